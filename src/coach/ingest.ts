import type { ChatMessage } from "../channels/adapter.js";
import type { CommandsConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import type { ActivityTracker } from "./activity.js";
import { parseCoachCommand } from "./commands.js";
import type { ReminderScheduler } from "./scheduler.js";

export interface ChatHandlerDeps {
  activity: ActivityTracker;
  scheduler: ReminderScheduler;
  commands: CommandsConfig;
  logger: Logger;
  showChat?: boolean;
}

/**
 * Builds the listener for a chat adapter's `message` event. Every message
 * counts as activity; coach commands from the streamer (and moderators, when
 * allowed) are executed as well.
 */
export function createChatHandler(deps: ChatHandlerDeps): (msg: ChatMessage) => void {
  const { activity, scheduler, commands, logger } = deps;

  return (msg) => {
    if (deps.showChat) {
      logger.info({ author: msg.author }, msg.content);
    }

    activity.onMessage(msg.author, msg.content, msg.isStreamer);

    if (!commands.enabled) return;
    const privileged = msg.isStreamer || (commands.allowModerators && msg.isModerator);
    if (!privileged) return;

    const command = parseCoachCommand(msg.content, commands.prefix);
    if (!command) return;

    switch (command.kind) {
      case "reset":
        logger.info({ author: msg.author, timer: command.timer }, "Reset requested from chat");
        scheduler.resetTimer(command.timer);
        break;
      case "status":
        scheduler.logTimerStatus();
        break;
    }
  };
}
