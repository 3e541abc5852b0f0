import { loadConfig } from "../config/loader.js";
import { validateChatConfig } from "../config/schema.js";
import type { ChatPlatform, CoachConfig } from "../config/types.js";
import { createLogger, type Logger } from "../logging/logger.js";
import { ActivityTracker } from "../coach/activity.js";
import { ReminderScheduler } from "../coach/scheduler.js";
import { createChatHandler } from "../coach/ingest.js";
import { createNotifier, type Notifier } from "../notify/index.js";
import type { ChatAdapter } from "../channels/adapter.js";
import { TwitchAdapter } from "../channels/twitch/index.js";
import { DiscordAdapter } from "../channels/discord/index.js";
import { StatusServer } from "../status/server.js";

export interface CoachContext {
  config: CoachConfig;
  logger: Logger;
  activity: ActivityTracker;
  scheduler: ReminderScheduler;
  notifier: Notifier;
  adapter: ChatAdapter;
  statusServer: StatusServer | null;
  abortController: AbortController;
  shutdown: () => Promise<void>;
  /** Settles once shutdown has finished. */
  closed: Promise<void>;
}

const ADAPTER_FACTORIES: Record<ChatPlatform, () => ChatAdapter> = {
  twitch: () => new TwitchAdapter(),
  discord: () => new DiscordAdapter(),
};

const SHUTDOWN_TIMEOUT_MS = 10_000;

export async function startCoach(configPath?: string): Promise<CoachContext> {
  // 1. Load config
  const config = loadConfig(configPath);

  // 2. Create logger
  const logger = createLogger(config.logging);
  logger.info("Starting stream coach...");

  // 3. Credentials are the only fatal configuration problem
  const problems = validateChatConfig(config.chat);
  if (problems.length > 0) {
    throw new Error(`Chat configuration incomplete: ${problems.join("; ")}`);
  }

  // 4. Core components
  const notifier = createNotifier(config.notifications, logger.child({ component: "notifier" }));
  const activity = new ActivityTracker(config.context, logger.child({ component: "activity" }));
  const scheduler = new ReminderScheduler({
    activity,
    notifier,
    logger: logger.child({ component: "scheduler" }),
    timers: config.timers,
    pollIntervalMs: config.scheduler.pollIntervalSeconds * 1000,
    showTimers: config.logging.showTimers,
  });
  logger.info({ backend: notifier.backend }, "Notifier ready");

  const abortController = new AbortController();

  // 5. Chat source
  const adapter = ADAPTER_FACTORIES[config.chat.platform]();
  const chatLogger = logger.child({ channel: adapter.id });

  adapter.events.on(
    "message",
    createChatHandler({
      activity,
      scheduler,
      commands: config.commands,
      logger: chatLogger,
      showChat: config.logging.showChat,
    }),
  );

  adapter.events.on("connected", () => {
    chatLogger.info({ chat: config.chat.channel }, "Chat connected");
  });

  adapter.events.on("disconnected", (reason) => {
    chatLogger.warn({ reason }, "Chat disconnected");
  });

  adapter.events.on("error", (err) => {
    chatLogger.error({ err }, "Chat error");
  });

  logger.info({ platform: adapter.label, chat: config.chat.channel }, "Connecting to chat...");
  try {
    await adapter.start(config.chat, abortController.signal);
  } catch (err) {
    abortController.abort();
    await adapter.stop().catch((stopErr: unknown) => {
      chatLogger.warn({ err: stopErr }, "Error stopping chat");
    });
    throw err;
  }

  // 6. Status server
  let statusServer: StatusServer | null = null;
  if (config.status.enabled) {
    statusServer = new StatusServer(scheduler, config.status.port, config.status.hostname);
    await statusServer.start();
    logger.info(
      { port: config.status.port, hostname: config.status.hostname },
      "Status server started",
    );
  }

  // 7. Graceful shutdown (use 'once' to avoid handler accumulation)
  let markClosed: () => void = () => {};
  const closed = new Promise<void>((resolve) => {
    markClosed = resolve;
  });
  let shutdownInProgress: Promise<void> | null = null;

  const runShutdown = async (): Promise<void> => {
    logger.info("Shutting down...");

    const forceExit = setTimeout(() => {
      logger.warn("Shutdown timeout reached, forcing exit");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExit.unref();

    try {
      abortController.abort();
      try {
        await scheduler.stop();
      } catch (err) {
        logger.error({ err }, "Reminder scheduler exited with an error");
      }

      try {
        await adapter.stop();
      } catch (err) {
        logger.error({ err, channel: adapter.id }, "Error stopping chat");
      }

      if (statusServer) {
        await statusServer.stop();
      }
    } finally {
      clearTimeout(forceExit);
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
      logger.info("Shutdown complete. Take care of yourself!");
      markClosed();
    }
  };

  const shutdown = (): Promise<void> => {
    shutdownInProgress ??= runShutdown();
    return shutdownInProgress;
  };

  const onSignal = (): void => {
    shutdown().catch((err: unknown) => {
      logger.error({ err }, "Shutdown failed");
      process.exitCode = 1;
    });
  };

  process.once("SIGTERM", onSignal);
  process.once("SIGINT", onSignal);

  // 8. Reminder loop
  scheduler.start(abortController.signal).catch((err: unknown) => {
    if (abortController.signal.aborted) return;
    logger.fatal({ err }, "Reminder scheduler stopped unexpectedly");
    process.exitCode = 1;
    onSignal();
  });

  logger.info("Monitoring chat for good moments (Ctrl+C to stop)");
  return {
    config,
    logger,
    activity,
    scheduler,
    notifier,
    adapter,
    statusServer,
    abortController,
    shutdown,
    closed,
  };
}
