import type { NotificationsConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import { ConsoleNotifier } from "./console.js";
import { DesktopNotifier } from "./desktop.js";
import type { Notifier } from "./types.js";

export type { Notifier } from "./types.js";

export interface NotifierEnvironment {
  readonly platform: NodeJS.Platform;
  readonly env: NodeJS.ProcessEnv;
}

/** Linux needs a graphical session for notify-send; Windows and macOS always have one. */
export function hasDesktopSession(environment: NotifierEnvironment): boolean {
  if (environment.platform === "win32" || environment.platform === "darwin") return true;
  return Boolean(environment.env["DISPLAY"] || environment.env["WAYLAND_DISPLAY"]);
}

/**
 * Picks the delivery backend once at startup; nothing downstream branches on
 * the platform.
 */
export function createNotifier(
  config: NotificationsConfig,
  logger: Logger,
  environment: NotifierEnvironment = { platform: process.platform, env: process.env },
): Notifier {
  if (config.backend === "console") {
    return new ConsoleNotifier(logger);
  }

  if (config.backend === "auto" && !hasDesktopSession(environment)) {
    logger.warn(
      { platform: environment.platform },
      "No desktop session detected, reminders will be written to the log",
    );
    return new ConsoleNotifier(logger);
  }

  return new DesktopNotifier(config, logger);
}
