import notifier from "node-notifier";
import type { NotificationsConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import { titleForReminder, type Notifier } from "./types.js";

export interface DesktopNotification {
  readonly title: string;
  readonly message: string;
  readonly appID: string;
  readonly sound: boolean;
  readonly timeout: number;
  readonly wait: boolean;
}

export type DesktopSend = (
  notification: DesktopNotification,
  callback: (err: Error | null) => void,
) => void;

const LONG_TIMEOUT_SECONDS = 10;
const SHORT_TIMEOUT_SECONDS = 5;

const sendWithNodeNotifier: DesktopSend = (notification, callback) => {
  notifier.notify(notification, (err) => callback(err));
};

/**
 * Native toast notifications. node-notifier picks the platform backend
 * (Windows toasts, macOS Notification Center, notify-send on Linux).
 */
export class DesktopNotifier implements Notifier {
  readonly backend = "desktop";

  private readonly appName: string;
  private readonly sound: boolean;
  private readonly timeoutSeconds: number;
  private readonly logger: Logger;
  private readonly send: DesktopSend;

  constructor(
    config: Pick<NotificationsConfig, "appName" | "sound" | "duration">,
    logger: Logger,
    send: DesktopSend = sendWithNodeNotifier,
  ) {
    this.appName = config.appName;
    this.sound = config.sound;
    this.timeoutSeconds =
      config.duration === "long" ? LONG_TIMEOUT_SECONDS : SHORT_TIMEOUT_SECONDS;
    this.logger = logger;
    this.send = send;
  }

  notify(reminderType: string, message: string): void {
    this.dispatch(titleForReminder(reminderType), message);
  }

  notifyCustom(title: string, message: string): void {
    this.dispatch(title, message);
  }

  private dispatch(title: string, message: string): void {
    const notification: DesktopNotification = {
      title,
      message,
      appID: this.appName,
      sound: this.sound,
      timeout: this.timeoutSeconds,
      wait: false,
    };

    const onDelivered = (err: Error | null): void => {
      if (err) {
        this.logger.warn({ err, title }, "Desktop notification failed");
      }
    };

    try {
      this.send(notification, onDelivered);
    } catch (err) {
      this.logger.warn({ err, title }, "Desktop notification failed");
    }
  }
}
