import type { Logger } from "../logging/logger.js";
import { titleForReminder, type Notifier } from "./types.js";

/** Writes reminders to the log. Used where no desktop session is available. */
export class ConsoleNotifier implements Notifier {
  readonly backend = "console";

  constructor(private readonly logger: Logger) {}

  notify(reminderType: string, message: string): void {
    this.logger.info({ reminder: reminderType, title: titleForReminder(reminderType) }, message);
  }

  notifyCustom(title: string, message: string): void {
    this.logger.info({ title }, message);
  }
}
