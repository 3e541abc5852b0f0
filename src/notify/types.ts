/**
 * Delivers a reminder to the streamer. Fire-and-forget: implementations
 * absorb their own delivery failures and never throw into the scheduler.
 */
export interface Notifier {
  readonly backend: string;
  notify(reminderType: string, message: string): void;
  notifyCustom(title: string, message: string): void;
}

const REMINDER_TITLES: Readonly<Record<string, string>> = {
  break: "Break Time",
  hydration: "Hydration Check",
  posture: "Posture Check",
  duration: "Stream Duration",
};

export function titleForReminder(reminderType: string): string {
  return REMINDER_TITLES[reminderType] ?? "Reminder";
}
