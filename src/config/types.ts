export type ChatPlatform = "twitch" | "discord";
export type NotificationBackend = "auto" | "desktop" | "console";

export interface CoachConfig {
  readonly chat: ChatConfig;
  readonly timers: TimersConfig;
  readonly context: ContextConfig;
  readonly scheduler: SchedulerConfig;
  readonly notifications: NotificationsConfig;
  readonly commands: CommandsConfig;
  readonly status: StatusConfig;
  readonly logging: LoggingConfig;
}

export interface ChatConfig {
  readonly platform: ChatPlatform;
  /** Twitch channel login, or the Discord text channel id to watch. */
  readonly channel: string;
  readonly username?: string;
  readonly token?: string;
  /** Discord user id of the streamer. Twitch derives it from the channel. */
  readonly streamerId?: string;
}

export interface TimersConfig {
  readonly breakReminderMinutes: number;
  readonly hydrationReminderMinutes: number;
  readonly postureReminderMinutes: number;
  readonly streamDurationAlertMinutes: number;
  readonly messages: Record<string, string>;
}

export interface ContextConfig {
  readonly quietThresholdSeconds: number;
  readonly hypeCooldownSeconds: number;
  readonly hypeKeywords: readonly string[];
  readonly waitForQuiet: boolean;
}

export interface SchedulerConfig {
  readonly pollIntervalSeconds: number;
}

export interface NotificationsConfig {
  readonly backend: NotificationBackend;
  readonly sound: boolean;
  readonly appName: string;
  readonly duration: "long" | "short";
}

export interface CommandsConfig {
  readonly enabled: boolean;
  readonly prefix: string;
  readonly allowModerators: boolean;
}

export interface StatusConfig {
  readonly enabled: boolean;
  readonly port: number;
  readonly hostname: string;
}

export interface LoggingConfig {
  readonly level: "debug" | "info" | "warn" | "error";
  readonly file?: string;
  readonly json?: boolean;
  readonly showChat: boolean;
  readonly showTimers: boolean;
}
