import { z } from "zod";
import type { ChatConfig, CoachConfig } from "./types.js";

export const DEFAULT_HYPE_KEYWORDS = ["hype", "pog", "lets go", "amazing", "incredible"];

// Timer and context values never abort startup: anything malformed
// falls back to its default.
const minutes = (fallback: number) => z.number().min(0).catch(fallback);
const seconds = (fallback: number) => z.number().min(0).catch(fallback);

const chatSchema = z.object({
  platform: z.enum(["twitch", "discord"]).default("twitch"),
  channel: z.string().default(""),
  username: z.string().optional(),
  token: z.string().optional(),
  streamerId: z.string().optional(),
});

const timersSchema = z.object({
  breakReminderMinutes: minutes(120),
  hydrationReminderMinutes: minutes(45),
  postureReminderMinutes: minutes(90),
  streamDurationAlertMinutes: minutes(240),
  messages: z.record(z.string(), z.string()).catch({}),
});

const contextSchema = z.object({
  quietThresholdSeconds: seconds(30),
  hypeCooldownSeconds: seconds(60),
  hypeKeywords: z.array(z.string()).catch(() => [...DEFAULT_HYPE_KEYWORDS]),
  waitForQuiet: z.boolean().catch(true),
});

const schedulerSchema = z.object({
  pollIntervalSeconds: z.number().positive().catch(10),
});

const notificationsSchema = z.object({
  backend: z.enum(["auto", "desktop", "console"]).default("auto"),
  sound: z.boolean().default(true),
  appName: z.string().min(1).default("Coach"),
  duration: z.enum(["long", "short"]).default("long"),
});

const commandsSchema = z.object({
  enabled: z.boolean().default(true),
  prefix: z.string().min(1).default("!coach"),
  allowModerators: z.boolean().default(true),
});

const statusSchema = z.object({
  enabled: z.boolean().default(false),
  port: z.number().int().positive().default(19877),
  hostname: z.string().default("127.0.0.1"),
});

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  file: z.string().optional(),
  json: z.boolean().optional(),
  showChat: z.boolean().default(false),
  showTimers: z.boolean().default(true),
});

export const coachConfigSchema = z.object({
  chat: chatSchema.default({}),
  timers: timersSchema.catch(() => timersSchema.parse({})),
  context: contextSchema.catch(() => contextSchema.parse({})),
  scheduler: schedulerSchema.catch(() => schedulerSchema.parse({})),
  notifications: notificationsSchema.default({}),
  commands: commandsSchema.default({}),
  status: statusSchema.default({}),
  logging: loggingSchema.default({}),
});

export function parseConfig(raw: unknown): CoachConfig {
  return coachConfigSchema.parse(raw);
}

/**
 * Lists what the selected chat platform still needs before it can connect.
 * An empty list means the chat section is usable.
 */
export function validateChatConfig(chat: ChatConfig): string[] {
  const problems: string[] = [];
  if (!chat.channel) {
    problems.push(
      chat.platform === "discord"
        ? "chat.channel must be the Discord channel id to watch"
        : "chat.channel must be the Twitch channel to join",
    );
  }
  if (chat.platform === "discord" && !chat.token) {
    problems.push("chat.token (Discord bot token) is required");
  }
  if (chat.platform === "twitch" && chat.token && !chat.username) {
    problems.push("chat.username is required when chat.token is set");
  }
  return problems;
}
