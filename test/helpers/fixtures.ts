import { vi } from "vitest";
import type { ChatMessage } from "../../src/channels/adapter.js";
import type {
  CommandsConfig,
  ContextConfig,
  TimersConfig,
} from "../../src/config/types.js";
import type { Logger } from "../../src/logging/logger.js";
import type { Notifier } from "../../src/notify/types.js";

export const STREAM_START = new Date("2026-03-14T18:00:00.000Z").getTime();

export const SECOND = 1_000;
export const MINUTE = 60_000;

export function makeLogger(): Logger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn().mockReturnThis(),
    level: "info",
  } as unknown as Logger;
}

export function makeNotifier() {
  return {
    backend: "fake",
    notify: vi.fn<(reminderType: string, message: string) => void>(),
    notifyCustom: vi.fn<(title: string, message: string) => void>(),
  } satisfies Notifier;
}

export function makeContextConfig(overrides: Partial<ContextConfig> = {}): ContextConfig {
  return {
    quietThresholdSeconds: 30,
    hypeCooldownSeconds: 60,
    hypeKeywords: ["hype", "pog", "lets go", "amazing", "incredible"],
    waitForQuiet: true,
    ...overrides,
  };
}

export function makeTimersConfig(overrides: Partial<TimersConfig> = {}): TimersConfig {
  return {
    breakReminderMinutes: 120,
    hydrationReminderMinutes: 45,
    postureReminderMinutes: 90,
    streamDurationAlertMinutes: 240,
    messages: {},
    ...overrides,
  };
}

export function makeCommandsConfig(overrides: Partial<CommandsConfig> = {}): CommandsConfig {
  return {
    enabled: true,
    prefix: "!coach",
    allowModerators: true,
    ...overrides,
  };
}

export function makeChatMessage(overrides: Partial<ChatMessage> = {}): ChatMessage {
  return {
    id: "msg-1",
    author: "viewer",
    content: "hello chat",
    isStreamer: false,
    isModerator: false,
    timestamp: Date.now(),
    ...overrides,
  };
}
