import type { ContextConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";

const VELOCITY_WINDOW_MS = 5 * 60_000;
// Spans shorter than this (6s) would turn a couple of messages into a spike.
const MIN_VELOCITY_SPAN_MINUTES = 0.1;

export interface ActivitySnapshot {
  readonly lastMessageAt: number;
  readonly lastHypeAt: number | null;
  readonly secondsSinceLastMessage: number;
  readonly messagesPerMinute: number;
  readonly goodMoment: boolean;
}

/**
 * Rolling view of chat activity used to decide whether a reminder would
 * interrupt the stream.
 *
 * A moment is "good" only when chat has been silent for the quiet threshold
 * and the last hype keyword is older than the hype cooldown. Silence alone
 * does not clear a recent hype mention.
 */
export class ActivityTracker {
  private readonly quietThresholdMs: number;
  private readonly hypeCooldownMs: number;
  private readonly hypeKeywords: readonly string[];
  private readonly waitForQuiet: boolean;
  private readonly logger: Logger;

  private lastMessageAt = Date.now();
  private lastHypeAt: number | null = null;
  // Chronological; pruned to the velocity window on every message.
  private messageTimestamps: number[] = [];

  constructor(config: ContextConfig, logger: Logger) {
    this.quietThresholdMs = config.quietThresholdSeconds * 1000;
    this.hypeCooldownMs = config.hypeCooldownSeconds * 1000;
    this.hypeKeywords = config.hypeKeywords
      .map((kw) => kw.toLowerCase())
      .filter((kw) => kw.length > 0);
    this.waitForQuiet = config.waitForQuiet;
    this.logger = logger;
  }

  onMessage(author: string, content: string, isStreamer: boolean): void {
    const now = Date.now();
    this.lastMessageAt = now;
    this.messageTimestamps.push(now);

    const cutoff = now - VELOCITY_WINDOW_MS;
    const firstKept = this.messageTimestamps.findIndex((t) => t > cutoff);
    if (firstKept > 0) {
      this.messageTimestamps = this.messageTimestamps.slice(firstKept);
    }

    const lowered = content.toLowerCase();
    const keyword = this.hypeKeywords.find((kw) => lowered.includes(kw));
    if (keyword !== undefined) {
      this.lastHypeAt = now;
      this.logger.debug({ keyword, author, isStreamer }, "Hype detected");
    }
  }

  isGoodMoment(): boolean {
    if (!this.waitForQuiet) return true;

    const now = Date.now();
    const quiet = now - this.lastMessageAt >= this.quietThresholdMs;
    const pastHype =
      this.lastHypeAt === null || now - this.lastHypeAt >= this.hypeCooldownMs;

    this.logger.debug({ quiet, pastHype }, "Context check");
    return quiet && pastHype;
  }

  messagesPerMinute(): number {
    const now = Date.now();
    const cutoff = now - VELOCITY_WINDOW_MS;
    const recent = this.messageTimestamps.filter((t) => t > cutoff);

    const oldest = recent[0];
    if (oldest === undefined) return 0;

    const spanMinutes = (now - oldest) / 60_000;
    if (spanMinutes < MIN_VELOCITY_SPAN_MINUTES) return 0;

    return recent.length / spanMinutes;
  }

  secondsSinceLastMessage(): number {
    return (Date.now() - this.lastMessageAt) / 1000;
  }

  /** Timestamps currently held for the velocity window, oldest first. */
  retainedTimestamps(): readonly number[] {
    return [...this.messageTimestamps];
  }

  snapshot(): ActivitySnapshot {
    return {
      lastMessageAt: this.lastMessageAt,
      lastHypeAt: this.lastHypeAt,
      secondsSinceLastMessage: this.secondsSinceLastMessage(),
      messagesPerMinute: this.messagesPerMinute(),
      goodMoment: this.isGoodMoment(),
    };
  }
}
