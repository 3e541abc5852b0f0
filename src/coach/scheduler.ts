import type { TimersConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import type { Notifier } from "../notify/types.js";
import { capitalize } from "../utils/format.js";
import { sleep } from "../utils/sleep.js";
import type { ActivitySnapshot, ActivityTracker } from "./activity.js";
import { ReminderTimer, type TimerSnapshot } from "./timer.js";

export const DEFAULT_POLL_INTERVAL_MS = 10_000;

export interface TimerDefinition {
  readonly name: string;
  readonly configKey: Exclude<keyof TimersConfig, "messages">;
  readonly defaultMessage: string;
}

export const TIMER_CATALOG: readonly TimerDefinition[] = [
  {
    name: "break",
    configKey: "breakReminderMinutes",
    defaultMessage: "Time for a break! Stand up, stretch, rest your eyes.",
  },
  {
    name: "hydration",
    configKey: "hydrationReminderMinutes",
    defaultMessage: "Stay hydrated! Take a sip of water.",
  },
  {
    name: "posture",
    configKey: "postureReminderMinutes",
    defaultMessage: "Posture check! Sit up straight, relax your shoulders.",
  },
  {
    name: "duration",
    configKey: "streamDurationAlertMinutes",
    defaultMessage: "You've been streaming for a while. Consider wrapping up soon.",
  },
];

export interface PlannedTimer {
  readonly name: string;
  readonly intervalMinutes: number;
  readonly message: string;
}

/** Enabled timers for a config, in catalog order. A zero interval disables a timer. */
export function planTimers(config: TimersConfig): PlannedTimer[] {
  return TIMER_CATALOG.filter((def) => config[def.configKey] > 0).map((def) => ({
    name: def.name,
    intervalMinutes: config[def.configKey],
    message: config.messages[def.name] ?? def.defaultMessage,
  }));
}

export interface ReminderSchedulerDeps {
  activity: ActivityTracker;
  notifier: Notifier;
  logger: Logger;
  timers: TimersConfig;
  pollIntervalMs?: number;
  showTimers?: boolean;
}

export interface SchedulerStatus {
  readonly streamStartedAt: number;
  readonly streamDurationMs: number;
  readonly timers: TimerSnapshot[];
  readonly activity: ActivitySnapshot;
}

/**
 * Owns the reminder timers and the poll loop. Each tick delivers every timer
 * that is due (or already pending) if the activity tracker reports a good
 * moment; otherwise the timer stays pending and is retried on the next tick,
 * with no upper bound on how long it may wait.
 */
export class ReminderScheduler {
  private readonly activity: ActivityTracker;
  private readonly notifier: Notifier;
  private readonly logger: Logger;
  private readonly pollIntervalMs: number;
  private readonly showTimers: boolean;
  private readonly timers: ReminderTimer[];
  private readonly streamStartedAt: number;

  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(deps: ReminderSchedulerDeps) {
    this.activity = deps.activity;
    this.notifier = deps.notifier;
    this.logger = deps.logger;
    this.pollIntervalMs = deps.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.showTimers = deps.showTimers ?? true;

    this.streamStartedAt = Date.now();
    this.timers = planTimers(deps.timers).map(
      (plan) => new ReminderTimer(plan.name, plan.intervalMinutes, plan.message, this.streamStartedAt),
    );
  }

  /**
   * Runs the poll loop until `signal` (or `stop()`) aborts it. The returned
   * promise rejects with the abort reason so callers can tell cancellation
   * apart from completion.
   */
  start(signal?: AbortSignal): Promise<void> {
    if (this.loop) return this.loop;

    const controller = new AbortController();
    const forwardAbort = (): void => controller.abort(signal?.reason);
    if (signal?.aborted) {
      controller.abort(signal.reason);
    } else {
      signal?.addEventListener("abort", forwardAbort, { once: true });
    }

    const loop = this.run(controller.signal).finally(() => {
      signal?.removeEventListener("abort", forwardAbort);
      if (this.loop === loop) {
        this.controller = null;
        this.loop = null;
      }
    });
    this.controller = controller;
    this.loop = loop;
    return loop;
  }

  /** Cancels the loop and waits for it to exit. */
  async stop(): Promise<void> {
    const { controller, loop } = this;
    if (!controller || !loop) return;

    controller.abort();
    try {
      await loop;
    } catch (err) {
      if (err !== controller.signal.reason) throw err;
    }
    this.logger.info("Reminder scheduler stopped");
  }

  get running(): boolean {
    return this.loop !== null;
  }

  pollTick(): void {
    for (const timer of this.timers) {
      if (!timer.isDue() && !timer.pending) continue;

      timer.markPending();
      if (this.activity.isGoodMoment()) {
        this.deliver(timer);
      } else {
        this.logger.debug({ timer: timer.name }, "Reminder pending, waiting for a good moment");
      }
    }
  }

  resetTimer(name: string): boolean {
    const timer = this.getTimer(name);
    if (!timer) {
      this.logger.warn({ timer: name }, "Cannot reset unknown timer");
      return false;
    }

    timer.reset();
    if (this.showTimers) {
      this.logger.info({ timer: name }, `Reset ${name} timer`);
    }
    return true;
  }

  streamDuration(): number {
    return Date.now() - this.streamStartedAt;
  }

  getTimer(name: string): ReminderTimer | undefined {
    return this.timers.find((t) => t.name === name);
  }

  listTimers(): readonly ReminderTimer[] {
    return this.timers;
  }

  status(): SchedulerStatus {
    return {
      streamStartedAt: this.streamStartedAt,
      streamDurationMs: this.streamDuration(),
      timers: this.timers.map((t) => t.snapshot()),
      activity: this.activity.snapshot(),
    };
  }

  logTimerStatus(): void {
    if (this.timers.length === 0) {
      this.logger.info("No reminder timers enabled");
      return;
    }
    for (const timer of this.timers) {
      const minutes = Math.floor(timer.timeUntilDue() / 60_000);
      this.logger.info(
        { timer: timer.name, minutesRemaining: minutes, pending: timer.pending },
        `${capitalize(timer.name)}: ${minutes} min remaining`,
      );
    }
  }

  private async run(signal: AbortSignal): Promise<void> {
    this.logger.info(
      { timers: this.timers.map((t) => t.name), pollIntervalMs: this.pollIntervalMs },
      "Reminder scheduler started",
    );
    if (this.showTimers) this.logTimerStatus();

    try {
      for (;;) {
        signal.throwIfAborted();
        this.pollTick();
        await sleep(this.pollIntervalMs, signal);
      }
    } finally {
      this.logger.debug("Reminder scheduler loop exited");
    }
  }

  private deliver(timer: ReminderTimer): void {
    if (this.showTimers) {
      this.logger.info({ timer: timer.name }, `${capitalize(timer.name)} reminder`);
    }

    try {
      this.notifier.notify(timer.name, timer.message);
    } catch (err) {
      // Notifiers absorb their own failures; this only guards a broken one.
      this.logger.error({ err, timer: timer.name }, "Reminder delivery failed");
    }

    timer.trigger();
  }
}
