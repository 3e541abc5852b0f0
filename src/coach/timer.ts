export interface TimerSnapshot {
  readonly name: string;
  readonly intervalMs: number;
  readonly message: string;
  readonly lastTriggeredAt: number | null;
  readonly nextDueAt: number;
  readonly msUntilDue: number;
  readonly due: boolean;
  readonly pending: boolean;
}

/**
 * One periodic reminder. Due-ness is measured from the last trigger, or from
 * the anchor (stream start) before the first one, and stays true until the
 * timer is triggered or reset.
 */
export class ReminderTimer {
  readonly name: string;
  readonly intervalMs: number;
  readonly message: string;
  readonly anchorAt: number;

  private triggeredAt: number | null = null;
  private isPending = false;

  constructor(name: string, intervalMinutes: number, message: string, anchorAt = Date.now()) {
    if (!(intervalMinutes > 0)) {
      throw new RangeError(`Timer "${name}" needs a positive interval, got ${intervalMinutes}`);
    }
    this.name = name;
    this.intervalMs = intervalMinutes * 60_000;
    this.message = message;
    this.anchorAt = anchorAt;
  }

  get lastTriggeredAt(): number | null {
    return this.triggeredAt;
  }

  /** Due but not yet delivered. */
  get pending(): boolean {
    return this.isPending;
  }

  markPending(): void {
    this.isPending = true;
  }

  isDue(): boolean {
    return Date.now() - (this.triggeredAt ?? this.anchorAt) >= this.intervalMs;
  }

  trigger(): void {
    this.triggeredAt = Date.now();
    this.isPending = false;
  }

  /** Manual acknowledgement: restart the interval from now. */
  reset(): void {
    this.trigger();
  }

  nextDueAt(): number {
    return (this.triggeredAt ?? this.anchorAt) + this.intervalMs;
  }

  timeUntilDue(): number {
    return Math.max(0, this.nextDueAt() - Date.now());
  }

  snapshot(): TimerSnapshot {
    return {
      name: this.name,
      intervalMs: this.intervalMs,
      message: this.message,
      lastTriggeredAt: this.triggeredAt,
      nextDueAt: this.nextDueAt(),
      msUntilDue: this.timeUntilDue(),
      due: this.isDue(),
      pending: this.isPending,
    };
  }
}
