import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { ReminderTimer } from "../../src/coach/timer.js";
import { MINUTE, STREAM_START } from "../helpers/fixtures.js";

function at(offsetMs: number): void {
  vi.setSystemTime(STREAM_START + offsetMs);
}

describe("ReminderTimer", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    at(0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("is not due before anchor + interval and due from that instant on", () => {
    const timer = new ReminderTimer("break", 5, "Take a break");

    at(5 * MINUTE - 1);
    expect(timer.isDue()).toBe(false);

    at(5 * MINUTE);
    expect(timer.isDue()).toBe(true);

    at(50 * MINUTE);
    expect(timer.isDue()).toBe(true);
  });

  it("does not change state when due-ness is checked repeatedly", () => {
    const timer = new ReminderTimer("break", 5, "Take a break");
    at(6 * MINUTE);

    const before = timer.snapshot();
    timer.isDue();
    timer.isDue();
    timer.isDue();

    expect(timer.snapshot()).toEqual(before);
  });

  it("re-anchors on trigger", () => {
    const timer = new ReminderTimer("break", 5, "Take a break");
    timer.markPending();

    at(7 * MINUTE);
    timer.trigger();

    expect(timer.isDue()).toBe(false);
    expect(timer.pending).toBe(false);
    expect(timer.lastTriggeredAt).toBe(STREAM_START + 7 * MINUTE);
    expect(timer.timeUntilDue()).toBe(5 * MINUTE);

    at(12 * MINUTE);
    expect(timer.isDue()).toBe(true);
  });

  it("never reports negative time until due", () => {
    const timer = new ReminderTimer("hydration", 45, "Drink water");

    at(10 * MINUTE);
    expect(timer.timeUntilDue()).toBe(35 * MINUTE);

    at(90 * MINUTE);
    expect(timer.timeUntilDue()).toBe(0);
  });

  it("uses the given anchor for the first due instant", () => {
    const timer = new ReminderTimer("posture", 90, "Sit up", STREAM_START - 30 * MINUTE);
    expect(timer.nextDueAt()).toBe(STREAM_START + 60 * MINUTE);
  });

  it("reset restarts the interval and clears pending", () => {
    const timer = new ReminderTimer("hydration", 45, "Drink water");
    at(50 * MINUTE);
    timer.markPending();

    timer.reset();

    expect(timer.pending).toBe(false);
    expect(timer.isDue()).toBe(false);
    expect(timer.timeUntilDue()).toBe(45 * MINUTE);
  });

  it("rejects non-positive intervals", () => {
    expect(() => new ReminderTimer("break", 0, "x")).toThrow(RangeError);
    expect(() => new ReminderTimer("break", -3, "x")).toThrow(
      'Timer "break" needs a positive interval, got -3',
    );
  });

  it("snapshots its state", () => {
    const timer = new ReminderTimer("break", 120, "Take a break");
    at(30 * MINUTE);

    expect(timer.snapshot()).toEqual({
      name: "break",
      intervalMs: 120 * MINUTE,
      message: "Take a break",
      lastTriggeredAt: null,
      nextDueAt: STREAM_START + 120 * MINUTE,
      msUntilDue: 90 * MINUTE,
      due: false,
      pending: false,
    });
  });
});
