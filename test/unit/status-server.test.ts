import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { Hono } from "hono";
import { ActivityTracker } from "../../src/coach/activity.js";
import { ReminderScheduler } from "../../src/coach/scheduler.js";
import { createStatusApp } from "../../src/status/server.js";
import {
  MINUTE,
  STREAM_START,
  makeContextConfig,
  makeLogger,
  makeNotifier,
  makeTimersConfig,
} from "../helpers/fixtures.js";

describe("status app", () => {
  let scheduler: ReminderScheduler;
  let app: Hono;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(STREAM_START);
    const logger = makeLogger();
    scheduler = new ReminderScheduler({
      activity: new ActivityTracker(makeContextConfig(), logger),
      notifier: makeNotifier(),
      logger,
      timers: makeTimersConfig({ postureReminderMinutes: 0, streamDurationAlertMinutes: 0 }),
    });
    app = createStatusApp(scheduler);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe("GET /health", () => {
    it("reports stream duration and a stopped loop", async () => {
      vi.setSystemTime(STREAM_START + 90 * MINUTE);

      const res = await app.request("/health");
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        status: "stopped",
        uptime: 90 * MINUTE,
        uptimeHuman: "1h 30m",
        streamDurationMs: 90 * MINUTE,
        streamDurationHuman: "1h 30m",
      });
    });
  });

  describe("GET /timers", () => {
    it("lists enabled timers", async () => {
      vi.setSystemTime(STREAM_START + 15 * MINUTE);

      const res = await app.request("/timers");
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        timers: [
          {
            name: "break",
            intervalMs: 120 * MINUTE,
            message: "Time for a break! Stand up, stretch, rest your eyes.",
            lastTriggeredAt: null,
            nextDueAt: STREAM_START + 120 * MINUTE,
            msUntilDue: 105 * MINUTE,
            due: false,
            pending: false,
          },
          {
            name: "hydration",
            intervalMs: 45 * MINUTE,
            message: "Stay hydrated! Take a sip of water.",
            lastTriggeredAt: null,
            nextDueAt: STREAM_START + 45 * MINUTE,
            msUntilDue: 30 * MINUTE,
            due: false,
            pending: false,
          },
        ],
      });
    });
  });

  describe("GET /activity", () => {
    it("returns the activity snapshot", async () => {
      const res = await app.request("/activity");
      const body = await res.json();
      expect(body).toMatchObject({
        lastMessageAt: STREAM_START,
        lastHypeAt: null,
        messagesPerMinute: 0,
        goodMoment: false,
      });
    });
  });

  describe("POST /timers/:name/reset", () => {
    it("re-anchors a known timer", async () => {
      vi.setSystemTime(STREAM_START + 40 * MINUTE);

      const res = await app.request("/timers/hydration/reset", { method: "POST" });
      expect(res.status).toBe(200);
      const body = await res.json();
      expect(body).toMatchObject({
        reset: true,
        timer: {
          name: "hydration",
          lastTriggeredAt: STREAM_START + 40 * MINUTE,
          nextDueAt: STREAM_START + 85 * MINUTE,
          pending: false,
        },
      });
      expect(scheduler.getTimer("hydration")?.timeUntilDue()).toBe(45 * MINUTE);
    });

    it("returns 404 for an unknown timer", async () => {
      const res = await app.request("/timers/snack/reset", { method: "POST" });
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: "Unknown timer: snack" });
    });

    it("rejects GET on the reset route", async () => {
      const res = await app.request("/timers/hydration/reset");
      expect(res.status).toBe(404);
    });
  });
});
