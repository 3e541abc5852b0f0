import { Hono } from "hono";
import { serve } from "@hono/node-server";
import type { ReminderScheduler } from "../coach/scheduler.js";
import { formatDuration } from "../utils/format.js";

export function createStatusApp(scheduler: ReminderScheduler): Hono {
  const app = new Hono();
  const startedAt = Date.now();

  app.get("/health", (c) => {
    const uptime = Date.now() - startedAt;
    return c.json({
      status: scheduler.running ? "ok" : "stopped",
      uptime,
      uptimeHuman: formatDuration(uptime),
      streamDurationMs: scheduler.streamDuration(),
      streamDurationHuman: formatDuration(scheduler.streamDuration()),
    });
  });

  app.get("/timers", (c) => {
    return c.json({ timers: scheduler.listTimers().map((t) => t.snapshot()) });
  });

  app.get("/activity", (c) => {
    return c.json(scheduler.status().activity);
  });

  app.post("/timers/:name/reset", (c) => {
    const name = c.req.param("name");
    if (!scheduler.resetTimer(name)) {
      return c.json({ error: `Unknown timer: ${name}` }, 404);
    }
    const timer = scheduler.getTimer(name);
    return c.json({ reset: true, timer: timer?.snapshot() ?? null });
  });

  return app;
}

export class StatusServer {
  private readonly app: Hono;
  private server: ReturnType<typeof serve> | null = null;

  constructor(
    scheduler: ReminderScheduler,
    private readonly port: number,
    private readonly hostname: string,
  ) {
    this.app = createStatusApp(scheduler);
  }

  async start(): Promise<void> {
    this.server = serve({
      fetch: this.app.fetch,
      port: this.port,
      hostname: this.hostname,
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  }
}
