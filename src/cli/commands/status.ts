import { Command, Option } from "clipanion";
import { z } from "zod";
import { loadConfig } from "../../config/loader.js";
import type { TimerSnapshot } from "../../coach/timer.js";
import { capitalize, formatDuration } from "../../utils/format.js";

const timersResponseSchema = z.object({
  timers: z.array(
    z.object({
      name: z.string(),
      intervalMs: z.number(),
      message: z.string(),
      lastTriggeredAt: z.number().nullable(),
      nextDueAt: z.number(),
      msUntilDue: z.number(),
      due: z.boolean(),
      pending: z.boolean(),
    }),
  ),
});

export function formatTimerLine(timer: TimerSnapshot): string {
  const state = timer.pending
    ? "pending (waiting for a good moment)"
    : `due in ${formatDuration(timer.msUntilDue)}`;
  return `  - ${capitalize(timer.name)}: ${state}`;
}

export class StatusCommand extends Command {
  static override paths = [["status"]];

  static override usage = Command.Usage({
    description: "Show live timer state from a running coach (needs status.enabled)",
    examples: [["Show status", "coach status"]],
  });

  configFile = Option.String("--config,-c", { required: false });

  async execute(): Promise<void> {
    let config;
    try {
      config = loadConfig(this.configFile);
    } catch (err) {
      this.context.stdout.write(
        `Failed to load config: ${err instanceof Error ? err.message : String(err)}\n`,
      );
      process.exitCode = 1;
      return;
    }

    if (!config.status.enabled) {
      this.context.stdout.write("Status server is disabled (set status.enabled in the config)\n");
      process.exitCode = 1;
      return;
    }

    const url = `http://${config.status.hostname}:${config.status.port}/timers`;
    let body: z.infer<typeof timersResponseSchema>;
    try {
      const res = await fetch(url, { signal: AbortSignal.timeout(5000) });
      if (!res.ok) {
        this.context.stdout.write(`Coach returned status ${res.status} (${url})\n`);
        process.exitCode = 1;
        return;
      }
      body = timersResponseSchema.parse(await res.json());
    } catch (err) {
      this.context.stdout.write(
        `Could not read coach status (${url}): ${err instanceof Error ? err.message : String(err)}\n`,
      );
      process.exitCode = 1;
      return;
    }

    this.context.stdout.write("Reminder timers:\n");
    for (const timer of body.timers) {
      this.context.stdout.write(formatTimerLine(timer) + "\n");
    }
  }
}
