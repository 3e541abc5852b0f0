import { Command, Option } from "clipanion";
import { loadConfig } from "../../config/loader.js";
import { planTimers } from "../../coach/scheduler.js";
import { capitalize } from "../../utils/format.js";

export class TimersCommand extends Command {
  static override paths = [["timers"]];

  static override usage = Command.Usage({
    description: "List the reminder schedule the config produces",
    examples: [["Show reminder schedule", "coach timers"]],
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

    const plan = planTimers(config.timers);
    if (plan.length === 0) {
      this.context.stdout.write("No reminder timers enabled\n");
      return;
    }

    this.context.stdout.write("Reminder timers:\n");
    for (const timer of plan) {
      this.context.stdout.write(
        `  - ${capitalize(timer.name)} every ${timer.intervalMinutes} min: ${timer.message}\n`,
      );
    }

    const { quietThresholdSeconds, hypeCooldownSeconds, waitForQuiet } = config.context;
    this.context.stdout.write(
      waitForQuiet
        ? `Waits for ${quietThresholdSeconds}s of quiet and ${hypeCooldownSeconds}s after hype\n`
        : "Delivers as soon as due (waitForQuiet is off)\n",
    );
  }
}
