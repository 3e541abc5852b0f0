import { Command, Option } from "clipanion";
import { startCoach } from "../../runtime/lifecycle.js";
import { printBanner } from "../banner.js";
import { VERSION } from "../version.js";

export class CoachRunCommand extends Command {
  static override paths = [["run"], Command.Default];

  static override usage = Command.Usage({
    description: "Watch chat and deliver self-care reminders at quiet moments",
    examples: [
      ["Start with default config", "coach run"],
      ["Start with custom config", "coach run --config ./my-coach.json"],
    ],
  });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  async execute(): Promise<number> {
    printBanner(VERSION);

    let ctx;
    try {
      ctx = await startCoach(this.config);
    } catch (err) {
      this.context.stderr.write(
        `Failed to start coach: ${err instanceof Error ? err.message : String(err)}\n`,
      );
      return 1;
    }

    // Runs until SIGINT/SIGTERM completes the shutdown
    await ctx.closed;
    return 0;
  }
}
