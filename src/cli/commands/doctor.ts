import { Command, Option } from "clipanion";
import { loadConfig } from "../../config/loader.js";
import { getConfigPath } from "../../config/paths.js";
import { validateChatConfig } from "../../config/schema.js";
import { planTimers } from "../../coach/scheduler.js";
import { hasDesktopSession } from "../../notify/index.js";

export class DoctorCommand extends Command {
  static override paths = [["doctor"]];

  static override usage = Command.Usage({
    description: "Run diagnostic checks on the coach configuration and environment",
    examples: [["Run diagnostics", "coach doctor"]],
  });

  configFile = Option.String("--config,-c", { required: false });

  async execute(): Promise<void> {
    this.context.stdout.write("Coach Doctor\n");
    this.context.stdout.write("============\n\n");

    let allPassed = true;

    // Check 1: Config valid
    const configPath = this.configFile ?? getConfigPath();
    let config;
    try {
      config = loadConfig(configPath);
      this.context.stdout.write(`[PASS] Config valid (${configPath})\n`);
    } catch (err) {
      this.context.stdout.write(
        `[FAIL] Config invalid (${configPath}): ${err instanceof Error ? err.message : String(err)}\n`,
      );
      process.exitCode = 1;
      return;
    }

    // Check 2: Chat credentials
    const problems = validateChatConfig(config.chat);
    if (problems.length === 0) {
      this.context.stdout.write(
        `[PASS] Chat configured (${config.chat.platform}: ${config.chat.channel})\n`,
      );
    } else {
      for (const problem of problems) {
        this.context.stdout.write(`[FAIL] ${problem}\n`);
      }
      allPassed = false;
    }

    // Check 3: Timers
    const timers = planTimers(config.timers);
    if (timers.length > 0) {
      this.context.stdout.write(
        `[PASS] Timers enabled (${timers.map((t) => t.name).join(", ")})\n`,
      );
    } else {
      this.context.stdout.write("[WARN] All reminder timers are disabled\n");
    }

    // Check 4: Notification backend
    const desktop = hasDesktopSession({ platform: process.platform, env: process.env });
    if (config.notifications.backend === "console") {
      this.context.stdout.write("[PASS] Notifications go to the log (console backend)\n");
    } else if (desktop) {
      this.context.stdout.write(`[PASS] Desktop notifications available (${process.platform})\n`);
    } else if (config.notifications.backend === "auto") {
      this.context.stdout.write("[WARN] No desktop session, reminders will be logged instead\n");
    } else {
      this.context.stdout.write("[FAIL] Desktop backend requested but no desktop session found\n");
      allPassed = false;
    }

    this.context.stdout.write(
      `\n${allPassed ? "All checks passed." : "Some checks failed."}\n`,
    );
    if (!allPassed) process.exitCode = 1;
  }
}
