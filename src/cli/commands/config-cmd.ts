import { Command, Option } from "clipanion";
import { loadConfig, readConfigFile } from "../../config/loader.js";
import { getConfigPath } from "../../config/paths.js";
import type { CoachConfig } from "../../config/types.js";

export function redactConfig(config: CoachConfig): CoachConfig {
  if (!config.chat.token) return config;
  return { ...config, chat: { ...config.chat, token: "***REDACTED***" } };
}

export class ConfigShowCommand extends Command {
  static override paths = [["config", "show"]];

  static override usage = Command.Usage({
    description: "Show the effective configuration (tokens redacted)",
    examples: [["Show config", "coach config show"]],
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

    this.context.stdout.write(JSON.stringify(redactConfig(config), null, 2) + "\n");
  }
}

export class ConfigValidateCommand extends Command {
  static override paths = [["config", "validate"]];

  static override usage = Command.Usage({
    description: "Validate a configuration file",
    examples: [
      ["Validate default config", "coach config validate"],
      ["Validate specific file", "coach config validate ./my-coach.json"],
    ],
  });

  configFile = Option.String({ name: "path", required: false });

  async execute(): Promise<void> {
    const configPath = this.configFile ?? getConfigPath();

    try {
      readConfigFile(configPath);
      this.context.stdout.write(`Config is valid: ${configPath}\n`);
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        this.context.stdout.write(`Config file not found: ${configPath}\n`);
      } else {
        this.context.stdout.write(
          `Config is INVALID: ${configPath}\n` +
            `  ${err instanceof Error ? err.message : String(err)}\n`,
        );
      }
      process.exitCode = 1;
    }
  }
}
