import { Cli } from "clipanion";
import { CoachRunCommand } from "./commands/run.js";
import { ConfigShowCommand, ConfigValidateCommand } from "./commands/config-cmd.js";
import { TimersCommand } from "./commands/timers.js";
import { StatusCommand } from "./commands/status.js";
import { DoctorCommand } from "./commands/doctor.js";

export function createCli(version: string): Cli {
  const cli = new Cli({
    binaryLabel: "Stream Coach",
    binaryName: "coach",
    binaryVersion: version,
  });

  cli.register(CoachRunCommand);

  // Config commands
  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);

  cli.register(TimersCommand);
  cli.register(StatusCommand);
  cli.register(DoctorCommand);

  return cli;
}
