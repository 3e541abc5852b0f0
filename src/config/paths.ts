export function getConfigPath(): string {
  return process.env["COACH_CONFIG_PATH"] ?? "coach.config.json";
}
