import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import type { CoachConfig } from "./types.js";
import { getConfigPath } from "./paths.js";
import { parseConfig } from "./schema.js";

const ENV_PATTERN = /\$\{env:([A-Z_][A-Z0-9_]*)\}/g;

export function substituteEnv(raw: string): string {
  return raw.replace(ENV_PATTERN, (match, varName: string) => {
    const value = process.env[varName];
    if (value === undefined) {
      throw new Error(`Missing environment variable: ${varName} (referenced as ${match})`);
    }
    return value;
  });
}

export function readConfigFile(configPath: string): CoachConfig {
  const content = readFileSync(configPath, "utf-8");
  const raw: unknown = JSON.parse(substituteEnv(content));
  return parseConfig(raw);
}

export function loadConfig(path?: string): CoachConfig {
  const configPath = resolve(path ?? getConfigPath());

  try {
    return readConfigFile(configPath);
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return parseConfig({});
    }
    throw err;
  }
}
