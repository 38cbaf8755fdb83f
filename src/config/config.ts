import fs from "node:fs";
import { ConfigError } from "../outreach/errors.js";
import { resolveConfigPath } from "./paths.js";

/** Raw, unvalidated contents of the config file. */
export type RawOutreachConfig = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function loadConfig(configPath: string = resolveConfigPath()): RawOutreachConfig {
  let text: string;
  try {
    text = fs.readFileSync(configPath, "utf8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      return {};
    }
    throw new ConfigError(`Cannot read config at ${configPath}`, { cause: err });
  }

  if (!text.trim()) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Config at ${configPath} is not valid JSON`, { cause: err });
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`Config at ${configPath} must be a JSON object`);
  }
  return parsed;
}
