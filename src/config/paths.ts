import os from "node:os";
import path from "node:path";

export const STATE_DIR_ENV = "OUTREACH_STATE_DIR";
export const CONFIG_PATH_ENV = "OUTREACH_CONFIG_PATH";

function expandHome(value: string): string {
  if (value === "~") {
    return os.homedir();
  }
  if (value.startsWith("~/")) {
    return path.join(os.homedir(), value.slice(2));
  }
  return value;
}

export function resolveStateDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env[STATE_DIR_ENV]?.trim();
  if (override) {
    return path.resolve(expandHome(override));
  }
  return path.join(os.homedir(), ".recruiter-outreach");
}

export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const override = env[CONFIG_PATH_ENV]?.trim();
  if (override) {
    return path.resolve(expandHome(override));
  }
  return path.join(resolveStateDir(env), "config.json");
}
