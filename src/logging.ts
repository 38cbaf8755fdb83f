import { danger, isDebugEnabled, muted, warn } from "./globals.js";
import { defaultRuntime, type RuntimeEnv } from "./runtime.js";

export type SubsystemLogger = {
  readonly subsystem: string;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  debug: (message: string) => void;
  child: (name: string) => SubsystemLogger;
};

/**
 * Create a logger whose lines are tagged with a subsystem name, e.g.
 * `[outreach/engine] Sent initial to a@b.co`.
 *
 * Output goes through the runtime so tests can capture it.
 */
export function createSubsystemLogger(
  subsystem: string,
  opts?: { runtime?: RuntimeEnv; debug?: boolean },
): SubsystemLogger {
  const runtime = opts?.runtime ?? defaultRuntime;
  const debugEnabled = opts?.debug ?? isDebugEnabled();
  const tag = muted(`[${subsystem}]`);

  return {
    subsystem,
    info: (message) => runtime.log(`${tag} ${message}`),
    warn: (message) => runtime.log(`${tag} ${warn(message)}`),
    error: (message) => runtime.error(`${tag} ${danger(message)}`),
    debug: (message) => {
      if (debugEnabled) {
        runtime.log(`${tag} ${muted(message)}`);
      }
    },
    child: (name) => createSubsystemLogger(`${subsystem}/${name}`, { runtime, debug: debugEnabled }),
  };
}
