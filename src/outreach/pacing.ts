import type { DelayRange } from "./config.js";
import { classifyExternalError } from "./errors.js";

export type Sleep = (ms: number) => Promise<void>;
export type RandomSource = () => number;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Uniform pick in `[minMs, maxMs]`. */
export function randomDelayMs(range: DelayRange, random: RandomSource = Math.random): number {
  const span = Math.max(0, range.maxMs - range.minMs);
  return range.minMs + Math.floor(random() * (span + 1));
}

/**
 * Human-paced waits between profile visits, sends and companies. The
 * external services throttle sessions that act at machine speed.
 */
export type Pacer = {
  pause: (range: DelayRange) => Promise<number>;
  sleep: Sleep;
};

export function createPacer(opts?: { sleep?: Sleep; random?: RandomSource }): Pacer {
  const sleepImpl = opts?.sleep ?? sleep;
  const random = opts?.random ?? Math.random;
  return {
    pause: async (range) => {
      const ms = randomDelayMs(range, random);
      if (ms > 0) {
        await sleepImpl(ms);
      }
      return ms;
    },
    sleep: sleepImpl,
  };
}

function jitter(baseMs: number, random: RandomSource): number {
  return baseMs + Math.floor(random() * Math.max(200, Math.floor(baseMs * 0.4)));
}

/** Retries transient failures with a growing, jittered delay. */
export async function withRetry<T>(params: {
  task: () => Promise<T>;
  maxAttempts?: number;
  baseDelayMs?: number;
  sleep?: Sleep;
  random?: RandomSource;
}): Promise<T> {
  const maxAttempts = params.maxAttempts ?? 3;
  const baseDelayMs = params.baseDelayMs ?? 600;
  const sleepImpl = params.sleep ?? sleep;
  const random = params.random ?? Math.random;
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await params.task();
    } catch (err) {
      lastError = err;
      if (!classifyExternalError(err).isTransient || attempt === maxAttempts) {
        throw err;
      }
      await sleepImpl(jitter(baseDelayMs * attempt, random));
    }
  }

  throw lastError instanceof Error ? lastError : new Error(String(lastError));
}
