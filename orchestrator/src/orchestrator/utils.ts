import { performance } from "node:perf_hooks";
import { config } from "./config.js";

export interface TimedResult<T> {
  result: T;
  durationMs: number;
}

export async function measureAsync<T>(fn: () => Promise<T>): Promise<TimedResult<T>> {
  const start = performance.now();
  const result = await fn();
  const durationMs = performance.now() - start;
  return { result, durationMs };
}

export function measureSync<T>(fn: () => T): TimedResult<T> {
  const start = performance.now();
  const result = fn();
  return { result, durationMs: performance.now() - start };
}

export async function sleep(seconds: number): Promise<void> {
  await new Promise((resolve) => setTimeout(resolve, seconds * 1000));
}

export async function exponentialBackoff<T>(
  operation: () => Promise<T>,
  options: { retries?: number; baseDelaySeconds?: number } = {}
): Promise<T> {
  const { retries = config.MAX_RETRIES, baseDelaySeconds = config.RETRY_BACKOFF_BASE } = options;
  let attempt = 0;
  // eslint-disable-next-line no-constant-condition
  while (true) {
    try {
      return await operation();
    } catch (error) {
      attempt += 1;
      if (attempt > retries) {
        throw error;
      }
      const delay = baseDelaySeconds * 2 ** (attempt - 1);
      await sleep(delay);
    }
  }
}
