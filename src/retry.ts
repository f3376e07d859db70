export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryOptions {
  attempts: number;
  /** Delay before retry number `attempt` (1-based). */
  delayMs: (attempt: number) => number;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  sleep?: Sleep;
}

export const exponentialBackoff =
  (baseMs: number, maxMs = 30_000) =>
  (attempt: number): number =>
    Math.min(baseMs * 2 ** (attempt - 1), maxMs);

/**
 * Runs `task` until it resolves or `attempts` runs have failed, then rethrows
 * the last error.
 */
export async function withRetry<T>(
  task: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const wait = options.sleep ?? sleep;
  let lastError: unknown;

  for (let attempt = 1; attempt <= options.attempts; attempt++) {
    try {
      return await task(attempt);
    } catch (error) {
      lastError = error;
      if (attempt === options.attempts) break;
      const delay = options.delayMs(attempt);
      options.onRetry?.(error, attempt, delay);
      await wait(delay);
    }
  }

  throw lastError;
}

export function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new Error(`${label} timed out after ${ms}ms`)), ms);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}
