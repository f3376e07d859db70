import { CompletionCancelledError, CompletionTimeoutError } from './errors';

interface Pending<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: Error) => void;
  timer?: NodeJS.Timeout;
}

export interface CompletionHandle<T> {
  readonly id: string;
  /**
   * Resolves with the value passed to `resolve(id, …)`. Rejects with
   * CompletionTimeoutError after `timeoutMs`, removing the entry.
   */
  wait(timeoutMs: number): Promise<T>;
}

/**
 * Correlates ids with waiters. Every method runs synchronously to completion,
 * so an insert, lookup and removal on one key never interleave between the
 * HTTP handlers and the result consumer.
 */
export class CompletionRegistry<T> {
  private readonly pending = new Map<string, Pending<T>>();

  register(id: string): CompletionHandle<T> {
    if (this.pending.has(id)) {
      throw new Error(`Completion ${id} is already registered`);
    }

    const settle: Pick<Pending<T>, 'resolve' | 'reject'> = {
      resolve: () => undefined,
      reject: () => undefined,
    };
    // The executor runs synchronously, so `settle` holds the real callbacks below.
    const promise = new Promise<T>((resolve, reject) => {
      settle.resolve = resolve;
      settle.reject = reject;
    });
    // A handle cancelled before anyone waits on it must not surface as an unhandled rejection.
    promise.catch(() => undefined);

    const entry: Pending<T> = { promise, resolve: settle.resolve, reject: settle.reject };
    this.pending.set(id, entry);

    return {
      id,
      wait: (timeoutMs: number) => {
        if (this.pending.get(id) === entry && !entry.timer) {
          entry.timer = setTimeout(() => {
            if (this.remove(id, entry)) {
              entry.reject(new CompletionTimeoutError(id, timeoutMs));
            }
          }, timeoutMs);
        }
        return entry.promise;
      },
    };
  }

  /** Wakes the waiter for `id`. Returns false when no waiter is registered. */
  resolve(id: string, value: T): boolean {
    const entry = this.pending.get(id);
    if (!entry || !this.remove(id, entry)) {
      return false;
    }
    entry.resolve(value);
    return true;
  }

  /** Drops the waiter for `id` without resolving it. */
  cancel(id: string, reason = 'cancelled'): boolean {
    const entry = this.pending.get(id);
    if (!entry || !this.remove(id, entry)) {
      return false;
    }
    entry.reject(new CompletionCancelledError(id, reason));
    return true;
  }

  /** Rejects every outstanding waiter; used on shutdown. */
  cancelAll(reason: string): number {
    const ids = Array.from(this.pending.keys());
    for (const id of ids) {
      this.cancel(id, reason);
    }
    return ids.length;
  }

  has(id: string): boolean {
    return this.pending.has(id);
  }

  get size(): number {
    return this.pending.size;
  }

  private remove(id: string, entry: Pending<T>): boolean {
    if (this.pending.get(id) !== entry) {
      return false;
    }
    if (entry.timer) {
      clearTimeout(entry.timer);
    }
    this.pending.delete(id);
    return true;
  }
}
