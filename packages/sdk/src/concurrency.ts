/**
 * Bounded fan-out, per-key mutual exclusion and cancellation helpers
 */

import { BackendTransientError } from "./errors.js";
import type { CallOptions } from "./types.js";

/**
 * Run `fn` over every item with at most `limit` in flight. Results keep input order.
 * A rejected task does not stop the others; `fn` is expected to capture its own failures.
 */
export async function mapWithConcurrency<I, O>(
  items: readonly I[],
  limit: number,
  fn: (item: I, index: number) => Promise<O>
): Promise<O[]> {
  const results: O[] = new Array<O>(items.length);
  // Workers share one iterator, so every position is taken exactly once
  const entries = items.entries();

  const worker = async (): Promise<void> => {
    for (const [index, item] of entries) {
      results[index] = await fn(item, index);
    }
  };

  const workers: Promise<void>[] = [];
  for (let i = 0; i < Math.min(Math.max(1, limit), items.length); i++) {
    workers.push(worker());
  }
  await Promise.all(workers);

  return results;
}

/**
 * Simple in-process mutex
 */
export class Mutex {
  #queue: Array<() => void> = [];
  #locked = false;

  async acquire(): Promise<void> {
    if (!this.#locked) {
      this.#locked = true;
      return;
    }

    await new Promise<void>((resolve) => {
      this.#queue.push(resolve);
    });
  }

  release(): void {
    const next = this.#queue.shift();
    if (next) {
      next();
    } else {
      this.#locked = false;
    }
  }

  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}

/**
 * Mutexes created on demand per key
 */
export class KeyedMutex {
  #mutexes = new Map<string, Mutex>();

  withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    let mutex = this.#mutexes.get(key);
    if (!mutex) {
      mutex = new Mutex();
      this.#mutexes.set(key, mutex);
    }
    return mutex.withLock(fn);
  }
}

/**
 * Combine a caller signal with an optional timeout into one signal
 */
export function resolveSignal(opts: CallOptions = {}): AbortSignal | undefined {
  const signals: AbortSignal[] = [];
  if (opts.signal) signals.push(opts.signal);
  if (opts.timeoutMs !== undefined && opts.timeoutMs > 0) {
    signals.push(AbortSignal.timeout(opts.timeoutMs));
  }

  if (signals.length === 0) return undefined;
  if (signals.length === 1) return signals[0];
  return AbortSignal.any(signals);
}

function abortReason(signal: AbortSignal): string {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) {
    return reason.name === "TimeoutError" ? "timed out" : reason.message;
  }
  return "aborted";
}

/**
 * Throw BackendTransientError when the signal has fired
 */
export function throwIfAborted(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted) {
    throw new BackendTransientError(operation, abortReason(signal), { cause: signal.reason });
  }
}

/**
 * Race a remote call against the signal. The call itself is not rolled back on abort.
 */
export async function abortable<T>(
  signal: AbortSignal | undefined,
  operation: string,
  fn: () => Promise<T>
): Promise<T> {
  throwIfAborted(signal, operation);
  if (!signal) return fn();

  let onAbort: (() => void) | undefined;
  const aborted = new Promise<never>((_resolve, reject) => {
    onAbort = () =>
      reject(new BackendTransientError(operation, abortReason(signal), { cause: signal.reason }));
    signal.addEventListener("abort", onAbort, { once: true });
  });

  try {
    return await Promise.race([fn(), aborted]);
  } finally {
    if (onAbort) signal.removeEventListener("abort", onAbort);
  }
}
