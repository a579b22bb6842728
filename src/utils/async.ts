// Promise helpers for the controller's serial mailbox: deferreds, a cancellable
// delay and acknowledgement timeouts.

import type { Deferred } from "../types.js";

export function createDeferred<T>(): Deferred<T> {
  let resolve!: (value: T) => void;
  let reject!: (reason: unknown) => void;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/**
 * Waits `ms` milliseconds. Resolves `true` when the time elapsed and `false`
 * as soon as `signal` aborts. Never rejects.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<boolean> {
  const deferred = createDeferred<boolean>();
  if (signal?.aborted) {
    deferred.resolve(false);
    return deferred.promise;
  }

  const onAbort = () => {
    clearTimeout(timer);
    deferred.resolve(false);
  };
  const timer = setTimeout(() => {
    signal?.removeEventListener("abort", onAbort);
    deferred.resolve(true);
  }, ms);
  signal?.addEventListener("abort", onAbort, { once: true });

  return deferred.promise;
}

export class AckTimeoutError extends Error {
  constructor(
    message: string,
    readonly timeoutMs: number,
  ) {
    super(message);
    this.name = "AckTimeoutError";
  }
}

/**
 * Races `promise` against a timer. Rejects with AckTimeoutError when the timer
 * wins; the original promise keeps running and is the caller's to clean up.
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, message: string): Promise<T> {
  const deferred = createDeferred<T>();
  const timer = setTimeout(() => {
    deferred.reject(new AckTimeoutError(message, timeoutMs));
  }, timeoutMs);

  promise.then(
    (value) => {
      clearTimeout(timer);
      deferred.resolve(value);
    },
    (err: unknown) => {
      clearTimeout(timer);
      deferred.reject(err);
    },
  );

  return deferred.promise;
}
