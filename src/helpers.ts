/**
 * Utility functions and synchronization primitives.
 */

import { EventEmitter } from 'events';
import { TimeoutError } from './errors.ts';
import type { RetryPolicy } from './types.ts';

/** Default request and handshake timeout. */
export const DEFAULT_TIMEOUT_MS = 10000;

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: Infinity,
  baseDelayMs: 1000,
  maxDelayMs: 60000,
  jitterFactor: 0.3,
};

/**
 * Race a promise against a timer.
 *
 * The timer is cleared as soon as the promise settles. A rejection of the
 * original promise after the timeout fired is observed and dropped.
 *
 * @param promise - The operation to bound
 * @param ms - Timeout in milliseconds
 * @param message - Message of the TimeoutError
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, message = 'Operation timed out'): Promise<T> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => reject(new TimeoutError(message)), ms);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      }
    );
  });
}

/**
 * Fill unset fields of a partial retry policy with defaults.
 */
export function resolveRetryPolicy(policy: Partial<RetryPolicy> = {}): RetryPolicy {
  return {
    maxAttempts: policy.maxAttempts ?? DEFAULT_RETRY_POLICY.maxAttempts,
    baseDelayMs: policy.baseDelayMs ?? DEFAULT_RETRY_POLICY.baseDelayMs,
    maxDelayMs: policy.maxDelayMs ?? DEFAULT_RETRY_POLICY.maxDelayMs,
    jitterFactor: policy.jitterFactor ?? DEFAULT_RETRY_POLICY.jitterFactor,
  };
}

/**
 * Exponential backoff delay for a zero-based attempt number.
 *
 * @param attempt - Number of reconnect attempts already made
 * @param policy - Backoff parameters
 * @param random - Source of randomness in [0, 1)
 */
export function computeBackoffDelay(
  attempt: number,
  policy: RetryPolicy,
  random: () => number = Math.random
): number {
  const baseDelay = Math.min(policy.baseDelayMs * Math.pow(2, attempt), policy.maxDelayMs);
  const jitter = baseDelay * policy.jitterFactor * (random() - 0.5);
  return Math.max(0, Math.round(baseDelay + jitter));
}

/**
 * Promise-chain mutual exclusion lock.
 *
 * Callbacks run one at a time in call order. A rejected callback releases the
 * lock like a resolved one.
 */
export class Mutex {
  private _tail: Promise<void> = Promise.resolve();
  private _pending = 0;

  get locked(): boolean {
    return this._pending > 0;
  }

  runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    this._pending++;
    const result = this._tail.then(fn);
    this._tail = result.then(
      () => {
        this._pending--;
      },
      () => {
        this._pending--;
      }
    );
    return result;
  }
}

/**
 * Set/clear flag that can be awaited.
 *
 * Emits `set` and `clear` on transitions only. `wait()` checks the flag
 * synchronously before listening, so a `set` between the check and the
 * listener cannot be missed.
 */
export class ConnectionSignal extends EventEmitter {
  private _set = false;

  get isSet(): boolean {
    return this._set;
  }

  set(): void {
    if (this._set) return;
    this._set = true;
    this.emit('set');
  }

  clear(): void {
    if (!this._set) return;
    this._set = false;
    this.emit('clear');
  }

  /**
   * Resolve `true` once the flag is set, or `false` as soon as any of the
   * given abort signals fires.
   */
  wait(...signals: (AbortSignal | undefined)[]): Promise<boolean> {
    if (this._set) return Promise.resolve(true);

    const active = signals.filter((s): s is AbortSignal => s !== undefined);
    if (active.some((s) => s.aborted)) return Promise.resolve(false);

    return new Promise((resolve) => {
      const onSet = () => {
        cleanup();
        resolve(true);
      };

      const onAbort = () => {
        cleanup();
        resolve(false);
      };

      const cleanup = () => {
        this.off('set', onSet);
        for (const s of active) s.removeEventListener('abort', onAbort);
      };

      this.on('set', onSet);
      for (const s of active) s.addEventListener('abort', onAbort, { once: true });
    });
  }
}
