/**
 * Service Lock Module
 *
 * Concurrency primitives shared by the orchestrator and adapters.
 *
 * Exclusive, FIFO-ordered locks keyed by serviceId. A second query that
 * targets a service whose lock is held waits in line instead of opening
 * a second session against the same persisted profile.
 *
 * Waiters may pass an AbortSignal; an aborted waiter leaves the queue
 * without disturbing the order of the others.
 */

import { CancelledError } from '../errors/index.js';

export interface LockHolder {
  ownerId: string;
  acquiredAt: number;
}

export type ReleaseFn = () => void;

interface LockState {
  tail: Promise<void>;
  holder: LockHolder | null;
  waiting: number;
}

/**
 * Keyed FIFO mutex
 */
export class ServiceLockManager {
  private locks: Map<string, LockState> = new Map();

  /**
   * Wait for exclusive access to a key
   *
   * @param key - Lock key (serviceId)
   * @param ownerId - Who is taking the lock (queryId), reported by holder()
   * @param signal - Abort while waiting
   * @returns Release function; calling it more than once is a no-op
   * @throws CancelledError if the signal aborts before the lock is granted
   */
  async acquire(key: string, ownerId: string, signal?: AbortSignal): Promise<ReleaseFn> {
    if (signal?.aborted) {
      throw new CancelledError(`Cancelled while waiting for lock on ${key}`);
    }

    const state = this.locks.get(key) ?? { tail: Promise.resolve(), holder: null, waiting: 0 };
    this.locks.set(key, state);

    const previous = state.tail;
    let releaseCurrent: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      releaseCurrent = resolve;
    });
    const tail = previous.then(() => current);
    state.tail = tail;
    state.waiting += 1;

    const granted = await this.waitForTurn(previous, signal);
    state.waiting -= 1;

    if (!granted) {
      // Keep our place in the chain so later waiters are not released early.
      void previous.then(() => this.finish(key, tail, releaseCurrent));
      throw new CancelledError(`Cancelled while waiting for lock on ${key}`);
    }

    state.holder = { ownerId, acquiredAt: Date.now() };

    let released = false;
    return () => {
      if (released) return;
      released = true;
      state.holder = null;
      this.finish(key, tail, releaseCurrent);
    };
  }

  /**
   * Run a function while holding the lock for a key
   */
  async withLock<T>(
    key: string,
    ownerId: string,
    fn: () => Promise<T>,
    signal?: AbortSignal
  ): Promise<T> {
    const release = await this.acquire(key, ownerId, signal);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /**
   * Current holder of a key's lock, if any
   */
  holder(key: string): LockHolder | null {
    return this.locks.get(key)?.holder ?? null;
  }

  /**
   * Number of callers queued behind the current holder
   */
  queueLength(key: string): number {
    return this.locks.get(key)?.waiting ?? 0;
  }

  isLocked(key: string): boolean {
    return this.holder(key) !== null;
  }

  private finish(key: string, tail: Promise<void>, releaseCurrent: () => void): void {
    releaseCurrent();
    const state = this.locks.get(key);
    if (state && state.tail === tail && state.holder === null && state.waiting === 0) {
      this.locks.delete(key);
    }
  }

  private waitForTurn(previous: Promise<void>, signal?: AbortSignal): Promise<boolean> {
    if (!signal) {
      return previous.then(() => true);
    }

    return new Promise<boolean>((resolve) => {
      const onAbort = (): void => resolve(false);
      signal.addEventListener('abort', onAbort, { once: true });
      void previous.then(() => {
        signal.removeEventListener('abort', onAbort);
        resolve(!signal.aborted);
      });
    });
  }
}

/**
 * Wait for a delay, resolving early with CancelledError when the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new CancelledError());
  }

  return new Promise<void>((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
