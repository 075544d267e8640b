/**
 * Keyed Read/Write Lock
 *
 * In-process lock table used to serialize mutations. Each key admits either
 * any number of shared holders or a single exclusive holder. Waiters are
 * served in arrival order, so a queued exclusive request is not starved by
 * later shared ones.
 */

import { ConcurrentModificationError } from '../errors/index.js';

export type LockMode = 'shared' | 'exclusive';

export interface LockRequest {
  key: string;
  mode: LockMode;
}

export type ReleaseFn = () => void;

interface Waiter {
  mode: LockMode;
  grant: () => void;
}

interface LockState {
  sharedHolders: number;
  exclusiveHeld: boolean;
  queue: Waiter[];
}

export class KeyedLock {
  private locks: Map<string, LockState> = new Map();

  constructor(private readonly defaultTimeoutMs: number = 5000) {}

  /**
   * Acquire a single key. Rejects with ConcurrentModificationError when the
   * lock is not granted within the timeout.
   */
  acquire(key: string, mode: LockMode, timeoutMs: number = this.defaultTimeoutMs): Promise<ReleaseFn> {
    const state = this.stateFor(key);

    if (state.queue.length === 0 && this.compatible(state, mode)) {
      this.take(state, mode);
      return Promise.resolve(this.releaser(key, mode));
    }

    return new Promise<ReleaseFn>((resolve, reject) => {
      const waiter: Waiter = {
        mode,
        grant: () => {
          clearTimeout(timer);
          resolve(this.releaser(key, mode));
        },
      };

      const timer = setTimeout(() => {
        const index = state.queue.indexOf(waiter);
        if (index >= 0) {
          state.queue.splice(index, 1);
          this.drain(key, state);
          reject(new ConcurrentModificationError(key, timeoutMs));
        }
      }, timeoutMs);

      state.queue.push(waiter);
    });
  }

  /**
   * Acquire several keys in the order given. Callers must always pass keys
   * in the same global order. Already-acquired keys are released if a later
   * one times out.
   */
  async acquireAll(requests: LockRequest[], timeoutMs: number = this.defaultTimeoutMs): Promise<ReleaseFn> {
    const releases: ReleaseFn[] = [];
    try {
      for (const request of requests) {
        releases.push(await this.acquire(request.key, request.mode, timeoutMs));
      }
    } catch (error) {
      releases.reverse().forEach((release) => release());
      throw error;
    }

    return () => {
      releases.reverse().forEach((release) => release());
    };
  }

  /**
   * Run `fn` while holding the requested keys.
   */
  async withLocks<T>(requests: LockRequest[], fn: () => Promise<T>, timeoutMs?: number): Promise<T> {
    const release = await this.acquireAll(requests, timeoutMs);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /** Keys with a holder or a waiter */
  activeKeys(): string[] {
    return Array.from(this.locks.keys());
  }

  private stateFor(key: string): LockState {
    let state = this.locks.get(key);
    if (!state) {
      state = { sharedHolders: 0, exclusiveHeld: false, queue: [] };
      this.locks.set(key, state);
    }
    return state;
  }

  private compatible(state: LockState, mode: LockMode): boolean {
    if (state.exclusiveHeld) return false;
    return mode === 'shared' || state.sharedHolders === 0;
  }

  private take(state: LockState, mode: LockMode): void {
    if (mode === 'exclusive') {
      state.exclusiveHeld = true;
    } else {
      state.sharedHolders++;
    }
  }

  private releaser(key: string, mode: LockMode): ReleaseFn {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      const state = this.locks.get(key);
      if (!state) return;

      if (mode === 'exclusive') {
        state.exclusiveHeld = false;
      } else {
        state.sharedHolders--;
      }
      this.drain(key, state);
    };
  }

  private drain(key: string, state: LockState): void {
    while (state.queue.length > 0 && this.compatible(state, state.queue[0].mode)) {
      const [next] = state.queue.splice(0, 1);
      this.take(state, next.mode);
      next.grant();
    }

    if (!state.exclusiveHeld && state.sharedHolders === 0 && state.queue.length === 0) {
      this.locks.delete(key);
    }
  }
}
