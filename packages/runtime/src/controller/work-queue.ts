// Work queue of Grant keys
//
// - A key added while already waiting is coalesced into the pending entry
// - A key is handed to one worker at a time; re-adds during processing are
//   queued again when the worker calls done()
// - Failed keys come back after base * 2^failures ms, capped, until forget()

import type { BackoffConfig } from '../config.js';

type Timer = ReturnType<typeof setTimeout>;

export class WorkQueue {
  private readonly backoff: BackoffConfig;
  private readonly queue: string[] = [];
  private readonly dirty = new Set<string>();
  private readonly processing = new Set<string>();
  private readonly failures = new Map<string, number>();
  private readonly timers = new Set<Timer>();
  private readonly waiters: Array<(key: string | undefined) => void> = [];
  private shuttingDown = false;

  constructor(backoff: BackoffConfig) {
    this.backoff = backoff;
  }

  get length(): number {
    return this.queue.length;
  }

  get isShuttingDown(): boolean {
    return this.shuttingDown;
  }

  add(key: string): void {
    if (this.shuttingDown || this.dirty.has(key)) {
      return;
    }
    this.dirty.add(key);
    if (this.processing.has(key)) {
      return;
    }
    this.queue.push(key);
    this.dispatch();
  }

  /**
   * Wait for the next key. Resolves undefined once the queue is shut down.
   */
  get(): Promise<string | undefined> {
    if (this.shuttingDown) {
      return Promise.resolve(undefined);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
      this.dispatch();
    });
  }

  /**
   * Mark a key returned by get() as finished
   */
  done(key: string): void {
    this.processing.delete(key);
    if (this.dirty.has(key) && !this.shuttingDown) {
      this.queue.push(key);
      this.dispatch();
    }
  }

  addAfter(key: string, delayMs: number): void {
    if (this.shuttingDown) {
      return;
    }
    if (delayMs <= 0) {
      this.add(key);
      return;
    }
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      this.add(key);
    }, delayMs);
    this.timers.add(timer);
  }

  /**
   * Re-add a key after its backoff delay, and grow the delay for next time
   */
  addRateLimited(key: string): void {
    const failures = this.failures.get(key) ?? 0;
    this.failures.set(key, failures + 1);
    this.addAfter(key, this.delayFor(failures));
  }

  /**
   * Reset the backoff of a key
   */
  forget(key: string): void {
    this.failures.delete(key);
  }

  numRequeues(key: string): number {
    return this.failures.get(key) ?? 0;
  }

  /**
   * Stop handing out keys. Waiting workers get undefined; queued and delayed keys are dropped.
   */
  shutDown(): void {
    this.shuttingDown = true;
    for (const timer of this.timers) clearTimeout(timer);
    this.timers.clear();
    this.queue.length = 0;
    this.dirty.clear();
    for (const resolve of this.waiters.splice(0)) resolve(undefined);
  }

  private delayFor(failures: number): number {
    return Math.min(this.backoff.baseMs * 2 ** failures, this.backoff.maxMs);
  }

  private dispatch(): void {
    while (this.waiters.length > 0 && this.queue.length > 0) {
      const key = this.queue.shift();
      const resolve = this.waiters.shift();
      if (key === undefined || resolve === undefined) return;
      this.dirty.delete(key);
      this.processing.add(key);
      resolve(key);
    }
  }
}
