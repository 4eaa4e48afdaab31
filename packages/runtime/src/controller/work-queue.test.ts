import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { WorkQueue } from './work-queue.js';

const BACKOFF = { baseMs: 5, maxMs: 40 };

describe('WorkQueue', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should hand out keys in order', async () => {
    const queue = new WorkQueue(BACKOFF);
    queue.add('ns/a');
    queue.add('ns/b');

    expect(await queue.get()).toBe('ns/a');
    expect(await queue.get()).toBe('ns/b');
  });

  it('should coalesce duplicate adds while pending', () => {
    const queue = new WorkQueue(BACKOFF);
    queue.add('ns/a');
    queue.add('ns/a');
    queue.add('ns/b');

    expect(queue.length).toBe(2);
  });

  it('should resolve a waiting get when a key arrives', async () => {
    const queue = new WorkQueue(BACKOFF);
    const next = queue.get();

    queue.add('ns/a');

    expect(await next).toBe('ns/a');
  });

  it('should not hand out a key that is being processed', async () => {
    const queue = new WorkQueue(BACKOFF);
    queue.add('ns/a');
    const key = await queue.get();

    queue.add('ns/a');
    expect(queue.length).toBe(0);

    queue.done('ns/a');
    expect(queue.length).toBe(1);
    expect(key).toBe('ns/a');
    expect(await queue.get()).toBe('ns/a');
  });

  it('should not requeue a finished key that was not re-added', async () => {
    const queue = new WorkQueue(BACKOFF);
    queue.add('ns/a');
    await queue.get();

    queue.done('ns/a');

    expect(queue.length).toBe(0);
  });

  it('should add a key after a delay', async () => {
    const queue = new WorkQueue(BACKOFF);
    queue.addAfter('ns/a', 100);

    await vi.advanceTimersByTimeAsync(99);
    expect(queue.length).toBe(0);

    await vi.advanceTimersByTimeAsync(1);
    expect(queue.length).toBe(1);
  });

  it('should back off exponentially up to the cap', async () => {
    const queue = new WorkQueue(BACKOFF);
    const delays: number[] = [];

    for (let attempt = 0; attempt < 5; attempt++) {
      queue.addRateLimited('ns/a');
      let waited = 0;
      while (queue.length === 0) {
        await vi.advanceTimersByTimeAsync(1);
        waited++;
      }
      delays.push(waited);
      await queue.get();
      queue.done('ns/a');
    }

    expect(delays).toEqual([5, 10, 20, 40, 40]);
    expect(queue.numRequeues('ns/a')).toBe(5);
  });

  it('should reset backoff on forget', () => {
    const queue = new WorkQueue(BACKOFF);
    queue.addRateLimited('ns/a');
    queue.addRateLimited('ns/a');

    queue.forget('ns/a');

    expect(queue.numRequeues('ns/a')).toBe(0);
  });

  it('should release waiting workers and drop pending keys on shutdown', async () => {
    const queue = new WorkQueue(BACKOFF);
    const waiting = queue.get();
    queue.addAfter('ns/b', 10);

    queue.shutDown();
    queue.add('ns/a');
    await vi.advanceTimersByTimeAsync(10);

    expect(await waiting).toBeUndefined();
    expect(await queue.get()).toBeUndefined();
    expect(queue.length).toBe(0);
  });
});
