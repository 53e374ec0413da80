/**
 * Coalescer, keyed mutex and caller deadlines
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { CancelledError, TimeoutError } from '../../../../common/errors.js';
import { waitWithDeadline } from '../deadline.js';
import { KeyedMutex } from '../keyed-mutex.js';
import { RequestCoalescer } from '../request-coalescer.js';

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe('RequestCoalescer', () => {
  it('should share one in-flight call per key', async () => {
    const coalescer = new RequestCoalescer<number>();
    const gate = deferred<number>();
    const fn = vi.fn(() => gate.promise);

    const a = coalescer.run('AAPL', fn);
    const b = coalescer.run('AAPL', fn);
    expect(coalescer.isInFlight('AAPL')).toBe(true);

    gate.resolve(42);
    await expect(a).resolves.toBe(42);
    await expect(b).resolves.toBe(42);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(coalescer.isInFlight('AAPL')).toBe(false);
  });

  it('should run different keys independently', async () => {
    const coalescer = new RequestCoalescer<string>();
    const fn = vi.fn(async () => 'x');

    await Promise.all([coalescer.run('AAPL', fn), coalescer.run('MSFT', fn)]);
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('should propagate failures to every waiter and forget the key', async () => {
    const coalescer = new RequestCoalescer<number>();
    const gate = deferred<number>();

    const a = coalescer.run('AAPL', () => gate.promise);
    const b = coalescer.run('AAPL', () => gate.promise);
    gate.reject(new Error('boom'));

    await expect(a).rejects.toThrow('boom');
    await expect(b).rejects.toThrow('boom');
    expect(coalescer.size()).toBe(0);
  });
});

describe('KeyedMutex', () => {
  it('should serialize holders of the same key', async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    const gate = deferred<void>();

    const first = mutex.runExclusive('AAPL', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = mutex.runExclusive('AAPL', async () => {
      order.push('second');
    });

    await new Promise(resolve => setTimeout(resolve, 0));
    expect(order).toEqual(['first:start']);

    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(['first:start', 'first:end', 'second']);
    expect(mutex.size()).toBe(0);
  });

  it('should not block other keys', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred<void>();

    const held = mutex.runExclusive('AAPL', () => gate.promise);
    await expect(mutex.runExclusive('MSFT', () => 'free')).resolves.toBe('free');

    gate.resolve();
    await held;
  });

  it('should release the lock when the holder throws', async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive('AAPL', () => {
        throw new Error('fail');
      })
    ).rejects.toThrow('fail');
    await expect(mutex.runExclusive('AAPL', () => 1)).resolves.toBe(1);
    expect(mutex.isLocked('AAPL')).toBe(false);
  });
});

describe('waitWithDeadline', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should pass the result through when work finishes in time', async () => {
    await expect(waitWithDeadline(Promise.resolve('ok'), { timeoutMs: 1_000 })).resolves.toBe('ok');
  });

  it('should reject with TimeoutError without cancelling the work', async () => {
    vi.useFakeTimers();
    const work = deferred<string>();

    const waiting = waitWithDeadline(work.promise, { timeoutMs: 100, label: 'series AAPL' });
    const assertion = expect(waiting).rejects.toBeInstanceOf(TimeoutError);
    await vi.advanceTimersByTimeAsync(100);
    await assertion;

    work.resolve('late');
    await expect(work.promise).resolves.toBe('late');
  });

  it('should reject with CancelledError on abort', async () => {
    const controller = new AbortController();
    const work = deferred<string>();

    const waiting = waitWithDeadline(work.promise, { signal: controller.signal });
    controller.abort();

    await expect(waiting).rejects.toBeInstanceOf(CancelledError);
  });

  it('should reject immediately for an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      waitWithDeadline(new Promise<string>(() => undefined), { signal: controller.signal })
    ).rejects.toBeInstanceOf(CancelledError);
  });
});
