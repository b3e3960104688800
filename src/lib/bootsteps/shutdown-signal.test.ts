import { afterEach, describe, expect, test, vi } from 'vitest';
import { ShutdownSignal } from './shutdown-signal';

describe('ShutdownSignal', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  test('starts unset and is set exactly once', () => {
    const signal = new ShutdownSignal();

    expect(signal.isSet).toBe(false);
    expect(signal.set()).toBe(true);
    expect(signal.set()).toBe(false);
    expect(signal.isSet).toBe(true);
  });

  test('releases every concurrent waiter', async () => {
    const signal = new ShutdownSignal();
    const waiters = [signal.wait(), signal.wait(), signal.wait()];

    signal.set();

    expect(await Promise.all(waiters)).toEqual(['complete', 'complete', 'complete']);
    await expect(signal.promise).resolves.toBeUndefined();
  });

  test('resolves immediately once set', async () => {
    const signal = new ShutdownSignal();
    signal.set();

    expect(await signal.wait({ timeoutMS: 0 })).toBe('complete');
  });

  test('times out without rejecting', async () => {
    vi.useFakeTimers();
    const signal = new ShutdownSignal();

    const waiting = signal.wait({ timeoutMS: 100 });
    await vi.advanceTimersByTimeAsync(100);

    expect(await waiting).toBe('timeout');
    expect(vi.getTimerCount()).toBe(0);
  });

  test('a set before the timeout clears the timer', async () => {
    vi.useFakeTimers();
    const signal = new ShutdownSignal();

    const waiting = signal.wait({ timeoutMS: 100 });
    signal.set();

    expect(await waiting).toBe('complete');
    expect(vi.getTimerCount()).toBe(0);
  });

  test('an aborted wait resolves as cancelled', async () => {
    const signal = new ShutdownSignal();
    const controller = new AbortController();

    const waiting = signal.wait({ signal: controller.signal });
    controller.abort();

    expect(await waiting).toBe('cancelled');
    expect(signal.isSet).toBe(false);
  });

  test('an already aborted signal cancels right away', async () => {
    const signal = new ShutdownSignal();

    expect(await signal.wait({ signal: AbortSignal.abort() })).toBe('cancelled');
  });

  test('the first outcome wins', async () => {
    const signal = new ShutdownSignal();
    const controller = new AbortController();

    const waiting = signal.wait({ signal: controller.signal });
    controller.abort();
    signal.set();

    expect(await waiting).toBe('cancelled');
  });

  test('waits that time out are released', async () => {
    vi.useFakeTimers();
    const signal = new ShutdownSignal();

    for (let attempt = 0; attempt < 3; attempt++) {
      const waiting = signal.wait({ timeoutMS: 10 });
      expect(signal.waiterCount).toBe(1);

      await vi.advanceTimersByTimeAsync(10);
      expect(await waiting).toBe('timeout');
      expect(signal.waiterCount).toBe(0);
    }
  });

  test('cancelled and completed waits are released', async () => {
    const signal = new ShutdownSignal();
    const controller = new AbortController();

    const cancelled = signal.wait({ signal: controller.signal });
    const completed = signal.wait();
    expect(signal.waiterCount).toBe(2);

    controller.abort();
    expect(await cancelled).toBe('cancelled');
    expect(signal.waiterCount).toBe(1);

    signal.set();
    expect(await completed).toBe('complete');
    expect(signal.waiterCount).toBe(0);
  });
});
