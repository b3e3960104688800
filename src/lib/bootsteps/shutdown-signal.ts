import { PromiseProtectedResolver } from '../promise-protected-resolver';

/**
 * How a wait on the shutdown signal ended
 *
 * - `complete`: the signal was set
 * - `timeout`: `timeoutMS` elapsed first
 * - `cancelled`: the caller's AbortSignal fired first. This is not an error:
 *   a waiter torn down by its own scheduler during process teardown returns
 *   normally instead of rejecting.
 */
export type WaitOutcome = 'complete' | 'timeout' | 'cancelled';

export interface WaitOptions {
  /** Give up after this many milliseconds (waits forever when omitted) */
  timeoutMS?: number;
  /** Cancels the wait; resolves with `cancelled` */
  signal?: AbortSignal;
}

/**
 * One-shot completion signal, set exactly once when a namespace reaches its
 * terminal state
 *
 * Any number of waiters can call `wait()` concurrently; all of them are
 * released by the first `set()`. Waiting never rejects.
 */
export class ShutdownSignal {
  private readonly resolver = new PromiseProtectedResolver<void>();

  /** Pending waiters; each removes itself when its wait ends */
  private readonly waiters = new Set<() => void>();

  public get isSet(): boolean {
    return this.resolver.hasSettled;
  }

  /** Number of wait() calls still pending */
  public get waiterCount(): number {
    return this.waiters.size;
  }

  /**
   * Resolves once the signal is set
   */
  public get promise(): Promise<void> {
    return this.resolver.promise;
  }

  /**
   * Set the signal
   *
   * @returns true if this call set it, false if it was already set
   */
  public set(): boolean {
    if (!this.resolver.resolveOnce()) {
      return false;
    }

    for (const waiter of [...this.waiters]) {
      waiter();
    }

    return true;
  }

  public wait(options: WaitOptions = {}): Promise<WaitOutcome> {
    const { timeoutMS, signal } = options;

    if (this.isSet) {
      return Promise.resolve('complete');
    }

    if (signal?.aborted) {
      return Promise.resolve('cancelled');
    }

    return new Promise<WaitOutcome>((resolve) => {
      let timer: ReturnType<typeof setTimeout> | undefined;

      const finish = (outcome: WaitOutcome): void => {
        if (timer !== undefined) {
          clearTimeout(timer);
        }
        signal?.removeEventListener('abort', onAbort);
        this.waiters.delete(onComplete);
        resolve(outcome);
      };

      const onAbort = (): void => {
        finish('cancelled');
      };

      const onComplete = (): void => {
        finish('complete');
      };

      this.waiters.add(onComplete);

      if (timeoutMS !== undefined) {
        timer = setTimeout(() => {
          finish('timeout');
        }, Math.max(0, timeoutMS));
      }

      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
