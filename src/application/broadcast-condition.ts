/**
 * Broadcast wait/notify primitive.
 *
 * Any number of callers park on `wait()`. A single `notify(value)`
 * reaches every caller parked at that moment with the same value; there
 * is no queue, so a notify with nobody parked is simply not observed.
 *
 * Each waiter may pass an `inspect` step that accepts or declines a
 * value. A declining waiter stays parked for the next notify, so it is
 * never absent from the set while values keep arriving. Notifies are
 * serialized on the condition's lock and each runs the inspect steps one
 * at a time, in arrival order, so `notify()` resolving means every
 * parked waiter has seen the value. Inspect steps must not call
 * `notify()` on the same condition and wait for it.
 */

export type InspectVerdict = 'accept' | 'decline';

export interface WaitOptions<T> {
  /** Aborting removes the waiter; `wait()` rejects with the signal's reason. */
  signal?: AbortSignal | undefined;
  /** Runs under the lock for each value. A throw rejects this waiter only. */
  inspect?: ((value: T) => InspectVerdict | Promise<InspectVerdict>) | undefined;
}

interface ParkedWaiter<T> {
  settled: boolean;
  inspect: ((value: T) => InspectVerdict | Promise<InspectVerdict>) | undefined;
  resolve(value: T): void;
  reject(reason: unknown): void;
  detach(): void;
}

/**
 * FIFO async lock. `runExclusive` releases on every exit path, including
 * a throwing or rejecting callback.
 */
export class Lock {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<R>(fn: () => R | Promise<R>): Promise<R> {
    const previous = this.tail;
    let release: () => void = () => {};
    const released = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tail = previous.then(() => released);

    await previous;
    try {
      return await fn();
    } finally {
      release();
    }
  }
}

export class BroadcastCondition<T> {
  private readonly waiters = new Set<ParkedWaiter<T>>();
  private readonly lock = new Lock();

  /** Number of callers currently parked. */
  get size(): number {
    let parked = 0;
    for (const waiter of this.waiters) {
      if (!waiter.settled) parked++;
    }
    return parked;
  }

  wait(options: WaitOptions<T> = {}): Promise<T> {
    const { signal, inspect } = options;
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    return new Promise<T>((resolve, reject) => {
      const waiter: ParkedWaiter<T> = {
        settled: false,
        inspect,
        resolve,
        reject,
        detach: () => {},
      };

      if (signal) {
        const onAbort = (): void => {
          if (waiter.settled) return;
          this.release(waiter);
          reject(signal.reason);
        };
        signal.addEventListener('abort', onAbort, { once: true });
        waiter.detach = () => signal.removeEventListener('abort', onAbort);
      }

      // Registration goes through the lock so it is ordered against
      // any notify() that was called after this wait().
      void this.lock.runExclusive(() => {
        if (!waiter.settled) this.waiters.add(waiter);
      });
    });
  }

  /**
   * Offers `value` to every parked waiter.
   *
   * Resolves with the number of waiters that inspected it, once all of
   * them have accepted, declined or failed.
   */
  notify(value: T): Promise<number> {
    return this.lock.runExclusive(async () => {
      let reached = 0;
      for (const waiter of [...this.waiters]) {
        if (waiter.settled) continue;
        reached++;

        let verdict: InspectVerdict;
        try {
          verdict = waiter.inspect ? await waiter.inspect(value) : 'accept';
        } catch (err: unknown) {
          if (!waiter.settled) {
            this.release(waiter);
            waiter.reject(err);
          }
          continue;
        }

        if (verdict === 'accept' && !waiter.settled) {
          this.release(waiter);
          waiter.resolve(value);
        }
      }
      return reached;
    });
  }

  private release(waiter: ParkedWaiter<T>): void {
    waiter.settled = true;
    waiter.detach();
    this.waiters.delete(waiter);
  }
}
