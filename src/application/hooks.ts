/** Removes a previously added hook. Calling it twice is harmless. */
export type Unsubscribe = () => void;

export type Hook<TArgs extends unknown[]> = (...args: TArgs) => void | Promise<void>;

interface HookEntry<TArgs extends unknown[]> {
  readonly hook: Hook<TArgs>;
}

/**
 * Ordered list of callbacks for one lifecycle point.
 *
 * The list is replaced (never mutated in place) on add/remove, so a run
 * that is already iterating keeps the list it started with.
 */
export class HookList<TArgs extends unknown[]> {
  private entries: readonly HookEntry<TArgs>[] = [];

  add(hook: Hook<TArgs>): Unsubscribe {
    const entry: HookEntry<TArgs> = { hook };
    this.entries = [...this.entries, entry];
    return () => {
      this.entries = this.entries.filter((e) => e !== entry);
    };
  }

  get size(): number {
    return this.entries.length;
  }

  /** Awaits each hook in registration order. The first failure propagates. */
  async runSerial(...args: TArgs): Promise<void> {
    for (const { hook } of this.entries) {
      await hook(...args);
    }
  }
}
