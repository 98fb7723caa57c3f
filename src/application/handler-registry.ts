import type { BotEvent } from '../domain/index.js';
import { HandlerAlreadyRegisteredError, InvalidPriorityError } from '../domain/index.js';
import type { HandlerDescriptor } from './handler.js';
import { prioritySchema } from './handler-schema.js';

/** One priority bucket as seen by the dispatcher. */
export interface HandlerTier<E extends BotEvent = BotEvent> {
  readonly priority: number;
  readonly handlers: readonly HandlerDescriptor<E>[];
}

/**
 * Priority table of registered handlers.
 *
 * Buckets are replaced rather than mutated, and `snapshot()` hands out
 * an immutable ascending view. Because Node.js is single-threaded and
 * every mutation here is synchronous, a dispatch that already took a
 * snapshot keeps iterating the table it started with: it sees either
 * the old table or the new one, never a partial mix.
 */
export class HandlerRegistry<E extends BotEvent = BotEvent> {
  private readonly buckets = new Map<number, readonly HandlerDescriptor<E>[]>();
  private readonly priorities = new Map<HandlerDescriptor<E>, number>();
  private cached: readonly HandlerTier<E>[] | null = null;

  /**
   * Adds a descriptor at `priority` (its own by default), after every
   * handler already in that tier.
   *
   * @throws InvalidPriorityError when the priority is not an integer >= 0
   * @throws HandlerAlreadyRegisteredError when the descriptor is already present
   */
  register(descriptor: HandlerDescriptor<E>, priority: number = descriptor.priority): void {
    const tier = this.validate(descriptor, priority);
    if (this.priorities.has(descriptor)) {
      throw new HandlerAlreadyRegisteredError(descriptor.name);
    }

    const bucket = this.buckets.get(tier) ?? [];
    this.buckets.set(tier, [...bucket, descriptor]);
    this.priorities.set(descriptor, tier);
    this.cached = null;
  }

  /** Removes a descriptor. Returns false if it was not registered. */
  unregister(descriptor: HandlerDescriptor<E>): boolean {
    const tier = this.priorities.get(descriptor);
    if (tier === undefined) return false;

    const remaining = (this.buckets.get(tier) ?? []).filter((d) => d !== descriptor);
    if (remaining.length === 0) {
      this.buckets.delete(tier);
    } else {
      this.buckets.set(tier, remaining);
    }
    this.priorities.delete(descriptor);
    this.cached = null;
    return true;
  }

  /**
   * Swaps `previous` for `next`, the hot-reload pair.
   *
   * `next` lands at `priority`, or at the tier `previous` occupied, or at
   * its own priority when `previous` was not registered. Validation runs
   * before anything is removed, so a rejected replacement leaves the
   * table untouched.
   */
  replace(previous: HandlerDescriptor<E>, next: HandlerDescriptor<E>, priority?: number): void {
    const target = priority ?? this.priorities.get(previous) ?? next.priority;
    this.validate(next, target);
    if (next !== previous && this.priorities.has(next)) {
      throw new HandlerAlreadyRegisteredError(next.name);
    }

    this.unregister(previous);
    this.register(next, target);
  }

  /** Ascending tiers; registration order within a tier. */
  snapshot(): readonly HandlerTier<E>[] {
    if (this.cached === null) {
      this.cached = [...this.buckets.entries()]
        .sort(([a], [b]) => a - b)
        .map(([priority, handlers]) => ({ priority, handlers }));
    }
    return this.cached;
  }

  /** Every registered descriptor in dispatch order. */
  get handlers(): HandlerDescriptor<E>[] {
    return this.snapshot().flatMap((tier) => tier.handlers);
  }

  get size(): number {
    return this.priorities.size;
  }

  has(descriptor: HandlerDescriptor<E>): boolean {
    return this.priorities.has(descriptor);
  }

  /** The tier a descriptor was registered at, if any. */
  priorityOf(descriptor: HandlerDescriptor<E>): number | undefined {
    return this.priorities.get(descriptor);
  }

  /** First registered descriptor with this name, in dispatch order. */
  findByName(name: string): HandlerDescriptor<E> | undefined {
    return this.handlers.find((d) => d.name === name);
  }

  private validate(descriptor: HandlerDescriptor<E>, priority: unknown): number {
    const parsed = prioritySchema.safeParse(priority);
    if (!parsed.success) {
      throw new InvalidPriorityError(descriptor.name, priority);
    }
    return parsed.data;
  }
}
