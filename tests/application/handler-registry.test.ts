import { describe, it, expect, beforeEach } from 'vitest';
import { HandlerRegistry } from '../../src/application/handler-registry.js';
import { defineHandler } from '../../src/application/handler.js';
import type { HandlerDescriptor } from '../../src/application/handler.js';
import { HandlerAlreadyRegisteredError, InvalidPriorityError } from '../../src/domain/index.js';

function handler(name: string, priority = 0): HandlerDescriptor {
  return defineHandler({ name, priority, run: () => undefined });
}

function layout(registry: HandlerRegistry): Array<[number, string[]]> {
  return registry.snapshot().map((tier) => [tier.priority, tier.handlers.map((h) => h.name)]);
}

describe('HandlerRegistry', () => {
  let registry: HandlerRegistry;

  beforeEach(() => {
    registry = new HandlerRegistry();
  });

  it('orders tiers ascending and handlers by registration within a tier', () => {
    registry.register(handler('late', 10));
    registry.register(handler('a', 0));
    registry.register(handler('mid', 5));
    registry.register(handler('b', 0));

    expect(layout(registry)).toEqual([
      [0, ['a', 'b']],
      [5, ['mid']],
      [10, ['late']],
    ]);
    expect(registry.handlers.map((h) => h.name)).toEqual(['a', 'b', 'mid', 'late']);
    expect(registry.size).toBe(4);
  });

  it('registers at an explicit priority over the descriptor default', () => {
    const h = handler('h', 0);
    registry.register(h, 3);

    expect(registry.priorityOf(h)).toBe(3);
    expect(layout(registry)).toEqual([[3, ['h']]]);
  });

  it.each([-1, 1.5, Number.NaN, Number.POSITIVE_INFINITY])('rejects priority %s', (priority) => {
    const h = handler('bad');

    expect(() => registry.register(h, priority)).toThrow(InvalidPriorityError);
    expect(registry.size).toBe(0);
    expect(registry.snapshot()).toEqual([]);
  });

  it('reports the offending handler and priority', () => {
    const err = (() => {
      try {
        registry.register(handler('bad', -2));
      } catch (e: unknown) {
        return e;
      }
      return null;
    })();

    expect(err).toMatchObject({
      code: 'INVALID_PRIORITY',
      handlerName: 'bad',
      priority: -2,
      message: 'Handler "bad" has invalid priority -2 (expected an integer >= 0)',
    });
  });

  it('rejects registering the same descriptor twice', () => {
    const h = handler('twice');
    registry.register(h);

    expect(() => registry.register(h, 4)).toThrow(HandlerAlreadyRegisteredError);
    expect(layout(registry)).toEqual([[0, ['twice']]]);
  });

  it('drops a bucket once its last handler is unregistered', () => {
    const a = handler('a', 1);
    const b = handler('b', 2);
    registry.register(a);
    registry.register(b);

    expect(registry.unregister(a)).toBe(true);
    expect(layout(registry)).toEqual([[2, ['b']]]);
    expect(registry.has(a)).toBe(false);
    expect(registry.unregister(a)).toBe(false);
  });

  it('keeps an earlier snapshot intact across mutation', () => {
    const a = handler('a');
    registry.register(a);
    const before = registry.snapshot();

    registry.register(handler('b'));
    registry.unregister(a);

    expect(before.map((t) => t.handlers.map((h) => h.name))).toEqual([['a']]);
    expect(layout(registry)).toEqual([[0, ['b']]]);
  });

  it('returns the cached snapshot while nothing changes', () => {
    registry.register(handler('a'));
    expect(registry.snapshot()).toBe(registry.snapshot());
  });

  describe('replace', () => {
    it('puts the new descriptor in the tier the old one occupied', () => {
      const v1 = handler('greeter', 0);
      const v2 = handler('greeter', 0);
      registry.register(v1, 7);

      registry.replace(v1, v2);

      expect(registry.has(v1)).toBe(false);
      expect(registry.priorityOf(v2)).toBe(7);
    });

    it('uses an explicit priority when given', () => {
      const v1 = handler('greeter');
      const v2 = handler('greeter');
      registry.register(v1);

      registry.replace(v1, v2, 2);

      expect(layout(registry)).toEqual([[2, ['greeter']]]);
    });

    it('registers the new descriptor at its own priority when the old one is absent', () => {
      const v2 = handler('fresh', 4);
      registry.replace(handler('missing'), v2);

      expect(registry.priorityOf(v2)).toBe(4);
    });

    it('leaves the table untouched when the new priority is invalid', () => {
      const v1 = handler('keep', 1);
      registry.register(v1);

      expect(() => registry.replace(v1, handler('next'), -5)).toThrow(InvalidPriorityError);
      expect(registry.has(v1)).toBe(true);
    });
  });

  it('finds a descriptor by name', () => {
    const a = handler('a', 3);
    registry.register(a);

    expect(registry.findByName('a')).toBe(a);
    expect(registry.findByName('nope')).toBeUndefined();
  });
});
