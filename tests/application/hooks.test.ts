import { describe, it, expect } from 'vitest';
import { HookList } from '../../src/application/hooks.js';

describe('HookList', () => {
  it('awaits hooks one after another in registration order', async () => {
    const hooks = new HookList<[string]>();
    const calls: string[] = [];
    hooks.add(async (value) => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      calls.push(`slow:${value}`);
    });
    hooks.add((value) => {
      calls.push(`fast:${value}`);
    });

    await hooks.runSerial('x');

    expect(calls).toEqual(['slow:x', 'fast:x']);
  });

  it('removes a hook through its unsubscribe function', async () => {
    const hooks = new HookList<[]>();
    const calls: string[] = [];
    const remove = hooks.add(() => { calls.push('a'); });
    hooks.add(() => { calls.push('b'); });

    remove();
    remove();
    await hooks.runSerial();

    expect(calls).toEqual(['b']);
    expect(hooks.size).toBe(1);
  });

  it('removes only the registration it was returned for', async () => {
    const hooks = new HookList<[]>();
    let count = 0;
    const hook = (): void => { count++; };
    const first = hooks.add(hook);
    hooks.add(hook);

    first();
    await hooks.runSerial();

    expect(count).toBe(1);
  });

  it('propagates the first failure and skips the rest', async () => {
    const hooks = new HookList<[]>();
    const calls: string[] = [];
    hooks.add(() => {
      throw new Error('hook failed');
    });
    hooks.add(() => { calls.push('never'); });

    await expect(hooks.runSerial()).rejects.toThrow('hook failed');
    expect(calls).toEqual([]);
  });

  it('keeps running the list it started with when a hook removes another', async () => {
    const hooks = new HookList<[]>();
    const calls: string[] = [];
    let removeSecond: () => void = () => {};
    hooks.add(() => {
      calls.push('first');
      removeSecond();
    });
    removeSecond = hooks.add(() => { calls.push('second'); });

    await hooks.runSerial();
    await hooks.runSerial();

    expect(calls).toEqual(['first', 'second', 'first']);
  });
});
