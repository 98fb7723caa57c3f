import { vi } from 'vitest';
import type { Logger } from 'pino';
import { Bot } from '../src/application/bot.js';
import { RuntimeContext } from '../src/application/runtime-context.js';
import { defineHandler } from '../src/application/handler.js';
import type { HandlerDefinition, HandlerDescriptor } from '../src/application/handler.js';
import { MessageEvent } from '../src/domain/index.js';
import type { EventOrigin, MessageEventData } from '../src/domain/index.js';

/**
 * Minimal fake logger. `child()` returns the same object, so calls made
 * through any child logger land on these mocks.
 */
export function fakeLogger() {
  const log = {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    trace: vi.fn(),
    child: vi.fn(),
  };
  log.child.mockReturnValue(log);
  return log;
}

export type FakeLogger = ReturnType<typeof fakeLogger>;

export function asLogger(log: FakeLogger): Logger {
  return log as unknown as Logger;
}

export const testOrigin: EventOrigin = { name: 'test' };

let counter = 0;

/**
 * Factory for creating test events with sensible defaults.
 * Override any field via the partial parameter.
 */
export function makeEvent(overrides: Partial<MessageEventData> = {}): MessageEvent {
  counter++;
  return new MessageEvent(testOrigin, {
    event_id: overrides.event_id ?? `test-${counter}`,
    event_type: overrides.event_type ?? 'message',
    source: overrides.source ?? 'chat',
    timestamp: overrides.timestamp ?? '2026-02-18T12:00:00.000Z',
    payload: overrides.payload ?? {},
    metadata: overrides.metadata ?? {},
  });
}

export function makeContext(log: FakeLogger = fakeLogger(), verboseExceptionLog = false): RuntimeContext {
  return new RuntimeContext({ log: asLogger(log), verboseExceptionLog });
}

export function makeBot(log: FakeLogger = fakeLogger()): Bot<MessageEvent> {
  return new Bot<MessageEvent>({ log: asLogger(log) });
}

/** Handler that records every call into `trace` as `<name>.matches` / `<name>.run`. */
export function tracingHandler(
  trace: string[],
  definition: Omit<HandlerDefinition<MessageEvent>, 'matches' | 'run'> & {
    matches?: (event: MessageEvent) => boolean;
    run?: HandlerDefinition<MessageEvent>['run'];
  },
): HandlerDescriptor<MessageEvent> {
  const { matches = () => true, run = () => undefined, ...options } = definition;
  return defineHandler<MessageEvent>({
    ...options,
    matches: (event) => {
      trace.push(`${options.name}.matches`);
      return matches(event);
    },
    run: (event, scope) => {
      trace.push(`${options.name}.run`);
      return run(event, scope);
    },
  });
}

/** Lets pending microtasks and immediate callbacks run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
