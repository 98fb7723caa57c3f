import { defineHandler } from '../application/handler.js';
import type { HandlerScope } from '../application/handler.js';
import { GetEventTimeoutError } from '../domain/index.js';
import type { MessageEvent } from '../domain/index.js';
import { RedisChannelAdapter } from '../infrastructure/redis/redis-channel-adapter.js';

async function reply(scope: HandlerScope<MessageEvent>, payload: Record<string, unknown>): Promise<void> {
  const { adapter } = scope.event;
  if (adapter instanceof RedisChannelAdapter) {
    await adapter.publish({ reply_to: scope.event.event_id, ...payload });
    return;
  }
  scope.log.info({ reply: payload }, 'Reply');
}

/** Answers `ping` with `pong`. Later tiers never see pings. */
export const ping = defineHandler<MessageEvent>({
  name: 'ping',
  priority: 0,
  block: true,
  matches: (event) => event.event_type === 'ping',
  run: (_event, scope) => reply(scope, { event_type: 'pong' }),
});

/**
 * Asks the source for a name, then waits for its `answer` event.
 */
export const askName = defineHandler<MessageEvent>({
  name: 'ask-name',
  priority: 0,
  block: true,
  matches: (event) => event.event_type === 'hello',
  run: async (event, scope) => {
    await reply(scope, { event_type: 'question', text: 'What is your name?' });
    try {
      const answer = await scope.bot.get(
        (next) => next.event_type === 'answer' && next.source === event.source,
        { timeoutMs: 30_000 },
      );
      if (answer === undefined) return;
      await reply(scope, { event_type: 'greeting', text: `Hello, ${String(answer.payload['name'])}` });
    } catch (err: unknown) {
      if (!(err instanceof GetEventTimeoutError)) throw err;
      await reply(scope, { event_type: 'timeout', text: 'No answer received' });
    }
  },
});

export const audit = defineHandler<MessageEvent>({
  name: 'audit',
  priority: 10,
  run: (event, scope) => {
    scope.log.info({ event: event.toJSON() }, 'Event audited');
  },
});
