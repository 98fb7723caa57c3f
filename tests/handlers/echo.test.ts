import { describe, it, expect, beforeEach } from 'vitest';
import type { Bot } from '../../src/application/bot.js';
import type { MessageEvent } from '../../src/domain/index.js';
import { askName, audit, ping } from '../../src/handlers/echo.js';
import { fakeLogger, flush, makeBot, makeEvent } from '../helpers.js';
import type { FakeLogger } from '../helpers.js';

describe('echo handlers', () => {
  let log: FakeLogger;
  let bot: Bot<MessageEvent>;

  beforeEach(() => {
    log = fakeLogger();
    bot = makeBot(log);
    bot.handlers.register(ping);
    bot.handlers.register(askName);
    bot.handlers.register(audit);
  });

  function replies(): unknown[] {
    return log.info.mock.calls.filter(([, message]) => message === 'Reply').map(([fields]) => fields);
  }

  function audited(): string[] {
    return log.info.mock.calls
      .filter(([, message]) => message === 'Event audited')
      .map(([fields]) => String(fields.event.event_type));
  }

  it('answers ping with pong and blocks the audit tier', async () => {
    await bot.deliverEvent(makeEvent({ event_type: 'ping' }));
    await bot.drain();

    expect(replies()).toEqual([{ reply: { event_type: 'pong' } }]);
    expect(audited()).toEqual([]);
  });

  it('asks for a name and greets with the answer from the same source', async () => {
    await bot.deliverEvent(makeEvent({ event_type: 'hello', source: 'user-1' }));
    await flush();
    await bot.deliverEvent(makeEvent({ event_type: 'answer', source: 'user-1', payload: { name: 'Ada' } }));
    await bot.drain();

    expect(replies()).toEqual([
      { reply: { event_type: 'question', text: 'What is your name?' } },
      { reply: { event_type: 'greeting', text: 'Hello, Ada' } },
    ]);
    expect(audited()).toEqual([]);
  });

  it('audits everything else', async () => {
    await bot.deliverEvent(makeEvent({ event_type: 'note' }));
    await bot.drain();

    expect(replies()).toEqual([]);
    expect(audited()).toEqual(['note']);
  });
});
