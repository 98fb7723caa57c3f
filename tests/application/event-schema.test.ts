import { describe, it, expect } from 'vitest';
import { inboundEventSchema, inboundEventBatchSchema, toMessageEvent } from '../../src/application/event-schema.js';

const FIXED_NOW = new Date('2026-02-18T12:00:00Z');

describe('inboundEventSchema', () => {
  it('fills defaults for optional fields', () => {
    const parsed = inboundEventSchema.parse({ event_type: 'ping', source: 'cli' });

    expect(parsed).toEqual({ event_type: 'ping', source: 'cli', payload: {}, metadata: {}, allow_get: true });
  });

  it('requires event_type and source', () => {
    const result = inboundEventSchema.safeParse({ event_type: 'ping' });

    expect(result.success).toBe(false);
    expect(result.error?.issues.map((i) => i.path.join('.'))).toEqual(['source']);
  });

  it('rejects a timestamp that is not ISO-8601', () => {
    const result = inboundEventSchema.safeParse({ event_type: 'ping', source: 'cli', timestamp: 'yesterday' });

    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.message).toBe('Must be a valid ISO-8601 datetime');
  });

  it('rejects an empty batch', () => {
    const result = inboundEventBatchSchema.safeParse([]);

    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.message).toBe('Batch must contain at least one event');
  });
});

describe('toMessageEvent', () => {
  const origin = { name: 'webhook' };

  it('keeps supplied identifiers', () => {
    const input = inboundEventSchema.parse({
      event_id: 'evt-1',
      event_type: 'ping',
      source: 'cli',
      timestamp: '2026-01-01T00:00:00Z',
      payload: { n: 1 },
    });

    const event = toMessageEvent(origin, input, () => FIXED_NOW);

    expect(event.adapter).toBe(origin);
    expect(event.toJSON()).toEqual({
      event_id: 'evt-1',
      event_type: 'ping',
      source: 'cli',
      timestamp: '2026-01-01T00:00:00Z',
      payload: { n: 1 },
      metadata: {},
    });
  });

  it('assigns an id and the ingestion time when missing', () => {
    const event = toMessageEvent(origin, inboundEventSchema.parse({ event_type: 'ping', source: 'cli' }), () => FIXED_NOW);

    expect(event.event_id).toMatch(/^[0-9a-f-]{36}$/);
    expect(event.timestamp).toBe('2026-02-18T12:00:00.000Z');
  });
});
