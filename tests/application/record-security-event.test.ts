import { describe, it, expect, vi } from 'vitest';
import { recordSecurityEvent } from '../../src/application/index.js';
import { InMemoryEventRepository } from '../../src/infrastructure/db/index.js';
import { fakeLogger } from '../helpers.js';

const input = {
  event_type: 'login',
  severity: 'high' as const,
  source: 'web-application',
  description: 'Multiple failed login attempts',
  event_data: { attempts: 5 },
};

describe('recordSecurityEvent', () => {
  it('stores the event and then publishes it', async () => {
    const events = new InMemoryEventRepository(() => new Date('2026-03-01T10:00:00.000Z'));
    const publisher = { publishEvent: vi.fn().mockResolvedValue(undefined) };

    const result = await recordSecurityEvent({ events, publisher, log: fakeLogger() }, input);

    expect(result.queued).toBe(true);
    expect(result.event).toMatchObject({ ...input, created_at: '2026-03-01T10:00:00.000Z' });
    expect(publisher.publishEvent).toHaveBeenCalledWith(result.event);
    expect(await events.findByEventId(result.event.event_id)).toEqual(result.event);
  });

  it('keeps the stored event when publishing fails', async () => {
    const events = new InMemoryEventRepository();
    const log = fakeLogger();
    const publisher = { publishEvent: vi.fn().mockRejectedValue(new Error('broker down')) };

    const result = await recordSecurityEvent({ events, publisher, log }, input);

    expect(result.queued).toBe(false);
    expect(await events.list()).toHaveLength(1);
    expect(vi.mocked(log.error)).toHaveBeenCalledWith(
      expect.objectContaining({ event_id: result.event.event_id }),
      'Failed to publish event to queue',
    );
  });

  it('reports a publish that outlasts the timeout as not queued', async () => {
    const events = new InMemoryEventRepository();
    const log = fakeLogger();
    // Never settles, like a confirm held back by a blocked broker
    const publisher = { publishEvent: vi.fn(() => new Promise<void>(() => undefined)) };

    const result = await recordSecurityEvent({ events, publisher, log, publishTimeoutMs: 20 }, input);

    expect(result.queued).toBe(false);
    expect(await events.list()).toHaveLength(1);
    expect(vi.mocked(log.error)).toHaveBeenCalledWith(
      expect.objectContaining({
        event_id: result.event.event_id,
        err: expect.objectContaining({
          code: 'PUBLISH_ERROR',
          message: 'Failed to publish to queue security_events: Publish timed out after 20 ms',
        }),
      }),
      'Failed to publish event to queue',
    );
  });

  it('publishes nothing when the insert fails', async () => {
    const publisher = { publishEvent: vi.fn() };
    const events = {
      insert: vi.fn().mockRejectedValue(new Error('db down')),
      list: vi.fn(),
      findByEventId: vi.fn(),
      update: vi.fn(),
      delete: vi.fn(),
      ping: vi.fn(),
    };

    await expect(recordSecurityEvent({ events, publisher, log: fakeLogger() }, input)).rejects.toThrow('db down');
    expect(publisher.publishEvent).not.toHaveBeenCalled();
  });
});
