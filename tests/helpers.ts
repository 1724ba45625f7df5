import { vi } from 'vitest';
import type { Logger } from 'pino';
import type { Message } from '../src/domain/index.js';
import { encodeMessage } from '../src/application/index.js';

/** Fake logger whose `child()` returns itself, so every record lands on the same mocks. */
export function fakeLogger(): Logger {
  const log = {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(),
  };
  log.child.mockReturnValue(log);
  return log as unknown as Logger;
}

export function sampleMessage(overrides: Partial<Message> = {}): Message {
  return {
    id: 'msg-1',
    type: 'test_event',
    payload: { n: 1 },
    createdAt: '2026-01-02T03:04:05.000Z',
    retryCount: 0,
    ...overrides,
  };
}

/** Decodes every body as JSON. */
export function bodiesAsJson(bodies: Buffer[]): unknown[] {
  return bodies.map((body) => JSON.parse(body.toString('utf-8')));
}

export function encoded(overrides: Partial<Message> = {}): Buffer {
  return encodeMessage(sampleMessage(overrides));
}
