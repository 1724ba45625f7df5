import { describe, it, expect } from 'vitest';
import {
  ConnectionError,
  DeclarationError,
  ProcessingError,
  PublishError,
  SerializationError,
  deadQueueName,
  describeError,
  queueSet,
  retryQueueName,
  withFailedAttempt,
} from '../../src/domain/index.js';
import { sampleMessage } from '../helpers.js';

describe('queue names', () => {
  it('derives retry and dead-letter names from the primary queue', () => {
    expect(retryQueueName('security_events')).toBe('security_events_retry');
    expect(deadQueueName('security_events')).toBe('security_events_dead');
    expect(queueSet('orders')).toEqual({
      primary: 'orders',
      retry: 'orders_retry',
      dead: 'orders_dead',
    });
  });
});

describe('withFailedAttempt', () => {
  it('increments retryCount by one and keeps everything else', () => {
    const original = sampleMessage({ retryCount: 1 });
    const next = withFailedAttempt(original);

    expect(next).toEqual({ ...original, retryCount: 2 });
    expect(original.retryCount).toBe(1);
  });
});

describe('delivery errors', () => {
  it('carries a code and the class name', () => {
    const err = new ProcessingError('boom');

    expect(err).toBeInstanceOf(Error);
    expect(err.code).toBe('PROCESSING_ERROR');
    expect(err.name).toBe('ProcessingError');
    expect(err.message).toBe('boom');
  });

  it('ConnectionError reports the attempt count and last cause', () => {
    const cause = new Error('ECONNREFUSED');
    const err = new ConnectionError(10, cause);

    expect(err.message).toBe('Failed to connect to broker after 10 attempts: ECONNREFUSED');
    expect(err.attempts).toBe(10);
    expect(err.cause).toBe(cause);
    expect(err.code).toBe('CONNECTION_ERROR');
  });

  it('DeclarationError and PublishError name the queue', () => {
    expect(new DeclarationError('q1', new Error('denied')).message).toBe('Failed to declare queue q1: denied');
    expect(new PublishError('q2', 'closed').message).toBe('Failed to publish to queue q2: closed');
    expect(new SerializationError('bad').code).toBe('SERIALIZATION_ERROR');
  });

  it('describeError falls back to String for non-errors', () => {
    expect(describeError(new Error('x'))).toBe('x');
    expect(describeError(42)).toBe('42');
  });
});
