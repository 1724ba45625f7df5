import { describe, it, expect } from 'vitest';
import { decideFailureOutcome } from '../../src/application/index.js';
import { sampleMessage } from '../helpers.js';

describe('decideFailureOutcome', () => {
  it('retries a first failure on the retry queue with retryCount 1', () => {
    const outcome = decideFailureOutcome(sampleMessage({ retryCount: 0 }), 'orders', 3);

    expect(outcome.kind).toBe('retry');
    expect(outcome.queue).toBe('orders_retry');
    expect(outcome.message.retryCount).toBe(1);
  });

  it('still retries while the incremented count stays below the budget', () => {
    const outcome = decideFailureOutcome(sampleMessage({ retryCount: 1 }), 'orders', 3);

    expect(outcome).toEqual({
      kind: 'retry',
      queue: 'orders_retry',
      message: sampleMessage({ retryCount: 2 }),
    });
  });

  it('dead-letters once the incremented count reaches the budget', () => {
    const outcome = decideFailureOutcome(sampleMessage({ retryCount: 2 }), 'orders', 3);

    expect(outcome.kind).toBe('dead-letter');
    expect(outcome.queue).toBe('orders_dead');
    expect(outcome.message.retryCount).toBe(3);
  });

  it('keeps the message id across the resubmission', () => {
    const outcome = decideFailureOutcome(sampleMessage({ id: 'evt-7' }), 'orders', 3);

    expect(outcome.message.id).toBe('evt-7');
  });

  it('dead-letters immediately with a budget of one', () => {
    expect(decideFailureOutcome(sampleMessage(), 'orders', 1).kind).toBe('dead-letter');
  });
});
