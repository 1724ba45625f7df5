import type { Message } from '../domain/index.js';
import { deadQueueName, retryQueueName, withFailedAttempt } from '../domain/index.js';

/** Where a failed message goes next. */
export type FailureOutcome =
  | { readonly kind: 'retry'; readonly message: Message; readonly queue: string }
  | { readonly kind: 'dead-letter'; readonly message: Message; readonly queue: string };

/**
 * Decides the fate of a message whose handler just failed.
 *
 * The failed attempt is recorded first; the message is retried while
 * the new count stays below `maxRetries` and dead-lettered once it
 * reaches it. With `maxRetries = 3` a message is attempted three times
 * and lands in `<queue>_dead` with `retryCount = 3`.
 *
 * `baseQueue` is the primary queue name, also for messages that were
 * delivered from its retry queue.
 */
export function decideFailureOutcome(message: Message, baseQueue: string, maxRetries: number): FailureOutcome {
  const next = withFailedAttempt(message);

  if (next.retryCount < maxRetries) {
    return { kind: 'retry', message: next, queue: retryQueueName(baseQueue) };
  }

  return { kind: 'dead-letter', message: next, queue: deadQueueName(baseQueue) };
}
