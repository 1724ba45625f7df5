/**
 * Transport-level types for the event delivery pipeline.
 *
 * A `Message` is what travels through the broker. It carries no
 * framework or broker dependencies so both the publishing side and
 * the consuming side can share it.
 */

/** Open-ended event body. */
export type MessagePayload = Record<string, unknown>;

/**
 * Unit of transport.
 *
 * `id` stays the same across every retry of one logical event, so
 * handlers can use it to tolerate duplicate deliveries.
 * `retryCount` is the number of failed processing attempts so far.
 */
export interface Message {
  readonly id: string;
  readonly type: string;
  readonly payload: MessagePayload;
  readonly createdAt: string; // ISO-8601
  readonly retryCount: number;
}

/** Failed attempts after which a message is dead-lettered. */
export const MAX_RETRIES = 3;

/** Primary queue that the HTTP layer publishes security events to. */
export const SECURITY_EVENTS_QUEUE = 'security_events';

/** Message type used for security events published by the HTTP layer. */
export const SECURITY_EVENT_MESSAGE_TYPE = 'security_event';

export function retryQueueName(queueName: string): string {
  return `${queueName}_retry`;
}

export function deadQueueName(queueName: string): string {
  return `${queueName}_dead`;
}

/** Primary, retry and dead-letter names derived from one base queue. */
export interface QueueSet {
  readonly primary: string;
  readonly retry: string;
  readonly dead: string;
}

export function queueSet(queueName: string): QueueSet {
  return {
    primary: queueName,
    retry: retryQueueName(queueName),
    dead: deadQueueName(queueName),
  };
}

/** Returns a copy of `message` with one more failed attempt recorded. */
export function withFailedAttempt(message: Message): Message {
  return { ...message, retryCount: message.retryCount + 1 };
}
