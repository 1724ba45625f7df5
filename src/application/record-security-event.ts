import { randomUUID } from 'node:crypto';
import type { BaseLogger } from 'pino';
import type { SecurityEvent } from '../domain/index.js';
import { PublishError, SECURITY_EVENTS_QUEUE } from '../domain/index.js';
import type { EventRepository } from '../infrastructure/db/index.js';
import type { CreateSecurityEventInput } from './security-event-schema.js';

/** The slice of the queue client this use case needs. */
export interface SecurityEventPublisher {
  publishEvent(event: SecurityEvent): Promise<unknown>;
}

export interface RecordSecurityEventDeps {
  events: EventRepository;
  publisher: SecurityEventPublisher;
  log: BaseLogger;
  /** Upper bound on waiting for the broker to accept the event. Unset = wait indefinitely. */
  publishTimeoutMs?: number | undefined;
}

export interface RecordedSecurityEvent {
  event: SecurityEvent;
  /** False when the event was stored but could not be queued. */
  queued: boolean;
}

/**
 * Use case: store a security event, then queue it for asynchronous
 * processing.
 *
 * The store is the source of truth. A failed publish is logged and does
 * not fail the call; a failed insert does, and nothing is published.
 * A publish still pending after `publishTimeoutMs` counts as failed,
 * though the broker may yet accept it.
 */
export async function recordSecurityEvent(
  deps: RecordSecurityEventDeps,
  input: CreateSecurityEventInput,
): Promise<RecordedSecurityEvent> {
  const event = await deps.events.insert({ event_id: randomUUID(), ...input });

  try {
    await withTimeout(deps.publisher.publishEvent(event), deps.publishTimeoutMs);
    deps.log.info({ event_id: event.event_id }, 'Event published to queue');
    return { event, queued: true };
  } catch (err: unknown) {
    deps.log.error({ err, event_id: event.event_id }, 'Failed to publish event to queue');
    return { event, queued: false };
  }
}

async function withTimeout(work: Promise<unknown>, timeoutMs: number | undefined): Promise<void> {
  if (timeoutMs === undefined) {
    await work;
    return;
  }

  let timer: NodeJS.Timeout | undefined;
  const timedOut = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(new PublishError(SECURITY_EVENTS_QUEUE, new Error(`Publish timed out after ${timeoutMs} ms`)));
    }, timeoutMs);
  });

  try {
    await Promise.race([work, timedOut]);
  } finally {
    clearTimeout(timer);
  }
}
