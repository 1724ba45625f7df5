import type { MessageHandler } from './message-handlers.js';
import { ProcessingError } from '../domain/index.js';

/** Event types with a dedicated processing branch. */
const KNOWN_EVENT_TYPES = new Set(['login', 'data_access', 'file_access']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Handler for `security_event` messages published by the HTTP layer.
 *
 * The stored event travels under `payload.event`. A message without it
 * is a processing failure, so it goes through the retry budget and ends
 * in the dead-letter queue for an operator to inspect.
 */
export const securityEventHandler: MessageHandler = async (message, ctx) => {
  const event = message.payload['event'];
  if (!isRecord(event)) {
    throw new ProcessingError('invalid event data in message');
  }

  const eventType = typeof event['event_type'] === 'string' ? event['event_type'] : 'unknown';
  const category = KNOWN_EVENT_TYPES.has(eventType) ? eventType : 'generic';

  ctx.log.info(
    {
      message_id: message.id,
      event_type: eventType,
      severity: event['severity'],
      source: event['source'],
      category,
      retry_count: message.retryCount,
    },
    `Processing ${category} security event`,
  );
};
