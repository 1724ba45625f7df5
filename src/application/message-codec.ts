import { z } from 'zod';
import type { Message } from '../domain/index.js';
import { SerializationError, describeError } from '../domain/index.js';

/**
 * Wire format of a message body.
 *
 * Keys are snake_case like every other JSON document the service emits.
 * `payload` stays open-ended so one envelope fits every message type.
 */
export const messageWireSchema = z.object({
  id: z.string().min(1),
  type: z.string().min(1),
  payload: z.record(z.string(), z.unknown()),
  created_at: z.string().datetime({ message: 'Must be a valid ISO-8601 datetime' }),
  retry_count: z.number().int().nonnegative(),
});

export type MessageWire = z.infer<typeof messageWireSchema>;

/**
 * Encodes a message as UTF-8 JSON.
 *
 * Throws `SerializationError` when the payload cannot be represented
 * (circular references, BigInt values).
 */
export function encodeMessage(message: Message): Buffer {
  const wire: MessageWire = {
    id: message.id,
    type: message.type,
    payload: message.payload,
    created_at: message.createdAt,
    retry_count: message.retryCount,
  };

  try {
    return Buffer.from(JSON.stringify(wire), 'utf-8');
  } catch (err: unknown) {
    throw new SerializationError(`Failed to serialize message ${message.id}: ${describeError(err)}`, { cause: err });
  }
}

/**
 * Decodes and validates a message body.
 *
 * Throws `SerializationError` for invalid JSON or a body that does
 * not match the wire schema.
 */
export function decodeMessage(body: Buffer): Message {
  let raw: unknown;
  try {
    raw = JSON.parse(body.toString('utf-8'));
  } catch (err: unknown) {
    throw new SerializationError(`Message body is not valid JSON: ${describeError(err)}`, { cause: err });
  }

  const parsed = messageWireSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`);
    throw new SerializationError(`Message body failed validation: ${issues.join('; ')}`, { cause: parsed.error });
  }

  return {
    id: parsed.data.id,
    type: parsed.data.type,
    payload: parsed.data.payload,
    createdAt: parsed.data.created_at,
    retryCount: parsed.data.retry_count,
  };
}
