import type { QueueSet } from '../../domain/index.js';
import { DeclarationError, queueSet } from '../../domain/index.js';
import type { BrokerChannel } from '../broker/index.js';

/**
 * Ensures a durable queue exists. Safe to call repeatedly: redeclaring
 * with the same durability is a no-op and never touches enqueued
 * messages. Rejects with `DeclarationError` otherwise.
 */
export async function declareQueue(
  channel: BrokerChannel,
  name: string,
  options: { durable?: boolean } = {},
): Promise<void> {
  try {
    await channel.declare(name, { durable: options.durable ?? true });
  } catch (err: unknown) {
    throw new DeclarationError(name, err);
  }
}

/** Declares a primary queue with its retry and dead-letter satellites. */
export async function declareQueueSet(channel: BrokerChannel, queueName: string): Promise<QueueSet> {
  const set = queueSet(queueName);
  await declareQueue(channel, set.primary);
  await declareQueue(channel, set.retry);
  await declareQueue(channel, set.dead);
  return set;
}
