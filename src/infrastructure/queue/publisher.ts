import type { Logger } from 'pino';
import type { Message } from '../../domain/index.js';
import { PublishError } from '../../domain/index.js';
import { encodeMessage } from '../../application/index.js';
import type { BrokerChannel } from '../broker/index.js';
import { declareQueue } from './queue-declarator.js';
import { Mutex } from './mutex.js';

/**
 * Serializes messages and writes them to named queues.
 *
 * Owns one channel. Writes are serialized through a mutex, so one
 * publisher may be shared by concurrent callers (HTTP requests, a
 * worker's retry path) without interleaving frames on the channel.
 * Each queue is declared the first time it is written to.
 */
export class Publisher {
  private readonly lock = new Mutex();
  private readonly declared = new Set<string>();

  constructor(
    private readonly channel: BrokerChannel,
    private readonly log: Logger,
  ) {}

  /**
   * Publishes one persistent copy of `message` to `queueName`.
   *
   * - `SerializationError`: the message could not be encoded. It is
   *   dropped and must not be retried.
   * - `DeclarationError`: the queue could not be declared.
   * - `PublishError`: the broker write failed. Safe to retry.
   *
   * Delivery is at-least-once; consumers may see the same `id` twice.
   */
  async publish(message: Message, queueName: string): Promise<void> {
    const body = encodeMessage(message);
    await this.publishRaw(body, queueName);

    this.log.debug(
      { message_id: message.id, type: message.type, queue: queueName, retry_count: message.retryCount },
      'Message published',
    );
  }

  /** Writes an already encoded body, e.g. an undecodable one being dead-lettered. */
  async publishRaw(body: Buffer, queueName: string): Promise<void> {
    await this.lock.runExclusive(async () => {
      if (!this.declared.has(queueName)) {
        await declareQueue(this.channel, queueName);
        this.declared.add(queueName);
      }

      try {
        await this.channel.send(queueName, body);
      } catch (err: unknown) {
        throw new PublishError(queueName, err);
      }
    });
  }
}
