import { setTimeout as sleep } from 'node:timers/promises';
import type { Logger } from 'pino';
import type { Message, QueueSet, QueueStats, SecurityEvent } from '../../domain/index.js';
import { SECURITY_EVENT_MESSAGE_TYPE, SECURITY_EVENTS_QUEUE, SerializationError, deadQueueName } from '../../domain/index.js';
import { decodeMessage } from '../../application/index.js';
import type { BrokerChannel, BrokerConnection } from '../broker/index.js';
import { Publisher } from './publisher.js';
import { declareQueueSet } from './queue-declarator.js';
import { StatsReporter } from './stats-reporter.js';

const POLL_INTERVAL_MS = 100;

/**
 * Queue capability handed to the HTTP layer and the worker process.
 *
 * Bundles one broker connection with a publisher channel, a pull
 * channel and a stats reporter. Constructed explicitly and passed to
 * whoever needs it.
 */
export class QueueClient {
  private readonly publisher: Publisher;
  private readonly reporter: StatsReporter;
  private closed = false;

  private constructor(
    readonly connection: BrokerConnection,
    private readonly publishChannel: BrokerChannel,
    private readonly pullChannel: BrokerChannel,
    private readonly log: Logger,
  ) {
    this.publisher = new Publisher(publishChannel, log);
    this.reporter = new StatsReporter(connection, log);
  }

  static async open(connection: BrokerConnection, log: Logger): Promise<QueueClient> {
    const publishChannel = await connection.openChannel();
    const pullChannel = await connection.openChannel();
    return new QueueClient(connection, publishChannel, pullChannel, log.child({ component: 'queue-client' }));
  }

  /** Declares `queueName` with its retry and dead-letter queues. */
  declare(queueName: string): Promise<QueueSet> {
    return declareQueueSet(this.pullChannel, queueName);
  }

  publishMessage(message: Message, queueName: string): Promise<void> {
    return this.publisher.publish(message, queueName);
  }

  /** Wraps a stored security event into a fresh message and publishes it. */
  async publishEvent(event: SecurityEvent, queueName: string = SECURITY_EVENTS_QUEUE): Promise<Message> {
    const message: Message = {
      id: event.event_id,
      type: SECURITY_EVENT_MESSAGE_TYPE,
      payload: { event },
      createdAt: new Date().toISOString(),
      retryCount: 0,
    };
    await this.publisher.publish(message, queueName);
    return message;
  }

  /**
   * Pulls and acknowledges a single message, or returns null once
   * `timeoutMs` passes with the queue empty.
   *
   * An undecodable body is requeued the first time it is seen and moved
   * to the dead-letter queue when it comes back.
   */
  async consumeMessage(queueName: string, timeoutMs: number): Promise<Message | null> {
    const deadline = Date.now() + timeoutMs;

    for (;;) {
      const delivery = await this.pullChannel.get(queueName);

      if (delivery) {
        try {
          const message = decodeMessage(delivery.body);
          await delivery.ack();
          return message;
        } catch (err: unknown) {
          if (!(err instanceof SerializationError)) throw err;

          if (delivery.redelivered) {
            this.log.warn({ err, queue: queueName }, 'Malformed message redelivered, moving to dead-letter queue');
            await this.publisher.publishRaw(delivery.body, deadQueueName(queueName));
            await delivery.ack();
          } else {
            this.log.warn({ err, queue: queueName }, 'Malformed message, requeueing once');
            await delivery.nack(true);
          }
          continue;
        }
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) return null;
      await sleep(Math.min(POLL_INTERVAL_MS, remaining));
    }
  }

  stats(...queueNames: string[]): Promise<QueueStats> {
    return this.reporter.stats(...queueNames);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    await this.publishChannel.close();
    await this.pullChannel.close();
    await this.connection.close();
    this.log.info('Queue client closed');
  }
}
