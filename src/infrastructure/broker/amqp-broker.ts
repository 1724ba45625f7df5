import { once } from 'node:events';
import amqplib from 'amqplib';
import type { ChannelModel, ConfirmChannel, Message as AmqpMessage } from 'amqplib';
import type { Logger } from 'pino';
import type {
  BrokerChannel,
  BrokerConnection,
  DeclareOptions,
  Delivery,
  DeliveryHandler,
  SubscribeOptions,
  Subscription,
} from './types.js';

/**
 * RabbitMQ backend (AMQP 0-9-1 over amqplib).
 *
 * Every channel is a confirm channel, so `send()` resolves only once the
 * broker has taken responsibility for the message.
 */
export class AmqpConnection implements BrokerConnection {
  readonly kind = 'rabbitmq' as const;

  private closing = false;
  private readonly lostListeners: Array<(err: Error) => void> = [];

  constructor(
    private readonly model: ChannelModel,
    private readonly log: Logger,
  ) {
    this.model.on('error', (err: Error) => {
      this.log.error({ err }, 'RabbitMQ connection error');
    });

    this.model.on('close', () => {
      if (this.closing) return;

      // No automatic reconnection: surface the drop to the owner instead
      const err = new Error('RabbitMQ connection closed unexpectedly');
      this.log.fatal({ err }, 'Broker connection lost, automatic reconnection is not attempted');
      for (const listener of this.lostListeners) {
        listener(err);
      }
    });
  }

  async openChannel(): Promise<BrokerChannel> {
    const channel = await this.model.createConfirmChannel();
    return new AmqpChannel(channel, this.log);
  }

  onLost(listener: (err: Error) => void): void {
    this.lostListeners.push(listener);
  }

  async close(): Promise<void> {
    if (this.closing) return;
    this.closing = true;
    await this.model.close();
    this.log.info('RabbitMQ disconnected');
  }
}

/** Opens one AMQP connection. Retrying is the caller's business. */
export async function dialAmqp(url: string, log: Logger): Promise<AmqpConnection> {
  const model = await amqplib.connect(url);
  log.info('RabbitMQ connected');
  return new AmqpConnection(model, log);
}

export class AmqpChannel implements BrokerChannel {
  private closed = false;

  constructor(
    private readonly channel: ConfirmChannel,
    private readonly log: Logger,
  ) {
    // An unhandled 'error' event would crash the process
    this.channel.on('error', (err: Error) => {
      this.log.warn({ err }, 'RabbitMQ channel error');
    });

    this.channel.on('close', () => {
      this.closed = true;
    });
  }

  async declare(queue: string, options: DeclareOptions = {}): Promise<void> {
    await this.channel.assertQueue(queue, {
      durable: options.durable ?? true,
      exclusive: false,
      autoDelete: false,
    });
  }

  async send(queue: string, body: Buffer): Promise<void> {
    const { confirmed, callback } = publisherConfirm();
    const flushed = this.channel.sendToQueue(
      queue,
      body,
      { persistent: true, contentType: 'application/json' },
      callback,
    );

    if (!flushed) {
      await once(this.channel, 'drain');
    }
    await confirmed;
  }

  async subscribe(
    queues: readonly string[],
    handler: DeliveryHandler,
    options: SubscribeOptions,
  ): Promise<Subscription> {
    // global = true: the limit is shared by every consumer on this channel
    await this.channel.prefetch(options.prefetch, true);

    const consumerTags: string[] = [];
    for (const queue of queues) {
      const { consumerTag } = await this.channel.consume(
        queue,
        (msg) => {
          if (msg === null) {
            this.log.warn({ queue }, 'Consumer cancelled by broker');
            return;
          }

          handler(this.toDelivery(queue, msg)).catch((err: unknown) => {
            this.log.error({ err, queue }, 'Delivery handler failed');
          });
        },
        { noAck: false },
      );
      consumerTags.push(consumerTag);
    }

    return {
      cancel: async () => {
        if (this.closed) return;
        for (const tag of consumerTags) {
          await this.channel.cancel(tag);
        }
      },
    };
  }

  async get(queue: string): Promise<Delivery | null> {
    const msg = await this.channel.get(queue, { noAck: false });
    if (msg === false) return null;
    return this.toDelivery(queue, msg);
  }

  async depth(queue: string): Promise<number> {
    const { messageCount } = await this.channel.checkQueue(queue);
    return messageCount;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.channel.close();
  }

  private toDelivery(queue: string, msg: AmqpMessage): Delivery {
    return {
      queue,
      body: msg.content,
      redelivered: msg.fields.redelivered,
      ack: async () => {
        this.channel.ack(msg);
      },
      nack: async (requeue: boolean) => {
        this.channel.nack(msg, false, requeue);
      },
    };
  }
}

/** Bridges an amqplib confirm callback to a promise. */
function publisherConfirm(): { confirmed: Promise<void>; callback: (err: unknown) => void } {
  let settle: (err: unknown) => void = () => undefined;
  const confirmed = new Promise<void>((resolve, reject) => {
    settle = (err: unknown) => {
      if (err) {
        reject(err instanceof Error ? err : new Error(String(err)));
        return;
      }
      resolve();
    };
  });

  return { confirmed, callback: (err: unknown) => settle(err) };
}
