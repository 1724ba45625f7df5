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

interface StoredMessage {
  readonly body: Buffer;
  readonly redelivered: boolean;
}

interface MemoryConsumer {
  readonly channel: MemoryChannel;
  readonly handler: DeliveryHandler;
}

interface MemoryQueue {
  readonly durable: boolean;
  readonly ready: StoredMessage[];
  consumers: MemoryConsumer[];
  /** Round-robin position among consumers. */
  cursor: number;
}

/**
 * In-process broker with AMQP queue semantics.
 *
 * Holds the queues; connections opened from it share them. It keeps the
 * behaviour the delivery pipeline relies on: durable-flag equivalence on
 * redeclare, prefetch per channel, round-robin dispatch, ack/nack with
 * requeue at the head, and requeue of unacked deliveries when a channel
 * closes. Nothing survives the process.
 */
export class MemoryBroker {
  private readonly queues = new Map<string, MemoryQueue>();
  private readonly scheduled = new Set<string>();

  constructor(readonly log: Logger) {}

  connect(): MemoryConnection {
    return new MemoryConnection(this);
  }

  declare(name: string, durable: boolean): void {
    const existing = this.queues.get(name);
    if (existing) {
      if (existing.durable !== durable) {
        throw new Error(`PRECONDITION_FAILED - inequivalent arg 'durable' for queue '${name}'`);
      }
      return;
    }
    this.queues.set(name, { durable, ready: [], consumers: [], cursor: 0 });
  }

  /** Ready (undelivered) messages in `name`. */
  depth(name: string): number {
    return this.queue(name).ready.length;
  }

  /** Copies of the ready message bodies in `name`, head first. */
  messages(name: string): Buffer[] {
    return this.queue(name).ready.map((m) => m.body);
  }

  hasQueue(name: string): boolean {
    return this.queues.has(name);
  }

  enqueue(name: string, message: StoredMessage, atHead = false): void {
    const queue = this.queue(name);
    if (atHead) {
      queue.ready.unshift(message);
    } else {
      queue.ready.push(message);
    }
    this.schedule(name);
  }

  take(name: string): StoredMessage | undefined {
    return this.queue(name).ready.shift();
  }

  addConsumer(name: string, consumer: MemoryConsumer): void {
    this.queue(name).consumers.push(consumer);
    this.schedule(name);
  }

  removeConsumers(match: (consumer: MemoryConsumer) => boolean): void {
    for (const queue of this.queues.values()) {
      queue.consumers = queue.consumers.filter((c) => !match(c));
    }
  }

  /** Dispatch runs on a microtask so handlers never re-enter the broker. */
  schedule(name: string): void {
    if (this.scheduled.has(name)) return;
    this.scheduled.add(name);
    queueMicrotask(() => {
      this.scheduled.delete(name);
      this.dispatch(name);
    });
  }

  private dispatch(name: string): void {
    const queue = this.queues.get(name);
    if (!queue) return;

    while (queue.ready.length > 0) {
      const consumer = this.nextConsumer(queue);
      if (!consumer) return;

      const message = queue.ready.shift();
      if (!message) return;
      consumer.channel.deliver(name, message, consumer.handler);
    }
  }

  private nextConsumer(queue: MemoryQueue): MemoryConsumer | undefined {
    const count = queue.consumers.length;
    for (let i = 0; i < count; i++) {
      const index = (queue.cursor + i) % count;
      const consumer = queue.consumers[index];
      if (consumer && consumer.channel.hasCapacity()) {
        queue.cursor = index + 1;
        return consumer;
      }
    }
    return undefined;
  }

  private queue(name: string): MemoryQueue {
    const queue = this.queues.get(name);
    if (!queue) {
      throw new Error(`NOT_FOUND - no queue '${name}'`);
    }
    return queue;
  }
}

export class MemoryConnection implements BrokerConnection {
  readonly kind = 'memory' as const;

  private readonly channels = new Set<MemoryChannel>();
  private readonly lostListeners: Array<(err: Error) => void> = [];
  private closed = false;

  constructor(private readonly broker: MemoryBroker) {}

  async openChannel(): Promise<BrokerChannel> {
    if (this.closed) {
      throw new Error('Connection closed');
    }
    const channel = new MemoryChannel(this.broker, () => this.channels.delete(channel));
    this.channels.add(channel);
    return channel;
  }

  onLost(listener: (err: Error) => void): void {
    this.lostListeners.push(listener);
  }

  /** Drops the connection as if the broker went away. */
  simulateLoss(reason = 'Connection reset'): void {
    const err = new Error(reason);
    this.closeChannels();
    this.closed = true;
    for (const listener of this.lostListeners) {
      listener(err);
    }
  }

  async close(): Promise<void> {
    this.closeChannels();
    this.closed = true;
  }

  private closeChannels(): void {
    for (const channel of [...this.channels]) {
      channel.closeNow();
    }
  }
}

interface PendingDelivery {
  readonly queue: string;
  readonly message: StoredMessage;
}

export class MemoryChannel implements BrokerChannel {
  private readonly unacked = new Set<PendingDelivery>();
  private readonly consumedQueues = new Set<string>();
  private prefetch = 0;
  private closed = false;

  constructor(
    private readonly broker: MemoryBroker,
    private readonly onClose: () => void,
  ) {}

  async declare(queue: string, options: DeclareOptions = {}): Promise<void> {
    this.assertOpen();
    this.broker.declare(queue, options.durable ?? true);
  }

  async send(queue: string, body: Buffer): Promise<void> {
    this.assertOpen();
    this.broker.enqueue(queue, { body: Buffer.from(body), redelivered: false });
  }

  async subscribe(
    queues: readonly string[],
    handler: DeliveryHandler,
    options: SubscribeOptions,
  ): Promise<Subscription> {
    this.assertOpen();
    this.prefetch = options.prefetch;

    const consumers: MemoryConsumer[] = [];
    for (const queue of queues) {
      if (!this.broker.hasQueue(queue)) {
        throw new Error(`NOT_FOUND - no queue '${queue}'`);
      }
      const consumer: MemoryConsumer = { channel: this, handler };
      consumers.push(consumer);
      this.consumedQueues.add(queue);
      this.broker.addConsumer(queue, consumer);
    }

    return {
      cancel: async () => {
        this.broker.removeConsumers((c) => consumers.includes(c));
        for (const queue of queues) {
          this.consumedQueues.delete(queue);
        }
      },
    };
  }

  async get(queue: string): Promise<Delivery | null> {
    this.assertOpen();
    const message = this.broker.take(queue);
    if (!message) return null;
    return this.track(queue, message);
  }

  async depth(queue: string): Promise<number> {
    this.assertOpen();
    return this.broker.depth(queue);
  }

  async close(): Promise<void> {
    this.closeNow();
  }

  /** Number of deliveries this channel holds without ack or nack. */
  get unackedCount(): number {
    return this.unacked.size;
  }

  hasCapacity(): boolean {
    return !this.closed && (this.prefetch === 0 || this.unacked.size < this.prefetch);
  }

  deliver(queue: string, message: StoredMessage, handler: DeliveryHandler): void {
    const delivery = this.track(queue, message);
    handler(delivery).catch((err: unknown) => {
      this.broker.log.error({ err, queue }, 'Delivery handler failed');
    });
  }

  closeNow(): void {
    if (this.closed) return;
    this.closed = true;
    this.broker.removeConsumers((c) => c.channel === this);

    // Unacked deliveries go back to the head of their queue, oldest first
    const pending = [...this.unacked].reverse();
    this.unacked.clear();
    for (const { queue, message } of pending) {
      if (this.broker.hasQueue(queue)) {
        this.broker.enqueue(queue, { body: message.body, redelivered: true }, true);
      }
    }
    this.onClose();
  }

  private track(queue: string, message: StoredMessage): Delivery {
    const pending: PendingDelivery = { queue, message };
    this.unacked.add(pending);

    const settle = (): void => {
      this.assertOpen();
      if (!this.unacked.delete(pending)) {
        throw new Error('PRECONDITION_FAILED - unknown delivery tag');
      }
      for (const consumed of this.consumedQueues) {
        this.broker.schedule(consumed);
      }
    };

    return {
      queue,
      body: message.body,
      redelivered: message.redelivered,
      ack: async () => {
        settle();
      },
      nack: async (requeue: boolean) => {
        settle();
        if (requeue) {
          this.broker.enqueue(queue, { body: message.body, redelivered: true }, true);
        }
      },
    };
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error('Channel closed');
    }
  }
}
