import { randomUUID } from 'node:crypto';
import { hostname } from 'node:os';
import { Redis } from 'ioredis';
import type { Logger } from 'pino';
import { z } from 'zod';
import type {
  BrokerChannel,
  BrokerConnection,
  DeclareOptions,
  Delivery,
  DeliveryHandler,
  SubscribeOptions,
  Subscription,
} from './types.js';

/** One consumer group shared by every worker, so each entry goes to one of them. */
const GROUP_NAME = 'delivery_workers';

// How long one blocking read waits before re-checking for cancellation (ms)
const BLOCK_MS = 1000;

// Pause after a failed read before trying again (ms)
const READ_ERROR_BACKOFF_MS = 1000;

/**
 * XREADGROUP reply: [[stream, [[id, fields | null], ...]], ...] or null.
 * Fields are null for entries deleted while still pending.
 */
const streamReplySchema = z
  .array(z.tuple([z.string(), z.array(z.tuple([z.string(), z.array(z.string()).nullable()]))]))
  .nullable();

/** XPENDING summary reply: [count, smallestId, greatestId, consumers]. */
const pendingSummarySchema = z.tuple([z.number(), z.unknown(), z.unknown(), z.unknown()]);

interface StreamEntry {
  readonly queue: string;
  readonly id: string;
  readonly fields: Map<string, string>;
}

function parseStreamReply(reply: unknown): StreamEntry[] {
  const parsed = streamReplySchema.parse(reply);
  if (parsed === null) return [];

  const entries: StreamEntry[] = [];
  for (const [queue, items] of parsed) {
    for (const [id, flat] of items) {
      if (flat === null) continue; // deleted while pending
      const fields = new Map<string, string>();
      for (let i = 0; i < flat.length; i += 2) {
        const key = flat[i];
        const value = flat[i + 1];
        if (key !== undefined && value !== undefined) {
          fields.set(key, value);
        }
      }
      entries.push({ queue, id, fields });
    }
  }
  return entries;
}

/**
 * Redis backend built on Streams and one consumer group per queue.
 *
 * - A queue is a stream; declaring it creates the group (MKSTREAM).
 * - Acknowledging removes the entry (XACK + XDEL), so the stream only
 *   holds outstanding work and its length tracks queue depth.
 * - A requeue re-appends the body flagged as redelivered.
 *
 * Durability follows the server's persistence settings; the `durable`
 * flag is accepted but has no per-queue effect.
 */
export class RedisConnection implements BrokerConnection {
  readonly kind = 'redis' as const;

  private closing = false;
  private readonly lostListeners: Array<(err: Error) => void> = [];
  private readonly channels = new Set<RedisChannel>();

  constructor(
    private readonly redis: Redis,
    private readonly log: Logger,
  ) {
    this.redis.on('error', (err: Error) => {
      this.log.error({ err }, 'Redis connection error');
    });

    this.redis.on('end', () => {
      if (this.closing) return;
      const err = new Error('Redis connection ended unexpectedly');
      this.log.fatal({ err }, 'Broker connection lost, automatic reconnection is not attempted');
      for (const listener of this.lostListeners) {
        listener(err);
      }
    });
  }

  async openChannel(): Promise<BrokerChannel> {
    const channel = new RedisChannel(this.redis, this.log, () => this.channels.delete(channel));
    this.channels.add(channel);
    return channel;
  }

  onLost(listener: (err: Error) => void): void {
    this.lostListeners.push(listener);
  }

  async close(): Promise<void> {
    if (this.closing) return;
    this.closing = true;

    for (const channel of [...this.channels]) {
      await channel.close();
    }
    await this.redis.quit();
    this.log.info('Redis disconnected');
  }
}

/** Opens one Redis connection without ioredis' own reconnect loop. */
export async function dialRedis(url: string, log: Logger): Promise<RedisConnection> {
  const redis = new Redis(url, {
    maxRetriesPerRequest: null,
    enableReadyCheck: true,
    lazyConnect: true,
    retryStrategy: () => null,
  });

  await redis.connect();
  log.info('Redis connected');
  return new RedisConnection(redis, log);
}

interface OutstandingEntry {
  readonly queue: string;
  readonly id: string;
  readonly body: string;
}

export class RedisChannel implements BrokerChannel {
  private readonly consumerName = `${hostname()}-${process.pid}-${randomUUID().slice(0, 8)}`;
  private readonly outstanding = new Map<string, OutstandingEntry>();
  private readonly loops = new Set<Promise<void>>();
  private readonly blockingClients = new Set<Redis>();
  private capacityWaiters: Array<() => void> = [];
  private closed = false;

  constructor(
    private readonly redis: Redis,
    private readonly log: Logger,
    private readonly onClose: () => void,
  ) {}

  /**
   * Creates the consumer group from "0" so entries appended before the
   * first consumer existed are still delivered. Acked entries are
   * deleted, so "0" never replays finished work.
   *
   * Ignores BUSYGROUP errors (group already exists).
   */
  async declare(queue: string, _options: DeclareOptions = {}): Promise<void> {
    try {
      await this.redis.xgroup('CREATE', queue, GROUP_NAME, '0', 'MKSTREAM');
      this.log.debug({ queue, group: GROUP_NAME }, 'Consumer group created');
    } catch (err: unknown) {
      if (err instanceof Error && err.message.includes('BUSYGROUP')) {
        return;
      }
      throw err;
    }
  }

  async send(queue: string, body: Buffer): Promise<void> {
    await this.redis.xadd(queue, '*', 'body', body.toString('utf-8'));
  }

  async subscribe(
    queues: readonly string[],
    handler: DeliveryHandler,
    options: SubscribeOptions,
  ): Promise<Subscription> {
    this.assertOpen();

    // Blocking reads hold their connection, so each subscription gets its own
    const reader = this.redis.duplicate();
    this.blockingClients.add(reader);

    const state = { cancelled: false };
    const loop = this.readLoop(reader, queues, handler, options.prefetch, state).finally(() => {
      this.loops.delete(loop);
      this.blockingClients.delete(reader);
      reader.disconnect();
    });
    this.loops.add(loop);

    return {
      cancel: async () => {
        state.cancelled = true;
        this.releaseCapacityWaiters();
        await loop;
      },
    };
  }

  async get(queue: string): Promise<Delivery | null> {
    this.assertOpen();

    const reply = await this.redis.call(
      'XREADGROUP', 'GROUP', GROUP_NAME, this.consumerName,
      'COUNT', 1,
      'STREAMS', queue, '>',
    );

    const [entry] = parseStreamReply(reply);
    return entry ? this.track(entry) : null;
  }

  /** Entries not yet delivered to any consumer. */
  async depth(queue: string): Promise<number> {
    if ((await this.redis.exists(queue)) === 0) {
      throw new Error(`NOT_FOUND - no queue '${queue}'`);
    }

    const length = await this.redis.xlen(queue);
    const [pending] = pendingSummarySchema.parse(await this.redis.call('XPENDING', queue, GROUP_NAME));
    return Math.max(0, length - pending);
  }

  /** Stops reading and puts every unacknowledged entry back on its queue. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.releaseCapacityWaiters();

    for (const reader of this.blockingClients) {
      reader.disconnect();
    }
    await Promise.allSettled([...this.loops]);

    for (const entry of [...this.outstanding.values()]) {
      await this.requeue(entry);
    }
    this.outstanding.clear();
    this.onClose();
  }

  private async readLoop(
    reader: Redis,
    queues: readonly string[],
    handler: DeliveryHandler,
    prefetch: number,
    state: { cancelled: boolean },
  ): Promise<void> {
    while (!state.cancelled && !this.closed) {
      const free = prefetch - this.outstanding.size;
      if (free <= 0) {
        await new Promise<void>((resolve) => this.capacityWaiters.push(resolve));
        continue;
      }

      let entries: StreamEntry[];
      try {
        const reply = await reader.call(
          'XREADGROUP', 'GROUP', GROUP_NAME, this.consumerName,
          'COUNT', free,
          'BLOCK', BLOCK_MS,
          'STREAMS', ...queues, ...queues.map(() => '>'),
        );
        entries = parseStreamReply(reply);
      } catch (err: unknown) {
        if (state.cancelled || this.closed) break;
        this.log.error({ err, queues }, 'Stream read failed, retrying');
        await sleep(READ_ERROR_BACKOFF_MS);
        continue;
      }

      for (const entry of entries) {
        if (this.closed) {
          await this.requeue({ queue: entry.queue, id: entry.id, body: entry.fields.get('body') ?? '' });
          continue;
        }
        handler(this.track(entry)).catch((err: unknown) => {
          this.log.error({ err, queue: entry.queue }, 'Delivery handler failed');
        });
      }
    }
  }

  private track(entry: StreamEntry): Delivery {
    const outstanding: OutstandingEntry = {
      queue: entry.queue,
      id: entry.id,
      body: entry.fields.get('body') ?? '',
    };
    this.outstanding.set(entry.id, outstanding);

    const settle = async (action: () => Promise<void>): Promise<void> => {
      this.assertOpen();
      if (!this.outstanding.delete(entry.id)) {
        throw new Error(`Delivery ${entry.id} already settled`);
      }
      try {
        await action();
      } finally {
        this.releaseCapacityWaiters();
      }
    };

    return {
      queue: entry.queue,
      body: Buffer.from(outstanding.body, 'utf-8'),
      redelivered: entry.fields.get('redelivered') === '1',
      ack: () => settle(() => this.remove(outstanding)),
      nack: (requeue: boolean) => settle(() => (requeue ? this.requeue(outstanding) : this.remove(outstanding))),
    };
  }

  private async remove(entry: OutstandingEntry): Promise<void> {
    await this.redis.xack(entry.queue, GROUP_NAME, entry.id);
    await this.redis.xdel(entry.queue, entry.id);
  }

  private async requeue(entry: OutstandingEntry): Promise<void> {
    await this.redis.xadd(entry.queue, '*', 'body', entry.body, 'redelivered', '1');
    await this.remove(entry);
  }

  private releaseCapacityWaiters(): void {
    const waiters = this.capacityWaiters;
    this.capacityWaiters = [];
    for (const wake of waiters) {
      wake();
    }
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error('Channel closed');
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
