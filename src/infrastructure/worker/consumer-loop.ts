import type { Logger } from 'pino';
import type { Message, QueueSet } from '../../domain/index.js';
import { MAX_RETRIES, ProcessingError, SerializationError, queueSet } from '../../domain/index.js';
import type { HandlerRegistry } from '../../application/index.js';
import { decodeMessage, decideFailureOutcome } from '../../application/index.js';
import type { BrokerChannel, BrokerConnection, Delivery, Subscription } from '../broker/index.js';
import { Publisher, declareQueueSet } from '../queue/index.js';

export interface ConsumerLoopOptions {
  connection: BrokerConnection;
  /** Primary queue; its retry queue is consumed too. */
  queueName: string;
  registry: HandlerRegistry;
  log: Logger;
  maxRetries?: number;
  /** Per-message processing limit. Unset = no limit. */
  handlerTimeoutMs?: number | undefined;
  /** How long `stop` waits for the in-flight message before abandoning it. */
  shutdownGraceMs?: number;
  /** Shared cancellation; aborting it stops the loop. */
  signal?: AbortSignal | undefined;
}

type LoopState = 'idle' | 'starting' | 'running' | 'stopping' | 'stopped';

const DEFAULT_SHUTDOWN_GRACE_MS = 5000;

/**
 * One worker: a channel with prefetch 1 consuming `<queue>` and
 * `<queue>_retry`, so it holds at most one unacknowledged message.
 *
 * Per delivery:
 * 1. Decode. A malformed body is requeued once, then dead-lettered raw.
 * 2. Dispatch to the handler registered for `message.type`.
 * 3. Success: ack.
 * 4. Failure: publish a copy with `retryCount + 1` to the retry queue, or
 *    to the dead-letter queue once the budget is spent, then ack the
 *    original. If that publish fails the original is requeued instead.
 *
 * The resubmit is published before the ack, so a crash in between can
 * duplicate a message but never lose it.
 */
export class ConsumerLoop {
  private readonly queues: QueueSet;
  private readonly maxRetries: number;
  private readonly graceMs: number;
  private readonly log: Logger;

  private state: LoopState = 'idle';
  private channel: BrokerChannel | undefined;
  private publisher: Publisher | undefined;
  private subscription: Subscription | undefined;
  private inFlight: Promise<void> | undefined;
  private handlerAbort: AbortController | undefined;
  /** Set once the channel is being torn down; nothing is acked or published after it. */
  private abandoned = false;
  private starting: Promise<void> | undefined;
  private stopping: Promise<void> | undefined;

  constructor(private readonly options: ConsumerLoopOptions) {
    this.queues = queueSet(options.queueName);
    this.maxRetries = options.maxRetries ?? MAX_RETRIES;
    this.graceMs = options.shutdownGraceMs ?? DEFAULT_SHUTDOWN_GRACE_MS;
    this.log = options.log;
  }

  get running(): boolean {
    return this.state === 'running';
  }

  async start(): Promise<void> {
    if (this.state !== 'idle') {
      throw new Error(`Consumer loop cannot start from state ${this.state}`);
    }
    this.state = 'starting';
    this.starting = this.open();
    await this.starting;

    // A stop that arrived mid-start owns the teardown
    if (this.stopping) return;

    const { signal } = this.options;
    if (signal) {
      if (signal.aborted) {
        await this.stop();
        return;
      }
      signal.addEventListener('abort', () => {
        this.stop().catch((err: unknown) => {
          this.log.error({ err }, 'Consumer loop stop failed');
        });
      }, { once: true });
    }

    this.log.info({ queues: [this.queues.primary, this.queues.retry] }, 'Consumer started');
  }

  private async open(): Promise<void> {
    let channel: BrokerChannel;
    try {
      channel = await this.options.connection.openChannel();
    } catch (err: unknown) {
      this.state = 'stopped';
      throw err;
    }
    this.channel = channel;
    this.publisher = new Publisher(channel, this.log);

    try {
      await declareQueueSet(channel, this.queues.primary);
      this.state = 'running';
      this.subscription = await channel.subscribe(
        [this.queues.primary, this.queues.retry],
        (delivery) => this.onDelivery(delivery),
        { prefetch: 1 },
      );
    } catch (err: unknown) {
      this.state = 'stopped';
      await channel.close().catch((closeErr: unknown) => {
        this.log.warn({ err: closeErr }, 'Failed to close channel after start failure');
      });
      throw err;
    }
  }

  /**
   * Stops consuming: cancels the subscription, waits up to `graceMs` for
   * the in-flight message, then closes the channel. A message still in
   * flight is left unacknowledged and the broker redelivers it.
   * Idempotent.
   */
  stop(graceMs: number = this.graceMs): Promise<void> {
    this.stopping ??= this.shutdown(graceMs);
    return this.stopping;
  }

  private async shutdown(graceMs: number): Promise<void> {
    if (this.state === 'idle') {
      this.state = 'stopped';
      return;
    }

    // Let an in-progress start finish, so its channel and subscription are torn down here
    if (this.starting) {
      const opened = await this.starting.then(
        () => true,
        () => false,
      );
      if (!opened) return;
    }
    this.state = 'stopping';

    if (this.subscription) {
      await this.subscription.cancel().catch((err: unknown) => {
        this.log.warn({ err }, 'Failed to cancel subscription');
      });
    }

    const inFlight = this.inFlight;
    if (inFlight && !(await settlesWithin(inFlight, graceMs))) {
      this.log.warn({ graceMs }, 'Grace period elapsed, abandoning in-flight message');
    }

    this.abandoned = true;
    this.handlerAbort?.abort(new ProcessingError('Consumer loop stopped'));

    if (this.channel) {
      await this.channel.close().catch((err: unknown) => {
        this.log.warn({ err }, 'Failed to close consumer channel');
      });
    }

    this.state = 'stopped';
    this.log.info('Consumer stopped');
  }

  private onDelivery(delivery: Delivery): Promise<void> {
    const work = this.process(delivery);
    this.inFlight = work;
    return work.finally(() => {
      if (this.inFlight === work) this.inFlight = undefined;
    });
  }

  private async process(delivery: Delivery): Promise<void> {
    // Arrived after cancel: leave it unacked for redelivery.
    if (this.state !== 'running') return;

    let message: Message;
    try {
      message = decodeMessage(delivery.body);
    } catch (err: unknown) {
      await this.handleMalformed(delivery, err);
      return;
    }

    const log = this.log.child({
      message_id: message.id,
      type: message.type,
      retry_count: message.retryCount,
      queue: delivery.queue,
    });

    try {
      await this.runHandler(message, log);
    } catch (err: unknown) {
      if (this.abandoned) {
        log.warn({ err }, 'Handler interrupted by shutdown, message left for redelivery');
        return;
      }
      await this.handleFailure(delivery, message, err, log);
      return;
    }

    if (this.abandoned) return;
    await delivery.ack();
    log.debug('Message processed');
  }

  private async runHandler(message: Message, log: Logger): Promise<void> {
    const controller = new AbortController();
    this.handlerAbort = controller;
    const { handlerTimeoutMs } = this.options;
    let timer: NodeJS.Timeout | undefined;

    try {
      const handled = this.options.registry.dispatch(message, { log, signal: controller.signal });
      if (handlerTimeoutMs === undefined) {
        await handled;
        return;
      }

      const timedOut = new Promise<never>((_resolve, reject) => {
        timer = setTimeout(() => {
          const err = new ProcessingError(`Handler timed out after ${handlerTimeoutMs} ms`);
          controller.abort(err);
          reject(err);
        }, handlerTimeoutMs);
      });
      await Promise.race([handled, timedOut]);
    } finally {
      clearTimeout(timer);
      if (this.handlerAbort === controller) this.handlerAbort = undefined;
    }
  }

  private async handleFailure(delivery: Delivery, message: Message, cause: unknown, log: Logger): Promise<void> {
    if (this.abandoned) return;
    const outcome = decideFailureOutcome(message, this.queues.primary, this.maxRetries);

    try {
      await this.requirePublisher().publish(outcome.message, outcome.queue);
    } catch (err: unknown) {
      if (err instanceof SerializationError) {
        log.error({ err, cause }, 'Failed message cannot be re-encoded, dropping it');
        await delivery.ack();
        return;
      }
      log.error({ err, cause, queue: outcome.queue }, 'Failed to resubmit message, requeueing original');
      if (!this.abandoned) await delivery.nack(true);
      return;
    }

    if (this.abandoned) return;
    await delivery.ack();

    if (outcome.kind === 'retry') {
      log.warn(
        { err: cause, next_retry_count: outcome.message.retryCount, queue: outcome.queue },
        'Message processing failed, scheduled for retry',
      );
    } else {
      log.warn(
        { err: cause, retry_count: outcome.message.retryCount, queue: outcome.queue },
        'Message dead-lettered after exhausting retries',
      );
    }
  }

  private async handleMalformed(delivery: Delivery, cause: unknown): Promise<void> {
    const log = this.log.child({ queue: delivery.queue });

    if (!delivery.redelivered) {
      if (this.abandoned) return;
      log.warn({ err: cause }, 'Malformed message, requeueing once');
      await delivery.nack(true);
      return;
    }

    if (this.abandoned) return;
    try {
      await this.requirePublisher().publishRaw(delivery.body, this.queues.dead);
    } catch (err: unknown) {
      log.error({ err, cause }, 'Failed to dead-letter malformed message, requeueing it');
      if (!this.abandoned) await delivery.nack(true);
      return;
    }

    if (this.abandoned) return;
    await delivery.ack();
    log.warn({ err: cause, dead_queue: this.queues.dead }, 'Malformed message redelivered, moved to dead-letter queue');
  }

  private requirePublisher(): Publisher {
    if (!this.publisher) {
      throw new Error('Consumer loop has not been started');
    }
    return this.publisher;
  }
}

/** Resolves true when `work` settles within `ms`, false otherwise. */
async function settlesWithin(work: Promise<unknown>, ms: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const elapsed = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => resolve(false), ms);
  });

  try {
    return await Promise.race([work.then(() => true, () => true), elapsed]);
  } finally {
    clearTimeout(timer);
  }
}
