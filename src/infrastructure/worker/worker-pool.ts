import type { Logger } from 'pino';
import type { HandlerRegistry } from '../../application/index.js';
import type { BrokerConnection } from '../broker/index.js';
import { declareQueueSet } from '../queue/index.js';
import { ConsumerLoop } from './consumer-loop.js';

export interface WorkerPoolOptions {
  connection: BrokerConnection;
  registry: HandlerRegistry;
  log: Logger;
  maxRetries?: number;
  handlerTimeoutMs?: number | undefined;
  shutdownGraceMs?: number;
}

/** A running set of workers, returned by `WorkerPool.start`. */
export interface WorkerPoolHandle {
  readonly queueName: string;
  readonly workerCount: number;
  /** Shared by every worker of the pool; aborted by `stop`. */
  readonly signal: AbortSignal;
}

interface RunningPool {
  readonly controller: AbortController;
  readonly loops: readonly ConsumerLoop[];
}

/**
 * Supervises a fixed number of consumer loops on one queue.
 *
 * Each worker has its own channel with prefetch 1, so up to
 * `workerCount` messages are processed at once across the pool and
 * messages within one worker are handled one at a time.
 */
export class WorkerPool {
  private readonly running = new Map<WorkerPoolHandle, RunningPool>();

  constructor(private readonly options: WorkerPoolOptions) {}

  async start(queueName: string, workerCount: number): Promise<WorkerPoolHandle> {
    if (!Number.isInteger(workerCount) || workerCount < 1) {
      throw new RangeError(`workerCount must be a positive integer, got ${workerCount}`);
    }

    const { connection, log } = this.options;
    await this.declare(queueName);

    const controller = new AbortController();
    const loops: ConsumerLoop[] = [];

    for (let i = 1; i <= workerCount; i++) {
      const loop = new ConsumerLoop({
        connection,
        queueName,
        registry: this.options.registry,
        log: log.child({ worker: i }),
        maxRetries: this.options.maxRetries,
        handlerTimeoutMs: this.options.handlerTimeoutMs,
        shutdownGraceMs: this.options.shutdownGraceMs,
        signal: controller.signal,
      });

      try {
        await loop.start();
      } catch (err: unknown) {
        log.error({ err, worker: i }, 'Worker failed to start, stopping the pool');
        controller.abort();
        await Promise.all(loops.map((started) => started.stop()));
        throw err;
      }
      loops.push(loop);
    }

    const handle: WorkerPoolHandle = { queueName, workerCount, signal: controller.signal };
    this.running.set(handle, { controller, loops });
    log.info({ queue: queueName, workerCount }, 'Worker pool started');
    return handle;
  }

  /** Signals every worker to stop and resolves once all of them have. */
  async stop(handle: WorkerPoolHandle): Promise<void> {
    const pool = this.running.get(handle);
    if (!pool) return;

    pool.controller.abort();
    await Promise.all(pool.loops.map((loop) => loop.stop()));
    this.running.delete(handle);
    this.options.log.info({ queue: handle.queueName }, 'Worker pool stopped');
  }

  private async declare(queueName: string): Promise<void> {
    const channel = await this.options.connection.openChannel();
    try {
      await declareQueueSet(channel, queueName);
    } finally {
      await channel.close();
    }
  }
}
