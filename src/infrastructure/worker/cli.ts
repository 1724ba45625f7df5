import { Command, InvalidArgumentError, Option } from 'commander';
import type { BackendKind } from '../../domain/index.js';
import type { Config } from '../config.js';

/** Backends another process can reach; the in-process broker is not one of them. */
export const WORKER_BACKEND_KINDS = ['rabbitmq', 'redis'] as const satisfies readonly BackendKind[];

export type WorkerBackendKind = (typeof WORKER_BACKEND_KINDS)[number];

export type WorkerCliOptions = {
  backend: WorkerBackendKind;
  amqp: string;
  redis: string;
  queue: string;
  workers: number;
};

function parseWorkerCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function isWorkerBackend(kind: string): kind is WorkerBackendKind {
  return WORKER_BACKEND_KINDS.some((candidate) => candidate === kind);
}

/**
 * Builds the worker command line. Environment configuration supplies
 * the defaults; flags override it.
 */
export function createWorkerCommand(config: Config): Command {
  return new Command()
    .name('security-event-worker')
    .description('Consume security events from the broker with a fixed pool of workers')
    .addOption(
      new Option('--backend <kind>', 'broker backend')
        .choices(WORKER_BACKEND_KINDS)
        .default(config.QUEUE_BACKEND),
    )
    .option('--amqp <url>', 'AMQP broker URL', config.AMQP_URL)
    .option('--redis <url>', 'Redis URL for the redis backend', config.REDIS_URL)
    .option('--queue <name>', 'primary queue to consume', config.QUEUE_NAME)
    .option('--workers <n>', 'number of concurrent workers', parseWorkerCount, config.WORKER_COUNT);
}

/**
 * Parses user arguments (without the node and script entries).
 *
 * Defaults skip commander's choice check, so a `QUEUE_BACKEND=memory`
 * environment is rejected here: a standalone worker on the in-process
 * broker would have nothing to consume and nothing keeping it alive.
 */
export function parseWorkerArgs(args: readonly string[], config: Config): WorkerCliOptions {
  const command = createWorkerCommand(config).exitOverride();
  command.parse([...args], { from: 'user' });

  const { backend, amqp, redis, queue, workers } = command.opts<{
    backend: string;
    amqp: string;
    redis: string;
    queue: string;
    workers: number;
  }>();
  if (isWorkerBackend(backend)) {
    return { backend, amqp, redis, queue, workers };
  }
  return command.error(
    `error: backend '${backend}' cannot be used by a standalone worker. Allowed choices are ${WORKER_BACKEND_KINDS.join(', ')}.`,
    { code: 'commander.invalidArgument', exitCode: 1 },
  );
}
