#!/usr/bin/env node
import { CommanderError } from 'commander';
import { loadConfig } from './infrastructure/config.js';
import { createLogger } from './infrastructure/logger.js';
import { createBrokerConnection } from './infrastructure/broker/index.js';
import { WorkerPool, parseWorkerArgs } from './infrastructure/worker/index.js';
import { HandlerRegistry, securityEventHandler } from './application/index.js';
import { ConnectionError, SECURITY_EVENT_MESSAGE_TYPE } from './domain/index.js';

/**
 * Standalone worker process that consumes security events from the
 * broker with a fixed pool of consumer loops.
 *
 * Runs independently of the HTTP server and can be scaled by launching
 * more instances against the same queue.
 *
 * Exit codes: 0 after a signal-driven shutdown, 1 when the broker is
 * unreachable at startup or the connection drops.
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const log = createLogger(config.LOG_LEVEL, { service: 'security-event-worker' });
  const options = parseWorkerArgs(process.argv.slice(2), config);

  const connection = await createBrokerConnection(
    {
      backend: options.backend,
      amqpUrl: options.amqp,
      redisUrl: options.redis,
      retry: { attempts: config.CONNECT_ATTEMPTS, intervalMs: config.CONNECT_INTERVAL_MS },
    },
    log,
  );
  connection.onLost((err) => {
    log.fatal({ err }, 'Broker connection lost, exiting');
    process.exit(1);
  });

  const registry = new HandlerRegistry().register(SECURITY_EVENT_MESSAGE_TYPE, securityEventHandler);
  const pool = new WorkerPool({
    connection,
    registry,
    log,
    maxRetries: config.MAX_RETRIES,
    handlerTimeoutMs: config.HANDLER_TIMEOUT_MS,
    shutdownGraceMs: config.SHUTDOWN_GRACE_MS,
  });

  const handle = await pool.start(options.queue, options.workers);
  log.info({ queue: options.queue, workers: options.workers, backend: options.backend }, 'Worker running');

  // Graceful shutdown on SIGINT / SIGTERM
  const shutdown = (signal: string): void => {
    log.info({ signal }, 'Shutting down worker...');
    pool
      .stop(handle)
      .then(() => connection.close())
      .then(
        () => process.exit(0),
        (err: unknown) => {
          log.error({ err }, 'Worker shutdown failed');
          process.exit(1);
        },
      );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((err: unknown) => {
  if (err instanceof CommanderError) {
    process.exit(err.exitCode);
  }
  const log = createLogger(process.env['LOG_LEVEL'] ?? 'info');
  if (err instanceof ConnectionError) {
    log.fatal({ err, attempts: err.attempts }, 'Broker unreachable');
  } else {
    log.fatal({ err }, 'Worker crashed');
  }
  process.exit(1);
});
