import { loadConfig } from './infrastructure/config.js';
import { createLogger } from './infrastructure/logger.js';
import { createBrokerConnection } from './infrastructure/broker/index.js';
import { InMemoryEventRepository } from './infrastructure/db/index.js';
import type { DbPluginOptions } from './infrastructure/db/index.js';
import { QueueClient } from './infrastructure/queue/index.js';
import { WorkerPool } from './infrastructure/worker/index.js';
import { HandlerRegistry, securityEventHandler } from './application/index.js';
import { SECURITY_EVENT_MESSAGE_TYPE, SECURITY_EVENTS_QUEUE } from './domain/index.js';
import { buildServer } from './server.js';

/**
 * Bootstrap the HTTP ingestion server.
 *
 * Order:
 * 1) Broker connection (bounded retries, fatal on failure)
 * 2) Fastify plugins and routes
 * 3) Shutdown hooks
 * 4) listen()
 *
 * With the in-process broker nothing else can reach the queues, so the
 * worker pool runs inside the server.
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const log = createLogger(config.LOG_LEVEL, { service: 'security-event-server' });

  const connection = await createBrokerConnection(
    {
      backend: config.QUEUE_BACKEND,
      amqpUrl: config.AMQP_URL,
      redisUrl: config.REDIS_URL,
      retry: { attempts: config.CONNECT_ATTEMPTS, intervalMs: config.CONNECT_INTERVAL_MS },
    },
    log,
  );
  connection.onLost((err) => {
    log.fatal({ err }, 'Broker connection lost, exiting');
    process.exit(1);
  });

  const queue = await QueueClient.open(connection, log);
  await queue.declare(SECURITY_EVENTS_QUEUE);

  const inProcess = config.QUEUE_BACKEND === 'memory';
  const db: DbPluginOptions = inProcess
    ? { repository: new InMemoryEventRepository() }
    : { databaseUrl: config.DATABASE_URL };

  const app = await buildServer({
    logger: { level: config.LOG_LEVEL },
    db,
    queue,
    publishTimeoutMs: config.PUBLISH_TIMEOUT_MS,
  });

  let stopWorkers = async (): Promise<void> => undefined;

  if (inProcess) {
    const pool = new WorkerPool({
      connection,
      registry: new HandlerRegistry().register(SECURITY_EVENT_MESSAGE_TYPE, securityEventHandler),
      log: log.child({ component: 'worker-pool' }),
      maxRetries: config.MAX_RETRIES,
      handlerTimeoutMs: config.HANDLER_TIMEOUT_MS,
      shutdownGraceMs: config.SHUTDOWN_GRACE_MS,
    });
    const handle = await pool.start(SECURITY_EVENTS_QUEUE, config.WORKER_COUNT);
    stopWorkers = () => pool.stop(handle);
  }

  const shutdown = (signal: string): void => {
    log.info({ signal }, 'Shutting down server...');
    // Workers stop before the queue plugin closes the connection.
    stopWorkers()
      .then(() => app.close())
      .then(
        () => process.exit(0),
        (err: unknown) => {
          log.error({ err }, 'Server shutdown failed');
          process.exit(1);
        },
      );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await app.listen({ host: config.HOST, port: config.PORT });
}

main().catch((err: unknown) => {
  console.error('Fatal: failed to start server', err);
  process.exit(1);
});
