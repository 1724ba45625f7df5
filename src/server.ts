import { fastify } from 'fastify';
import type { FastifyInstance, FastifyServerOptions } from 'fastify';
import { dbPlugin } from './infrastructure/db/index.js';
import type { DbPluginOptions } from './infrastructure/db/index.js';
import { queuePlugin } from './infrastructure/queue/index.js';
import type { QueueClient } from './infrastructure/queue/index.js';
import { eventRoutes, healthRoutes, queueRoutes } from './interfaces/http/index.js';

export interface ServerOptions {
  logger: FastifyServerOptions['logger'];
  db: DbPluginOptions;
  queue: QueueClient;
  /** Bound on the broker wait in `POST /api/v1/events`. */
  publishTimeoutMs?: number | undefined;
}

/**
 * Assembles the HTTP server without listening.
 *
 * Order:
 * 1) Infrastructure plugins
 * 2) HTTP routes
 */
export async function buildServer(opts: ServerOptions): Promise<FastifyInstance> {
  const app = fastify({ logger: opts.logger });

  await app.register(dbPlugin, opts.db);
  await app.register(queuePlugin, { client: opts.queue });

  await app.register(healthRoutes);
  await app.register(eventRoutes, { publishTimeoutMs: opts.publishTimeoutMs });
  await app.register(queueRoutes);

  return app;
}
