import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import { createDbClient, ensureSchema } from './client.js';
import { DrizzleEventRepository } from './event-repository.js';
import type { EventRepository } from './event-repository.js';

/** A Postgres URL to connect to, or a ready repository (tests, local runs). */
export type DbPluginOptions =
  | { databaseUrl: string }
  | { repository: EventRepository };

/**
 * Fastify plugin that manages the Drizzle/postgres.js connection lifecycle.
 *
 * Decorates `fastify.events` with the Postgres-backed event store and
 * closes the connection pool on server shutdown. A repository passed in
 * directly is decorated as is.
 */
async function dbPlugin(fastify: FastifyInstance, opts: DbPluginOptions): Promise<void> {
  if ('repository' in opts) {
    fastify.decorate('events', opts.repository);
    return;
  }

  const { sql, db } = createDbClient(opts.databaseUrl);

  await ensureSchema(sql);
  fastify.log.info('Database ready (security_events table)');

  fastify.decorate('events', new DrizzleEventRepository(db));

  fastify.addHook('onClose', async () => {
    await sql.end();
    fastify.log.info('Database disconnected');
  });
}

export default fp(dbPlugin, {
  name: 'db',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.events` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    events: EventRepository;
  }
}
