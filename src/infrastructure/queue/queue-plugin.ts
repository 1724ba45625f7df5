import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { QueueClient } from './queue-client.js';

export interface QueuePluginOptions {
  client: QueueClient;
}

/**
 * Fastify plugin that exposes an open queue client as `fastify.queue`
 * and closes it (and its broker connection) on server shutdown.
 */
async function queuePlugin(fastify: FastifyInstance, opts: QueuePluginOptions): Promise<void> {
  fastify.decorate('queue', opts.client);

  fastify.addHook('onClose', async () => {
    await opts.client.close();
    fastify.log.info('Broker disconnected');
  });
}

export default fp(queuePlugin, {
  name: 'queue',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.queue` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    queue: QueueClient;
  }
}
