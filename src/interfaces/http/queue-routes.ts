import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { queueSet, SECURITY_EVENTS_QUEUE } from '../../domain/index.js';

/**
 * GET /api/v1/queue/stats - depth of the security event queues.
 *
 * A queue whose depth cannot be read is reported with an `error` entry;
 * the route itself still answers 200.
 */
async function queueRoutes(fastify: FastifyInstance): Promise<void> {
  const { primary, retry, dead } = queueSet(SECURITY_EVENTS_QUEUE);

  fastify.get(
    '/api/v1/queue/stats',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const queueStats = await fastify.queue.stats(primary, retry, dead);

      return reply.status(200).send({
        queue_stats: queueStats,
        timestamp: new Date().toISOString(),
      });
    },
  );
}

export default fp(queueRoutes, {
  name: 'queue-routes',
  dependencies: ['queue'],
  fastify: '5.x',
});
