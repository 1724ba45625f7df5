import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { SECURITY_EVENTS_QUEUE } from '../../domain/index.js';

export const SERVICE_NAME = 'security-event-relay';
export const SERVICE_VERSION = '0.1.0';

type CheckStatus = 'ok' | 'unreachable';

/**
 * Liveness and status routes.
 *
 * GET /               - service banner
 * GET /health         - store and broker reachability, 503 when either fails
 * GET /api/v1/status  - process uptime
 */
async function healthRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get(
    '/',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.status(200).send({ service: SERVICE_NAME, version: SERVICE_VERSION, status: 'running' });
    },
  );

  fastify.get(
    '/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      let database: CheckStatus = 'ok';
      try {
        await fastify.events.ping();
      } catch (err: unknown) {
        fastify.log.error({ err }, 'Database health check failed');
        database = 'unreachable';
      }

      // Passive depth read: fails when the broker or the queue is gone
      const stats = await fastify.queue.stats(SECURITY_EVENTS_QUEUE);
      const entry = stats[SECURITY_EVENTS_QUEUE];
      let broker: CheckStatus = 'ok';
      if (!entry || 'error' in entry) {
        fastify.log.error({ queue: SECURITY_EVENTS_QUEUE, stats: entry }, 'Broker health check failed');
        broker = 'unreachable';
      }

      const healthy = database === 'ok' && broker === 'ok';
      return reply.status(healthy ? 200 : 503).send({
        status: healthy ? 'healthy' : 'unhealthy',
        service: SERVICE_NAME,
        version: SERVICE_VERSION,
        timestamp: new Date().toISOString(),
        checks: { database, broker },
      });
    },
  );

  fastify.get(
    '/api/v1/status',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.status(200).send({
        status: 'operational',
        uptime_seconds: Math.floor(process.uptime()),
        timestamp: new Date().toISOString(),
      });
    },
  );
}

export default fp(healthRoutes, {
  name: 'health-routes',
  dependencies: ['db', 'queue'],
  fastify: '5.x',
});
