import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  createSecurityEventSchema,
  recordSecurityEvent,
  updateSecurityEventSchema,
} from '../../application/index.js';
import { queueSet, SECURITY_EVENTS_QUEUE } from '../../domain/index.js';

export interface EventRoutesOptions {
  /** Passed to the record use case; unset = wait for the broker indefinitely. */
  publishTimeoutMs?: number | undefined;
}

type EventParams = { Params: { id: string } };

/**
 * Registers the security event routes.
 *
 * POST   /api/v1/events      - store an event and queue it for processing
 * GET    /api/v1/events      - stored events, newest first, with queue stats
 * GET    /api/v1/events/:id  - one stored event by event_id
 * PUT    /api/v1/events/:id  - partial update of a stored event
 * DELETE /api/v1/events/:id  - remove a stored event
 *
 * Updates and deletes touch the store only; a message already queued
 * for the event is not recalled.
 */
async function eventRoutes(fastify: FastifyInstance, opts: EventRoutesOptions): Promise<void> {
  const { primary, retry, dead } = queueSet(SECURITY_EVENTS_QUEUE);

  fastify.post(
    '/api/v1/events',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = createSecurityEventSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const { event, queued } = await recordSecurityEvent(
        {
          events: fastify.events,
          publisher: fastify.queue,
          log: request.log,
          publishTimeoutMs: opts.publishTimeoutMs,
        },
        parsed.data,
      );

      return reply.status(201).send({
        message: queued
          ? 'Event created successfully and queued for processing'
          : 'Event created successfully',
        event,
      });
    },
  );

  fastify.get(
    '/api/v1/events',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const events = await fastify.events.list();
      const queueStats = await fastify.queue.stats(primary, retry, dead);

      return reply.status(200).send({
        events,
        total: events.length,
        queue_stats: queueStats,
      });
    },
  );

  fastify.get(
    '/api/v1/events/:id',
    async (request: FastifyRequest<EventParams>, reply: FastifyReply) => {
      const event = await fastify.events.findByEventId(request.params.id);

      if (!event) {
        return reply.status(404).send({ error: 'Event not found' });
      }

      return reply.status(200).send({ event });
    },
  );

  fastify.put(
    '/api/v1/events/:id',
    async (request: FastifyRequest<EventParams>, reply: FastifyReply) => {
      const parsed = updateSecurityEventSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const event = await fastify.events.update(request.params.id, parsed.data);

      if (!event) {
        return reply.status(404).send({ error: 'Event not found' });
      }

      request.log.info({ event_id: event.event_id }, 'Event updated');
      return reply.status(200).send({ message: 'Event updated successfully', event });
    },
  );

  fastify.delete(
    '/api/v1/events/:id',
    async (request: FastifyRequest<EventParams>, reply: FastifyReply) => {
      const deleted = await fastify.events.delete(request.params.id);

      if (!deleted) {
        return reply.status(404).send({ error: 'Event not found' });
      }

      request.log.info({ event_id: request.params.id }, 'Event deleted');
      return reply.status(200).send({ message: 'Event deleted successfully', event_id: request.params.id });
    },
  );
}

export default fp(eventRoutes, {
  name: 'event-routes',
  dependencies: ['db', 'queue'],
  fastify: '5.x',
});
