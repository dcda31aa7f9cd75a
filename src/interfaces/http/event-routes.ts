import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import {
  BadRequestError,
  INVALID_EVENT_MESSAGE,
  ingestEvent,
  listRecentEvents,
} from '../../application/index.js';
import type { EventRepository } from '../../domain/index.js';
import type { Instrumentation } from '../../infrastructure/index.js';

export interface EventRoutesOptions {
  store: EventRepository;
  instrumentation: Instrumentation;
}

/** Bodies are decoded as JSON whatever the declared content type. */
async function parseJsonBody(_request: FastifyRequest, body: string): Promise<unknown> {
  try {
    return JSON.parse(body);
  } catch {
    throw new BadRequestError(INVALID_EVENT_MESSAGE);
  }
}

/**
 * Registers the event routes.
 *
 * POST /events: validate → store → 201 with the stored event
 * GET  /events: newest 50 events
 *
 * Registered without fastify-plugin so the body parser override stays
 * scoped to these routes.
 */
async function eventRoutes(fastify: FastifyInstance, opts: EventRoutesOptions): Promise<void> {
  fastify.removeAllContentTypeParsers();
  fastify.addContentTypeParser('*', { parseAs: 'string' }, parseJsonBody);

  const instrumented = opts.instrumentation.instrument('/events');

  fastify.post(
    '/events',
    { ...instrumented },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const created = await ingestEvent(opts.store, request.body);
      return reply.status(201).send(created);
    },
  );

  fastify.get(
    '/events',
    { ...instrumented },
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const events = await listRecentEvents(opts.store);
      return reply.status(200).send(events);
    },
  );
}

export default eventRoutes;
