import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { Instrumentation } from '../../infrastructure/index.js';

export interface HealthRoutesOptions {
  instrumentation: Instrumentation;
}

/**
 * GET /healthz: liveness check. Fixed body, no I/O, so it keeps
 * answering while the event routes are under load.
 */
async function healthRoutes(fastify: FastifyInstance, opts: HealthRoutesOptions): Promise<void> {
  fastify.get(
    '/healthz',
    { ...opts.instrumentation.instrument('/healthz') },
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.status(200).type('text/plain; charset=utf-8').send('ok');
    },
  );
}

export default fp(healthRoutes, {
  name: 'health-routes',
  fastify: '5.x',
});
