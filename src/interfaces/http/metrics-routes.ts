import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { Instrumentation } from '../../infrastructure/index.js';

export interface MetricsRoutesOptions {
  instrumentation: Instrumentation;
}

/**
 * Metrics exposition route.
 *
 * GET /metrics: Prometheus scrape endpoint. Not instrumented itself.
 */
async function metricsRoutes(fastify: FastifyInstance, opts: MetricsRoutesOptions): Promise<void> {
  fastify.get(
    '/metrics',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const body = await opts.instrumentation.metrics();
      return reply.status(200).type(opts.instrumentation.contentType).send(body);
    },
  );
}

export default fp(metricsRoutes, {
  name: 'metrics-routes',
  fastify: '5.x',
});
