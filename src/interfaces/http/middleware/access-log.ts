import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';

/**
 * One `request` line per completed response, whatever the outcome.
 * Replaces Fastify's built-in request logging.
 */
async function accessLog(fastify: FastifyInstance): Promise<void> {
  fastify.addHook('onResponse', async (request, reply) => {
    request.log.info(
      {
        method: request.method,
        path: request.url.split('?')[0] ?? '',
        status: reply.statusCode,
        duration_ms: reply.elapsedTime,
        client_ip: request.clientIp,
      },
      'request',
    );
  });
}

export default fp(accessLog, {
  name: 'access-log',
  dependencies: ['client-origin'],
  fastify: '5.x',
});
