import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';

/**
 * Once the server starts closing, responses still being produced ask the
 * client to drop the connection. Otherwise a keep-alive socket that was
 * busy at close time would stay open after its response and hold
 * `close()` until the keep-alive timeout.
 */
async function connectionDrain(fastify: FastifyInstance): Promise<void> {
  let closing = false;

  fastify.addHook('preClose', async () => {
    closing = true;
  });

  fastify.addHook('onSend', async (_request, reply, payload) => {
    if (closing) {
      reply.header('connection', 'close');
    }
    return payload;
  });
}

export default fp(connectionDrain, {
  name: 'connection-drain',
  fastify: '5.x',
});
