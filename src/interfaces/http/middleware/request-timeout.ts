import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest } from 'fastify';
import { RequestTimeoutError } from '../../../application/index.js';

export interface RequestTimeoutOptions {
  timeoutMs: number;
}

/**
 * Per-request deadline.
 *
 * - `request.deadline` aborts when the time is up, so handlers can stop early.
 * - If nothing has been sent by then, a 504 goes out through the error handler.
 *
 * Only the expired request is affected.
 */
async function requestTimeout(
  fastify: FastifyInstance,
  opts: RequestTimeoutOptions,
): Promise<void> {
  const timers = new WeakMap<FastifyRequest, NodeJS.Timeout>();

  // Filled per request by the onRequest hook below.
  fastify.decorateRequest('deadline', null, []);

  fastify.addHook('onRequest', async (request, reply) => {
    const controller = new AbortController();
    request.deadline = controller.signal;

    const timer = setTimeout(() => {
      const err = new RequestTimeoutError(opts.timeoutMs);
      controller.abort(err);
      if (!reply.sent) {
        reply.send(err);
      }
    }, opts.timeoutMs);
    timer.unref();

    timers.set(request, timer);
  });

  const clear = async (request: FastifyRequest): Promise<void> => {
    clearTimeout(timers.get(request));
    timers.delete(request);
  };

  fastify.addHook('onResponse', clear);
  fastify.addHook('onRequestAbort', clear);
}

export default fp(requestTimeout, {
  name: 'request-timeout',
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyRequest {
    deadline: AbortSignal;
  }
}
