import type { IncomingHttpHeaders } from 'node:http';
import { isIP } from 'node:net';
import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';

/** Checked in order; the first one holding a valid IP wins. */
const ORIGIN_HEADERS = ['true-client-ip', 'x-real-ip', 'x-forwarded-for'] as const;

/**
 * Canonical client address for logging.
 *
 * Proxy headers take precedence over the socket address. For
 * `X-Forwarded-For` only the left-most (originating) entry counts.
 */
export function resolveClientIp(headers: IncomingHttpHeaders, socketIp: string): string {
  for (const name of ORIGIN_HEADERS) {
    const raw = headers[name];
    const value = Array.isArray(raw) ? raw[0] : raw;
    if (value === undefined) continue;

    const candidate = (value.split(',')[0] ?? '').trim();
    if (isIP(candidate) !== 0) {
      return candidate;
    }
  }
  return socketIp;
}

async function clientOrigin(fastify: FastifyInstance): Promise<void> {
  fastify.decorateRequest('clientIp', '');

  fastify.addHook('onRequest', async (request) => {
    request.clientIp = resolveClientIp(request.headers, request.ip);
  });
}

export default fp(clientOrigin, {
  name: 'client-origin',
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyRequest {
    clientIp: string;
  }
}
