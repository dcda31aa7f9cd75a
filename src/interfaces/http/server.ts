import { randomUUID } from 'node:crypto';
import Fastify from 'fastify';
import type { FastifyBaseLogger, FastifyInstance } from 'fastify';
import type { EventRepository } from '../../domain/index.js';
import type { Instrumentation } from '../../infrastructure/index.js';
import {
  accessLog,
  clientOrigin,
  connectionDrain,
  errorHandler,
  requestTimeout,
} from './middleware/index.js';
import eventRoutes from './event-routes.js';
import healthRoutes from './health-routes.js';
import metricsRoutes from './metrics-routes.js';

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

export interface ServerOptions {
  store: EventRepository;
  instrumentation: Instrumentation;
  /** Omit for a silent server. */
  logger?: FastifyBaseLogger;
  requestTimeoutMs?: number;
}

/**
 * Assembles the HTTP pipeline without listening.
 *
 * Order:
 * 1) Recovery (error handler)
 * 2) Request id (`X-Request-Id` or a fresh UUID)
 * 3) Client origin
 * 4) Timeout
 * 5) Access log
 * 6) Connection drain on close
 * 7) Routes, instrumented per endpoint
 */
export async function buildServer(options: ServerOptions): Promise<FastifyInstance> {
  const fastify = Fastify({
    loggerInstance: options.logger,
    disableRequestLogging: true,
    requestIdHeader: 'x-request-id',
    requestIdLogLabel: 'reqId',
    genReqId: () => randomUUID(),
  });

  fastify.setErrorHandler(errorHandler);

  await fastify.register(clientOrigin);
  await fastify.register(requestTimeout, {
    timeoutMs: options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
  });
  await fastify.register(accessLog);
  await fastify.register(connectionDrain);

  await fastify.register(healthRoutes, { instrumentation: options.instrumentation });
  await fastify.register(metricsRoutes, { instrumentation: options.instrumentation });
  await fastify.register(eventRoutes, {
    store: options.store,
    instrumentation: options.instrumentation,
  });

  return fastify;
}
