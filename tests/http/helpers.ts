import pino from 'pino';
import type { FastifyInstance } from 'fastify';
import { buildServer } from '../../src/interfaces/http/index.js';
import type { ServerOptions } from '../../src/interfaces/http/index.js';
import { InMemoryEventRepository, Instrumentation } from '../../src/infrastructure/index.js';
import type { EventRepository } from '../../src/domain/index.js';

export type LogLine = Record<string, unknown>;

export interface TestContext {
  fastify: FastifyInstance;
  store: EventRepository;
  instrumentation: Instrumentation;
  logs: LogLine[];
}

/**
 * Builds the full pipeline with an in-memory store, a private metrics
 * registry and a pino logger that records every line.
 */
export async function createTestServer(
  overrides: Partial<Omit<ServerOptions, 'logger'>> = {},
): Promise<TestContext> {
  const logs: LogLine[] = [];
  const logger = pino({ level: 'info' }, {
    write(msg: string) {
      const line: LogLine = JSON.parse(msg);
      logs.push(line);
    },
  });

  const store = overrides.store ?? new InMemoryEventRepository();
  const instrumentation = overrides.instrumentation ?? new Instrumentation({ defaultMetrics: false });

  const fastify = await buildServer({
    ...overrides,
    store,
    instrumentation,
    logger,
  });

  return { fastify, store, instrumentation, logs };
}

export async function closeTestServer(ctx: TestContext): Promise<void> {
  await ctx.fastify.close();
}

/** Values of one metric from the context's private registry. */
export async function metricValues(instrumentation: Instrumentation, name: string) {
  const all = await instrumentation.registry.getMetricsAsJSON();
  return all.find((metric) => metric.name === name)?.values ?? [];
}

/** Sum of `http_requests_total` across all status labels. */
export async function requestCount(
  instrumentation: Instrumentation,
  route: string,
  method: string,
): Promise<number> {
  const values = await metricValues(instrumentation, 'http_requests_total');
  return values
    .filter((v) => v.labels['route'] === route && v.labels['method'] === method)
    .reduce((sum, v) => sum + v.value, 0);
}

export function postEvent(fastify: FastifyInstance, body: unknown) {
  return fastify.inject({ method: 'POST', url: '/events', payload: JSON.stringify(body), headers: { 'content-type': 'application/json' } });
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
