import { STATUS_CODES } from 'node:http';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

/** Prometheus client default latency buckets, in seconds. */
export const DEFAULT_BUCKETS: readonly number[] = [
  0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10,
];

export interface InstrumentationOptions {
  /** Also export process metrics (CPU, memory, event loop). Default: true. */
  defaultMetrics?: boolean;
  buckets?: readonly number[];
}

/** Route-level hooks produced by {@link Instrumentation.instrument}. */
export interface RouteInstrumentation {
  onRequest: (request: FastifyRequest) => Promise<void>;
  onSend: (request: FastifyRequest, reply: FastifyReply, payload: unknown) => Promise<unknown>;
}

/**
 * Explicit metrics context.
 *
 * Owns its own registry instead of the prom-client global one, so each
 * server (and each test) aggregates independently. Constructed once at
 * startup and handed to the server wiring by reference.
 */
export class Instrumentation {
  readonly registry: Registry;
  private readonly requests: Counter<'route' | 'method' | 'code'>;
  private readonly duration: Histogram<'route' | 'method'>;
  private readonly startedAt = new WeakMap<FastifyRequest, bigint>();
  private readonly recorded = new WeakSet<FastifyRequest>();

  constructor(options: InstrumentationOptions = {}) {
    this.registry = new Registry();

    this.requests = new Counter({
      name: 'http_requests_total',
      help: 'Total HTTP requests',
      labelNames: ['route', 'method', 'code'] as const,
      registers: [this.registry],
    });

    this.duration = new Histogram({
      name: 'http_request_duration_seconds',
      help: 'HTTP request latency',
      labelNames: ['route', 'method'] as const,
      buckets: [...(options.buckets ?? DEFAULT_BUCKETS)],
      registers: [this.registry],
    });

    if (options.defaultMetrics ?? true) {
      collectDefaultMetrics({ register: this.registry });
    }
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  /**
   * Wraps a route: starts a timer on entry and, when the handler's
   * response is dispatched, records its status and elapsed time under
   * `route`.
   *
   * Recording happens in `onSend`, which runs whether or not the client
   * is still connected, so a request whose client hung up is still
   * counted. Each request is recorded once.
   *
   * Only observes: the handler's response is never touched. A handler
   * that sets no status is recorded as 200, which is what Fastify sends.
   */
  instrument(route: string): RouteInstrumentation {
    return {
      onRequest: async (request) => {
        this.startedAt.set(request, process.hrtime.bigint());
      },
      onSend: async (request, reply, payload) => {
        if (this.recorded.has(request)) return payload;
        this.recorded.add(request);

        const start = this.startedAt.get(request);
        this.startedAt.delete(request);

        const seconds = start === undefined
          ? 0
          : Number(process.hrtime.bigint() - start) / 1e9;

        this.record(route, request.method, reply.statusCode, seconds);
        return payload;
      },
    };
  }

  record(route: string, method: string, statusCode: number, seconds: number): void {
    this.requests.inc({ route, method, code: STATUS_CODES[statusCode] ?? String(statusCode) });
    this.duration.observe({ route, method }, seconds);
  }

  /** Prometheus text exposition of everything in the registry. */
  metrics(): Promise<string> {
    return this.registry.metrics();
  }
}
