import pino from 'pino';

import {
  InMemoryEventRepository,
  Instrumentation,
  ServerLifecycle,
  abortOnSignals,
  loadConfig,
  DEFAULT_GRACE_PERIOD_MS,
} from './infrastructure/index.js';
import type { ShutdownOutcome } from './infrastructure/index.js';

import { buildServer, DEFAULT_REQUEST_TIMEOUT_MS } from './interfaces/http/index.js';

export interface ServiceOptions {
  env?: NodeJS.ProcessEnv;
  /** Process signals that start the shutdown. Default: SIGINT, SIGTERM. */
  signals?: readonly NodeJS.Signals[];
  /** Where log lines go. Default: stdout. */
  logDestination?: pino.DestinationStream;
  /** Called with the bound URL once the listener is up. */
  onListening?: (url: string) => void;
}

/**
 * Runs the intake service until one of `signals` arrives.
 *
 * Order:
 * 1) Config (HTTP_ADDR, LOG_LEVEL)
 * 2) Shared state: event store + instrumentation context
 * 3) HTTP pipeline
 * 4) Signal-driven cancellation
 * 5) listen(), then serve until signalled and drain
 *
 * Rejects on invalid config or a bind failure.
 */
export async function runService(options: ServiceOptions = {}): Promise<ShutdownOutcome> {
  const config = loadConfig(options.env);
  const log = options.logDestination === undefined
    ? pino({ level: config.logLevel })
    : pino({ level: config.logLevel }, options.logDestination);

  const store = new InMemoryEventRepository();
  const instrumentation = new Instrumentation();

  const fastify = await buildServer({
    store,
    instrumentation,
    logger: log,
    requestTimeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
  });

  const lifecycle = new ServerLifecycle(fastify, {
    gracePeriodMs: DEFAULT_GRACE_PERIOD_MS,
  });

  const stop = abortOnSignals(options.signals);

  const url = await lifecycle.start(config.listen);
  options.onListening?.(url);

  return lifecycle.runUntil(stop);
}
