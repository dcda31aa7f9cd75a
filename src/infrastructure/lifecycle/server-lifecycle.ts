import type { FastifyInstance } from 'fastify';
import type { ListenAddress } from '../config/index.js';

export const DEFAULT_GRACE_PERIOD_MS = 10_000;

export type LifecycleState = 'starting' | 'running' | 'shutting_down' | 'stopped';

export type ShutdownOutcome = 'graceful' | 'forced';

const TRANSITIONS: Readonly<Record<LifecycleState, readonly LifecycleState[]>> = {
  starting: ['running', 'stopped'],
  running: ['shutting_down'],
  shutting_down: ['stopped'],
  stopped: [],
};

export class InvalidLifecycleTransitionError extends Error {
  constructor(
    public readonly from: LifecycleState,
    public readonly to: LifecycleState,
  ) {
    super(`Invalid lifecycle transition: "${from}" -> "${to}"`);
    this.name = 'InvalidLifecycleTransitionError';
  }
}

export interface ServerLifecycleOptions {
  gracePeriodMs?: number;
}

/**
 * Drives a Fastify server through starting → running → shutting_down → stopped.
 *
 * Shutdown stops the listener immediately and gives in-flight requests
 * the grace period to finish; whatever is still open afterwards is
 * destroyed. Errors while closing are logged, never rethrown.
 */
export class ServerLifecycle {
  private _state: LifecycleState = 'starting';
  private shutdownPromise: Promise<ShutdownOutcome> | null = null;
  private readonly gracePeriodMs: number;

  constructor(
    private readonly fastify: FastifyInstance,
    options: ServerLifecycleOptions = {},
  ) {
    this.gracePeriodMs = options.gracePeriodMs ?? DEFAULT_GRACE_PERIOD_MS;
  }

  get state(): LifecycleState {
    return this._state;
  }

  /**
   * Binds the listener. Resolves with the bound URL.
   *
   * A bind failure moves straight to `stopped` and rejects; it is not
   * retried.
   */
  async start(address: ListenAddress): Promise<string> {
    this.assertTransition('running');

    let url: string;
    try {
      url = await this.fastify.listen({ host: address.host, port: address.port });
    } catch (err: unknown) {
      this.transition('stopped');
      throw err;
    }

    this.transition('running');
    return url;
  }

  /** Serves until `signal` aborts, then shuts down. */
  async runUntil(signal: AbortSignal): Promise<ShutdownOutcome> {
    if (!signal.aborted) {
      await new Promise<void>((resolve) => {
        signal.addEventListener('abort', () => resolve(), { once: true });
      });
    }
    return this.shutdown();
  }

  shutdown(): Promise<ShutdownOutcome> {
    if (this.shutdownPromise === null) {
      this.shutdownPromise = this.drain();
    }
    return this.shutdownPromise;
  }

  private async drain(): Promise<ShutdownOutcome> {
    if (this._state === 'stopped') return 'graceful';
    if (this._state === 'starting') {
      this.transition('stopped');
      await this.fastify.close();
      return 'graceful';
    }

    this.transition('shutting_down');
    this.fastify.log.info({ gracePeriodMs: this.gracePeriodMs }, 'Shutting down');

    const closing = this.fastify.close().then(
      () => undefined,
      (err: unknown) => {
        this.fastify.log.warn({ err }, 'Error while closing server');
      },
    );

    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<'forced'>((resolve) => {
      timer = setTimeout(() => resolve('forced'), this.gracePeriodMs);
    });

    const outcome = await Promise.race([
      closing.then(() => 'graceful' as const),
      expired,
    ]);
    clearTimeout(timer);

    if (outcome === 'forced') {
      this.fastify.log.warn('Grace period expired, closing remaining connections');
      this.fastify.server.closeAllConnections();
      await closing;
    }

    this.transition('stopped');
    this.fastify.log.info({ outcome }, 'Server stopped');
    return outcome;
  }

  private assertTransition(to: LifecycleState): void {
    if (!TRANSITIONS[this._state].includes(to)) {
      throw new InvalidLifecycleTransitionError(this._state, to);
    }
  }

  private transition(to: LifecycleState): void {
    this.assertTransition(to);
    this._state = to;
  }
}

/**
 * Cancellation token for the process: aborts on the first of `signals`.
 *
 * The listeners stay installed, so a second Ctrl-C or SIGTERM during the
 * drain is ignored rather than falling through to Node's default action,
 * which would kill the process with requests still in flight.
 */
export function abortOnSignals(
  signals: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'],
): AbortSignal {
  const controller = new AbortController();

  const onSignal = (received: NodeJS.Signals): void => {
    if (!controller.signal.aborted) {
      controller.abort(received);
    }
  };

  for (const name of signals) {
    process.on(name, onSignal);
  }

  return controller.signal;
}
