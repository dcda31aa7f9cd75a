export { InMemoryEventRepository } from './events/index.js';
export type { InMemoryEventRepositoryOptions } from './events/index.js';
export { Instrumentation, DEFAULT_BUCKETS } from './metrics/index.js';
export type { InstrumentationOptions, RouteInstrumentation } from './metrics/index.js';
export { loadConfig, parseListenAddress, ConfigError } from './config/index.js';
export type { AppConfig, ListenAddress, LogLevel } from './config/index.js';
export {
  ServerLifecycle,
  InvalidLifecycleTransitionError,
  abortOnSignals,
  DEFAULT_GRACE_PERIOD_MS,
} from './lifecycle/index.js';
export type { LifecycleState, ShutdownOutcome, ServerLifecycleOptions } from './lifecycle/index.js';
