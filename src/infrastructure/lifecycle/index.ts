export {
  ServerLifecycle,
  InvalidLifecycleTransitionError,
  abortOnSignals,
  DEFAULT_GRACE_PERIOD_MS,
} from './server-lifecycle.js';
export type {
  LifecycleState,
  ShutdownOutcome,
  ServerLifecycleOptions,
} from './server-lifecycle.js';
