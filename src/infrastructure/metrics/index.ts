export { Instrumentation, DEFAULT_BUCKETS } from './instrumentation.js';
export type { InstrumentationOptions, RouteInstrumentation } from './instrumentation.js';
