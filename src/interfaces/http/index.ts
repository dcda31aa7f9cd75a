export { default as eventRoutes } from './event-routes.js';
export type { EventRoutesOptions } from './event-routes.js';
export { default as healthRoutes } from './health-routes.js';
export type { HealthRoutesOptions } from './health-routes.js';
export { default as metricsRoutes } from './metrics-routes.js';
export type { MetricsRoutesOptions } from './metrics-routes.js';
export { buildServer, DEFAULT_REQUEST_TIMEOUT_MS } from './server.js';
export type { ServerOptions } from './server.js';
