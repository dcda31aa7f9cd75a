export { errorHandler } from './error-handler.js';
export type { ApiError } from './error-handler.js';
export { default as clientOrigin, resolveClientIp } from './client-origin.js';
export { default as requestTimeout } from './request-timeout.js';
export type { RequestTimeoutOptions } from './request-timeout.js';
export { default as accessLog } from './access-log.js';
export { default as connectionDrain } from './connection-drain.js';
