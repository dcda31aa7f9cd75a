export { newEventSchema } from './event-schema.js';
export { ingestEvent, INVALID_EVENT_MESSAGE } from './ingest-event.js';
export { listRecentEvents, EVENT_PAGE_SIZE } from './query-events.js';
export { BadRequestError, RequestTimeoutError, isAppError } from './errors.js';
export type { AppError } from './errors.js';
