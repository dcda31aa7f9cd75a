export type { NewEvent, StoredEvent, EventRepository, Awaitable } from './event.js';
