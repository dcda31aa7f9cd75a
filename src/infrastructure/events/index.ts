export { InMemoryEventRepository } from './in-memory-event-repo.js';
export type { InMemoryEventRepositoryOptions } from './in-memory-event-repo.js';
