import type { EventRepository, StoredEvent } from '../domain/index.js';

/** Fixed page size of the list endpoint; clients cannot override it. */
export const EVENT_PAGE_SIZE = 50;

/**
 * Use case: the most recent page of events, newest first.
 */
export async function listRecentEvents(
  store: EventRepository,
): Promise<readonly StoredEvent[]> {
  return store.list(EVENT_PAGE_SIZE);
}
