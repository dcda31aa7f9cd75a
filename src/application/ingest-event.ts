import type { EventRepository, StoredEvent } from '../domain/index.js';
import { BadRequestError } from './errors.js';
import { newEventSchema, type NewEventInput } from './event-schema.js';

export const INVALID_EVENT_MESSAGE = 'invalid json (need type, payload)';

/**
 * Use case: validate a decoded request body and append it to the store.
 *
 * Validation happens before the store is touched, so a rejected body
 * never consumes an identifier.
 */
export async function ingestEvent(
  store: EventRepository,
  body: unknown,
): Promise<StoredEvent> {
  const parsed = newEventSchema.safeParse(body);

  if (!parsed.success) {
    throw new BadRequestError(INVALID_EVENT_MESSAGE, parsed.error.issues);
  }

  const event: NewEventInput = parsed.data;
  return store.add(event);
}
