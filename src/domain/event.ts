/**
 * Core domain types for the event intake model.
 *
 * These types define the canonical shape of an event as it flows
 * through the system. They carry no framework dependencies.
 */

/** Client-supplied event candidate: no identity, no receipt time. */
export interface NewEvent {
  readonly type: string;
  /** Opaque to the service; stored and returned verbatim. */
  readonly payload: string;
}

/**
 * Canonical stored Event entity.
 *
 * `id` and `received_at` are assigned by the store at insertion time
 * and are never taken from the producer.
 */
export interface StoredEvent extends NewEvent {
  readonly id: number;
  readonly received_at: string; // RFC 3339, UTC
}

export type Awaitable<T> = T | Promise<T>;

/**
 * Storage port consumed by the HTTP handlers.
 *
 * Implementations own identifier and timestamp assignment.
 */
export interface EventRepository {
  add(event: NewEvent): Awaitable<StoredEvent>;
  /** Newest first; `limit <= 0` means everything. */
  list(limit: number): Awaitable<readonly StoredEvent[]>;
}
