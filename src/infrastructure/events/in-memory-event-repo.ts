import type { EventRepository, NewEvent, StoredEvent } from '../../domain/index.js';

export interface InMemoryEventRepositoryOptions {
  /** Wall clock used for `received_at`. Defaults to `new Date()`. */
  clock?: () => Date;
}

/**
 * Append-only, process-local event repository.
 *
 * Sole owner of event identity: ids start at 1 and are handed out
 * in the order `add()` runs. Both methods are synchronous, so on the
 * Node.js event loop each call is a critical section: no other add
 * or list can observe a half-applied insert.
 *
 * Nothing is ever evicted; capacity is bounded by process memory.
 */
export class InMemoryEventRepository implements EventRepository {
  private readonly events: StoredEvent[] = [];
  private readonly clock: () => Date;
  private seq = 0;
  private lastReceivedAt = 0;

  constructor(options: InMemoryEventRepositoryOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
  }

  get size(): number {
    return this.events.length;
  }

  add(event: NewEvent): StoredEvent {
    // A clock stepping backwards must not reorder receipt times.
    const receivedAt = Math.max(this.clock().getTime(), this.lastReceivedAt);

    this.seq += 1;
    this.lastReceivedAt = receivedAt;

    const stored: StoredEvent = Object.freeze({
      id: this.seq,
      type: event.type,
      payload: event.payload,
      received_at: new Date(receivedAt).toISOString(),
    });

    this.events.push(stored);
    return stored;
  }

  /** Copy of the newest `limit` events, newest first. O(limit). */
  list(limit: number): StoredEvent[] {
    const count = limit <= 0 || limit > this.events.length
      ? this.events.length
      : limit;

    return this.events.slice(this.events.length - count).reverse();
  }
}
