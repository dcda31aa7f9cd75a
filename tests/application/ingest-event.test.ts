import { describe, it, expect, vi } from 'vitest';
import { ingestEvent, INVALID_EVENT_MESSAGE } from '../../src/application/ingest-event.js';
import { listRecentEvents, EVENT_PAGE_SIZE } from '../../src/application/query-events.js';
import { BadRequestError } from '../../src/application/errors.js';
import type { EventRepository, NewEvent, StoredEvent } from '../../src/domain/index.js';

function fakeRepository() {
  return {
    add: vi.fn((event: NewEvent): StoredEvent => ({
      id: 1,
      ...event,
      received_at: '2026-02-18T12:00:00.000Z',
    })),
    list: vi.fn((_limit: number): StoredEvent[] => []),
  } satisfies EventRepository;
}

describe('ingestEvent', () => {
  it('passes the validated event to the store', async () => {
    const store = fakeRepository();

    const stored = await ingestEvent(store, { type: 'signup', payload: 'p' });

    expect(store.add).toHaveBeenCalledWith({ type: 'signup', payload: 'p' });
    expect(stored).toEqual({
      id: 1,
      type: 'signup',
      payload: 'p',
      received_at: '2026-02-18T12:00:00.000Z',
    });
  });

  it('drops unknown fields before storing', async () => {
    const store = fakeRepository();

    await ingestEvent(store, { type: 'a', payload: 'b', id: 7, extra: true });

    expect(store.add).toHaveBeenCalledWith({ type: 'a', payload: 'b' });
  });

  it('defaults a missing payload to an empty string', async () => {
    const store = fakeRepository();

    await ingestEvent(store, { type: 'a' });

    expect(store.add).toHaveBeenCalledWith({ type: 'a', payload: '' });
  });

  it.each([
    ['missing type', { payload: 'x' }],
    ['empty type', { type: '', payload: 'x' }],
    ['numeric type', { type: 1 }],
    ['object payload', { type: 'a', payload: {} }],
    ['null body', null],
    ['string body', 'signup'],
  ])('rejects %s without touching the store', async (_label, body) => {
    const store = fakeRepository();

    await expect(ingestEvent(store, body)).rejects.toBeInstanceOf(BadRequestError);
    await expect(ingestEvent(store, body)).rejects.toThrow(INVALID_EVENT_MESSAGE);
    expect(store.add).not.toHaveBeenCalled();
  });

  it('attaches the validation issues as details', async () => {
    const store = fakeRepository();

    const error = await ingestEvent(store, { payload: 'x' }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(BadRequestError);
    expect(error).toMatchObject({ statusCode: 400, code: 'BAD_REQUEST' });
    expect(error).toMatchObject({ details: expect.any(Array) });
  });
});

describe('listRecentEvents', () => {
  it('asks the store for a fixed page of 50', async () => {
    const store = fakeRepository();

    await listRecentEvents(store);

    expect(EVENT_PAGE_SIZE).toBe(50);
    expect(store.list).toHaveBeenCalledWith(50);
  });
});
