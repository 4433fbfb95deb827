import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SqliteItemRepository } from '../src/repositories/sqlite-item.repository';
import { ItemState } from '../src/types/item.types';
import { TransitionFailure } from '../src/types/lease.types';
import { at, createTestStore, seed } from './helpers';

const LEASE = 1000;

describe('SqliteItemRepository', () => {
  let store: SqliteItemRepository;

  beforeEach(async () => {
    store = createTestStore();
    await seed(store, ['a.png', 'b.png', 'c.png']);
  });

  afterEach(async () => {
    await store.close();
  });

  const reserve = (token: string, nowMs: number) =>
    store.tryReserve({ token, now: at(nowMs), expiresAt: at(nowMs + LEASE) });

  describe('upsertIfAbsent', () => {
    it('returns the existing row for a known name', async () => {
      const first = await store.findById(1);
      const again = await store.upsertIfAbsent('a.png', at(50));

      expect(again.id).toBe(1);
      expect(again.state).toBe(ItemState.PENDING);
      expect(first?.name).toBe('a.png');
      expect(await store.list({})).toHaveLength(3);
    });

    it('stamps a new row with the given time and leaves an existing one alone', async () => {
      const added = await store.upsertIfAbsent('d.png', at(50));
      const existing = await store.upsertIfAbsent('a.png', at(60));

      expect(added.updatedAt).toEqual(at(50));
      expect(existing.updatedAt).toEqual(at(0));
    });

    it('does not reset an item that is already done', async () => {
      await reserve('t1', 0);
      await store.commitTerminal({ id: 1, token: 't1', labels: { q: ['x'] }, skipped: false, now: at(0) });

      const item = await store.upsertIfAbsent('a.png', at(50));

      expect(item.state).toBe(ItemState.DONE);
      expect(item.labels).toEqual({ q: ['x'] });
    });
  });

  describe('tryReserve', () => {
    it('hands out items lowest id first', async () => {
      expect((await reserve('t1', 0))?.id).toBe(1);
      expect((await reserve('t2', 0))?.id).toBe(2);
      expect((await reserve('t3', 0))?.id).toBe(3);
      expect(await reserve('t4', 0)).toBeNull();
    });

    it('records the token and expiry on the reserved row', async () => {
      const item = await reserve('t1', 0);

      expect(item?.state).toBe(ItemState.RESERVED);
      expect(item?.reservation).toEqual({ token: 't1', expiresAt: at(LEASE) });
    });

    it('takes back an expired reservation before a higher-id pending item', async () => {
      await reserve('t1', 0);

      const again = await reserve('t2', LEASE);

      expect(again?.id).toBe(1);
      expect(again?.reservation?.token).toBe('t2');
    });

    it('leaves a live reservation alone', async () => {
      await reserve('t1', 0);

      const next = await reserve('t2', LEASE - 1);

      expect(next?.id).toBe(2);
    });
  });

  describe('commitTerminal', () => {
    it('moves a live reservation to DONE and clears the lease', async () => {
      await reserve('t1', 0);

      const result = await store.commitTerminal({
        id: 1,
        token: 't1',
        labels: { quality: ['looks fine'] },
        skipped: false,
        now: at(10),
      });

      expect(result.ok).toBe(true);
      const item = await store.findById(1);
      expect(item?.state).toBe(ItemState.DONE);
      expect(item?.skipped).toBe(false);
      expect(item?.labels).toEqual({ quality: ['looks fine'] });
      expect(item?.reservation).toBeNull();
    });

    it('stores no labels for a skipped item', async () => {
      await reserve('t1', 0);

      await store.commitTerminal({ id: 1, token: 't1', labels: { q: ['x'] }, skipped: true, now: at(10) });

      const item = await store.findById(1);
      expect(item?.skipped).toBe(true);
      expect(item?.labels).toEqual({});
    });

    it('refuses a second commit with the same token', async () => {
      await reserve('t1', 0);
      await store.commitTerminal({ id: 1, token: 't1', labels: { q: ['x'] }, skipped: false, now: at(10) });

      const result = await store.commitTerminal({ id: 1, token: 't1', labels: { q: ['y'] }, skipped: false, now: at(20) });

      expect(result).toEqual({ ok: false, reason: TransitionFailure.ALREADY_DONE });
      expect((await store.findById(1))?.labels).toEqual({ q: ['x'] });
    });

    it('explains each refusal', async () => {
      await reserve('t1', 0);
      const commit = (id: number, token: string, nowMs: number) =>
        store.commitTerminal({ id, token, labels: { q: ['x'] }, skipped: false, now: at(nowMs) });

      expect(await commit(99, 't1', 10)).toEqual({ ok: false, reason: TransitionFailure.NOT_FOUND });
      expect(await commit(2, 't1', 10)).toEqual({ ok: false, reason: TransitionFailure.NOT_RESERVED });
      expect(await commit(1, 'other', 10)).toEqual({ ok: false, reason: TransitionFailure.TOKEN_MISMATCH });
      expect(await commit(1, 't1', LEASE)).toEqual({ ok: false, reason: TransitionFailure.EXPIRED });
    });

    it('rejects the old token once the item has been leased again', async () => {
      await reserve('t1', 0);
      await reserve('t2', LEASE);

      const result = await store.commitTerminal({ id: 1, token: 't1', labels: { q: ['x'] }, skipped: false, now: at(LEASE + 1) });

      expect(result).toEqual({ ok: false, reason: TransitionFailure.TOKEN_MISMATCH });
      expect((await store.findById(1))?.reservation?.token).toBe('t2');
    });
  });

  describe('release', () => {
    it('returns a live reservation to PENDING', async () => {
      await reserve('t1', 0);

      const result = await store.release({ id: 1, token: 't1', now: at(10) });

      expect(result.ok).toBe(true);
      const item = await store.findById(1);
      expect(item?.state).toBe(ItemState.PENDING);
      expect(item?.reservation).toBeNull();
      expect((await reserve('t2', 20))?.id).toBe(1);
    });

    it('refuses an expired lease', async () => {
      await reserve('t1', 0);

      expect(await store.release({ id: 1, token: 't1', now: at(LEASE) })).toEqual({
        ok: false,
        reason: TransitionFailure.EXPIRED,
      });
    });
  });

  describe('counts', () => {
    it('counts expired reservations as pending', async () => {
      await reserve('t1', 0);
      await reserve('t2', 0);
      await store.commitTerminal({ id: 2, token: 't2', labels: { q: ['x'] }, skipped: false, now: at(0) });

      expect(await store.counts(at(0))).toEqual({ pending: 1, reservedLive: 1, done: 1, total: 3 });
      expect(await store.counts(at(LEASE))).toEqual({ pending: 2, reservedLive: 0, done: 1, total: 3 });
    });
  });

  describe('list', () => {
    it('filters by state and limits in id order', async () => {
      await reserve('t1', 0);

      expect((await store.list({ state: ItemState.PENDING })).map((i) => i.id)).toEqual([2, 3]);
      expect((await store.list({ state: ItemState.RESERVED })).map((i) => i.id)).toEqual([1]);
      expect((await store.list({ limit: 2 })).map((i) => i.name)).toEqual(['a.png', 'b.png']);
    });
  });

  describe('releaseExpired', () => {
    it('reverts only lapsed reservations', async () => {
      await reserve('t1', 0);
      await reserve('t2', 500);

      const result = await store.releaseExpired(at(LEASE));

      expect(result).toEqual({ releasedCount: 1, releasedItemIds: [1] });
      expect((await store.findById(1))?.state).toBe(ItemState.PENDING);
      expect((await store.findById(2))?.state).toBe(ItemState.RESERVED);
    });
  });

  describe('releaseAll', () => {
    it('reverts every reservation, live or not', async () => {
      await reserve('t1', 0);
      await reserve('t2', 0);

      expect(await store.releaseAll(at(10))).toBe(2);
      expect(await store.list({ state: ItemState.RESERVED })).toEqual([]);
    });
  });
});
