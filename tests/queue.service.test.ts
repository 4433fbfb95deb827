import { describe, it, expect, beforeEach, vi } from 'vitest';
import { QueueService, imageReference, normaliseSelection } from '../src/services/queue.service';
import { LeaseManager } from '../src/services/lease-manager.service';
import { SqliteItemRepository } from '../src/repositories/sqlite-item.repository';
import { parseTaxonomy } from '../src/config/taxonomy';
import { ErrorCode } from '../src/types/error.types';
import { ItemState } from '../src/types/item.types';
import { TransitionFailure } from '../src/types/lease.types';
import { ManualClock } from '../src/utils/clock';
import { createTestStore, seed, sequentialTokens, T0 } from './helpers';

const LEASE_MS = 300_000;

const taxonomy = parseTaxonomy({
  categories: [
    { id: 'hands', labels: ['extra fingers', 'missing fingers'] },
    { id: 'quality', labels: ['looks fine'] },
  ],
});

describe('QueueService', () => {
  let store: SqliteItemRepository;
  let clock: ManualClock;
  let leaseManager: LeaseManager;
  let queue: QueueService;

  const build = (options: ConstructorParameters<typeof QueueService>[2] = {}) =>
    new QueueService(leaseManager, store, { clock, ...options });

  beforeEach(async () => {
    store = createTestStore();
    clock = new ManualClock(T0);
    leaseManager = new LeaseManager(store, { leaseDurationMs: LEASE_MS, clock, generateToken: sequentialTokens() });
    queue = build();
  });

  describe('with two items', () => {
    beforeEach(async () => {
      await seed(store, ['a.png', 'b.png']);
    });

    it('hands each client a different item, then reports empty', async () => {
      const first = await queue.next();
      const second = await queue.next();
      const third = await queue.next();

      expect(first).toEqual({
        status: 'assigned',
        item: { id: 1, name: 'a.png', reference: '/images/a.png' },
        token: 'token-1',
        expiresAt: new Date('2024-01-01T00:05:00.000Z'),
      });
      expect(second).toMatchObject({ status: 'assigned', item: { id: 2 }, token: 'token-2' });
      expect(third).toEqual({ status: 'empty' });
    });

    it('reassigns an abandoned item with a new token after the lease runs out', async () => {
      await queue.next(); // a -> token-1
      await queue.next(); // b -> token-2
      await queue.submit(1, 'token-1', { quality: ['looks fine'] });

      clock.advance(LEASE_MS);

      await expect(queue.submit(2, 'token-2', { quality: ['looks fine'] })).rejects.toMatchObject({
        code: ErrorCode.RESERVATION_INVALID,
        details: { reason: TransitionFailure.EXPIRED },
      });

      const again = await queue.next();
      expect(again).toMatchObject({ status: 'assigned', item: { id: 2, name: 'b.png' }, token: 'token-3' });

      await queue.submit(2, 'token-3', { hands: ['extra fingers'] });
      expect(await queue.progress()).toEqual({ completed: 2, total: 2 });
      expect(await queue.next()).toEqual({ status: 'empty' });
    });

    it('rejects an empty selection and keeps the lease', async () => {
      await queue.next();

      await expect(queue.submit(1, 'token-1', {})).rejects.toMatchObject({
        code: ErrorCode.VALIDATION_ERROR,
        message: 'At least one label must be selected to submit.',
        statusCode: 400,
      });
      await expect(queue.submit(1, 'token-1', { hands: [] })).rejects.toMatchObject({ statusCode: 400 });

      expect((await store.findById(1))?.state).toBe(ItemState.RESERVED);
      await queue.skip(1, 'token-1');
      expect((await store.findById(1))?.skipped).toBe(true);
    });

    it('accepts a token only once', async () => {
      await queue.next();
      await queue.submit(1, 'token-1', { quality: ['looks fine'] });

      await expect(queue.skip(1, 'token-1')).rejects.toMatchObject({
        code: ErrorCode.RESERVATION_INVALID,
        details: { reason: TransitionFailure.ALREADY_DONE },
      });
    });

    it('lets exactly one of a racing submit and skip win', async () => {
      await queue.next();

      const outcomes = await Promise.allSettled([
        queue.submit(1, 'token-1', { quality: ['looks fine'] }),
        queue.skip(1, 'token-1'),
      ]);

      expect(outcomes.filter((o) => o.status === 'fulfilled')).toHaveLength(1);
      expect(outcomes.filter((o) => o.status === 'rejected')).toHaveLength(1);
    });

    it('puts a released item back at the front of the queue', async () => {
      await queue.next();
      await queue.release(1, 'token-1');

      expect(await queue.next()).toMatchObject({ status: 'assigned', item: { id: 1 }, token: 'token-2' });
    });

    it('never decreases completed progress', async () => {
      const seen: number[] = [];
      seen.push((await queue.progress()).completed);

      await queue.next();
      await queue.next();
      seen.push((await queue.progress()).completed);

      await queue.skip(2, 'token-2');
      seen.push((await queue.progress()).completed);

      clock.advance(LEASE_MS);
      seen.push((await queue.progress()).completed);

      expect(seen).toEqual([0, 0, 1, 1]);
      expect(await queue.progress()).toEqual({ completed: 1, total: 2 });
    });
  });

  it('never hands one item to two concurrent callers', async () => {
    await seed(store, ['1.png', '2.png', '3.png', '4.png', '5.png']);

    const results = await Promise.all(Array.from({ length: 10 }, () => queue.next()));

    const ids = results.flatMap((r) => (r.status === 'assigned' ? [r.item.id] : []));
    const tokens = results.flatMap((r) => (r.status === 'assigned' ? [r.token] : []));
    expect(ids.sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5]);
    expect(new Set(tokens).size).toBe(5);
    expect(results.filter((r) => r.status === 'empty')).toHaveLength(5);
  });

  it('syncs its source before every hand-out', async () => {
    const source = { sync: vi.fn(async () => seed(store, ['late.png'])) };
    queue = build({ source });

    const result = await queue.next();

    expect(source.sync).toHaveBeenCalledTimes(1);
    expect(result).toMatchObject({ status: 'assigned', item: { name: 'late.png' } });
  });

  describe('strict labels', () => {
    beforeEach(async () => {
      await seed(store, ['a.png']);
      queue = build({ taxonomy, strictLabels: true });
      await queue.next();
    });

    it('rejects labels the taxonomy does not define', async () => {
      await expect(
        queue.submit(1, 'token-1', { hands: ['extra fingers', 'six toes'], mood: ['happy'] })
      ).rejects.toMatchObject({
        code: ErrorCode.VALIDATION_ERROR,
        statusCode: 400,
        details: { unknownCategories: ['mood'], unknownLabels: ['hands/six toes'] },
      });
    });

    it('accepts a known selection', async () => {
      await queue.submit(1, 'token-1', { hands: ['missing fingers'] });

      expect((await store.findById(1))?.labels).toEqual({ hands: ['missing fingers'] });
    });
  });

  it('needs a taxonomy for strict labels', () => {
    expect(() => build({ strictLabels: true })).toThrow('Strict label checking needs a taxonomy');
  });
});

describe('normaliseSelection', () => {
  it('drops empty categories and duplicate labels', () => {
    expect(normaliseSelection({ hands: ['extra fingers', 'extra fingers', 'missing fingers'], faces: [] })).toEqual({
      hands: ['extra fingers', 'missing fingers'],
    });
  });
});

describe('imageReference', () => {
  it('encodes the file name', () => {
    expect(
      imageReference({
        id: 1,
        name: 'cat 1.png',
        state: ItemState.PENDING,
        skipped: false,
        labels: {},
        reservation: null,
        updatedAt: T0,
      })
    ).toBe('/images/cat%201.png');
  });
});
