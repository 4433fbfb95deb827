/**
 * API Integration Tests
 *
 * Drives the Express app over an in-memory SQLite store and a temporary image
 * directory, with a manual clock standing in for lease expiry.
 */

import fs from 'fs/promises';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import request from 'supertest';
import { Application } from 'express';
import { createApp } from '../src/app';
import { AppContainer, createContainer } from '../src/container';
import { parseTaxonomy } from '../src/config/taxonomy';
import { ManualClock } from '../src/utils/clock';
import { createTestStore, makeTempDir, T0 } from './helpers';

const LEASE_MS = 300_000;

const taxonomy = parseTaxonomy({
  categories: [
    { id: 'hands', labels: ['extra fingers', 'missing fingers'] },
    { id: 'quality', labels: ['looks fine'] },
  ],
});

let app: Application;
let container: AppContainer;
let clock: ManualClock;
let imageDirectory: string;

beforeEach(async () => {
  imageDirectory = await makeTempDir();
  await fs.writeFile(path.join(imageDirectory, 'a.png'), 'first image');
  await fs.writeFile(path.join(imageDirectory, 'b.png'), 'second image');
  await fs.writeFile(path.join(imageDirectory, '.x.png'), 'hidden image');

  clock = new ManualClock(T0);
  container = createContainer({
    store: createTestStore(),
    storeDriver: 'sqlite',
    taxonomy,
    imageDirectory,
    leaseDurationMs: LEASE_MS,
    syncOnNext: false,
    strictLabels: false,
    clock,
  });
  await container.catalogService.sync();

  app = createApp(container);
});

afterEach(async () => {
  await container.store.close();
});

const next = () => request(app).get('/v1/queue/next').expect(200);

describe('Health & Documentation', () => {
  it('GET /health reports the store', async () => {
    const response = await request(app).get('/health').expect(200);

    expect(response.body).toMatchObject({ status: 'healthy', store: 'sqlite' });
  });

  it('GET /health reports an unreachable store', async () => {
    await container.store.close();

    const response = await request(app).get('/health').expect(503);

    expect(response.body.status).toBe('unhealthy');
  });

  it('GET /v1 returns version info', async () => {
    const response = await request(app).get('/v1').expect(200);

    expect(response.body).toEqual({ version: '1.0.0', api: 'Label Queue API' });
  });

  it('GET /openapi.json serves the generated document', async () => {
    const response = await request(app).get('/openapi.json').expect(200);

    expect(response.body.info.title).toBe('Label Queue API');
    expect(response.body.info.description).toContain('A lease lasts 300 seconds');
  });

  it('GET /openapi.json describes the lease duration the container resolved', async () => {
    const shortLeases = createContainer({
      store: createTestStore(),
      storeDriver: 'sqlite',
      taxonomy,
      imageDirectory,
      leaseDurationMs: 120_000,
      syncOnNext: false,
      strictLabels: false,
      clock,
    });

    const response = await request(createApp(shortLeases)).get('/openapi.json').expect(200);

    expect(response.body.info.description).toContain('A lease lasts 120 seconds');
    await shortLeases.store.close();
  });

  it('unknown routes return 404', async () => {
    const response = await request(app).get('/v1/nothing').expect(404);

    expect(response.body.error).toEqual({ code: 'NOT_FOUND', message: 'Route GET /v1/nothing not found' });
  });
});

describe('Queue API', () => {
  it('GET /v1/queue/next assigns the first pending item', async () => {
    const response = await next();

    expect(response.body.data).toEqual({
      status: 'assigned',
      item: { id: 1, name: 'a.png', reference: '/images/a.png' },
      token: expect.stringMatching(/^[0-9a-f]{32}$/),
      expiresAt: '2024-01-01T00:05:00.000Z',
    });
  });

  it('walks two clients through an abandoned lease', async () => {
    const first = await next();
    const second = await next();
    const tokenA: string = first.body.data.token;
    const tokenB: string = second.body.data.token;
    expect(second.body.data.item.id).toBe(2);

    const saved = await request(app)
      .post('/v1/queue/submit')
      .send({ item_id: 1, token: tokenA, labels: { quality: ['looks fine'] } })
      .expect(200);
    expect(saved.body).toEqual({ data: { itemId: 1, skipped: false }, message: 'Labels saved' });

    clock.advance(LEASE_MS);

    const late = await request(app)
      .post('/v1/queue/submit')
      .send({ item_id: 2, token: tokenB, labels: { hands: ['extra fingers'] } })
      .expect(409);
    expect(late.body.error).toMatchObject({
      code: 'RESERVATION_INVALID',
      message: 'Reservation is no longer valid. Fetch a new item.',
      details: { itemId: 2, reason: 'EXPIRED' },
    });

    const again = await next();
    expect(again.body.data.item.id).toBe(2);
    expect(again.body.data.token).not.toBe(tokenB);

    await request(app)
      .post('/v1/queue/submit')
      .send({ item_id: 2, token: again.body.data.token, labels: { hands: ['extra fingers'] } })
      .expect(200);

    const progress = await request(app).get('/v1/queue/progress').expect(200);
    expect(progress.body.data).toEqual({ completed: 2, total: 2 });
    expect((await next()).body.data).toEqual({ status: 'empty' });
  });

  it('rejects an empty selection without losing the lease', async () => {
    const { token } = (await next()).body.data;

    const response = await request(app)
      .post('/v1/queue/submit')
      .send({ item_id: 1, token, labels: {} })
      .expect(400);
    expect(response.body.error.code).toBe('VALIDATION_ERROR');

    const record = await request(app).get('/v1/items/1').expect(200);
    expect(record.body.data.state).toBe('RESERVED');

    const skipped = await request(app).post('/v1/queue/skip').send({ item_id: 1, token }).expect(200);
    expect(skipped.body).toEqual({ data: { itemId: 1, skipped: true }, message: 'Item skipped' });
  });

  it('rejects a wrong token with 409', async () => {
    await next();

    const response = await request(app)
      .post('/v1/queue/skip')
      .send({ item_id: 1, token: 'not-the-token' })
      .expect(409);

    expect(response.body.error.details).toEqual({ itemId: 1, reason: 'TOKEN_MISMATCH' });
  });

  it('validates request bodies', async () => {
    const response = await request(app).post('/v1/queue/submit').send({ item_id: 'one', labels: {} }).expect(400);

    expect(response.body.error.code).toBe('VALIDATION_ERROR');
    expect(response.body.error.details.errors.map((e: { field: string }) => e.field)).toEqual([
      'body.item_id',
      'body.token',
    ]);
  });

  it('rejects malformed JSON', async () => {
    const response = await request(app)
      .post('/v1/queue/skip')
      .set('Content-Type', 'application/json')
      .send('{"item_id": 1,')
      .expect(400);

    expect(response.body.error.code).toBe('INVALID_INPUT');
  });

  it('POST /v1/queue/release hands the item back', async () => {
    const { token } = (await next()).body.data;

    const released = await request(app).post('/v1/queue/release').send({ item_id: 1, token }).expect(200);
    expect(released.body.message).toBe('Reservation released');

    expect((await next()).body.data.item.id).toBe(1);
  });

  it('never assigns one item to two concurrent requests', async () => {
    const responses = await Promise.all(Array.from({ length: 5 }, () => next()));

    const assigned = responses.filter((r) => r.body.data.status === 'assigned');
    expect(assigned.map((r) => r.body.data.item.id).sort()).toEqual([1, 2]);
    expect(new Set(assigned.map((r) => r.body.data.token)).size).toBe(2);
    expect(responses.filter((r) => r.body.data.status === 'empty')).toHaveLength(3);
  });
});

describe('Items API', () => {
  it('GET /v1/items lists records without tokens', async () => {
    await next();

    const response = await request(app).get('/v1/items').expect(200);

    expect(response.body.data).toHaveLength(2);
    expect(response.body.data[0]).toMatchObject({ id: 1, name: 'a.png', state: 'RESERVED', skipped: false });
    expect(response.body.data[0]).not.toHaveProperty('reservation');
  });

  it('GET /v1/items filters by state', async () => {
    await next();

    const response = await request(app).get('/v1/items?state=PENDING').expect(200);

    expect(response.body.data.map((item: { id: number }) => item.id)).toEqual([2]);
  });

  it('GET /v1/items rejects an unknown state', async () => {
    await request(app).get('/v1/items?state=LOST').expect(400);
  });

  it('GET /v1/items/:id returns 404 for an unknown id', async () => {
    const response = await request(app).get('/v1/items/99').expect(404);

    expect(response.body.error).toEqual({ code: 'ITEM_NOT_FOUND', message: 'Item with ID 99 not found' });
  });
});

describe('Catalog API', () => {
  it('GET /v1/taxonomy returns the categories', async () => {
    const response = await request(app).get('/v1/taxonomy').expect(200);

    expect(response.body.data.categories.map((c: { id: string }) => c.id)).toEqual(['hands', 'quality']);
    expect(response.body.data.imageDirectory).toBe(path.resolve(imageDirectory));
  });

  it('GET /images/:filename serves the image', async () => {
    const response = await request(app).get('/images/a.png').expect(200);

    expect(response.headers['content-type']).toBe('image/png');
  });

  it('never assigns or serves a hidden image', async () => {
    const names: unknown[] = [];
    for (let i = 0; i < 3; i++) {
      names.push((await next()).body.data.item?.name);
    }

    expect(names).toEqual(['a.png', 'b.png', undefined]);
    const response = await request(app).get('/images/.x.png').expect(404);
    expect(response.body.error.code).toBe('IMAGE_NOT_FOUND');
  });

  it('serves images from a directory below a dot-prefixed folder', async () => {
    const hiddenParent = path.join(imageDirectory, '.cache', 'images');
    await fs.mkdir(hiddenParent, { recursive: true });
    await fs.writeFile(path.join(hiddenParent, 'c.png'), 'third image');
    const nested = createContainer({
      store: createTestStore(),
      storeDriver: 'sqlite',
      taxonomy,
      imageDirectory: hiddenParent,
      leaseDurationMs: LEASE_MS,
      syncOnNext: true,
      strictLabels: false,
      clock,
    });
    const nestedApp = createApp(nested);

    const assigned = await request(nestedApp).get('/v1/queue/next').expect(200);
    expect(assigned.body.data.item.reference).toBe('/images/c.png');

    const image = await request(nestedApp).get(assigned.body.data.item.reference).expect(200);
    expect(image.headers['content-type']).toBe('image/png');
    await nested.store.close();
  });

  it('GET /images/:filename returns 404 for a missing image', async () => {
    const response = await request(app).get('/images/c.png').expect(404);

    expect(response.body.error).toEqual({ code: 'IMAGE_NOT_FOUND', message: 'Image c.png not found' });
  });
});

describe('Maintenance API', () => {
  it('POST /v1/maintenance/release-expired frees lapsed leases', async () => {
    await next();
    clock.advance(LEASE_MS);

    const response = await request(app).post('/v1/maintenance/release-expired').expect(200);

    expect(response.body).toEqual({
      data: { releasedCount: 1, releasedItemIds: [1] },
      message: 'Released 1 expired reservations',
    });
  });
});
