import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import { itemRoutes } from '../../src/interfaces/http/index.js';
import type { ItemRoutesOptions } from '../../src/interfaces/http/index.js';
import { InMemoryItemStore } from '../../src/infrastructure/memory/index.js';
import { fakeDbPlugin } from '../helpers/plugins.js';
import { FIXED_NOW } from '../helpers/fakes.js';

const ITEM_URL = '/api/v1/items/comment/r1';

async function buildApp(store: InMemoryItemStore, options: ItemRoutesOptions = {}): Promise<FastifyInstance> {
  const app = Fastify();
  await app.register(fakeDbPlugin(store));
  await app.register(itemRoutes, options);
  return app;
}

describe('item routes', () => {
  let store: InMemoryItemStore;
  let app: FastifyInstance;

  beforeEach(async () => {
    store = new InMemoryItemStore(() => FIXED_NOW);
    await store.insertIfAbsent({
      itemType: 'comment',
      itemId: 'r1',
      payload: { author: 'alice', body: 'hi' },
      receivedAt: FIXED_NOW.toISOString(),
    });
    app = await buildApp(store);
  });

  afterEach(async () => {
    await app.close();
  });

  describe('GET /api/v1/items/:itemType/:itemId', () => {
    it('returns the stored item', async () => {
      const res = await app.inject({ method: 'GET', url: ITEM_URL });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        itemType: 'comment',
        itemId: 'r1',
        payload: { author: 'alice', body: 'hi' },
        status: 'pending',
        receivedAt: '2026-03-01T10:00:00.000Z',
        createdAt: '2026-03-01T10:00:00.000Z',
        updatedAt: '2026-03-01T10:00:00.000Z',
      });
    });

    it('returns 404 for a missing item', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/v1/items/comment/nope' });

      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ error: 'Item not found' });
    });

    it('returns 400 for an unknown item type', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/v1/items/reaction/r1' });

      expect(res.statusCode).toBe(400);
    });
  });

  describe('PATCH /api/v1/items/:itemType/:itemId/status', () => {
    it('approves a pending item', async () => {
      const res = await app.inject({
        method: 'PATCH',
        url: `${ITEM_URL}/status`,
        payload: { status: 'approved' },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toMatchObject({ itemId: 'r1', status: 'approved' });
      expect((await store.get({ itemType: 'comment', itemId: 'r1' }))?.status).toBe('approved');
    });

    it('returns 409 for a transition the policy refuses', async () => {
      const res = await app.inject({
        method: 'PATCH',
        url: `${ITEM_URL}/status`,
        payload: { status: 'pending' },
      });

      expect(res.statusCode).toBe(409);
      expect(res.json()).toEqual({ error: 'Cannot move item from pending to pending' });
    });

    it('returns 400 for an unknown status', async () => {
      const res = await app.inject({
        method: 'PATCH',
        url: `${ITEM_URL}/status`,
        payload: { status: 'spam' },
      });

      expect(res.statusCode).toBe(400);
    });

    it('returns 404 for a missing item', async () => {
      const res = await app.inject({
        method: 'PATCH',
        url: '/api/v1/items/comment/nope/status',
        payload: { status: 'approved' },
      });

      expect(res.statusCode).toBe(404);
    });

    it('uses the configured moderation policy', async () => {
      const locked = await buildApp(store, { policy: () => false });

      const res = await locked.inject({
        method: 'PATCH',
        url: `${ITEM_URL}/status`,
        payload: { status: 'approved' },
      });
      await locked.close();

      expect(res.statusCode).toBe(409);
      expect(res.json()).toEqual({ error: 'Cannot move item from pending to approved' });
    });
  });
});
