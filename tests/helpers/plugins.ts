import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { ItemStore } from '../../src/application/item-store.js';
import type { FakeStreamRedis } from './fake-stream-redis.js';
import { asRedis } from './fake-stream-redis.js';

/** Stands in for the `redis` plugin, decorating the fake client. */
export function fakeRedisPlugin(fake: FakeStreamRedis) {
  return fp(async (fastify: FastifyInstance) => {
    fastify.decorate('redis', asRedis(fake));
  }, { name: 'redis' });
}

/** Stands in for the `db` plugin, decorating the given store. */
export function fakeDbPlugin(store: ItemStore) {
  return fp(async (fastify: FastifyInstance) => {
    fastify.decorate('itemStore', store);
  }, { name: 'db' });
}
