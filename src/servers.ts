import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import { redisPlugin, dbPlugin } from './infrastructure/index.js';
import type { AppConfig } from './infrastructure/index.js';
import { captureRoutes, itemRoutes } from './interfaces/http/index.js';
import type { ItemRoutesOptions } from './interfaces/http/index.js';

/**
 * Public edge: comment capture and health only. Callers see 204 or 500
 * and nothing about what happens to the submission afterwards.
 *
 * `redis` is the plugin that decorates `fastify.redis`.
 */
export async function buildEdgeServer(
  config: AppConfig,
  redis: typeof redisPlugin = redisPlugin,
): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: {
      level: config.logLevel,
    },
  });

  await fastify.register(redis, {
    redisUrl: config.redisUrl,
    commandTimeoutMs: config.publishTimeoutMs,
  });
  await fastify.register(captureRoutes, {
    streamKey: config.streamKey,
    publishTimeoutMs: config.publishTimeoutMs,
  });

  return fastify;
}

/**
 * Moderation surface: item reads and status transitions. Bound to
 * ADMIN_HOST/ADMIN_PORT, never to the edge listener.
 *
 * `db` is the plugin that decorates `fastify.itemStore`.
 */
export async function buildAdminServer(
  config: AppConfig,
  db: typeof dbPlugin = dbPlugin,
  routes: ItemRoutesOptions = {},
): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: {
      level: config.logLevel,
    },
  });

  await fastify.register(db, { databaseUrl: config.databaseUrl });
  await fastify.register(itemRoutes, routes);

  return fastify;
}
