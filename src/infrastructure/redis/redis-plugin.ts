import fp from 'fastify-plugin';
import { Redis } from 'ioredis';
import type { FastifyInstance } from 'fastify';

export interface RedisPluginOptions {
  redisUrl: string;
  /** Upper bound for any single command issued by the edge. */
  commandTimeoutMs?: number;
}

/**
 * Owns the edge's ioredis connection and exposes it as `fastify.redis`.
 *
 * The edge never queues: a command is retried at most once and fails after
 * `commandTimeoutMs`, so a stalled Redis turns into a 500 instead of a
 * hung request. The worker opens its own connection with different
 * settings.
 */
async function redisPlugin(fastify: FastifyInstance, options: RedisPluginOptions): Promise<void> {
  const redis = new Redis(options.redisUrl, {
    maxRetriesPerRequest: 1,
    commandTimeout: options.commandTimeoutMs,
    enableOfflineQueue: false,
    lazyConnect: true,
  });

  redis.on('error', (err: Error) => {
    fastify.log.warn({ err }, 'Redis connection error');
  });

  await redis.connect();
  fastify.log.info('Redis connected');

  fastify.decorate('redis', redis);

  fastify.addHook('onClose', async () => {
    await redis.quit();
    fastify.log.info('Redis disconnected');
  });
}

export default fp(redisPlugin, {
  name: 'redis',
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    redis: Redis;
  }
}
