export { redisPlugin, publishEnvelope, createEnvelopePublisher, decodeEnvelope, toStreamFields } from './redis/index.js';
export type { RedisPluginOptions, DecodeResult } from './redis/index.js';
export { createDbClient, ensureSchema, items, PostgresItemStore, dbPlugin } from './db/index.js';
export type { Database, Sql, DbPluginOptions } from './db/index.js';
export { InMemoryItemStore } from './memory/index.js';
export { startConsumer } from './worker/index.js';
export type { ConsumerOptions } from './worker/index.js';
export { loadConfig } from './config.js';
export type { AppConfig } from './config.js';
