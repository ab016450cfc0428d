export { items } from './schema.js';
export type { ItemRow } from './schema.js';
export { createDbClient } from './client.js';
export type { Database, Sql, DbClientOptions } from './client.js';
export { ensureSchema } from './migrate.js';
export { PostgresItemStore, isTransientStoreFailure, rejectedWriteCode, toStoredItem } from './item-repository.js';
export { default as dbPlugin } from './db-plugin.js';
export type { DbPluginOptions } from './db-plugin.js';
