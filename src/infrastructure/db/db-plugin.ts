import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import { createDbClient } from './client.js';
import { PostgresItemStore } from './item-repository.js';
import type { ItemStore } from '../../application/item-store.js';

export interface DbPluginOptions {
  databaseUrl: string;
  /** The edge only serves admin reads and status updates; a small pool is enough. */
  poolSize?: number;
}

/**
 * Exposes the item store to the administrative routes as `fastify.itemStore`.
 *
 * The capture path never touches the database; only the worker writes
 * new items. The pool is drained when the server closes.
 */
async function dbPlugin(fastify: FastifyInstance, options: DbPluginOptions): Promise<void> {
  const { sql, db } = createDbClient(options.databaseUrl, { max: options.poolSize ?? 5 });

  fastify.decorate('itemStore', new PostgresItemStore(db));

  fastify.addHook('onClose', async () => {
    await sql.end({ timeout: 5 });
    fastify.log.info('Database pool closed');
  });
}

export default fp(dbPlugin, {
  name: 'db',
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    itemStore: ItemStore;
  }
}
