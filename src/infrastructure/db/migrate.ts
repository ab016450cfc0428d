import type { PipelineLogger } from '../../application/logger.js';
import type { Sql } from './client.js';

/**
 * Creates the `items` table if it is missing.
 *
 * In production this would be handled by drizzle-kit migrate; for local
 * runs it guarantees the table exists before the first delivery.
 */
export async function ensureSchema(sql: Sql, log: PipelineLogger): Promise<void> {
  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS items (
      item_type    VARCHAR(32)  NOT NULL,
      item_id      TEXT         NOT NULL,
      payload      JSONB        NOT NULL DEFAULT '{}',
      status       VARCHAR(16)  NOT NULL DEFAULT 'pending',
      received_at  TIMESTAMPTZ  NOT NULL,
      created_at   TIMESTAMPTZ  NOT NULL DEFAULT NOW(),
      updated_at   TIMESTAMPTZ  NOT NULL DEFAULT NOW(),
      PRIMARY KEY (item_type, item_id)
    )
  `);

  log.info('Database ready (items table)');
}
