import { pgTable, text, varchar, timestamp, jsonb, primaryKey } from 'drizzle-orm/pg-core';
import { ITEM_TYPES, MODERATION_STATUSES } from '../../domain/index.js';

/**
 * Drizzle schema for the `items` table.
 *
 * The primary key is `(item_type, item_id)`; `item_id` is the request ID
 * assigned at capture (any length the caller sends), so ON CONFLICT DO NOTHING on the key gives the
 * idempotent create. `item_type` is the leading key column and has very
 * few distinct values: fine while per-type volume stays small, a ceiling
 * beyond that.
 *
 * No secondary indexes; all access is by full primary key.
 */
export const items = pgTable('items', {
  item_type: varchar('item_type', { length: 32, enum: ITEM_TYPES }).notNull(),
  item_id: text('item_id').notNull(),
  payload: jsonb('payload').$type<Record<string, string>>().notNull().default({}),
  status: varchar('status', { length: 16, enum: MODERATION_STATUSES }).notNull().default('pending'),
  received_at: timestamp('received_at', { withTimezone: true }).notNull(),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updated_at: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  primaryKey({ columns: [table.item_type, table.item_id] }),
]);

export type ItemRow = typeof items.$inferSelect;
