import { and, eq } from 'drizzle-orm';
import type { ItemKey, ModerationStatus, StoredItem } from '../../domain/index.js';
import { TransientStoreError, ValidationError } from '../../domain/index.js';
import type { ItemStore, NewItem } from '../../application/item-store.js';
import type { Database } from './client.js';
import { items } from './schema.js';
import type { ItemRow } from './schema.js';

// postgres.js connection error codes
const TRANSIENT_CONNECTION_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EPIPE',
  'ENOTFOUND',
  'EAI_AGAIN',
  'CONNECTION_CLOSED',
  'CONNECTION_ENDED',
  'CONNECTION_DESTROYED',
  'CONNECT_TIMEOUT',
]);

// SQLSTATE classes: 08 connection exception, 40 transaction rollback,
// 53 insufficient resources, 57P operator intervention (e.g. admin shutdown)
const TRANSIENT_SQLSTATE_PREFIXES = ['08', '40', '53', '57P'];

// 22 data exception (value too long, bad encoding), 23 integrity constraint
const REJECTED_SQLSTATE_PREFIXES = ['22', '23'];

const SQLSTATE = /^[0-9A-Z]{5}$/;

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/** First code in the `cause` chain that `match` accepts. Drizzle may wrap driver errors. */
function findCode(err: unknown, match: (code: string) => boolean): string | undefined {
  let current: unknown = err;
  for (let depth = 0; depth < 5 && current !== undefined && current !== null; depth++) {
    const code = errorCode(current);
    if (code !== undefined && match(code)) return code;
    current = current instanceof Error ? current.cause : undefined;
  }
  return undefined;
}

function sqlstateIn(prefixes: readonly string[]) {
  return (code: string): boolean => SQLSTATE.test(code) && prefixes.some((p) => code.startsWith(p));
}

/** True when a store failure is worth redelivering. */
export function isTransientStoreFailure(err: unknown): boolean {
  const transientSqlstate = sqlstateIn(TRANSIENT_SQLSTATE_PREFIXES);
  return findCode(err, (code) => TRANSIENT_CONNECTION_CODES.has(code) || transientSqlstate(code)) !== undefined;
}

/**
 * SQLSTATE of a failure caused by the data itself, or undefined.
 * The same row will be refused on every delivery.
 */
export function rejectedWriteCode(err: unknown): string | undefined {
  return findCode(err, sqlstateIn(REJECTED_SQLSTATE_PREFIXES));
}

/** Maps a database row to the domain shape. */
export function toStoredItem(row: ItemRow): StoredItem {
  return {
    itemType: row.item_type,
    itemId: row.item_id,
    payload: row.payload,
    status: row.status,
    receivedAt: row.received_at.toISOString(),
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString(),
  };
}

function keyWhere(key: ItemKey) {
  return and(eq(items.item_type, key.itemType), eq(items.item_id, key.itemId));
}

/**
 * PostgreSQL-backed item store.
 *
 * Transient driver failures are rethrown as TransientStoreError, data the
 * database refuses as ValidationError; anything else propagates unchanged.
 */
export class PostgresItemStore implements ItemStore {
  constructor(private readonly db: Database) {}

  async insertIfAbsent(item: NewItem): Promise<boolean> {
    const inserted = await this.run({ ...item }, () =>
      this.db
        .insert(items)
        .values({
          item_type: item.itemType,
          item_id: item.itemId,
          payload: item.payload,
          status: 'pending',
          received_at: new Date(item.receivedAt),
        })
        .onConflictDoNothing({ target: [items.item_type, items.item_id] })
        .returning({ item_id: items.item_id }),
    );

    return inserted.length > 0;
  }

  async get(key: ItemKey): Promise<StoredItem | null> {
    const rows = await this.run({ ...key }, () =>
      this.db.select().from(items).where(keyWhere(key)).limit(1),
    );
    const row = rows[0];
    return row ? toStoredItem(row) : null;
  }

  async updateStatus(
    key: ItemKey,
    from: ModerationStatus,
    to: ModerationStatus,
  ): Promise<StoredItem | null> {
    const rows = await this.run({ ...key }, () =>
      this.db
        .update(items)
        .set({ status: to, updated_at: new Date() })
        .where(and(keyWhere(key), eq(items.status, from)))
        .returning(),
    );
    const row = rows[0];
    return row ? toStoredItem(row) : null;
  }

  private async run<T>(context: Record<string, unknown>, query: () => Promise<T>): Promise<T> {
    try {
      return await query();
    } catch (err: unknown) {
      if (isTransientStoreFailure(err)) {
        throw new TransientStoreError('Item store unavailable', { cause: err, context });
      }
      const sqlstate = rejectedWriteCode(err);
      if (sqlstate !== undefined) {
        throw new ValidationError('Item rejected by store', { ...context, sqlstate }, err);
      }
      throw err;
    }
  }
}
