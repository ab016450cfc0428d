import type { ItemKey, ModerationStatus, StoredItem } from '../domain/index.js';

/** Fields supplied on first write; timestamps are assigned by the store. */
export interface NewItem extends ItemKey {
  payload: Record<string, string>;
  receivedAt: string;
}

/**
 * Single-key access to the item store.
 *
 * Every operation touches exactly one primary key. There are no scans and
 * no multi-key transactions.
 */
export interface ItemStore {
  /**
   * Atomically creates the item with status `pending` unless the key already
   * exists. Resolves true if this call created it.
   */
  insertIfAbsent(item: NewItem): Promise<boolean>;

  get(key: ItemKey): Promise<StoredItem | null>;

  /**
   * Sets `status` to `to` only while it still equals `from`.
   * Resolves null when the key is missing or the status moved underneath us.
   */
  updateStatus(key: ItemKey, from: ModerationStatus, to: ModerationStatus): Promise<StoredItem | null>;
}
