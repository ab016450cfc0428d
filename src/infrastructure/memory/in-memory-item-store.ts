import type { ItemKey, ModerationStatus, StoredItem } from '../../domain/index.js';
import type { ItemStore, NewItem } from '../../application/item-store.js';

function storageKey(key: ItemKey): string {
  return `${key.itemType}\u0000${key.itemId}`;
}

/**
 * In-process item store with the same single-key contract as the
 * PostgreSQL store.
 *
 * Check-and-set happens synchronously inside each call, so concurrent
 * callers on the event loop cannot both create the same key.
 */
export class InMemoryItemStore implements ItemStore {
  private readonly items: Map<string, StoredItem> = new Map();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async insertIfAbsent(item: NewItem): Promise<boolean> {
    const id = storageKey(item);
    if (this.items.has(id)) return false;

    const timestamp = this.now().toISOString();
    this.items.set(id, {
      itemType: item.itemType,
      itemId: item.itemId,
      payload: { ...item.payload },
      status: 'pending',
      receivedAt: item.receivedAt,
      createdAt: timestamp,
      updatedAt: timestamp,
    });
    return true;
  }

  async get(key: ItemKey): Promise<StoredItem | null> {
    return this.items.get(storageKey(key)) ?? null;
  }

  async updateStatus(
    key: ItemKey,
    from: ModerationStatus,
    to: ModerationStatus,
  ): Promise<StoredItem | null> {
    const id = storageKey(key);
    const current = this.items.get(id);
    if (!current || current.status !== from) return null;

    const next: StoredItem = { ...current, status: to, updatedAt: this.now().toISOString() };
    this.items.set(id, next);
    return next;
  }

  /** Number of stored items. */
  size(): number {
    return this.items.size;
  }
}
