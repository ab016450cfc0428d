import type { ItemType, SubmissionFields } from './submission.js';

export const MODERATION_STATUSES = ['pending', 'approved', 'rejected'] as const;
export type ModerationStatus = (typeof MODERATION_STATUSES)[number];

/** Primary key of a stored item. `itemType` is the partition key. */
export interface ItemKey {
  readonly itemType: ItemType;
  readonly itemId: string;
}

/**
 * Persisted record.
 *
 * `status` is the only field that changes after creation, and only through
 * a moderation transition.
 */
export interface StoredItem extends ItemKey {
  readonly payload: SubmissionFields;
  readonly status: ModerationStatus;
  readonly receivedAt: string;
  readonly createdAt: string;
  readonly updatedAt: string;
}
