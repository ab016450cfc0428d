import type { ItemKey, ModerationStatus, StoredItem } from '../domain/index.js';
import type { ItemStore } from './item-store.js';

/** Decides whether a moderator may move an item from one status to another. */
export type ModerationPolicy = (from: ModerationStatus, to: ModerationStatus) => boolean;

/**
 * pending → approved | rejected, approved ↔ rejected.
 * Nothing ever goes back to pending.
 */
export const defaultModerationPolicy: ModerationPolicy = (from, to) => {
  if (from === to || to === 'pending') return false;
  return true;
};

export type TransitionResult =
  | { kind: 'updated'; item: StoredItem }
  | { kind: 'not_found' }
  | { kind: 'invalid_transition'; from: ModerationStatus; to: ModerationStatus }
  | { kind: 'conflict' };

/**
 * Applies a moderation decision.
 *
 * Reads the current status, checks the policy, then updates conditionally
 * on that status. A concurrent change between read and write yields
 * `conflict`, never a blind overwrite.
 */
export async function transitionStatus(
  store: ItemStore,
  policy: ModerationPolicy,
  key: ItemKey,
  to: ModerationStatus,
): Promise<TransitionResult> {
  const current = await store.get(key);
  if (current === null) return { kind: 'not_found' };

  if (!policy(current.status, to)) {
    return { kind: 'invalid_transition', from: current.status, to };
  }

  const updated = await store.updateStatus(key, current.status, to);
  if (updated === null) return { kind: 'conflict' };

  return { kind: 'updated', item: updated };
}
