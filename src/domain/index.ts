export type {
  Submission,
  SubmissionFields,
  ItemType,
  Envelope,
  EnvelopeMetadata,
} from './submission.js';
export { ITEM_TYPES, ENVELOPE_SCHEMA_VERSION } from './submission.js';
export type { ItemKey, StoredItem, ModerationStatus } from './item.js';
export { MODERATION_STATUSES } from './item.js';
export { PipelineError, CaptureError, ValidationError, TransientStoreError } from './errors.js';
