/**
 * Core domain types for the comment ingestion pipeline.
 *
 * These types describe a submission as it moves from the edge, across the
 * stream, and into the item store. They carry no framework dependencies.
 */

/** Raw query parameters captured at the edge. Schema-free at this layer. */
export type SubmissionFields = Record<string, string>;

/**
 * One inbound edge request.
 *
 * `requestId` doubles as the idempotency key downstream.
 */
export interface Submission {
  readonly requestId: string;
  readonly fields: SubmissionFields;
  readonly receivedAt: string; // ISO-8601
}

export const ITEM_TYPES = ['comment', 'subscription'] as const;
export type ItemType = (typeof ITEM_TYPES)[number];

export const ENVELOPE_SCHEMA_VERSION = 1;

export interface EnvelopeMetadata {
  readonly itemType: ItemType;
  readonly schemaVersion: number;
  readonly publishedAt: string; // ISO-8601
}

/** What travels on the stream. Never mutated after publish. */
export interface Envelope {
  readonly submission: Submission;
  readonly metadata: EnvelopeMetadata;
}
