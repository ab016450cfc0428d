import { randomUUID } from 'node:crypto';
import type { PipelineLogger } from './logger.js';
import type { Envelope, ItemType, Submission, SubmissionFields } from '../domain/index.js';
import { CaptureError, ENVELOPE_SCHEMA_VERSION } from '../domain/index.js';
import { withTimeout } from './timeout.js';

/** Publishes one envelope to the stream and resolves with its entry ID. */
export type EnvelopePublisher = (envelope: Envelope) => Promise<string>;

export interface CaptureOptions {
  itemType: ItemType;
  publishTimeoutMs: number;
  now?: () => Date;
}

/** The only two answers the edge ever gives. */
export type CaptureResult =
  | { status: 204 }
  | { status: 500; body: { error: string } };

export const GENERIC_ERROR_BODY = { error: 'Internal Server Error' } as const;

/**
 * Builds a submission from a raw query string.
 *
 * Repeated parameters keep their last value. When the caller supplies no
 * request ID one is generated; a supplied ID is forwarded as-is, even when
 * empty, because validation belongs to the processor.
 */
export function buildSubmission(
  querystring: string,
  requestId: string | undefined,
  receivedAt: Date = new Date(),
): Submission {
  const fields: SubmissionFields = {};
  for (const [key, value] of new URLSearchParams(querystring)) {
    fields[key] = value;
  }

  return {
    requestId: requestId ?? randomUUID(),
    fields,
    receivedAt: receivedAt.toISOString(),
  };
}

/**
 * Publishes a submission and maps the outcome to a caller-facing result.
 *
 * Exactly one publish attempt, bounded by `publishTimeoutMs`. A 204 means
 * "accepted for processing" and says nothing about what the processor
 * later decides.
 */
export async function captureSubmission(
  publish: EnvelopePublisher,
  log: PipelineLogger,
  submission: Submission,
  options: CaptureOptions,
): Promise<CaptureResult> {
  const now = options.now ?? (() => new Date());

  const envelope: Envelope = {
    submission,
    metadata: {
      itemType: options.itemType,
      schemaVersion: ENVELOPE_SCHEMA_VERSION,
      publishedAt: now().toISOString(),
    },
  };

  try {
    const entryId = await withTimeout(publish(envelope), options.publishTimeoutMs, 'Stream publish');
    log.debug({ requestId: submission.requestId, entryId }, 'Submission published');
    return { status: 204 };
  } catch (err: unknown) {
    const error = new CaptureError('Failed to publish submission', {
      cause: err,
      context: { requestId: submission.requestId },
    });
    log.error({ err: error, requestId: submission.requestId }, 'Failed to publish submission');
    return { status: 500, body: { ...GENERIC_ERROR_BODY } };
  }
}
