import type { PipelineLogger } from './logger.js';
import type { Envelope, ItemKey, SubmissionFields } from '../domain/index.js';
import { TransientStoreError, ValidationError } from '../domain/index.js';
import type { ItemStore } from './item-store.js';
import { TimeoutError, withTimeout } from './timeout.js';

export interface ProcessorDeps {
  store: ItemStore;
  log: PipelineLogger;
  writeTimeoutMs: number;
}

/**
 * Result of handling one delivery.
 *
 * `created` and `duplicate` are both success; `duplicate` is the expected
 * outcome of a redelivery. `rejected` is permanent, `retry` is transient.
 */
export type ProcessOutcome =
  | { kind: 'created'; key: ItemKey }
  | { kind: 'duplicate'; key: ItemKey }
  | { kind: 'rejected'; error: ValidationError }
  | { kind: 'retry'; error: TransientStoreError };

/** True when the stream entry should be acknowledged. */
export function isSettled(outcome: ProcessOutcome): boolean {
  return outcome.kind !== 'retry';
}

function clean(text: string): string {
  // JSONB cannot hold NUL
  return text.replaceAll('\u0000', '').trim();
}

/** Trims keys and values and strips NUL characters; drops entries whose key is blank. */
export function normalizeFields(fields: SubmissionFields): SubmissionFields {
  const normalized: SubmissionFields = {};
  for (const [rawKey, rawValue] of Object.entries(fields)) {
    const key = clean(rawKey);
    if (key === '') continue;
    normalized[key] = clean(rawValue);
  }
  return normalized;
}

/** The single content rule: a submission must carry a request ID. */
export function validateEnvelope(envelope: Envelope): ValidationError | null {
  if (envelope.submission.requestId.trim() === '') {
    return new ValidationError('Submission is missing a requestId', {
      itemType: envelope.metadata.itemType,
      receivedAt: envelope.submission.receivedAt,
    });
  }
  return null;
}

function toTransient(err: unknown, key: ItemKey): TransientStoreError {
  if (err instanceof TransientStoreError) return err;
  if (err instanceof TimeoutError) {
    return new TransientStoreError(err.message, { cause: err, context: { ...key } });
  }
  // Unclassified store failures are redelivered; the stream's delivery
  // budget bounds how often.
  return new TransientStoreError('Unexpected store failure', { cause: err, context: { ...key } });
}

/**
 * Validates an envelope and performs the idempotent create.
 *
 * Never throws. The first successful write wins; any later delivery of the
 * same key finds it and returns `duplicate` without touching status or
 * payload. A ValidationError from the store means the data itself was
 * refused, which is permanent.
 */
export async function processEnvelope(
  deps: ProcessorDeps,
  envelope: Envelope,
): Promise<ProcessOutcome> {
  const invalid = validateEnvelope(envelope);
  if (invalid) {
    deps.log.warn({ err: invalid, itemType: envelope.metadata.itemType }, 'Discarding invalid submission');
    return { kind: 'rejected', error: invalid };
  }

  const key: ItemKey = {
    itemType: envelope.metadata.itemType,
    itemId: envelope.submission.requestId,
  };

  try {
    const created = await withTimeout(
      deps.store.insertIfAbsent({
        ...key,
        payload: normalizeFields(envelope.submission.fields),
        receivedAt: envelope.submission.receivedAt,
      }),
      deps.writeTimeoutMs,
      'Item write',
    );

    if (created) {
      deps.log.debug({ ...key }, 'Item created');
      return { kind: 'created', key };
    }

    deps.log.debug({ ...key }, 'Duplicate delivery skipped');
    return { kind: 'duplicate', key };
  } catch (err: unknown) {
    if (err instanceof ValidationError) {
      deps.log.warn({ err, ...key }, 'Store rejected item');
      return { kind: 'rejected', error: err };
    }
    const error = toTransient(err, key);
    deps.log.error({ err: error, ...key }, 'Failed to persist item');
    return { kind: 'retry', error };
  }
}
