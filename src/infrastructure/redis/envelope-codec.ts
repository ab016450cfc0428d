import type { Envelope } from '../../domain/index.js';
import { ENVELOPE_SCHEMA_VERSION, ValidationError } from '../../domain/index.js';
import { streamEnvelopeSchema } from '../../application/envelope-schema.js';

export type DecodeResult =
  | { ok: true; envelope: Envelope }
  | { ok: false; error: ValidationError };

/**
 * Flattens an envelope into the field/value list stored on the stream.
 * Redis Streams require string values, so `fields` is JSON-serialized.
 */
export function toStreamFields(envelope: Envelope): string[] {
  return [
    'request_id', envelope.submission.requestId,
    'item_type', envelope.metadata.itemType,
    'schema_version', String(envelope.metadata.schemaVersion),
    'received_at', envelope.submission.receivedAt,
    'published_at', envelope.metadata.publishedAt,
    'fields', JSON.stringify(envelope.submission.fields),
  ];
}

/** Stream entries arrive as flat [field, value, field, value, ...] arrays. */
export function toFieldMap(fields: readonly string[]): Map<string, string> {
  const map = new Map<string, string>();
  for (let i = 0; i < fields.length; i += 2) {
    const key = fields[i];
    const value = fields[i + 1];
    if (key !== undefined && value !== undefined) {
      map.set(key, value);
    }
  }
  return map;
}

/**
 * Rebuilds an envelope from a stream entry.
 *
 * Any structural problem is a permanent failure: the same bytes will be
 * redelivered unchanged, so retrying cannot help.
 */
export function decodeEnvelope(fields: readonly string[]): DecodeResult {
  const map = toFieldMap(fields);

  let parsedFields: unknown;
  try {
    parsedFields = JSON.parse(map.get('fields') ?? '{}');
  } catch {
    return { ok: false, error: new ValidationError('Envelope fields are not valid JSON') };
  }

  const parsed = streamEnvelopeSchema.safeParse({
    request_id: map.get('request_id'),
    item_type: map.get('item_type'),
    schema_version: map.get('schema_version'),
    received_at: map.get('received_at'),
    published_at: map.get('published_at'),
    fields: parsedFields,
  });

  if (!parsed.success) {
    return {
      ok: false,
      error: new ValidationError('Malformed envelope', { issues: parsed.error.issues }),
    };
  }

  if (parsed.data.schema_version !== ENVELOPE_SCHEMA_VERSION) {
    return {
      ok: false,
      error: new ValidationError('Unsupported envelope schema version', {
        schemaVersion: parsed.data.schema_version,
      }),
    };
  }

  return {
    ok: true,
    envelope: {
      submission: {
        requestId: parsed.data.request_id,
        fields: parsed.data.fields,
        receivedAt: parsed.data.received_at,
      },
      metadata: {
        itemType: parsed.data.item_type,
        schemaVersion: parsed.data.schema_version,
        publishedAt: parsed.data.published_at,
      },
    },
  };
}
