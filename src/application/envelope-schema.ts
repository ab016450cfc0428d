import { z } from 'zod';
import { ITEM_TYPES } from '../domain/index.js';

/**
 * Zod schema for an envelope as read back off the stream.
 *
 * Checks the shape of the wire record only. A non-empty `request_id` is
 * checked separately by the processor.
 */
export const streamEnvelopeSchema = z.object({
  request_id: z.string(),
  item_type: z.enum(ITEM_TYPES),
  schema_version: z.coerce.number().int().positive(),
  received_at: z.string().datetime({ message: 'Must be a valid ISO-8601 datetime' }),
  published_at: z.string().datetime({ message: 'Must be a valid ISO-8601 datetime' }),
  fields: z.record(z.string(), z.string()),
});

export type StreamEnvelope = z.infer<typeof streamEnvelopeSchema>;
