import type { Redis } from 'ioredis';
import type { Envelope } from '../../domain/index.js';
import type { EnvelopePublisher } from '../../application/capture.js';
import { toStreamFields } from './envelope-codec.js';

/**
 * Appends an envelope to the Redis Stream.
 *
 * Uses `XADD` with auto-generated stream IDs (`*`).
 *
 * @returns The stream entry ID assigned by Redis.
 */
export async function publishEnvelope(
  redis: Redis,
  streamKey: string,
  envelope: Envelope,
): Promise<string> {
  const entryId = await redis.xadd(streamKey, '*', ...toStreamFields(envelope));

  if (entryId === null) {
    throw new Error(`XADD to ${streamKey} returned no entry ID`);
  }

  return entryId;
}

/** Binds a connection and stream key into the publisher the edge expects. */
export function createEnvelopePublisher(redis: Redis, streamKey: string): EnvelopePublisher {
  return (envelope) => publishEnvelope(redis, streamKey, envelope);
}
