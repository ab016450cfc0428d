import type { Redis } from 'ioredis';
import type { PipelineLogger } from '../../application/logger.js';
import type { ProcessorDeps, ProcessOutcome } from '../../application/processor.js';
import { isSettled, processEnvelope } from '../../application/processor.js';
import { decodeEnvelope } from '../redis/envelope-codec.js';
import { parseEntries, parsePendingReply, parseReadReply } from './stream-reply.js';
import type { StreamEntry } from './stream-reply.js';

// How long to block waiting for new messages (ms)
const BLOCK_MS = 5000;
// Max messages to read per iteration
const BATCH_SIZE = 100;

export interface ConsumerOptions {
  streamKey: string;
  group: string;
  consumer: string;
  deadLetterStreamKey: string;
  /** Entries pending longer than this are reclaimed and redelivered. */
  reclaimIdleMs: number;
  /** Deliveries after which an entry is dead-lettered instead of retried. */
  maxDeliveries: number;
  blockMs?: number;
  batchSize?: number;
}

/** Dependencies bundled for internal functions. */
export interface ConsumerDeps {
  redis: Redis;
  log: PipelineLogger;
  processor: ProcessorDeps;
  options: ConsumerOptions;
}

/**
 * Ensures the consumer group exists on the stream.
 *
 * Start ID "0": a fresh group also picks up envelopes published before the
 * worker first started, so nothing the edge accepted is skipped.
 *
 * Uses MKSTREAM so the stream is created if it doesn't exist yet.
 * Ignores BUSYGROUP errors (group already exists).
 */
export async function ensureConsumerGroup(
  redis: Redis,
  log: PipelineLogger,
  streamKey: string,
  group: string,
): Promise<void> {
  try {
    await redis.xgroup('CREATE', streamKey, group, '0', 'MKSTREAM');
    log.info({ group, stream: streamKey }, 'Consumer group created');
  } catch (err: unknown) {
    if (err instanceof Error && err.message.includes('BUSYGROUP')) {
      log.debug({ group }, 'Consumer group already exists');
      return;
    }
    throw err;
  }
}

/**
 * Handles a single stream entry: decode → process → ACK.
 *
 * Created, duplicate and rejected entries are acknowledged. Entries whose
 * write failed transiently are left in the pending list so the stream
 * redelivers them.
 */
export async function handleEntry(
  deps: ConsumerDeps,
  streamId: string,
  fields: string[],
): Promise<ProcessOutcome> {
  const decoded = decodeEnvelope(fields);

  let outcome: ProcessOutcome;
  if (decoded.ok) {
    outcome = await processEnvelope(deps.processor, decoded.envelope);
  } else {
    deps.log.warn({ err: decoded.error, streamId }, 'Discarding malformed envelope');
    outcome = { kind: 'rejected', error: decoded.error };
  }

  if (isSettled(outcome)) {
    await deps.redis.xack(deps.options.streamKey, deps.options.group, streamId);
  } else {
    deps.log.warn({ streamId }, 'Entry left pending for redelivery');
  }

  return outcome;
}

async function handleEntries(deps: ConsumerDeps, entries: StreamEntry[]): Promise<number> {
  let count = 0;
  for (const [streamId, fields] of entries) {
    if (fields.length === 0) {
      // Trimmed from the stream while pending; nothing left to process
      await deps.redis.xack(deps.options.streamKey, deps.options.group, streamId);
      continue;
    }
    await handleEntry(deps, streamId, fields);
    count++;
  }
  return count;
}

/**
 * Reads and handles one batch of new entries.
 * Returns the number of entries handled (0 on a BLOCK timeout).
 */
export async function consumeBatch(deps: ConsumerDeps): Promise<number> {
  const { streamKey, group, consumer } = deps.options;

  const response: unknown = await deps.redis.xreadgroup(
    'GROUP', group, consumer,
    'COUNT', deps.options.batchSize ?? BATCH_SIZE,
    'BLOCK', deps.options.blockMs ?? BLOCK_MS,
    'STREAMS', streamKey,
    '>', // only new, undelivered messages
  );

  return handleEntries(deps, parseReadReply(response));
}

/**
 * Handles entries that were delivered before, dead-lettering those whose
 * previous delivery count has reached `maxDeliveries`.
 */
async function redeliver(
  deps: ConsumerDeps,
  entries: StreamEntry[],
  previousDeliveries: ReadonlyMap<string, number>,
): Promise<number> {
  const { streamKey, group, maxDeliveries } = deps.options;

  let count = 0;
  for (const entry of entries) {
    const [streamId, fields] = entry;
    const previous = previousDeliveries.get(streamId) ?? 0;

    if (fields.length === 0) {
      await deps.redis.xack(streamKey, group, streamId);
      continue;
    }

    if (previous >= maxDeliveries) {
      await deadLetter(deps, entry, previous);
      continue;
    }

    deps.log.info({ streamId, delivery: previous + 1 }, 'Redelivering entry');
    await handleEntry(deps, streamId, fields);
    count++;
  }
  return count;
}

/**
 * Processes this consumer's own pending entries (delivered but not ACKed).
 * This handles recovery after a crash or restart.
 *
 * Re-reading an entry by ID counts as a delivery, so a worker that keeps
 * crashing on the same entry still exhausts its budget.
 */
export async function processPending(deps: ConsumerDeps): Promise<number> {
  const { streamKey, group, consumer } = deps.options;
  const batchSize = deps.options.batchSize ?? BATCH_SIZE;

  // Counts as they stand before this read
  const pending = parsePendingReply(
    await deps.redis.xpending(streamKey, group, '-', '+', batchSize, consumer),
  );
  if (pending.length === 0) return 0;

  const response: unknown = await deps.redis.xreadgroup(
    'GROUP', group, consumer,
    'COUNT', batchSize,
    'STREAMS', streamKey,
    '0', // '0' = re-read pending entries for this consumer
  );

  const count = await redeliver(
    deps,
    parseReadReply(response),
    new Map(pending.map((p) => [p.id, p.deliveries])),
  );
  if (count > 0) {
    deps.log.info({ count }, 'Recovered pending entries');
  }
  return count;
}

async function deadLetter(deps: ConsumerDeps, entry: StreamEntry, deliveries: number): Promise<void> {
  const { streamKey, group, deadLetterStreamKey } = deps.options;
  const [streamId, fields] = entry;

  await deps.redis.xadd(
    deadLetterStreamKey, '*',
    ...fields,
    'source_stream', streamKey,
    'source_id', streamId,
    'deliveries', String(deliveries),
  );
  await deps.redis.xack(streamKey, group, streamId);

  deps.log.error(
    { streamId, deliveries, deadLetterStream: deadLetterStreamKey },
    'Delivery budget exhausted, entry dead-lettered',
  );
}

/**
 * Claims entries that have sat unacknowledged for `reclaimIdleMs`, from any
 * consumer in the group, and redelivers them.
 *
 * Entries already delivered `maxDeliveries` times are moved to the
 * dead-letter stream instead.
 */
export async function reclaimStale(deps: ConsumerDeps): Promise<number> {
  const { streamKey, group, consumer, reclaimIdleMs } = deps.options;

  const pending = parsePendingReply(
    await deps.redis.xpending(
      streamKey, group,
      'IDLE', reclaimIdleMs,
      '-', '+',
      deps.options.batchSize ?? BATCH_SIZE,
    ),
  );
  if (pending.length === 0) return 0;

  const claimed = parseEntries(
    await deps.redis.xclaim(streamKey, group, consumer, reclaimIdleMs, ...pending.map((p) => p.id)),
  );

  return redeliver(deps, claimed, new Map(pending.map((p) => [p.id, p.deliveries])));
}

/**
 * Main consumer loop.
 *
 * 1. Recover this consumer's own pending entries.
 * 2. Each cycle: reclaim stale entries, then XREADGROUP with BLOCK.
 * 3. For each entry: decode → idempotent create → XACK (unless transient).
 *
 * Never ACK before a successful write, a confirmed duplicate, or a
 * permanent rejection.
 *
 * The loop runs until `signal` is aborted (graceful shutdown).
 */
export async function startConsumer(
  redis: Redis,
  log: PipelineLogger,
  processor: ProcessorDeps,
  options: ConsumerOptions,
  signal: AbortSignal,
): Promise<void> {
  const deps: ConsumerDeps = { redis, log, processor, options };

  await ensureConsumerGroup(redis, log, options.streamKey, options.group);

  log.info(
    { consumer: options.consumer, group: options.group, stream: options.streamKey },
    'Consumer started',
  );

  await processPending(deps);

  while (!signal.aborted) {
    try {
      await reclaimStale(deps);
      await consumeBatch(deps);
    } catch (err: unknown) {
      if (signal.aborted) break;
      log.error({ err }, 'Consumer loop error, retrying in 1s');
      await sleep(1000);
    }
  }

  log.info('Consumer stopped');
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
