import { Redis } from 'ioredis';
import { pino } from 'pino';
import { createDbClient, ensureSchema, PostgresItemStore, loadConfig } from './infrastructure/index.js';
import { startConsumer } from './infrastructure/worker/index.js';

/**
 * Standalone worker process that consumes envelopes from the Redis Stream
 * and persists them to PostgreSQL.
 *
 * Runs independently of the edge server. Several instances can share the
 * consumer group by launching them with different WORKER_ID values; stale
 * entries held by a dead instance are reclaimed by the others.
 */
const config = loadConfig();

const log = pino({ level: config.logLevel });

const redis = new Redis(config.redisUrl, {
  maxRetriesPerRequest: null,   // required for blocking stream reads
  enableReadyCheck: true,
  lazyConnect: true,
});

const { sql, db } = createDbClient(config.databaseUrl);

// Abort controller for graceful shutdown
const ac = new AbortController();

async function main(): Promise<void> {
  await redis.connect();
  log.info('Redis connected');

  await ensureSchema(sql, log);

  await startConsumer(
    redis,
    log,
    {
      store: new PostgresItemStore(db),
      log,
      writeTimeoutMs: config.writeTimeoutMs,
    },
    {
      streamKey: config.streamKey,
      group: config.consumerGroup,
      consumer: config.workerId,
      deadLetterStreamKey: config.deadLetterStreamKey,
      reclaimIdleMs: config.reclaimIdleMs,
      maxDeliveries: config.maxDeliveries,
    },
    ac.signal,
  );
}

async function closeConnections(): Promise<void> {
  await redis.quit().catch((err: unknown) => log.warn({ err }, 'Redis quit failed'));
  await sql.end().catch((err: unknown) => log.warn({ err }, 'Database close failed'));
}

// Graceful shutdown on SIGINT / SIGTERM
function shutdown(): void {
  log.info('Shutting down worker...');
  ac.abort();

  // Give the in-flight entry a moment, then force exit
  setTimeout(() => {
    void closeConnections().then(() => process.exit(0));
  }, 3000);
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

main().catch((err: unknown) => {
  log.fatal({ err }, 'Worker crashed');
  process.exit(1);
});
