export {
  startConsumer,
  ensureConsumerGroup,
  handleEntry,
  consumeBatch,
  processPending,
  reclaimStale,
} from './stream-consumer.js';
export type { ConsumerDeps, ConsumerOptions } from './stream-consumer.js';
export { parseEntries, parseReadReply, parsePendingReply } from './stream-reply.js';
export type { StreamEntry, PendingEntry } from './stream-reply.js';
