export { default as redisPlugin } from './redis-plugin.js';
export type { RedisPluginOptions } from './redis-plugin.js';
export { publishEnvelope, createEnvelopePublisher } from './envelope-publisher.js';
export { toStreamFields, toFieldMap, decodeEnvelope } from './envelope-codec.js';
export type { DecodeResult } from './envelope-codec.js';
