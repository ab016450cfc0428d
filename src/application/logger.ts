import type { BaseLogger } from 'pino';

/**
 * The slice of a pino logger the pipeline writes to. Fastify's request
 * logger and a standalone pino instance both satisfy it.
 */
export type PipelineLogger = Pick<BaseLogger, 'debug' | 'info' | 'warn' | 'error'>;
