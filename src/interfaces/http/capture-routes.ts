import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { buildSubmission, captureSubmission } from '../../application/index.js';
import { createEnvelopePublisher } from '../../infrastructure/redis/index.js';

export interface CaptureRoutesOptions {
  streamKey: string;
  publishTimeoutMs: number;
}

export const CAPTURE_PATH = '/comment';
const REQUEST_ID_HEADER = 'x-request-id';

/** Everything after the first `?`, undecoded. */
function rawQuerystring(url: string): string {
  const idx = url.indexOf('?');
  return idx === -1 ? '' : url.slice(idx + 1);
}

function suppliedRequestId(request: FastifyRequest): string | undefined {
  const header = request.headers[REQUEST_ID_HEADER];
  return Array.isArray(header) ? header[0] : header;
}

/**
 * Registers the edge capture routes.
 *
 * GET /comment — capture a comment submission from the query string
 * GET /health  — Redis connectivity check
 */
async function captureRoutes(fastify: FastifyInstance, options: CaptureRoutesOptions): Promise<void> {
  const publish = createEnvelopePublisher(fastify.redis, options.streamKey);

  /**
   * Comment capture.
   *
   * The query string is the only input; no body is read. Publishes once
   * and answers 204, or 500 with a generic body if the publish fails.
   */
  fastify.get(
    CAPTURE_PATH,
    async (request: FastifyRequest, reply: FastifyReply) => {
      const submission = buildSubmission(
        rawQuerystring(request.url),
        suppliedRequestId(request),
      );

      const result = await captureSubmission(publish, request.log, submission, {
        itemType: 'comment',
        publishTimeoutMs: options.publishTimeoutMs,
      });

      if (result.status === 204) {
        return reply.status(204).send();
      }
      return reply.status(500).send(result.body);
    },
  );

  /**
   * Health check — verifies Redis is reachable via PING.
   */
  fastify.get(
    '/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      try {
        const pong = await fastify.redis.ping();
        return reply.status(200).send({ status: 'ok', redis: pong });
      } catch (err: unknown) {
        fastify.log.error({ err }, 'Redis health check failed');
        return reply.status(503).send({ status: 'degraded', redis: 'unreachable' });
      }
    },
  );
}

export default fp(captureRoutes, {
  name: 'capture-routes',
  dependencies: ['redis'],
  fastify: '5.x',
});
