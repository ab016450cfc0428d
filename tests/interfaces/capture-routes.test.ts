import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import { captureRoutes } from '../../src/interfaces/http/index.js';
import { decodeEnvelope } from '../../src/infrastructure/redis/index.js';
import { FakeStreamRedis } from '../helpers/fake-stream-redis.js';
import { fakeRedisPlugin } from '../helpers/plugins.js';

const STREAM = 'comments_stream';
const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

function onlyEnvelope(fake: FakeStreamRedis) {
  const entries = fake.entries(STREAM);
  expect(entries).toHaveLength(1);
  const decoded = decodeEnvelope(entries[0]?.[1] ?? []);
  if (!decoded.ok) throw decoded.error;
  return decoded.envelope;
}

describe('capture routes', () => {
  let fake: FakeStreamRedis;
  let app: FastifyInstance;

  beforeEach(async () => {
    fake = new FakeStreamRedis();
    app = Fastify();
    await app.register(fakeRedisPlugin(fake));
    await app.register(captureRoutes, { streamKey: STREAM, publishTimeoutMs: 50 });
  });

  afterEach(async () => {
    await app.close();
  });

  describe('GET /comment', () => {
    it('returns 204 with an empty body when the publish succeeds', async () => {
      const res = await app.inject({
        method: 'GET',
        url: '/comment?author=alice&body=hi',
        headers: { 'x-request-id': 'r1' },
      });

      expect(res.statusCode).toBe(204);
      expect(res.body).toBe('');
    });

    it('publishes the query parameters as submission fields', async () => {
      await app.inject({
        method: 'GET',
        url: '/comment?author=alice&body=hi+there&post=%2Fblog%2Fhello',
        headers: { 'x-request-id': 'r1' },
      });

      const envelope = onlyEnvelope(fake);
      expect(envelope.submission.requestId).toBe('r1');
      expect(envelope.submission.fields).toEqual({ author: 'alice', body: 'hi there', post: '/blog/hello' });
      expect(envelope.metadata.itemType).toBe('comment');
    });

    it('generates a request ID when the caller sends none', async () => {
      await app.inject({ method: 'GET', url: '/comment?author=alice' });

      expect(onlyEnvelope(fake).submission.requestId).toMatch(UUID_RE);
    });

    it('accepts a request without query parameters', async () => {
      const res = await app.inject({ method: 'GET', url: '/comment' });

      expect(res.statusCode).toBe(204);
      expect(onlyEnvelope(fake).submission.fields).toEqual({});
    });

    it('returns 500 with a generic body when the publish fails', async () => {
      vi.spyOn(fake, 'xadd').mockRejectedValueOnce(new Error('OOM command not allowed when used memory > maxmemory'));

      const res = await app.inject({ method: 'GET', url: '/comment?author=alice' });

      expect(res.statusCode).toBe(500);
      expect(res.json()).toEqual({ error: 'Internal Server Error' });
    });

    it('returns 500 when the publish exceeds its time budget', async () => {
      vi.spyOn(fake, 'xadd').mockReturnValueOnce(new Promise<string>(() => {}));

      const res = await app.inject({ method: 'GET', url: '/comment?author=alice' });

      expect(res.statusCode).toBe(500);
      expect(res.json()).toEqual({ error: 'Internal Server Error' });
    });

    it('publishes exactly once per request', async () => {
      const xadd = vi.spyOn(fake, 'xadd');

      await app.inject({ method: 'GET', url: '/comment?author=alice' });

      expect(xadd).toHaveBeenCalledTimes(1);
    });
  });

  describe('GET /health', () => {
    it('returns 200 when Redis answers PING', async () => {
      const res = await app.inject({ method: 'GET', url: '/health' });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ status: 'ok', redis: 'PONG' });
    });

    it('returns 503 when Redis is unreachable', async () => {
      vi.spyOn(fake, 'ping').mockRejectedValueOnce(new Error('Connection is closed.'));

      const res = await app.inject({ method: 'GET', url: '/health' });

      expect(res.statusCode).toBe(503);
      expect(res.json()).toEqual({ status: 'degraded', redis: 'unreachable' });
    });
  });
});
