import { describe, it, expect, vi, beforeEach } from 'vitest';
import { buildSubmission, captureSubmission, GENERIC_ERROR_BODY } from '../../src/application/capture.js';
import { TimeoutError } from '../../src/application/timeout.js';
import { CaptureError } from '../../src/domain/index.js';
import { fakeLogger, FIXED_NOW } from '../helpers/fakes.js';

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

describe('buildSubmission', () => {
  it('maps query parameters to fields', () => {
    const submission = buildSubmission('author=alice&body=hi%20there&post=%2Fblog%2Fhello', 'r1', FIXED_NOW);

    expect(submission).toEqual({
      requestId: 'r1',
      fields: { author: 'alice', body: 'hi there', post: '/blog/hello' },
      receivedAt: '2026-03-01T10:00:00.000Z',
    });
  });

  it('keeps the last value of a repeated parameter', () => {
    const submission = buildSubmission('author=alice&author=bob', 'r1', FIXED_NOW);
    expect(submission.fields).toEqual({ author: 'bob' });
  });

  it('decodes + as a space', () => {
    const submission = buildSubmission('body=hello+world', 'r1', FIXED_NOW);
    expect(submission.fields['body']).toBe('hello world');
  });

  it('accepts an empty query string', () => {
    const submission = buildSubmission('', 'r1', FIXED_NOW);
    expect(submission.fields).toEqual({});
  });

  it('generates a UUID when no request ID is supplied', () => {
    const submission = buildSubmission('author=alice', undefined, FIXED_NOW);
    expect(submission.requestId).toMatch(UUID_RE);
  });

  it('forwards an explicitly empty request ID unchanged', () => {
    const submission = buildSubmission('author=alice', '', FIXED_NOW);
    expect(submission.requestId).toBe('');
  });
});

describe('captureSubmission', () => {
  let log: ReturnType<typeof fakeLogger>;
  const submission = buildSubmission('author=alice&body=hi', 'r1', FIXED_NOW);
  const options = {
    itemType: 'comment' as const,
    publishTimeoutMs: 50,
    now: () => new Date('2026-03-01T10:00:01.000Z'),
  };

  beforeEach(() => {
    log = fakeLogger();
  });

  it('returns 204 when the publish succeeds', async () => {
    const publish = vi.fn().mockResolvedValue('1-0');

    const result = await captureSubmission(publish, log, submission, options);

    expect(result).toEqual({ status: 204 });
  });

  it('publishes exactly one envelope with item type and metadata', async () => {
    const publish = vi.fn().mockResolvedValue('1-0');

    await captureSubmission(publish, log, submission, options);

    expect(publish).toHaveBeenCalledTimes(1);
    expect(publish).toHaveBeenCalledWith({
      submission,
      metadata: {
        itemType: 'comment',
        schemaVersion: 1,
        publishedAt: '2026-03-01T10:00:01.000Z',
      },
    });
  });

  it('returns 500 with a generic body when the publish fails', async () => {
    const publish = vi.fn().mockRejectedValue(new Error('READONLY You can\'t write against a read only replica'));

    const result = await captureSubmission(publish, log, submission, options);

    expect(result).toEqual({ status: 500, body: { error: 'Internal Server Error' } });
    expect(publish).toHaveBeenCalledTimes(1);
  });

  it('does not leak the backend error to the caller', async () => {
    const publish = vi.fn().mockRejectedValue(new Error('connect ECONNREFUSED 10.0.0.5:6379'));

    const result = await captureSubmission(publish, log, submission, options);

    expect(result).toEqual({ status: 500, body: GENERIC_ERROR_BODY });
  });

  it('logs a CaptureError carrying the original cause', async () => {
    const cause = new Error('stream full');
    const publish = vi.fn().mockRejectedValue(cause);

    await captureSubmission(publish, log, submission, options);

    expect(log.error).toHaveBeenCalledWith(
      expect.objectContaining({ requestId: 'r1', err: expect.any(CaptureError) }),
      'Failed to publish submission',
    );
    const [bindings] = vi.mocked(log.error).mock.calls[0] as unknown as [{ err: CaptureError }];
    expect(bindings.err.cause).toBe(cause);
    expect(bindings.err.code).toBe('CAPTURE_FAILED');
  });

  it('returns 500 when the publish does not settle in time', async () => {
    const publish = vi.fn().mockReturnValue(new Promise<string>(() => {}));

    const result = await captureSubmission(publish, log, submission, { ...options, publishTimeoutMs: 20 });

    expect(result.status).toBe(500);
    const [bindings] = vi.mocked(log.error).mock.calls[0] as unknown as [{ err: CaptureError }];
    expect(bindings.err.cause).toBeInstanceOf(TimeoutError);
  });
});
