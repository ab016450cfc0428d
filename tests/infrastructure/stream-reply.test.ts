import { describe, it, expect } from 'vitest';
import { parseEntries, parseReadReply, parsePendingReply } from '../../src/infrastructure/worker/stream-reply.js';

describe('parseReadReply', () => {
  it('returns an empty list for a nil reply', () => {
    expect(parseReadReply(null)).toEqual([]);
  });

  it('flattens entries from every stream', () => {
    const reply = [
      ['comments_stream', [['1-0', ['a', '1']], ['2-0', ['b', '2']]]],
    ];

    expect(parseReadReply(reply)).toEqual([
      ['1-0', ['a', '1']],
      ['2-0', ['b', '2']],
    ]);
  });
});

describe('parseEntries', () => {
  it('maps nil fields of a deleted entry to an empty list', () => {
    expect(parseEntries([['3-0', null]])).toEqual([['3-0', []]]);
  });

  it('skips items without a string ID', () => {
    expect(parseEntries([[42, ['a', '1']], 'junk'])).toEqual([]);
  });
});

describe('parsePendingReply', () => {
  it('parses id, consumer, idle time and delivery count', () => {
    expect(parsePendingReply([['1-0', 'worker-1', 45000, 3]])).toEqual([
      { id: '1-0', consumer: 'worker-1', idleMs: 45000, deliveries: 3 },
    ]);
  });

  it('returns an empty list for a non-array reply', () => {
    expect(parsePendingReply('OK')).toEqual([]);
  });
});
