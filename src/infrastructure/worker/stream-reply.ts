/**
 * Narrowing helpers for raw stream replies.
 *
 * ioredis types several stream commands loosely, so replies are checked
 * here instead of being cast.
 */

export type StreamEntry = [id: string, fields: string[]];

export interface PendingEntry {
  id: string;
  consumer: string;
  idleMs: number;
  deliveries: number;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

/**
 * Parses an entry list (`XCLAIM` reply, or one stream of an `XREADGROUP`
 * reply). Entries deleted from the stream come back with nil fields and are
 * returned with an empty field list.
 */
export function parseEntries(raw: unknown): StreamEntry[] {
  if (!Array.isArray(raw)) return [];

  const entries: StreamEntry[] = [];
  for (const item of raw) {
    if (!Array.isArray(item)) continue;
    const [id, fields] = item;
    if (typeof id !== 'string') continue;
    entries.push([id, isStringArray(fields) ? fields : []]);
  }
  return entries;
}

/** Flattens an `XREADGROUP` reply ([[stream, entries], ...] or nil). */
export function parseReadReply(raw: unknown): StreamEntry[] {
  if (!Array.isArray(raw)) return [];
  return raw.flatMap((stream: unknown) =>
    Array.isArray(stream) ? parseEntries(stream[1]) : [],
  );
}

/** Parses the extended form of `XPENDING` (with a range and count). */
export function parsePendingReply(raw: unknown): PendingEntry[] {
  if (!Array.isArray(raw)) return [];

  const pending: PendingEntry[] = [];
  for (const item of raw) {
    if (!Array.isArray(item)) continue;
    const [id, consumer, idle, deliveries] = item;
    if (typeof id !== 'string' || typeof consumer !== 'string') continue;
    pending.push({
      id,
      consumer,
      idleMs: Number(idle),
      deliveries: Number(deliveries),
    });
  }
  return pending;
}
