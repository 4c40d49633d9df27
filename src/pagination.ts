/**
 * Cursor pagination
 *
 * Every list endpoint answers `{ items, has_more, next_cursor }`. Cursors are
 * opaque base64url JSON; callers never build them.
 */

import { BadRequestError } from './errors.js';
import { isJsonObject, type JsonObject } from './jsonl.js';

export const DEFAULT_LIMIT = 50;
export const MAX_LIMIT = 200;
const MAX_CURSOR_BYTES = 8192;

export interface Page<T> {
  items: T[];
  has_more: boolean;
  next_cursor: string | null;
}

export function encodeCursor(data: JsonObject): string {
  return Buffer.from(JSON.stringify(data), 'utf8').toString('base64url');
}

export function decodeCursor(cursor: string | undefined | null): JsonObject | null {
  if (!cursor) return null;
  if (cursor.length > MAX_CURSOR_BYTES) {
    throw new BadRequestError(`Invalid cursor: exceeds maximum size of ${MAX_CURSOR_BYTES} bytes`);
  }
  if (!/^[A-Za-z0-9_-]+=*$/.test(cursor)) {
    throw new BadRequestError('Invalid cursor: malformed encoding');
  }

  let data: unknown;
  try {
    data = JSON.parse(Buffer.from(cursor, 'base64url').toString('utf8'));
  } catch {
    throw new BadRequestError('Invalid cursor: malformed data');
  }
  if (!isJsonObject(data)) throw new BadRequestError('Invalid cursor: must decode to an object');
  return data;
}

/** Row offset carried by an offset cursor; 0 without a cursor. */
export function cursorOffset(cursor: JsonObject | null): number {
  if (!cursor || cursor.offset === undefined) return 0;
  const offset = cursor.offset;
  if (typeof offset !== 'number' || !Number.isSafeInteger(offset) || offset < 0) {
    throw new BadRequestError('Invalid cursor');
  }
  return offset;
}

export function clampLimit(limit: number | undefined): number {
  if (limit === undefined || Number.isNaN(limit)) return DEFAULT_LIMIT;
  return Math.min(MAX_LIMIT, Math.max(1, Math.trunc(limit)));
}

export function parsePagination(limit: string | undefined, cursor: string | undefined) {
  return {
    limit: clampLimit(limit === undefined ? undefined : Number(limit)),
    cursor: decodeCursor(cursor),
  };
}

/**
 * Build a page from rows fetched with `limit + 1`; the extra row only signals
 * that more exist.
 */
export function toPage<T>(rows: T[], limit: number, cursorOf: (last: T) => JsonObject): Page<T> {
  const hasMore = rows.length > limit;
  const items = hasMore ? rows.slice(0, limit) : rows;
  const last = items[items.length - 1];
  return {
    items,
    has_more: hasMore,
    next_cursor: hasMore && last !== undefined ? encodeCursor(cursorOf(last)) : null,
  };
}
