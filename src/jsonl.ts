/**
 * JSONL parsing for issue payloads
 */

import { ValidationError } from './errors.js';

export type JsonObject = { [key: string]: unknown };

export interface JsonlLimits {
  maxDepth: number;
  maxCount: number;
}

const DEFAULT_LIMITS: JsonlLimits = { maxDepth: 10, maxCount: 10_000 };

export class JsonlParseError extends ValidationError {
  constructor(message: string) {
    super(message, {}, 'invalid_jsonl');
  }
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function withinDepth(value: unknown, maxDepth: number, depth = 0): boolean {
  if (depth >= maxDepth) return false;
  if (Array.isArray(value)) return value.every(item => withinDepth(item, maxDepth, depth + 1));
  if (isJsonObject(value)) return Object.values(value).every(item => withinDepth(item, maxDepth, depth + 1));
  return true;
}

/**
 * Parse newline-delimited JSON objects. Blank lines are skipped; the record
 * limit is enforced as lines are read so oversized payloads fail early.
 */
export function parseJsonl(content: string, limits: Partial<JsonlLimits> = {}): JsonObject[] {
  const { maxDepth, maxCount } = { ...DEFAULT_LIMITS, ...limits };
  const records: JsonObject[] = [];
  const lines = content.split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue;
    const lineNum = i + 1;

    if (records.length >= maxCount) {
      throw new JsonlParseError(`Too many issues: exceeds limit of ${maxCount}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new JsonlParseError(`Invalid JSON on line ${lineNum}: ${reason}`);
    }

    if (!isJsonObject(parsed)) {
      throw new JsonlParseError(`JSON on line ${lineNum} must be an object`);
    }
    if (!withinDepth(parsed, maxDepth)) {
      throw new JsonlParseError(`JSON nesting depth exceeds limit (${maxDepth}) on line ${lineNum}`);
    }
    records.push(parsed);
  }

  return records;
}

/** Array payloads get the same limits as JSONL strings. */
export function checkRecords(items: unknown[], limits: Partial<JsonlLimits> = {}): JsonObject[] {
  const { maxDepth, maxCount } = { ...DEFAULT_LIMITS, ...limits };
  if (items.length > maxCount) {
    throw new JsonlParseError(`Too many issues: exceeds limit of ${maxCount}`);
  }
  return items.map((item, index) => {
    if (!isJsonObject(item)) throw new JsonlParseError(`Item ${index} must be an object`);
    if (!withinDepth(item, maxDepth)) {
      throw new JsonlParseError(`JSON nesting depth exceeds limit (${maxDepth}) in item ${index}`);
    }
    return item;
  });
}
