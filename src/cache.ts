/**
 * Ephemeral cache
 *
 * Presence and the event log only need a handful of Redis commands, so the
 * rest of the code talks to this narrow interface. Multi-key writes go
 * through `batch`, which runs as one MULTI/EXEC on Upstash.
 *
 * MemoryCache is the in-process stand-in for development without Upstash
 * credentials and for tests; its clock is injectable so TTLs can be
 * exercised without sleeping.
 */

import { EventEmitter } from 'events';
import { Redis } from '@upstash/redis';

export type CacheOp =
  | { op: 'hset'; key: string; fields: Record<string, string> }
  | { op: 'expire'; key: string; seconds: number }
  | { op: 'sadd'; key: string; member: string }
  | { op: 'srem'; key: string; member: string }
  | { op: 'del'; key: string }
  | { op: 'lpush'; key: string; value: string }
  | { op: 'ltrim'; key: string; start: number; stop: number };

export interface CacheClient {
  batch(ops: CacheOp[]): Promise<void>;
  hgetall(key: string): Promise<Record<string, string> | null>;
  smembers(key: string): Promise<string[]>;
  incr(key: string): Promise<number>;
  /**
   * Count a hit in a fixed window: INCR, with EXPIRE set only by the hit
   * that opened the window. Answers the count and the seconds left.
   */
  incrWindow(key: string, windowSeconds: number): Promise<{ count: number; ttlSeconds: number }>;
  lrange(key: string, start: number, stop: number): Promise<string[]>;
  publish(channel: string, message: string): Promise<number>;
}

// ============================================================================
// Upstash
// ============================================================================

// INCR and EXPIRE in one script, so they are atomic
const WINDOW_SCRIPT = `
local current = redis.call('INCR', KEYS[1])
if current == 1 or redis.call('TTL', KEYS[1]) < 0 then
  redis.call('EXPIRE', KEYS[1], ARGV[1])
end
return {current, redis.call('TTL', KEYS[1])}
`;

export class UpstashCache implements CacheClient {
  private redis: Redis;

  constructor(config: { url: string; token: string }) {
    // Values are stored as plain strings; JSON is handled by the callers
    this.redis = new Redis({ url: config.url, token: config.token, automaticDeserialization: false });
  }

  async batch(ops: CacheOp[]): Promise<void> {
    if (ops.length === 0) return;
    const tx = this.redis.multi();
    for (const op of ops) {
      switch (op.op) {
        case 'hset':
          tx.hset(op.key, op.fields);
          break;
        case 'expire':
          tx.expire(op.key, op.seconds);
          break;
        case 'sadd':
          tx.sadd(op.key, op.member);
          break;
        case 'srem':
          tx.srem(op.key, op.member);
          break;
        case 'del':
          tx.del(op.key);
          break;
        case 'lpush':
          tx.lpush(op.key, op.value);
          break;
        case 'ltrim':
          tx.ltrim(op.key, op.start, op.stop);
          break;
      }
    }
    await tx.exec();
  }

  async hgetall(key: string): Promise<Record<string, string> | null> {
    const raw = await this.redis.hgetall<Record<string, unknown>>(key);
    if (!raw) return null;
    const result: Record<string, string> = {};
    for (const [field, value] of Object.entries(raw)) {
      result[field] = typeof value === 'string' ? value : JSON.stringify(value);
    }
    return result;
  }

  async smembers(key: string): Promise<string[]> {
    return this.redis.smembers(key);
  }

  async incr(key: string): Promise<number> {
    return this.redis.incr(key);
  }

  async incrWindow(key: string, windowSeconds: number): Promise<{ count: number; ttlSeconds: number }> {
    const reply: unknown = await this.redis.eval(WINDOW_SCRIPT, [key], [windowSeconds]);
    if (!Array.isArray(reply) || reply.length !== 2) {
      throw new Error(`Unexpected rate window reply for ${key}`);
    }
    const ttl = Number(reply[1]);
    return { count: Number(reply[0]), ttlSeconds: ttl > 0 ? ttl : windowSeconds };
  }

  async lrange(key: string, start: number, stop: number): Promise<string[]> {
    return this.redis.lrange(key, start, stop);
  }

  async publish(channel: string, message: string): Promise<number> {
    return this.redis.publish(channel, message);
  }
}

// ============================================================================
// In-process
// ============================================================================

type Entry =
  | { kind: 'hash'; value: Map<string, string>; expiresAt: number | null }
  | { kind: 'set'; value: Set<string>; expiresAt: number | null }
  | { kind: 'list'; value: string[]; expiresAt: number | null }
  | { kind: 'counter'; value: number; expiresAt: number | null };

export class MemoryCache implements CacheClient {
  private entries = new Map<string, Entry>();
  private emitter = new EventEmitter();
  private now: () => number;

  constructor(options: { now?: () => number } = {}) {
    this.now = options.now ?? Date.now;
    this.emitter.setMaxListeners(0);
  }

  private live(key: string): Entry | undefined {
    const entry = this.entries.get(key);
    if (entry && entry.expiresAt !== null && entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }

  private hash(key: string): Map<string, string> {
    const entry = this.live(key);
    if (entry?.kind === 'hash') return entry.value;
    const value = new Map<string, string>();
    this.entries.set(key, { kind: 'hash', value, expiresAt: null });
    return value;
  }

  private set(key: string): Set<string> {
    const entry = this.live(key);
    if (entry?.kind === 'set') return entry.value;
    const value = new Set<string>();
    this.entries.set(key, { kind: 'set', value, expiresAt: null });
    return value;
  }

  private list(key: string): string[] {
    const entry = this.live(key);
    if (entry?.kind === 'list') return entry.value;
    const value: string[] = [];
    this.entries.set(key, { kind: 'list', value, expiresAt: null });
    return value;
  }

  async batch(ops: CacheOp[]): Promise<void> {
    for (const op of ops) {
      switch (op.op) {
        case 'hset': {
          const hash = this.hash(op.key);
          for (const [field, value] of Object.entries(op.fields)) hash.set(field, value);
          break;
        }
        case 'expire': {
          const entry = this.live(op.key);
          if (entry) entry.expiresAt = this.now() + op.seconds * 1000;
          break;
        }
        case 'sadd':
          this.set(op.key).add(op.member);
          break;
        case 'srem': {
          const entry = this.live(op.key);
          if (entry?.kind === 'set') {
            entry.value.delete(op.member);
            if (entry.value.size === 0) this.entries.delete(op.key);
          }
          break;
        }
        case 'del':
          this.entries.delete(op.key);
          break;
        case 'lpush':
          this.list(op.key).unshift(op.value);
          break;
        case 'ltrim': {
          const entry = this.live(op.key);
          if (entry?.kind === 'list') entry.value = sliceRange(entry.value, op.start, op.stop);
          break;
        }
      }
    }
  }

  async hgetall(key: string): Promise<Record<string, string> | null> {
    const entry = this.live(key);
    if (entry?.kind !== 'hash' || entry.value.size === 0) return null;
    return Object.fromEntries(entry.value);
  }

  async smembers(key: string): Promise<string[]> {
    const entry = this.live(key);
    return entry?.kind === 'set' ? [...entry.value] : [];
  }

  async incr(key: string): Promise<number> {
    const entry = this.live(key);
    const next = entry?.kind === 'counter' ? entry.value + 1 : 1;
    this.entries.set(key, { kind: 'counter', value: next, expiresAt: entry?.expiresAt ?? null });
    return next;
  }

  async incrWindow(key: string, windowSeconds: number): Promise<{ count: number; ttlSeconds: number }> {
    const count = await this.incr(key);
    const entry = this.live(key);
    if (!entry) throw new Error(`Counter ${key} vanished after incr`);
    if (entry.expiresAt === null) entry.expiresAt = this.now() + windowSeconds * 1000;
    return { count, ttlSeconds: Math.ceil((entry.expiresAt - this.now()) / 1000) };
  }

  async lrange(key: string, start: number, stop: number): Promise<string[]> {
    const entry = this.live(key);
    return entry?.kind === 'list' ? sliceRange(entry.value, start, stop) : [];
  }

  async publish(channel: string, message: string): Promise<number> {
    const receivers = this.emitter.listenerCount(channel);
    this.emitter.emit(channel, message);
    return receivers;
  }

  subscribe(channel: string, listener: (message: string) => void): () => void {
    this.emitter.on(channel, listener);
    return () => this.emitter.off(channel, listener);
  }
}

/** Redis LRANGE/LTRIM index semantics: inclusive stop, negatives count from the end. */
function sliceRange(values: string[], start: number, stop: number): string[] {
  const len = values.length;
  const from = start < 0 ? Math.max(0, len + start) : start;
  const to = stop < 0 ? len + stop : Math.min(stop, len - 1);
  return from > to ? [] : values.slice(from, to + 1);
}

export function createCache(redis: { url: string; token: string } | null): CacheClient {
  return redis ? new UpstashCache(redis) : new MemoryCache();
}
