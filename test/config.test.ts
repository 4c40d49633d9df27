import { describe, expect, it } from 'vitest';
import { defaultSettings, loadSettings } from '../src/config.js';

describe('loadSettings', () => {
  it('applies defaults to an empty environment', () => {
    const settings = loadSettings({});
    expect(settings.databaseUrl).toBeUndefined();
    expect(settings.redis).toBeNull();
    expect(settings.internalAuthSecret).toBeNull();
    expect(settings.port).toBe(3001);
    expect(settings.logLevel).toBe('info');
    expect(settings.presenceTtlSeconds).toBe(1800);
    expect(settings.outbox).toEqual({
      intervalMs: 5000,
      maxAttempts: 3,
      batchSize: 100,
      backoffBaseMs: 30_000,
      backoffMaxMs: 900_000,
    });
    expect(settings.systemAlias).toBe('bdh-system');
    expect(settings.apiKey).toBeNull();
    expect(settings.initRateLimit).toEqual({ limit: 10, windowSeconds: 60 });
  });

  it('reads and coerces variables', () => {
    const settings = loadSettings({
      DATABASE_URL: 'postgres://localhost:5432/bdh',
      UPSTASH_REDIS_REST_URL: 'https://cache.example.test',
      UPSTASH_REDIS_REST_TOKEN: 'test-token',
      BDH_INTERNAL_AUTH_SECRET: 'test-secret',
      PORT: '8080',
      BDH_PRESENCE_TTL_SECONDS: '60',
      BDH_OUTBOX_MAX_ATTEMPTS: '5',
      BDH_LOG_LEVEL: 'debug',
      BDH_INIT_RATE_LIMIT: '25',
    });
    expect(settings.databaseUrl).toBe('postgres://localhost:5432/bdh');
    expect(settings.redis).toEqual({ url: 'https://cache.example.test', token: 'test-token' });
    expect(settings.internalAuthSecret).toBe('test-secret');
    expect(settings.port).toBe(8080);
    expect(settings.presenceTtlSeconds).toBe(60);
    expect(settings.outbox.maxAttempts).toBe(5);
    expect(settings.initRateLimit).toEqual({ limit: 25, windowSeconds: 60 });
    expect(settings.logLevel).toBe('debug');
  });

  it('treats blank values as unset', () => {
    const settings = loadSettings({ BDH_INTERNAL_AUTH_SECRET: '', UPSTASH_REDIS_REST_URL: '' });
    expect(settings.internalAuthSecret).toBeNull();
    expect(settings.redis).toBeNull();
  });

  it('needs both Upstash variables to use Redis', () => {
    expect(loadSettings({ UPSTASH_REDIS_REST_URL: 'https://cache.example.test' }).redis).toBeNull();
  });

  it('rejects invalid values at startup', () => {
    expect(() => loadSettings({ BDH_PRESENCE_TTL_SECONDS: '5' })).toThrow();
    expect(() => loadSettings({ PORT: 'http' })).toThrow();
    expect(() => loadSettings({ BDH_LOG_LEVEL: 'verbose' })).toThrow();
  });

  it('lets embedded callers override defaults without touching the environment', () => {
    const settings = defaultSettings({ presenceTtlSeconds: 30, systemAlias: 'relay' });
    expect(settings.presenceTtlSeconds).toBe(30);
    expect(settings.systemAlias).toBe('relay');
    expect(settings.port).toBe(3001);
  });
});
