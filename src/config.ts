/**
 * Runtime settings
 *
 * Parsed once from the environment. Invalid values throw at startup rather
 * than surfacing later as odd behavior in a request.
 */

import { z } from 'zod';

const intFromEnv = (fallback: number, min: number) =>
  z.coerce.number().int().min(min).default(fallback);

const blankAsUndefined = (value: unknown) => (value === '' ? undefined : value);

const EnvSchema = z.object({
  DATABASE_URL: z.preprocess(blankAsUndefined, z.string().url().optional()),
  UPSTASH_REDIS_REST_URL: z.preprocess(blankAsUndefined, z.string().url().optional()),
  UPSTASH_REDIS_REST_TOKEN: z.preprocess(blankAsUndefined, z.string().optional()),
  BDH_INTERNAL_AUTH_SECRET: z.preprocess(blankAsUndefined, z.string().min(1).optional()),
  PORT: intFromEnv(3001, 1),
  BDH_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  BDH_PRESENCE_TTL_SECONDS: intFromEnv(1800, 10),
  BDH_OUTBOX_INTERVAL_MS: intFromEnv(5000, 100),
  BDH_OUTBOX_MAX_ATTEMPTS: intFromEnv(3, 1),
  BDH_OUTBOX_BATCH_SIZE: intFromEnv(100, 1),
  BDH_SYSTEM_ALIAS: z.string().default('bdh-system'),
  BDH_INIT_RATE_LIMIT: intFromEnv(10, 1),
  BDH_INIT_RATE_WINDOW: intFromEnv(60, 1),
  BDH_API_KEY: z.preprocess(blankAsUndefined, z.string().optional()),
});

export interface Settings {
  databaseUrl: string | undefined;
  redis: { url: string; token: string } | null;
  internalAuthSecret: string | null;
  port: number;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
  presenceTtlSeconds: number;
  outbox: {
    intervalMs: number;
    maxAttempts: number;
    batchSize: number;
    backoffBaseMs: number;
    backoffMaxMs: number;
  };
  systemAlias: string;
  /** Fixed-window cap on POST /v1/init per client address. */
  initRateLimit: { limit: number; windowSeconds: number };
  apiKey: string | null;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = EnvSchema.parse(env);
  const redis = parsed.UPSTASH_REDIS_REST_URL && parsed.UPSTASH_REDIS_REST_TOKEN
    ? { url: parsed.UPSTASH_REDIS_REST_URL, token: parsed.UPSTASH_REDIS_REST_TOKEN }
    : null;

  return {
    databaseUrl: parsed.DATABASE_URL,
    redis,
    internalAuthSecret: parsed.BDH_INTERNAL_AUTH_SECRET ?? null,
    port: parsed.PORT,
    logLevel: parsed.BDH_LOG_LEVEL,
    presenceTtlSeconds: parsed.BDH_PRESENCE_TTL_SECONDS,
    outbox: {
      intervalMs: parsed.BDH_OUTBOX_INTERVAL_MS,
      maxAttempts: parsed.BDH_OUTBOX_MAX_ATTEMPTS,
      batchSize: parsed.BDH_OUTBOX_BATCH_SIZE,
      backoffBaseMs: 30_000,
      backoffMaxMs: 15 * 60 * 1000,
    },
    systemAlias: parsed.BDH_SYSTEM_ALIAS,
    initRateLimit: { limit: parsed.BDH_INIT_RATE_LIMIT, windowSeconds: parsed.BDH_INIT_RATE_WINDOW },
    apiKey: parsed.BDH_API_KEY ?? null,
  };
}

/** Settings for tests and embedded use: defaults with overrides, no env lookups. */
export function defaultSettings(overrides: Partial<Settings> = {}): Settings {
  return { ...loadSettings({}), ...overrides };
}
