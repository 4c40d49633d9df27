/**
 * Process-wide service context
 *
 * Handlers pull their collaborators from here. `serve.ts` and the Vercel
 * entry points build it from the environment; tests install their own with
 * setAppContext.
 */

import { createCache, type CacheClient } from './cache.js';
import { loadSettings, type Settings } from './config.js';
import { createMutationHandler } from './events.js';
import { getDatabase, type Database } from './db/index.js';
import { PostgresIdentityAccessor, type IdentityAccessor } from './identity.js';
import { createLogger, setLogLevel } from './logger.js';
import { PresenceCache } from './presence.js';

export interface AppContext {
  db: Database;
  cache: CacheClient;
  presence: PresenceCache;
  identity: IdentityAccessor;
  settings: Settings;
}

let current: AppContext | null = null;

export function createAppContext(
  settings: Settings,
  overrides: Partial<Omit<AppContext, 'settings' | 'presence'>> = {}
): AppContext {
  const cache = overrides.cache ?? createCache(settings.redis);
  return {
    db: overrides.db ?? getDatabase(settings.databaseUrl),
    cache,
    presence: new PresenceCache(cache, settings.presenceTtlSeconds),
    identity: overrides.identity ?? new PostgresIdentityAccessor({ onMutation: createMutationHandler(cache) }),
    settings,
  };
}

export function getAppContext(): AppContext {
  if (!current) {
    const settings = loadSettings();
    setLogLevel(settings.logLevel);
    if (!settings.redis) {
      createLogger('context').warn('UPSTASH_REDIS_REST_URL not set, presence is kept in process memory');
    }
    current = createAppContext(settings);
  }
  return current;
}

export function setAppContext(context: AppContext | null): void {
  current = context;
}
