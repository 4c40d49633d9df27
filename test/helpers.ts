/**
 * Shared fixtures: an in-process Postgres (PGlite) with migrations applied,
 * an in-memory cache on a controllable clock, and a shortcut for creating
 * agents through the real init path.
 */

import { PGlite } from '@electric-sql/pglite';
import { drizzle } from 'drizzle-orm/pglite';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { resolveIdentity, type AuthIdentity } from '../src/auth.js';
import { initWorkspace, InitRequestSchema, type InitResult } from '../src/bootstrap.js';
import { MemoryCache } from '../src/cache.js';
import { defaultSettings, type Settings } from '../src/config.js';
import { createAppContext, type AppContext } from '../src/context.js';
import { migrate, type Database } from '../src/db/index.js';
import type { IdentityAccessor } from '../src/identity.js';
import { setLogLevel } from '../src/logger.js';
import { PresenceCache } from '../src/presence.js';

const MIGRATIONS_DIR = join(dirname(fileURLToPath(import.meta.url)), '..', 'src', 'db', 'migrations');

export const REPO_URL = 'git@github.com:acme/widgets.git';
export const REPO = 'github.com/acme/widgets';

export class TestClock {
  private current = Date.now();

  now = (): number => this.current;
  date = (): Date => new Date(this.current);

  advance(ms: number): void {
    this.current += ms;
  }
}

export interface TestEnv {
  ctx: AppContext;
  db: Database;
  cache: MemoryCache;
  clock: TestClock;
  close(): Promise<void>;
}

export async function createTestEnv(
  options: { identity?: IdentityAccessor; settings?: Partial<Settings> } = {}
): Promise<TestEnv> {
  setLogLevel('error');
  const client = new PGlite();
  const db: Database = drizzle(client);
  await migrate(db, MIGRATIONS_DIR);

  const clock = new TestClock();
  const cache = new MemoryCache({ now: clock.now });
  const settings = defaultSettings({ logLevel: 'error', ...options.settings });
  const base = createAppContext(settings, { db, cache, identity: options.identity });
  const ctx: AppContext = { ...base, presence: new PresenceCache(cache, settings.presenceTtlSeconds, clock.date) };

  return { ctx, db, cache, clock, close: () => client.close() };
}

export interface Agent {
  init: InitResult;
  identity: AuthIdentity;
  workspaceId: string;
  projectId: string;
}

/** Create (or re-init) an agent through POST /v1/init semantics and authenticate as it. */
export async function initAgent(ctx: AppContext, input: Record<string, unknown>): Promise<Agent> {
  const init = await initWorkspace(ctx, InitRequestSchema.parse({ project_slug: 'demo', repo_origin: REPO_URL, ...input }));
  const identity = await resolveIdentity(ctx, { authorization: `Bearer ${init.api_key}` });
  return { init, identity, workspaceId: init.workspace_id, projectId: init.project_id };
}
