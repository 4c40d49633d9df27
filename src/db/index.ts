/**
 * Database connection and migrations
 *
 * Production runs on node-postgres. Anything that accepts a `Database` also
 * accepts a transaction handle, so helpers compose inside `db.transaction`.
 */

import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import pg from 'pg';
import { sql } from 'drizzle-orm';
import { drizzle } from 'drizzle-orm/node-postgres';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import { migrations } from './schema.js';
import { createLogger } from '../logger.js';

const log = createLogger('db');

export type Database = PgDatabase<PgQueryResultHKT>;
export type Tx = Parameters<Parameters<Database['transaction']>[0]>[0];

const STATEMENT_BREAKPOINT = '--> statement-breakpoint';

let pool: pg.Pool | null = null;
let instance: Database | null = null;

export function getDatabase(databaseUrl: string | undefined): Database {
  if (instance) return instance;
  if (!databaseUrl) {
    throw new Error('DATABASE_URL environment variable is required');
  }
  pool = new pg.Pool({ connectionString: databaseUrl, max: 10 });
  pool.on('error', (err) => log.error('Idle client error:', err));
  instance = drizzle(pool);
  return instance;
}

export async function closeDatabase(): Promise<void> {
  if (pool) await pool.end();
  pool = null;
  instance = null;
}

export function migrationsDir(): string {
  return process.env.BDH_MIGRATIONS_DIR || join(process.cwd(), 'src', 'db', 'migrations');
}

/**
 * Apply pending .sql files in name order. Each file runs in its own
 * transaction and is recorded in public.bdh_migrations.
 */
export async function migrate(db: Database, dir: string = migrationsDir()): Promise<string[]> {
  await db.execute(sql.raw(
    'CREATE TABLE IF NOT EXISTS public.bdh_migrations (name text PRIMARY KEY, applied_at timestamptz NOT NULL DEFAULT now())'
  ));

  const applied = new Set((await db.select({ name: migrations.name }).from(migrations)).map(row => row.name));
  const files = (await readdir(dir)).filter(file => file.endsWith('.sql')).sort();
  const ran: string[] = [];

  for (const file of files) {
    if (applied.has(file)) continue;
    const text = await readFile(join(dir, file), 'utf8');
    const statements = text
      .split(STATEMENT_BREAKPOINT)
      .map(statement => statement.trim())
      .filter(Boolean);

    await db.transaction(async (tx) => {
      for (const statement of statements) {
        await tx.execute(sql.raw(statement));
      }
      await tx.insert(migrations).values({ name: file });
    });
    log.info(`Applied migration ${file}`);
    ran.push(file);
  }

  return ran;
}
