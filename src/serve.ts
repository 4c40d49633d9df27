#!/usr/bin/env node
/**
 * Long-running server: applies migrations, starts the background monitor and
 * serves the HTTP API until SIGINT/SIGTERM.
 */

import { getAppContext } from './context.js';
import { closeDatabase, migrate } from './db/index.js';
import { createHttpServer } from './http-server.js';
import { createLogger } from './logger.js';
import { CoordinationMonitor } from './monitor.js';

const log = createLogger('serve');

async function main(): Promise<void> {
  const ctx = getAppContext();
  const applied = await migrate(ctx.db);
  if (applied.length > 0) log.info(`Applied ${applied.length} migration(s)`);

  const monitor = new CoordinationMonitor(ctx);
  monitor.start();

  const server = createHttpServer();
  server.listen(ctx.settings.port, () => {
    log.info(`HTTP server running on http://localhost:${ctx.settings.port}`);
  });

  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    log.info(`${signal} received, shutting down`);
    await monitor.stop();
    await new Promise<void>(resolve => server.close(() => resolve()));
    await closeDatabase();
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).then(
        () => process.exit(0),
        (error: unknown) => {
          log.error('Shutdown failed:', error);
          process.exit(1);
        }
      );
    });
  }
}

main().catch((error: unknown) => {
  log.error('Failed to start:', error);
  process.exit(1);
});
