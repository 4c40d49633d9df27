/**
 * Background coordination monitor
 *
 * One tick drains the notification outbox and expires overdue escalations.
 * Once an hour it also prunes delivered outbox entries. Every tick starts
 * from what the database says, so restarts lose nothing.
 */

import type { AppContext } from './context.js';
import { expireOverdueEscalations } from './escalations.js';
import { createLogger } from './logger.js';
import { cleanupDeliveredNotifications, drainOutbox, type DrainResult } from './outbox.js';

const log = createLogger('monitor');

const CLEANUP_INTERVAL_MS = 60 * 60 * 1000;
const DELIVERED_RETENTION_DAYS = 7;

export interface TickResult {
  outbox: DrainResult;
  escalationsExpired: number;
  notificationsCleaned: number;
}

export class CoordinationMonitor {
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<TickResult | null> | null = null;
  private lastCleanup = 0;

  constructor(
    private readonly ctx: AppContext,
    private readonly clock: () => Date = () => new Date()
  ) {}

  get started(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;
    const { intervalMs } = this.ctx.settings.outbox;
    this.timer = setInterval(() => {
      void this.runTick();
    }, intervalMs);
    log.info(`Started (interval ${intervalMs}ms)`);
  }

  /** Stop scheduling and wait for an in-flight tick to finish. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      log.info('Stopped');
    }
    if (this.running) await this.running;
  }

  /** Ticks never overlap; a tick requested while one runs is skipped. */
  private async runTick(): Promise<TickResult | null> {
    if (this.running) return null;
    this.running = this.tick().catch((error: unknown) => {
      log.error('Tick failed:', error);
      return null;
    });
    try {
      return await this.running;
    } finally {
      this.running = null;
    }
  }

  async tick(): Promise<TickResult> {
    const now = this.clock();
    const { outbox } = this.ctx.settings;

    const drained = await drainOutbox(this.ctx.db, {
      identity: this.ctx.identity,
      senderAlias: this.ctx.settings.systemAlias,
      maxAttempts: outbox.maxAttempts,
      batchSize: outbox.batchSize,
      backoffBaseMs: outbox.backoffBaseMs,
      backoffMaxMs: outbox.backoffMaxMs,
      now,
    });
    const escalationsExpired = await expireOverdueEscalations(this.ctx.db, now);

    let notificationsCleaned = 0;
    if (now.getTime() - this.lastCleanup >= CLEANUP_INTERVAL_MS) {
      notificationsCleaned = await cleanupDeliveredNotifications(this.ctx.db, DELIVERED_RETENTION_DAYS, now);
      this.lastCleanup = now.getTime();
    }

    return { outbox: drained, escalationsExpired, notificationsCleaned };
  }
}
