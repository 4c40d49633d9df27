/**
 * Notification outbox
 *
 * Writers append entries in the same transaction as the change that caused
 * them. The drain claims due entries with FOR UPDATE SKIP LOCKED, hands each
 * to the mail primitive inside a savepoint, and records the outcome in the
 * same transaction, so concurrent drains never deliver an entry twice.
 *
 *   pending --deliver--> delivered
 *   pending --fail------> pending (next_attempt_at backed off)
 *                     \-> failed  (attempt budget spent)
 */

import { and, asc, desc, eq, lt, lte, type SQL } from 'drizzle-orm';
import { z } from 'zod';
import type { Database } from './db/index.js';
import { notificationOutbox, workspaces, type OutboxRow, type OutboxStatus } from './db/schema.js';
import type { DeliveredMail, IdentityAccessor, MailMessage } from './identity.js';
import { createLogger } from './logger.js';
import { cursorOffset, toPage, type Page } from './pagination.js';
import type { Subscriber } from './subscriptions.js';

const log = createLogger('outbox');

const MAX_ERROR_LENGTH = 500;

// ============================================================================
// Payloads
// ============================================================================

const StatusChangePayload = z.object({
  bead_id: z.string(),
  repo: z.string(),
  branch: z.string(),
  old_status: z.string().nullable(),
  new_status: z.string().nullable(),
  title: z.string().nullable(),
});

const EscalationResponsePayload = z.object({
  escalation_id: z.string(),
  subject: z.string(),
  response: z.string(),
  note: z.string().nullable(),
});

export type StatusChangeNotification = z.infer<typeof StatusChangePayload>;
export type EscalationResponseNotification = z.infer<typeof EscalationResponsePayload>;

export type OutboxIntent =
  | { eventType: 'bead_status_change'; payload: StatusChangeNotification }
  | { eventType: 'escalation_response'; payload: EscalationResponseNotification };

export function statusChangeMail(payload: StatusChangeNotification): { subject: string; body: string; threadId: string } {
  let body = `**${payload.bead_id}** status changed from \`${payload.old_status ?? 'unknown'}\` to \`${payload.new_status ?? 'unknown'}\`\n\n`;
  if (payload.title) body += `Title: ${payload.title}\n`;
  if (payload.repo) body += `Repo: ${payload.repo}\n`;
  if (payload.branch) body += `Branch: ${payload.branch}\n`;
  return { subject: `Bead status changed: ${payload.bead_id}`, body, threadId: `bead:${payload.bead_id}` };
}

export function escalationResponseMail(payload: EscalationResponseNotification): { subject: string; body: string; threadId: string } {
  let body = `Your escalation **${payload.subject}** received a response:\n\n${payload.response}\n`;
  if (payload.note) body += `\nNote: ${payload.note}\n`;
  return {
    subject: `Escalation response: ${payload.subject}`,
    body,
    threadId: `escalation:${payload.escalation_id}`,
  };
}

// ============================================================================
// Writers
// ============================================================================

/** Append one entry per recipient. Call with the transaction that made the change. */
export async function recordNotificationIntents(
  tx: Database,
  projectId: string,
  intent: OutboxIntent,
  recipients: Subscriber[]
): Promise<number> {
  if (recipients.length === 0) return 0;
  await tx.insert(notificationOutbox).values(recipients.map(recipient => ({
    projectId,
    eventType: intent.eventType,
    payload: { ...intent.payload },
    recipientWorkspaceId: recipient.workspaceId,
    recipientAlias: recipient.alias,
  })));
  return recipients.length;
}

// ============================================================================
// Drain
// ============================================================================

export interface DrainOptions {
  identity: IdentityAccessor;
  senderAlias: string;
  maxAttempts: number;
  batchSize: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  projectId?: string;
  now?: Date;
}

export interface DrainResult {
  delivered: number;
  retried: number;
  failed: number;
}

export function backoffDelayMs(attempts: number, baseMs: number, maxMs: number): number {
  return Math.min(maxMs, baseMs * 2 ** Math.max(0, attempts - 1));
}

function buildMail(entry: OutboxRow, senderAlias: string): MailMessage {
  let mail: { subject: string; body: string; threadId: string };
  switch (entry.eventType) {
    case 'bead_status_change':
      mail = statusChangeMail(StatusChangePayload.parse(entry.payload));
      break;
    case 'escalation_response':
      mail = escalationResponseMail(EscalationResponsePayload.parse(entry.payload));
      break;
    default:
      throw new Error(`Unknown outbox event type: ${entry.eventType}`);
  }
  return {
    projectId: entry.projectId,
    fromAlias: senderAlias,
    toAgentId: entry.recipientWorkspaceId,
    subject: mail.subject,
    body: mail.body,
    threadId: mail.threadId,
    priority: 'normal',
  };
}

async function deliver(tx: Database, entry: OutboxRow, options: DrainOptions): Promise<DeliveredMail> {
  const [recipient] = await tx
    .select({ deletedAt: workspaces.deletedAt })
    .from(workspaces)
    .where(and(eq(workspaces.workspaceId, entry.recipientWorkspaceId), eq(workspaces.projectId, entry.projectId)));
  if (!recipient || recipient.deletedAt) {
    throw new Error('Recipient workspace not found or deleted');
  }
  const message = buildMail(entry, options.senderAlias);
  const { messageId } = await options.identity.deliverMail(tx, message);
  return { message, messageId };
}

/** Deliver due entries. Returns counts for this batch only. */
export async function drainOutbox(db: Database, options: DrainOptions): Promise<DrainResult> {
  const now = options.now ?? new Date();
  const result: DrainResult = { delivered: 0, retried: 0, failed: 0 };
  const sent: DeliveredMail[] = [];

  const conditions: SQL[] = [
    eq(notificationOutbox.status, 'pending'),
    lte(notificationOutbox.nextAttemptAt, now),
  ];
  if (options.projectId) conditions.push(eq(notificationOutbox.projectId, options.projectId));

  await db.transaction(async (tx) => {
    const due = await tx
      .select()
      .from(notificationOutbox)
      .where(and(...conditions))
      .orderBy(asc(notificationOutbox.createdAt))
      .limit(options.batchSize)
      .for('update', { skipLocked: true });

    for (const entry of due) {
      const attempts = entry.attempts + 1;
      try {
        const mail = await tx.transaction((savepoint) => deliver(savepoint, entry, options));
        await tx
          .update(notificationOutbox)
          .set({ status: 'delivered', attempts, messageId: mail.messageId, lastError: null, processedAt: now })
          .where(eq(notificationOutbox.id, entry.id));
        result.delivered++;
        sent.push(mail);
      } catch (error) {
        const message = (error instanceof Error ? error.message : String(error)).slice(0, MAX_ERROR_LENGTH);
        if (attempts >= options.maxAttempts) {
          await tx
            .update(notificationOutbox)
            .set({ status: 'failed', attempts, lastError: message, processedAt: now })
            .where(eq(notificationOutbox.id, entry.id));
          result.failed++;
          log.warn(`Entry ${entry.id} for ${entry.recipientAlias} failed permanently after ${attempts} attempt(s): ${message}`);
        } else {
          const delay = backoffDelayMs(attempts, options.backoffBaseMs, options.backoffMaxMs);
          await tx
            .update(notificationOutbox)
            .set({ attempts, lastError: message, nextAttemptAt: new Date(now.getTime() + delay) })
            .where(eq(notificationOutbox.id, entry.id));
          result.retried++;
          log.debug(`Entry ${entry.id} attempt ${attempts} failed, retrying in ${delay}ms: ${message}`);
        }
      }
    }
  });

  // Announced only once the batch has committed
  if (sent.length > 0 && options.identity.announceMail) {
    try {
      await options.identity.announceMail(sent);
    } catch (error) {
      log.warn(`Failed to announce ${sent.length} delivered message(s): ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  if (result.delivered + result.retried + result.failed > 0) {
    log.info(`Drained outbox: ${result.delivered} delivered, ${result.retried} retrying, ${result.failed} failed`);
  }
  return result;
}

// ============================================================================
// Inspection and cleanup
// ============================================================================

export interface OutboxView {
  id: string;
  event_type: string;
  status: OutboxStatus;
  recipient_workspace_id: string;
  recipient_alias: string;
  payload: Record<string, unknown>;
  attempts: number;
  last_error: string | null;
  next_attempt_at: string;
  message_id: string | null;
  created_at: string;
  processed_at: string | null;
}

function toView(row: OutboxRow): OutboxView {
  return {
    id: row.id,
    event_type: row.eventType,
    status: row.status,
    recipient_workspace_id: row.recipientWorkspaceId,
    recipient_alias: row.recipientAlias,
    payload: row.payload,
    attempts: row.attempts,
    last_error: row.lastError,
    next_attempt_at: row.nextAttemptAt.toISOString(),
    message_id: row.messageId,
    created_at: row.createdAt.toISOString(),
    processed_at: row.processedAt ? row.processedAt.toISOString() : null,
  };
}

export async function listOutbox(
  db: Database,
  projectId: string,
  options: { status?: OutboxStatus; limit: number; cursor: Record<string, unknown> | null }
): Promise<Page<OutboxView>> {
  const conditions: SQL[] = [eq(notificationOutbox.projectId, projectId)];
  if (options.status) conditions.push(eq(notificationOutbox.status, options.status));

  const offset = cursorOffset(options.cursor);

  const rows = await db
    .select()
    .from(notificationOutbox)
    .where(and(...conditions))
    .orderBy(desc(notificationOutbox.createdAt), desc(notificationOutbox.id))
    .limit(options.limit + 1)
    .offset(offset);

  return toPage(rows.map(toView), options.limit, () => ({ offset: offset + options.limit }));
}

/** Remove delivered entries processed more than `olderThanDays` ago. */
export async function cleanupDeliveredNotifications(db: Database, olderThanDays = 7, now = new Date()): Promise<number> {
  const cutoff = new Date(now.getTime() - olderThanDays * 24 * 60 * 60 * 1000);
  const deleted = await db
    .delete(notificationOutbox)
    .where(and(eq(notificationOutbox.status, 'delivered'), lt(notificationOutbox.processedAt, cutoff)))
    .returning({ id: notificationOutbox.id });
  if (deleted.length === 0) return 0;
  log.info(`Removed ${deleted.length} delivered notification(s) older than ${olderThanDays} day(s)`);
  return deleted.length;
}
