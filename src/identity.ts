/**
 * Identity partition accessor
 *
 * Credentials and mail live in the `aweb` schema, which belongs to the
 * identity library. Coordination code reaches it only through this
 * interface, and writes only through calls that take the caller's
 * transaction so they commit or roll back with the business change.
 */

import crypto from 'crypto';
import { and, eq, gt, isNull, or } from 'drizzle-orm';
import type { Database } from './db/index.js';
import { apiKeys, messages } from './db/schema.js';

export const API_KEY_PREFIX = 'bdh_sk_';

export interface VerifiedKey {
  projectId: string;
  agentId: string;
}

export interface IssuedKey {
  apiKey: string;
  keyPrefix: string;
  createdAt: Date;
}

export interface MailMessage {
  projectId: string;
  fromAlias: string;
  fromAgentId?: string | null;
  toAgentId: string;
  subject: string;
  body: string;
  threadId?: string;
  priority?: 'low' | 'normal' | 'high' | 'urgent';
}

export interface DeliveredMail {
  message: MailMessage;
  messageId: string;
}

/** Receives the identity library's mutation callbacks, such as `message.sent`. */
export type MutationHook = (eventType: string, context: Record<string, unknown>) => Promise<void>;

export interface IdentityAccessor {
  verifyApiKey(db: Database, apiKey: string): Promise<VerifiedKey | null>;
  issueApiKey(tx: Database, owner: VerifiedKey): Promise<IssuedKey>;
  deliverMail(tx: Database, message: MailMessage): Promise<{ messageId: string }>;
  /** Report mail whose delivering transaction has committed. */
  announceMail?(delivered: DeliveredMail[]): Promise<void>;
}

export function hashApiKey(apiKey: string): string {
  return crypto.createHash('sha256').update(apiKey).digest('hex');
}

function generateApiKey(): string {
  return API_KEY_PREFIX + crypto.randomBytes(24).toString('hex');
}

export class PostgresIdentityAccessor implements IdentityAccessor {
  private readonly onMutation: MutationHook | null;

  constructor(options: { onMutation?: MutationHook } = {}) {
    this.onMutation = options.onMutation ?? null;
  }

  async verifyApiKey(db: Database, apiKey: string): Promise<VerifiedKey | null> {
    if (!apiKey.startsWith(API_KEY_PREFIX)) return null;

    const now = new Date();
    const [row] = await db
      .select({ projectId: apiKeys.projectId, agentId: apiKeys.agentId })
      .from(apiKeys)
      .where(and(
        eq(apiKeys.keyHash, hashApiKey(apiKey)),
        isNull(apiKeys.revokedAt),
        or(isNull(apiKeys.expiresAt), gt(apiKeys.expiresAt, now))
      ))
      .limit(1);

    return row ?? null;
  }

  async issueApiKey(tx: Database, owner: VerifiedKey): Promise<IssuedKey> {
    const apiKey = generateApiKey();
    const keyPrefix = apiKey.slice(0, API_KEY_PREFIX.length + 8);
    const [row] = await tx
      .insert(apiKeys)
      .values({
        projectId: owner.projectId,
        agentId: owner.agentId,
        keyHash: hashApiKey(apiKey),
        keyPrefix,
      })
      .returning({ createdAt: apiKeys.createdAt });

    return { apiKey, keyPrefix, createdAt: row.createdAt };
  }

  async deliverMail(tx: Database, message: MailMessage): Promise<{ messageId: string }> {
    const [row] = await tx
      .insert(messages)
      .values({
        projectId: message.projectId,
        fromAgentId: message.fromAgentId ?? null,
        fromAlias: message.fromAlias,
        toAgentId: message.toAgentId,
        subject: message.subject,
        body: message.body,
        priority: message.priority ?? 'normal',
        threadId: message.threadId ?? null,
      })
      .returning({ messageId: messages.messageId });

    return { messageId: row.messageId };
  }

  async announceMail(delivered: DeliveredMail[]): Promise<void> {
    if (!this.onMutation) return;
    for (const { message, messageId } of delivered) {
      await this.onMutation('message.sent', {
        project_id: message.projectId,
        message_id: messageId,
        from_agent_id: message.fromAgentId ?? null,
        from_alias: message.fromAlias,
        to_agent_id: message.toAgentId,
        subject: message.subject,
      });
    }
  }
}
