/**
 * Identifier validation and normalization
 *
 * Shared by request schemas and the sync pipeline. Patterns reject anything
 * that could be mistaken for a path, a flag or a cache key separator.
 */

import { z } from 'zod';

export const BEAD_ID_PATTERN = /^[a-zA-Z0-9][a-zA-Z0-9_.-]{0,99}$/;
export const BRANCH_PATTERN = /^[a-zA-Z0-9][a-zA-Z0-9/_.-]{0,254}$/;
export const CANONICAL_ORIGIN_PATTERN = /^[a-zA-Z0-9][a-zA-Z0-9._-]*(\/[a-zA-Z0-9][a-zA-Z0-9._-]*)*$/;
export const ALIAS_PATTERN = /^[a-zA-Z0-9][a-zA-Z0-9_-]{0,63}$/;
export const HUMAN_NAME_PATTERN = /^[a-zA-Z][a-zA-Z0-9 '\-]{0,63}$/;
export const PROJECT_SLUG_PATTERN = /^[a-z0-9][a-z0-9-]{0,62}$/;
export const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

const ROLE_MAX_LENGTH = 50;
const ROLE_MAX_WORDS = 2;
const ROLE_WORD_PATTERN = /^[a-zA-Z0-9][a-zA-Z0-9_-]*$/;
export const ROLE_ERROR_MESSAGE =
  'Invalid role: use 1-2 words (letters/numbers) with hyphens/underscores allowed; max 50 chars';

const CONTROL_CHARS = /[\x00-\x1f\x7f]/;

export const isValidBeadId = (value: string) => BEAD_ID_PATTERN.test(value);
export const isValidBranch = (value: string) => BRANCH_PATTERN.test(value);
export const isValidAlias = (value: string) => ALIAS_PATTERN.test(value);
export const isValidHumanName = (value: string) => HUMAN_NAME_PATTERN.test(value);
export const isUuid = (value: string) => UUID_PATTERN.test(value);

export function isValidCanonicalOrigin(value: string): boolean {
  return value.length <= 255 && CANONICAL_ORIGIN_PATTERN.test(value);
}

export function normalizeRole(role: string): string {
  return role.trim().split(/\s+/).filter(Boolean).join(' ').toLowerCase();
}

export function isValidRole(role: string): boolean {
  const normalized = normalizeRole(role);
  if (!normalized || normalized.length > ROLE_MAX_LENGTH) return false;
  const words = normalized.split(' ');
  if (words.length > ROLE_MAX_WORDS) return false;
  return words.every(word => ROLE_WORD_PATTERN.test(word));
}

export function roleToAliasPrefix(role: string): string {
  return normalizeRole(role).replace(/ /g, '-');
}

/**
 * Normalize a git origin to `host/path`.
 *
 *   git@github.com:org/repo.git          -> github.com/org/repo
 *   https://github.com/org/repo.git      -> github.com/org/repo
 *   ssh://git@github.com:22/org/repo.git -> github.com/org/repo
 *
 * Throws on input that has no host or no path.
 */
export function canonicalizeGitUrl(originUrl: string): string {
  const url = originUrl.trim();
  if (!url) throw new Error('Empty origin URL');

  let host: string;
  let path: string;

  const scp = /^git@([^:]+):(.+)$/.exec(url);
  if (scp) {
    host = scp[1];
    path = scp[2];
  } else {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      throw new Error(`Invalid git URL: ${originUrl}`);
    }
    if (!parsed.hostname) throw new Error(`Invalid git URL: ${originUrl}`);
    host = parsed.hostname;
    path = parsed.pathname.replace(/^\/+/, '');
  }

  if (path.endsWith('.git')) path = path.slice(0, -4);
  path = path.replace(/\/+$/, '');
  if (!path) throw new Error(`Invalid git URL (no path): ${originUrl}`);

  return `${host}/${path}`;
}

/** Last path segment of a canonical origin, used as the repo's display name. */
export function repoNameFromOrigin(canonicalOrigin: string): string {
  const slash = canonicalOrigin.lastIndexOf('/');
  return slash === -1 ? canonicalOrigin : canonicalOrigin.slice(slash + 1);
}

// ============================================================================
// Zod building blocks
// ============================================================================

export const beadIdSchema = z.string().regex(BEAD_ID_PATTERN, 'Invalid bead_id');
export const branchSchema = z.string().regex(BRANCH_PATTERN, 'Invalid branch name');
export const aliasSchema = z.string().regex(ALIAS_PATTERN, 'Invalid alias');
export const humanNameSchema = z.string().regex(HUMAN_NAME_PATTERN, 'Invalid human_name');
export const projectSlugSchema = z.string().regex(PROJECT_SLUG_PATTERN, 'Invalid project_slug');
export const uuidSchema = z.string().regex(UUID_PATTERN, 'Invalid id');

export const roleSchema = z
  .string()
  .refine(isValidRole, ROLE_ERROR_MESSAGE)
  .transform(normalizeRole);

export const hostnameSchema = z
  .string()
  .max(255)
  .refine(value => !CONTROL_CHARS.test(value), 'hostname contains control characters');

export const workspacePathSchema = z
  .string()
  .max(1024)
  .refine(value => !CONTROL_CHARS.test(value), 'workspace_path contains control characters');

export const repoOriginSchema = z
  .string()
  .min(1)
  .max(2048)
  .transform((value, ctx) => {
    try {
      const canonical = canonicalizeGitUrl(value);
      if (!isValidCanonicalOrigin(canonical)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid repo origin: ${value}` });
        return z.NEVER;
      }
      return canonical;
    } catch (error) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: error instanceof Error ? error.message : 'Invalid repo origin',
      });
      return z.NEVER;
    }
  });

export const CLASSIC_NAMES = [
  'alice', 'bob', 'charlie', 'dave', 'eve', 'frank', 'grace', 'henry', 'ivy',
  'jack', 'kate', 'leo', 'mia', 'noah', 'olivia', 'peter', 'quinn', 'rose',
  'sam', 'tara', 'uma', 'victor', 'wendy', 'xavier', 'yara', 'zoe',
] as const;
