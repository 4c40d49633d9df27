/**
 * Default policy bundle
 *
 * Loaded from markdown files with YAML frontmatter:
 *
 *   src/defaults/
 *     invariants/*.md   id, title  -> { id, title, body_md }
 *     roles/*.md        id, title  -> roles[id] = { title, playbook_md }
 *
 * The directory is resolved from the working directory, or from
 * BDH_DEFAULTS_DIR when set.
 */

import * as fs from 'fs';
import * as path from 'path';
import matter from 'gray-matter';
import type { PolicyBundle, PolicyInvariant, PolicyRole } from './db/schema.js';
import { createLogger } from './logger.js';

const log = createLogger('defaults');

let cached: PolicyBundle | null = null;

export function defaultsDir(): string {
  return process.env.BDH_DEFAULTS_DIR || path.join(process.cwd(), 'src', 'defaults');
}

function readFrontmatterFile(filePath: string): { id: string; title: string; body: string } {
  const parsed = matter(fs.readFileSync(filePath, 'utf-8'));
  const { id, title } = parsed.data;
  if (typeof id !== 'string' || !id) {
    throw new Error(`Policy file '${filePath}' is missing a string 'id' field`);
  }
  if (typeof title !== 'string' || !title) {
    throw new Error(`Policy file '${filePath}' is missing a string 'title' field`);
  }
  return { id, title, body: parsed.content.trim() };
}

function markdownFiles(dir: string): string[] {
  return fs.readdirSync(dir)
    .filter(name => name.endsWith('.md') && !name.startsWith('.'))
    .sort()
    .map(name => path.join(dir, name));
}

export function loadDefaultBundle(dir: string = defaultsDir()): PolicyBundle {
  const invariantsDir = path.join(dir, 'invariants');
  const rolesDir = path.join(dir, 'roles');
  if (!fs.existsSync(invariantsDir)) {
    throw new Error(`Defaults directory '${dir}' is missing required 'invariants' subdirectory`);
  }
  if (!fs.existsSync(rolesDir)) {
    throw new Error(`Defaults directory '${dir}' is missing required 'roles' subdirectory`);
  }

  const invariants: PolicyInvariant[] = [];
  for (const file of markdownFiles(invariantsDir)) {
    const { id, title, body } = readFrontmatterFile(file);
    if (invariants.some(inv => inv.id === id)) {
      throw new Error(`Duplicate invariant ID '${id}' found in '${file}'`);
    }
    invariants.push({ id, title, body_md: body });
  }

  const roles: Record<string, PolicyRole> = {};
  for (const file of markdownFiles(rolesDir)) {
    const { id, title, body } = readFrontmatterFile(file);
    if (id in roles) throw new Error(`Duplicate role ID '${id}' found in '${file}'`);
    roles[id] = { title, playbook_md: body };
  }

  log.info(`Loaded default policy bundle: ${invariants.length} invariants, ${Object.keys(roles).length} roles`);
  return { invariants, roles, adapters: {}, claims: { allow_coordinated: false } };
}

/** Cached copy of the default bundle; callers get their own clone. */
export function getDefaultBundle(forceReload = false): PolicyBundle {
  if (forceReload || !cached) cached = loadDefaultBundle();
  return structuredClone(cached);
}
