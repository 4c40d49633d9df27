import { describe, expect, it } from 'vitest';
import { suggestAlias } from '../src/bootstrap.js';
import { parseBlockedBy, parseDependencyRef, validateRecords } from '../src/beads-sync.js';
import { BadRequestError } from '../src/errors.js';
import { checkRecords, JsonlParseError, parseJsonl } from '../src/jsonl.js';
import { clampLimit, cursorOffset, decodeCursor, encodeCursor, toPage } from '../src/pagination.js';
import {
  canonicalizeGitUrl,
  CLASSIC_NAMES,
  isValidBeadId,
  isValidRole,
  normalizeRole,
  repoNameFromOrigin,
  repoOriginSchema,
  roleToAliasPrefix,
} from '../src/validation.js';

describe('canonicalizeGitUrl', () => {
  it('normalizes scp, https and ssh origins to host/path', () => {
    expect(canonicalizeGitUrl('git@github.com:acme/widgets.git')).toBe('github.com/acme/widgets');
    expect(canonicalizeGitUrl('https://github.com/acme/widgets.git')).toBe('github.com/acme/widgets');
    expect(canonicalizeGitUrl('https://github.com/acme/widgets/')).toBe('github.com/acme/widgets');
    expect(canonicalizeGitUrl('ssh://git@github.com:22/acme/widgets.git')).toBe('github.com/acme/widgets');
  });

  it('rejects origins without a host or path', () => {
    expect(() => canonicalizeGitUrl('')).toThrow('Empty origin URL');
    expect(() => canonicalizeGitUrl('not a url')).toThrow('Invalid git URL: not a url');
    expect(() => canonicalizeGitUrl('https://github.com/')).toThrow('Invalid git URL (no path): https://github.com/');
  });

  it('is applied by the repo origin schema', () => {
    expect(repoOriginSchema.parse('git@gitlab.com:team/app.git')).toBe('gitlab.com/team/app');
    expect(repoOriginSchema.safeParse('nope').success).toBe(false);
  });

  it('names a repo after its last path segment', () => {
    expect(repoNameFromOrigin('github.com/acme/widgets')).toBe('widgets');
  });
});

describe('roles', () => {
  it('normalizes whitespace and case', () => {
    expect(normalizeRole('  Code   Reviewer ')).toBe('code reviewer');
    expect(roleToAliasPrefix('Code Reviewer')).toBe('code-reviewer');
  });

  it('accepts one or two words only', () => {
    expect(isValidRole('developer')).toBe(true);
    expect(isValidRole('code reviewer')).toBe(true);
    expect(isValidRole('senior code reviewer')).toBe(false);
    expect(isValidRole('')).toBe(false);
    expect(isValidRole('dev!')).toBe(false);
  });
});

describe('suggestAlias', () => {
  it('takes the first classic name not used as a prefix', () => {
    expect(suggestAlias([], 'reviewer')).toBe('alice-reviewer');
    expect(suggestAlias(['alice-agent', 'bob'], 'agent')).toBe('charlie-agent');
  });

  it('does not treat a longer name as a prefix match', () => {
    expect(suggestAlias(['alicex-agent'], 'agent')).toBe('alice-agent');
  });

  it('falls back to numbered names once every classic name is taken', () => {
    const taken = CLASSIC_NAMES.map(name => `${name}-agent`);
    const alias = suggestAlias(taken, 'reviewer');
    expect(alias).toBe('alice-01-reviewer');
    expect(alias).toMatch(/^[a-z]+(-\d\d)?-reviewer$/);
  });
});

describe('bead ids and dependency refs', () => {
  const scope = { repo: 'github.com/acme/widgets', branch: 'main' };

  it('validates bead ids', () => {
    expect(isValidBeadId('bd-1')).toBe(true);
    expect(isValidBeadId('bd_1.2')).toBe(true);
    expect(isValidBeadId('-bd')).toBe(false);
    expect(isValidBeadId('bd 1')).toBe(false);
  });

  it('parses same-repo and cross-repo refs', () => {
    expect(parseDependencyRef('bd-1', scope)).toEqual({ repo: 'github.com/acme/widgets', branch: 'main', bead_id: 'bd-1' });
    expect(parseDependencyRef('github.com/acme/other:bd-2', scope)).toEqual({
      repo: 'github.com/acme/other',
      branch: 'main',
      bead_id: 'bd-2',
    });
    expect(parseDependencyRef('bad id!', scope)).toBeNull();
    expect(parseDependencyRef('', scope)).toBeNull();
  });

  it('accepts string and structured blocked_by entries, dropping invalid ones', () => {
    const refs = parseBlockedBy(
      ['bd-1', { bead_id: 'bd-2', branch: 'dev' }, { bead_id: 'no good' }, 42],
      scope
    );
    expect(refs).toEqual([
      { repo: 'github.com/acme/widgets', branch: 'main', bead_id: 'bd-1' },
      { repo: 'github.com/acme/widgets', branch: 'dev', bead_id: 'bd-2' },
    ]);
    expect(parseBlockedBy('bd-1', scope)).toEqual([]);
  });

  it('keys records by id and counts the invalid ones', () => {
    const { valid, skipped } = validateRecords([
      { id: 'bd-1', title: 'first' },
      { id: 'bad id' },
      { title: 'no id' },
      { id: 'bd-1', title: 'second' },
    ]);
    expect(skipped).toBe(2);
    expect([...valid.keys()]).toEqual(['bd-1']);
    expect(valid.get('bd-1')).toEqual({ id: 'bd-1', title: 'second' });
  });
});

describe('parseJsonl', () => {
  it('skips blank lines', () => {
    expect(parseJsonl('{"id":"bd-1"}\n\n  \r\n{"id":"bd-2"}\n')).toEqual([{ id: 'bd-1' }, { id: 'bd-2' }]);
  });

  it('rejects non-object lines with the line number', () => {
    expect(() => parseJsonl('{"id":"bd-1"}\n[1,2]')).toThrow('JSON on line 2 must be an object');
  });

  it('rejects malformed JSON', () => {
    expect(() => parseJsonl('{"id":')).toThrow(JsonlParseError);
    expect(() => parseJsonl('{"id":')).toThrow(/^Invalid JSON on line 1: /);
  });

  it('enforces the nesting depth limit', () => {
    let nested: unknown = 'leaf';
    for (let i = 0; i < 10; i++) nested = { inner: nested };
    expect(() => parseJsonl(JSON.stringify(nested))).toThrow('JSON nesting depth exceeds limit (10) on line 1');
  });

  it('enforces the record limit', () => {
    expect(() => parseJsonl('{}\n{}\n{}', { maxCount: 2 })).toThrow('Too many issues: exceeds limit of 2');
  });

  it('answers 422 with code invalid_jsonl', () => {
    try {
      parseJsonl('nope');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(JsonlParseError);
      if (error instanceof JsonlParseError) {
        expect(error.status).toBe(422);
        expect(error.code).toBe('invalid_jsonl');
      }
    }
  });

  it('applies the same rules to arrays', () => {
    expect(checkRecords([{ id: 'bd-1' }])).toEqual([{ id: 'bd-1' }]);
    expect(() => checkRecords([{ id: 'bd-1' }, 'x'])).toThrow('Item 1 must be an object');
  });
});

describe('pagination', () => {
  it('round-trips cursors', () => {
    expect(decodeCursor(encodeCursor({ offset: 50 }))).toEqual({ offset: 50 });
    expect(decodeCursor(undefined)).toBeNull();
  });

  it('rejects malformed cursors', () => {
    expect(() => decodeCursor('!!!')).toThrow(BadRequestError);
    expect(() => decodeCursor(Buffer.from('[1]').toString('base64url'))).toThrow('Invalid cursor: must decode to an object');
  });

  it('reads the offset of a cursor', () => {
    expect(cursorOffset(null)).toBe(0);
    expect(cursorOffset({})).toBe(0);
    expect(cursorOffset(decodeCursor(encodeCursor({ offset: 100 })))).toBe(100);
  });

  it('rejects negative, fractional and non-numeric offsets', () => {
    expect(() => cursorOffset({ offset: -5 })).toThrow(BadRequestError);
    expect(() => cursorOffset({ offset: 1.5 })).toThrow('Invalid cursor');
    expect(() => cursorOffset({ offset: '10' })).toThrow('Invalid cursor');
    expect(() => cursorOffset({ offset: 2 ** 60 })).toThrow('Invalid cursor');
  });

  it('clamps limits', () => {
    expect(clampLimit(undefined)).toBe(50);
    expect(clampLimit(0)).toBe(1);
    expect(clampLimit(500)).toBe(200);
    expect(clampLimit(Number.NaN)).toBe(50);
  });

  it('uses the extra row only as a has_more signal', () => {
    const page = toPage([1, 2, 3], 2, last => ({ after: last }));
    expect(page.items).toEqual([1, 2]);
    expect(page.has_more).toBe(true);
    expect(decodeCursor(page.next_cursor)).toEqual({ after: 2 });

    expect(toPage([1], 2, last => ({ after: last }))).toEqual({ items: [1], has_more: false, next_cursor: null });
  });
});
