import { describe, it, expect } from 'vitest';
import {
  assertKnownPaths,
  buildChangeSet,
  changedPaths,
  createChangeSet,
  parseNameStatus,
  quoteGitPath,
  renderDiff,
  splitDiff,
  withoutIgnored,
} from '../../src/vcs/diff.js';
import { InvalidPathError } from '../../src/errors.js';
import { fileDiff } from '../helpers/fake-git.js';

describe('parseNameStatus', () => {
  it('should map status letters and keep both sides of a rename', () => {
    const entries = parseNameStatus('M\0src/a.ts\0A\0src/b.ts\0R087\0src/old.ts\0src/new.ts\0D\0docs/x.md\0');

    expect(entries).toEqual([
      { path: 'src/a.ts', status: 'modified' },
      { path: 'src/b.ts', status: 'added' },
      { path: 'src/new.ts', status: 'renamed', previousPath: 'src/old.ts' },
      { path: 'docs/x.md', status: 'deleted' },
    ]);
  });

  it('should treat a copy as an added file without a previous path', () => {
    expect(parseNameStatus('C100\0src/a.ts\0src/a-copy.ts\0')).toEqual([
      { path: 'src/a-copy.ts', status: 'added', previousPath: undefined },
    ]);
  });

  it('should return nothing for empty output', () => {
    expect(parseNameStatus('')).toEqual([]);
  });
});

describe('splitDiff', () => {
  it('should key each chunk by its destination path', () => {
    const a = fileDiff('src/a.ts', 'one');
    const b = fileDiff('src/b.ts', 'two');

    const chunks = splitDiff(a + b, [
      { path: 'src/a.ts', status: 'modified' },
      { path: 'src/b.ts', status: 'modified' },
    ]);

    expect(chunks.get('src/a.ts')).toBe(a);
    expect(chunks.get('src/b.ts')).toBe(b);
  });

  it('should not confuse a path with a longer path that ends the same way', () => {
    const long = fileDiff('lib/src/a.ts', 'long');
    const short = fileDiff('src/a.ts', 'short');

    const chunks = splitDiff(long + short, [{ path: 'src/a.ts', status: 'modified' }]);

    expect(chunks.get('src/a.ts')).toBe(short);
  });

  it('should match a header that git quoted', () => {
    const quoted = [
      'diff --git "a/docs/caf\\303\\251.md" "b/docs/caf\\303\\251.md"',
      'new file mode 100644',
      '--- /dev/null',
      '+++ "b/docs/caf\\303\\251.md"',
      '@@ -0,0 +1 @@',
      '+bonjour',
      '',
    ].join('\n');

    const chunks = splitDiff(quoted, [{ path: 'docs/café.md', status: 'added' }]);

    expect(chunks.get('docs/café.md')).toBe(quoted);
  });
});

describe('quoteGitPath', () => {
  it('should leave plain paths alone', () => {
    expect(quoteGitPath('src/a.ts')).toBe('src/a.ts');
  });

  it('should write non-ASCII bytes in octal inside quotes', () => {
    expect(quoteGitPath('docs/café.md')).toBe('"docs/caf\\303\\251.md"');
  });

  it('should escape quotes, backslashes and tabs', () => {
    expect(quoteGitPath('a"b\\c\td')).toBe('"a\\"b\\\\c\\td"');
  });
});

describe('buildChangeSet', () => {
  it('should attach diff text per file and leave unmatched files empty', () => {
    const a = fileDiff('src/a.ts', 'one');
    const changes = buildChangeSet(a, [
      { path: 'src/a.ts', status: 'modified' },
      { path: 'bin/tool', status: 'modified' },
    ]);

    expect(changes.files.map((f) => f.diffText)).toEqual([a, '']);
    expect(changedPaths(changes)).toEqual(['src/a.ts', 'bin/tool']);
  });

  it('should render back to the original patch when every file matched', () => {
    const full = fileDiff('src/a.ts', 'one') + fileDiff('src/b.ts', 'two', 'three');
    const changes = buildChangeSet(full, parseNameStatus('M\0src/a.ts\0A\0src/b.ts\0'));

    expect(renderDiff(changes)).toBe(full);
  });

  it('should produce a frozen change set', () => {
    const changes = createChangeSet([{ path: 'src/a.ts', status: 'modified', diffText: '' }]);

    expect(Object.isFrozen(changes)).toBe(true);
    expect(Object.isFrozen(changes.files)).toBe(true);
    expect(Object.isFrozen(changes.files[0])).toBe(true);
  });
});

describe('assertKnownPaths', () => {
  it('should reject a path outside the pending changes', () => {
    const entries = [{ path: 'src/a.ts', status: 'modified' as const }];

    expect(() => assertKnownPaths(new Set(['src/a.ts']), entries)).not.toThrow();
    expect(() => assertKnownPaths(new Set(['src/zzz.ts']), entries)).toThrow(InvalidPathError);
  });
});

describe('withoutIgnored', () => {
  const changes = createChangeSet([
    { path: 'src/a.ts', status: 'modified', diffText: 'a' },
    { path: 'yarn.lock', status: 'modified', diffText: 'lock' },
    { path: 'dist/index.js', status: 'added', diffText: 'dist' },
  ]);

  it('should drop files matching any pattern', () => {
    const kept = withoutIgnored(changes, ['*.lock', 'dist/**']);

    expect(changedPaths(kept)).toEqual(['src/a.ts']);
  });

  it('should keep everything when every file would be dropped', () => {
    expect(withoutIgnored(changes, ['**'])).toBe(changes);
  });

  it('should return the same change set without patterns', () => {
    expect(withoutIgnored(changes, [])).toBe(changes);
  });
});
