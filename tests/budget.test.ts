import { describe, it, expect, vi } from 'vitest';
import { DiffBudgeter, estimateTokens, type FileSelector } from '../src/budget.js';
import { changedPaths, createChangeSet } from '../src/vcs/diff.js';
import type { ChangeSet, VcsBackend } from '../src/vcs/types.js';
import { DiffTooLargeError } from '../src/errors.js';

/** Files whose diff text is `size` characters long. */
class SizedBackend implements VcsBackend {
  readonly kind = 'git';
  readonly root = '/work/repo';
  readonly queries: (string[] | undefined)[] = [];

  constructor(private readonly sizes: Record<string, number>) {}

  async pendingChanges(paths?: ReadonlySet<string>): Promise<ChangeSet> {
    this.queries.push(paths ? [...paths] : undefined);
    return createChangeSet(
      Object.entries(this.sizes)
        .filter(([path]) => !paths || paths.has(path))
        .map(([path, size]) => ({ path, status: 'modified' as const, diffText: 'x'.repeat(size) }))
    );
  }

  async commit(): Promise<string> {
    return 'unused';
  }

  async currentDescription(): Promise<string | undefined> {
    return undefined;
  }
}

const byLength = (text: string) => text.length;

function selector(...answers: (string[] | undefined)[]) {
  const selectFiles = vi.fn<FileSelector['selectFiles']>();
  for (const answer of answers) selectFiles.mockResolvedValueOnce(answer);
  return { selectFiles };
}

const FIVE_FILES = { 'a.ts': 20_000, 'b.ts': 15_000, 'c.ts': 9_000, 'd.ts': 3_000, 'e.ts': 3_000 };

describe('estimateTokens', () => {
  it('should count four characters per token, rounding up', () => {
    expect(estimateTokens('')).toBe(0);
    expect(estimateTokens('abcd')).toBe(1);
    expect(estimateTokens('abcde')).toBe(2);
  });
});

describe('DiffBudgeter', () => {
  it('should pass a diff that fits without asking anyone', async () => {
    const backend = new SizedBackend({ 'a.ts': 100 });
    const files = selector();
    const budgeter = new DiffBudgeter(backend, files, { limit: 8_000, reserved: 0 }, { measure: byLength });

    const changes = await backend.pendingChanges();
    backend.queries.length = 0;
    const result = await budgeter.fit(changes);

    expect(result).toEqual({ changes, size: 100, iterations: 0 });
    expect(files.selectFiles).not.toHaveBeenCalled();
    expect(backend.queries).toEqual([]);
  });

  it('should narrow an oversized diff to the selected files in one round', async () => {
    const backend = new SizedBackend(FIVE_FILES);
    const files = selector(['d.ts', 'e.ts']);
    const budgeter = new DiffBudgeter(backend, files, { limit: 8_000, reserved: 0 }, { measure: byLength });

    const result = await budgeter.fit(await backend.pendingChanges());

    expect(changedPaths(result.changes)).toEqual(['d.ts', 'e.ts']);
    expect(result.size).toBe(6_000);
    expect(result.iterations).toBe(1);
    expect(files.selectFiles).toHaveBeenCalledWith(expect.any(Array), {
      size: 50_000,
      available: 8_000,
      voluntary: false,
    });
    expect(backend.queries[1]).toEqual(['d.ts', 'e.ts']);
  });

  it('should keep asking while the selection is still too large', async () => {
    const backend = new SizedBackend(FIVE_FILES);
    const files = selector(['a.ts', 'c.ts', 'd.ts'], ['d.ts']);
    const budgeter = new DiffBudgeter(backend, files, { limit: 8_000, reserved: 0 }, { measure: byLength });

    const result = await budgeter.fit(await backend.pendingChanges());

    expect(changedPaths(result.changes)).toEqual(['d.ts']);
    expect(result.iterations).toBe(2);
    expect(files.selectFiles.mock.calls[1][1]).toEqual({ size: 32_000, available: 8_000, voluntary: false });
  });

  it('should count the reserved prompt against the limit', async () => {
    const backend = new SizedBackend({ 'a.ts': 5_000 });
    const budgeter = new DiffBudgeter(backend, selector(undefined), { limit: 8_000, reserved: 4_000 }, { measure: byLength });

    expect(budgeter.available).toBe(4_000);
    await expect(budgeter.fit(await backend.pendingChanges())).rejects.toThrow(
      'Diff is ~5000 tokens, the limit is 4000: file selection was aborted'
    );
  });

  it('should never report a negative budget', () => {
    const budgeter = new DiffBudgeter(new SizedBackend({}), selector(), { limit: 100, reserved: 500 });

    expect(budgeter.available).toBe(0);
  });

  it('should fail when no file is selected', async () => {
    const backend = new SizedBackend(FIVE_FILES);
    const budgeter = new DiffBudgeter(backend, selector([]), { limit: 8_000, reserved: 0 }, { measure: byLength });

    await expect(budgeter.fit(await backend.pendingChanges())).rejects.toThrow(
      new DiffTooLargeError(50_000, 8_000, 'no files were selected')
    );
  });

  it('should ignore selected paths that are not part of the diff', async () => {
    const backend = new SizedBackend(FIVE_FILES);
    const budgeter = new DiffBudgeter(backend, selector(['z.ts']), { limit: 8_000, reserved: 0 }, { measure: byLength });

    await expect(budgeter.fit(await backend.pendingChanges())).rejects.toThrow(
      new DiffTooLargeError(50_000, 8_000, 'no files were selected')
    );
  });

  it('should fail when a selection leaves nothing out and is still too large', async () => {
    const backend = new SizedBackend(FIVE_FILES);
    const budgeter = new DiffBudgeter(
      backend,
      selector(Object.keys(FIVE_FILES)),
      { limit: 8_000, reserved: 0 },
      { measure: byLength }
    );

    const error = await budgeter.fit(await backend.pendingChanges()).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DiffTooLargeError);
    expect(error).toMatchObject({ size: 50_000, limit: 8_000 });
  });

  it('should offer the file list when selection is always requested', async () => {
    const backend = new SizedBackend({ 'a.ts': 100, 'b.ts': 50 });
    const files = selector(['b.ts']);
    const budgeter = new DiffBudgeter(
      backend,
      files,
      { limit: 8_000, reserved: 0 },
      { measure: byLength, alwaysSelect: true }
    );

    const result = await budgeter.fit(await backend.pendingChanges());

    expect(changedPaths(result.changes)).toEqual(['b.ts']);
    expect(files.selectFiles).toHaveBeenCalledWith(expect.any(Array), { size: 150, available: 8_000, voluntary: true });
  });
});
