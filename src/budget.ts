import { DiffTooLargeError } from "./errors.js";
import { renderDiff } from "./vcs/diff.js";
import type { ChangeSet, FileChange, VcsBackend } from "./vcs/types.js";

export interface Budget {
  /** Model context size. */
  limit: number;
  /** Taken up by the system prompt and extra instructions. */
  reserved: number;
}

export type Measure = (text: string) => number;

// Rough English/code average for GPT tokenizers.
const CHARS_PER_TOKEN = 4;

export const estimateTokens: Measure = (text) => Math.ceil(text.length / CHARS_PER_TOKEN);

export interface SelectionContext {
  size: number;
  available: number;
  /** True when the diff fits and selection was requested anyway. */
  voluntary: boolean;
}

export interface FileSelector {
  /** Resolves with the chosen paths, or undefined when the user aborts. */
  selectFiles(files: readonly FileChange[], context: SelectionContext): Promise<string[] | undefined>;
}

export interface BudgetResult {
  changes: ChangeSet;
  size: number;
  iterations: number;
}

export interface DiffBudgeterOptions {
  measure?: Measure;
  /** Ask for a file selection even when the diff fits. */
  alwaysSelect?: boolean;
}

export class DiffBudgeter {
  private readonly measure: Measure;
  private readonly alwaysSelect: boolean;

  constructor(
    private readonly backend: VcsBackend,
    private readonly selector: FileSelector,
    private readonly budget: Budget,
    options: DiffBudgeterOptions = {}
  ) {
    this.measure = options.measure ?? estimateTokens;
    this.alwaysSelect = options.alwaysSelect ?? false;
  }

  get available(): number {
    return Math.max(0, this.budget.limit - this.budget.reserved);
  }

  sizeOf(changes: ChangeSet): number {
    return this.measure(renderDiff(changes));
  }

  async fit(changes: ChangeSet): Promise<BudgetResult> {
    let current = changes;
    let size = this.sizeOf(current);
    let iterations = 0;

    if (size <= this.available && !this.alwaysSelect) {
      return { changes: current, size, iterations };
    }

    // Each pass either returns, throws, or strictly shrinks the universe,
    // so this runs at most once per file.
    for (;;) {
      const universe = current.files.map((file) => file.path);
      const voluntary = size <= this.available;
      const picked = await this.selector.selectFiles(current.files, {
        size,
        available: this.available,
        voluntary,
      });
      iterations += 1;

      if (picked === undefined) {
        throw new DiffTooLargeError(size, this.available, "file selection was aborted");
      }
      const selection = new Set(picked.filter((path) => universe.includes(path)));
      if (selection.size === 0) {
        throw new DiffTooLargeError(size, this.available, "no files were selected");
      }

      current = await this.backend.pendingChanges(selection);
      size = this.sizeOf(current);

      if (size <= this.available) {
        return { changes: current, size, iterations };
      }
      if (selection.size >= universe.length) {
        throw new DiffTooLargeError(size, this.available, "the selection must leave out at least one file");
      }
    }
  }
}
