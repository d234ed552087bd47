import {
  CommitFailedError,
  InvalidRevisionError,
  NoPendingChangesError,
  UnsupportedVcsVersionError,
  VcsCommandError,
} from "../errors.js";
import { runCommand, type CommandRunner } from "./exec.js";
import { assertKnownPaths, buildChangeSet, type FileEntry } from "./diff.js";
import type { BackendOptions, ChangeSet, FileStatus, VcsBackend } from "./types.js";

const SUMMARY_STATUS: Record<string, FileStatus> = {
  A: "added",
  C: "added",
  M: "modified",
  D: "deleted",
  R: "renamed",
};

// A change id, commit id or bookmark, optionally with `@` and `-` suffixes;
// revset operators and functions are not accepted.
const REVISION_PATTERN = /^[\p{L}\p{N}@._:-]+$/u;

/**
 * Jujutsu has no index: the pending change is the working-copy commit (or
 * the revision given with --revision) against its parent.
 */
export class JujutsuBackend implements VcsBackend {
  readonly kind = "jj";

  private resolved = false;

  constructor(
    readonly root: string,
    private readonly options: BackendOptions,
    private readonly run: CommandRunner = runCommand
  ) {
    if (options.revision !== undefined && !REVISION_PATTERN.test(options.revision)) {
      throw new InvalidRevisionError(
        options.revision,
        "only letters, digits, '@', '-', '_', '.' and ':' are allowed"
      );
    }
  }

  get revision(): string {
    return this.options.revision ?? (this.options.amend ? "@-" : "@");
  }

  async pendingChanges(paths?: ReadonlySet<string>): Promise<ChangeSet> {
    await this.assertSingleRevision();
    const summary = parseSummary(await this.jj(["diff", "--summary", "-r", this.revision]));
    if (summary.length === 0) {
      throw new NoPendingChangesError(this.revision);
    }

    let files = summary;
    if (paths) {
      assertKnownPaths(paths, summary);
      files = summary.filter((entry) => paths.has(entry.path));
    }

    // Filesets differ across jj versions, so the full diff is narrowed here.
    const diff = await this.jj(["diff", "--git", "-r", this.revision]);
    return buildChangeSet(diff, files);
  }

  async commit(message: string, amend: boolean): Promise<string> {
    const describeOnly = amend || this.options.revision !== undefined;
    const args = describeOnly
      ? ["describe", this.revision, "-m", message]
      : ["commit", "-m", message];

    const result = await this.run("jj", args, { cwd: this.root });
    if (result.exitCode !== 0) {
      this.rejectUnsupportedFlag(result.stderr);
      throw new CommitFailedError(result.stderr || result.stdout);
    }

    // `jj commit` moves the working copy to a new empty child.
    const target = describeOnly ? this.revision : "@-";
    return (await this.jj(["log", "-r", target, "--no-graph", "-T", "commit_id"])).trim();
  }

  async currentDescription(): Promise<string | undefined> {
    const description = (
      await this.jj(["log", "-r", this.revision, "--no-graph", "-T", "description"])
    ).trim();
    return description || undefined;
  }

  // `jj describe` rewrites every commit a revset matches, and `@-` of a merge
  // has several.
  private async assertSingleRevision(): Promise<void> {
    if (this.resolved || this.revision === "@") return;

    const ids = (await this.jj(["log", "-r", this.revision, "--no-graph", "-T", 'commit_id ++ "\\n"']))
      .split("\n")
      .filter((line) => line.trim().length > 0);
    if (ids.length !== 1) {
      throw new InvalidRevisionError(this.revision, `it resolves to ${ids.length} commits, not one`);
    }
    this.resolved = true;
  }

  private async jj(args: string[]): Promise<string> {
    const result = await this.run("jj", args, { cwd: this.root });
    if (result.exitCode !== 0) {
      this.rejectUnsupportedFlag(result.stderr);
      throw new VcsCommandError(`jj ${args.join(" ")}`, result.stderr, result.exitCode);
    }
    return result.stdout;
  }

  private rejectUnsupportedFlag(stderr: string): void {
    const match = stderr.match(/(?:unexpected|unrecognized|unknown) (?:argument|option|flag) '([^']+)'/i);
    if (match) {
      throw new UnsupportedVcsVersionError("jj", match[1], stderr);
    }
  }
}

/**
 * Parses `jj diff --summary`. Renames are printed with the changed part in
 * braces: `R src/{old.ts => new.ts}`.
 */
export function parseSummary(output: string): FileEntry[] {
  return output
    .split("\n")
    .filter((line) => line.trim().length > 0)
    .map((line) => {
      const code = line[0];
      const rest = line.slice(2).trim();
      const status = SUMMARY_STATUS[code] ?? "modified";

      if (status === "renamed" || code === "C") {
        const [from, to] = expandRename(rest);
        return { path: to, status, previousPath: status === "renamed" ? from : undefined };
      }
      return { path: rest, status };
    });
}

function expandRename(spec: string): [string, string] {
  const braced = spec.match(/^(.*)\{(.*) => (.*)\}(.*)$/);
  if (braced) {
    const [, prefix, from, to, suffix] = braced;
    const join = (middle: string) => `${prefix}${middle}${suffix}`.replace(/\/\//g, "/");
    return [join(from), join(to)];
  }
  const [from, to] = spec.split(" => ");
  return [from, to ?? from];
}
