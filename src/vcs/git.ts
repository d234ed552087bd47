import {
  CommitFailedError,
  NoStagedChangesError,
  StagedChangesPresentError,
  VcsCommandError,
} from "../errors.js";
import { runCommand, type CommandRunner } from "./exec.js";
import { assertKnownPaths, buildChangeSet, parseNameStatus, type FileEntry } from "./diff.js";
import type { BackendOptions, ChangeSet, VcsBackend } from "./types.js";

export class GitBackend implements VcsBackend {
  readonly kind = "git";

  constructor(
    readonly root: string,
    private readonly options: BackendOptions,
    private readonly run: CommandRunner = runCommand
  ) {}

  async pendingChanges(paths?: ReadonlySet<string>): Promise<ChangeSet> {
    const staged = parseNameStatus(await this.git(["diff", "--cached", "--name-status", "-z"]));

    if (this.options.amend) {
      // Amending rewrites only the message; new staged work would be folded in.
      if (staged.length > 0) {
        throw new StagedChangesPresentError(staged.map((f) => f.path));
      }
      return this.lastCommitChanges(paths);
    }

    if (staged.length === 0) {
      throw new NoStagedChangesError();
    }

    const files = this.restrict(staged, paths);
    const diff = await this.git([
      "--literal-pathspecs",
      "diff",
      "--cached",
      "--unified=3",
      "--",
      ...pathspec(files),
    ]);
    return buildChangeSet(diff, files);
  }

  async commit(message: string, amend: boolean): Promise<string> {
    const args = amend ? ["commit", "--amend", "-m", message] : ["commit", "-m", message];
    const result = await this.run("git", args, { cwd: this.root });
    if (result.exitCode !== 0) {
      throw new CommitFailedError(result.stderr || result.stdout);
    }
    return (await this.git(["rev-parse", "HEAD"])).trim();
  }

  async currentDescription(): Promise<string | undefined> {
    if (!this.options.amend) return undefined;
    const message = (await this.git(["log", "-1", "--format=%B"])).trim();
    return message || undefined;
  }

  // `git show` also covers a root commit, which has no parent to diff against.
  private async lastCommitChanges(paths?: ReadonlySet<string>): Promise<ChangeSet> {
    const all = parseNameStatus(
      await this.git(["show", "--format=", "--name-status", "-z", "HEAD"])
    );
    if (all.length === 0) {
      throw new NoStagedChangesError();
    }

    const files = this.restrict(all, paths);
    const diff = await this.git([
      "--literal-pathspecs",
      "show",
      "--format=",
      "--unified=3",
      "HEAD",
      "--",
      ...pathspec(files),
    ]);
    return buildChangeSet(diff, files);
  }

  private restrict(entries: FileEntry[], paths?: ReadonlySet<string>): FileEntry[] {
    if (!paths) return entries;
    assertKnownPaths(paths, entries);
    return entries.filter((entry) => paths.has(entry.path));
  }

  private async git(args: string[]): Promise<string> {
    const result = await this.run("git", args, { cwd: this.root });
    if (result.exitCode !== 0) {
      throw new VcsCommandError(`git ${args.join(" ")}`, result.stderr, result.exitCode);
    }
    return result.stdout;
  }
}

// Both sides of a rename, so git still pairs them up. Paths are matched
// literally (--literal-pathspecs), not as globs.
function pathspec(files: FileEntry[]): string[] {
  return files.flatMap((f) => (f.previousPath ? [f.previousPath, f.path] : [f.path]));
}
