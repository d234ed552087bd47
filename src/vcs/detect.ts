import { existsSync } from "fs";
import { dirname, join, resolve } from "path";
import { NotARepositoryError } from "../errors.js";
import type { CommandRunner } from "./exec.js";
import { GitBackend } from "./git.js";
import { JujutsuBackend } from "./jj.js";
import type { BackendOptions, VcsBackend, VcsKind } from "./types.js";

export interface DetectedRepository {
  kind: VcsKind;
  root: string;
}

/**
 * Walks up from `path` to the nearest directory holding `.jj` or `.git`.
 * A colocated workspace has both; jj owns the commits there, so it wins.
 */
export function detectRepository(path: string): DetectedRepository {
  let dir = resolve(path);

  for (;;) {
    if (existsSync(join(dir, ".jj"))) return { kind: "jj", root: dir };
    if (existsSync(join(dir, ".git"))) return { kind: "git", root: dir };

    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }

  throw new NotARepositoryError(resolve(path));
}

export function detectBackend(
  path: string,
  options: BackendOptions,
  run?: CommandRunner
): VcsBackend {
  const { kind, root } = detectRepository(path);
  switch (kind) {
    case "jj":
      return new JujutsuBackend(root, options, run);
    case "git":
      return new GitBackend(root, options, run);
  }
}
