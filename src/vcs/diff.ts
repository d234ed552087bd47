import { minimatch } from "minimatch";
import { InvalidPathError } from "../errors.js";
import type { ChangeSet, FileChange, FileStatus } from "./types.js";

export interface FileEntry {
  path: string;
  status: FileStatus;
  previousPath?: string;
}

export function createChangeSet(files: FileChange[]): ChangeSet {
  return Object.freeze({
    files: Object.freeze(files.map((file) => Object.freeze({ ...file }))),
  });
}

/** The serialized diff that is measured against the budget and sent to the model. */
export function renderDiff(changes: ChangeSet): string {
  return changes.files.map((file) => file.diffText).join("");
}

export function changedPaths(changes: ChangeSet): string[] {
  return changes.files.map((file) => file.path);
}

const GIT_STATUS: Record<string, FileStatus> = {
  A: "added",
  C: "added",
  M: "modified",
  T: "modified",
  D: "deleted",
  R: "renamed",
};

/**
 * Parses `git diff --name-status -z` output: NUL-separated fields, paths
 * unquoted. Renames and copies carry a similarity score and two paths:
 * `R100\0old\0new\0`.
 */
export function parseNameStatus(output: string): FileEntry[] {
  const fields = output.split("\0");
  const entries: FileEntry[] = [];

  let i = 0;
  while (i + 1 < fields.length) {
    const code = fields[i];
    const status = GIT_STATUS[code[0]] ?? "modified";
    if (code[0] === "R" || code[0] === "C") {
      entries.push({
        path: fields[i + 2],
        status,
        previousPath: status === "renamed" ? fields[i + 1] : undefined,
      });
      i += 3;
    } else {
      entries.push({ path: fields[i + 1], status });
      i += 2;
    }
  }
  return entries;
}

const QUOTE_ESCAPES: Record<number, string> = {
  7: "\\a",
  8: "\\b",
  9: "\\t",
  10: "\\n",
  11: "\\v",
  12: "\\f",
  13: "\\r",
  34: '\\"',
  92: "\\\\",
};

/**
 * `path` as git prints it in patch headers under `core.quotePath`: wrapped in
 * quotes with C escapes, bytes outside printable ASCII in octal.
 */
export function quoteGitPath(path: string): string {
  let quoted = "";
  let needsQuotes = false;
  for (const byte of Buffer.from(path, "utf-8")) {
    const escape = QUOTE_ESCAPES[byte];
    if (escape !== undefined) {
      quoted += escape;
      needsQuotes = true;
    } else if (byte < 0x20 || byte >= 0x7f) {
      quoted += "\\" + byte.toString(8).padStart(3, "0");
      needsQuotes = true;
    } else {
      quoted += String.fromCharCode(byte);
    }
  }
  return needsQuotes ? `"${quoted}"` : path;
}

/**
 * Splits a multi-file git-format patch into one chunk per file, keyed by the
 * destination path from the `diff --git a/<old> b/<new>` header.
 */
export function splitDiff(fullDiff: string, entries: FileEntry[]): Map<string, string> {
  const chunks = new Map<string, string>();

  // split consumes the separator, so it is re-added below
  for (const chunk of fullDiff.split(/^diff --git /m)) {
    if (!chunk.trim()) continue;

    const firstLine = chunk.split("\n")[0];
    const entry = entries.find(
      (e) => firstLine.endsWith(` b/${e.path}`) || firstLine.endsWith(` ${quoteGitPath(`b/${e.path}`)}`)
    );
    if (!entry) continue;

    chunks.set(entry.path, (chunks.get(entry.path) ?? "") + `diff --git ${chunk}`);
  }

  return chunks;
}

export function buildChangeSet(fullDiff: string, entries: FileEntry[]): ChangeSet {
  const chunks = splitDiff(fullDiff, entries);
  return createChangeSet(
    entries.map((entry) => ({
      ...entry,
      diffText: chunks.get(entry.path) ?? "",
    }))
  );
}

export function assertKnownPaths(paths: ReadonlySet<string>, entries: FileEntry[]): void {
  const known = new Set(entries.map((e) => e.path));
  for (const path of paths) {
    if (!known.has(path)) throw new InvalidPathError(path);
  }
}

/**
 * Drops files matching any ignore pattern. When every file matches, the
 * change set is returned as is so there is still something to describe.
 */
export function withoutIgnored(changes: ChangeSet, patterns: string[]): ChangeSet {
  if (patterns.length === 0) return changes;

  const kept = changes.files.filter(
    (file) => !patterns.some((pattern) => minimatch(file.path, pattern, { dot: true }))
  );
  if (kept.length === 0 || kept.length === changes.files.length) return changes;

  return createChangeSet([...kept]);
}
