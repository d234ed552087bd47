export type FileStatus = "added" | "modified" | "deleted" | "renamed";

export interface FileChange {
  readonly path: string;
  readonly status: FileStatus;
  readonly diffText: string;
  /** Source path of a rename. */
  readonly previousPath?: string;
}

export interface ChangeSet {
  readonly files: readonly FileChange[];
}

export type VcsKind = "git" | "jj";

export interface VcsBackend {
  readonly kind: VcsKind;
  readonly root: string;

  /**
   * The change set a commit message is drafted for. With `paths`, only those
   * files; each must belong to the unrestricted set.
   */
  pendingChanges(paths?: ReadonlySet<string>): Promise<ChangeSet>;

  /** Writes the commit and resolves with its id. */
  commit(message: string, amend: boolean): Promise<string>;

  /** Existing message of the commit being rewritten, if any. */
  currentDescription(): Promise<string | undefined>;
}

export interface BackendOptions {
  amend: boolean;
  /** jj only: revision to describe instead of the working copy. */
  revision?: string;
}
