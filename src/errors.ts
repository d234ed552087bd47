export type ErrorKind =
  | "REPOSITORY_STATE"
  | "BUDGET"
  | "MODEL_REQUEST"
  | "COMMIT"
  | "CONFIG";

export enum ExitCode {
  Ok = 0,
  Failure = 1,
  NothingToCommit = 2,
  DiffTooLarge = 3,
  Authentication = 4,
}

export abstract class DraftCommitError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Repository state: structural, never retried.

export class RepositoryStateError extends DraftCommitError {
  readonly kind = "REPOSITORY_STATE";
}

export class NotARepositoryError extends RepositoryStateError {
  constructor(readonly path: string) {
    super(`Not a git or jj repository: ${path}`);
  }
}

export class NoStagedChangesError extends RepositoryStateError {
  constructor() {
    super("No staged changes. Stage the files you want to commit with `git add`.");
  }
}

export class NoPendingChangesError extends RepositoryStateError {
  constructor(readonly revision: string) {
    super(`No changes in jj revision ${revision}.`);
  }
}

export class StagedChangesPresentError extends RepositoryStateError {
  constructor(readonly files: string[]) {
    super(
      `--amend only rewrites the message of the last commit, but ${files.length} file(s) are staged: ${files.join(", ")}`
    );
  }
}

export class UnsupportedVcsVersionError extends RepositoryStateError {
  constructor(
    readonly tool: string,
    readonly flag: string,
    readonly stderr: string
  ) {
    super(`Your ${tool} version does not accept ${flag}: ${stderr.trim()}`);
  }
}

export class InvalidPathError extends RepositoryStateError {
  constructor(readonly path: string) {
    super(`${path} is not part of the pending changes`);
  }
}

export class InvalidRevisionError extends RepositoryStateError {
  constructor(
    readonly revision: string,
    reason: string
  ) {
    super(`Cannot describe jj revision ${revision}: ${reason}`);
  }
}

export class VcsCommandError extends RepositoryStateError {
  constructor(
    readonly command: string,
    readonly stderr: string,
    readonly exitCode: number
  ) {
    super(`\`${command}\` exited with ${exitCode}: ${stderr.trim()}`);
  }
}

// Budget

export class BudgetError extends DraftCommitError {
  readonly kind = "BUDGET";
}

export class DiffTooLargeError extends BudgetError {
  constructor(
    readonly size: number,
    readonly limit: number,
    reason: string
  ) {
    super(`Diff is ~${size} tokens, the limit is ${limit}: ${reason}`);
  }
}

// Model requests

export class ModelRequestError extends DraftCommitError {
  readonly kind = "MODEL_REQUEST";

  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class AuthenticationError extends ModelRequestError {
  constructor(detail: string) {
    super(`HTTP 401: Unauthorized - check your API key (${detail})`, 401);
  }
}

export class InvalidRequestError extends ModelRequestError {
  constructor(
    detail: string,
    readonly param?: string
  ) {
    super(`HTTP 400: ${detail}${param ? ` (parameter: ${param})` : ""}`, 400);
  }
}

export class RateLimitedError extends ModelRequestError {
  constructor(detail: string) {
    super(`HTTP 429: rate limited after retrying - ${detail}`, 429);
  }
}

export class UnsupportedParameterError extends ModelRequestError {
  constructor(
    readonly param: string,
    detail: string
  ) {
    super(`Unsupported ${param}: ${detail}`);
  }
}

export class IncompleteStreamError extends ModelRequestError {
  constructor(detail: string, options?: { cause?: unknown }) {
    super(`Response stream ended before completion: ${detail}`, undefined, options);
  }
}

export class NetworkError extends ModelRequestError {
  constructor(endpoint: string, options?: { cause?: unknown }) {
    const cause = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(`Network error calling ${endpoint}${cause}`, undefined, options);
  }
}

export class RequestCancelledError extends ModelRequestError {
  constructor() {
    super("Request cancelled");
  }
}

export class MalformedResponseError extends ModelRequestError {
  constructor(detail: string) {
    super(`Unexpected response format: ${detail}`);
  }
}

// Commit

export class CommitError extends DraftCommitError {
  readonly kind = "COMMIT";
}

export class CommitFailedError extends CommitError {
  constructor(readonly stderr: string) {
    super(`Commit failed: ${stderr.trim()}`);
  }
}

// Config

export interface ConfigIssue {
  field: string;
  message: string;
}

export class ConfigError extends DraftCommitError {
  readonly kind = "CONFIG";

  constructor(
    readonly issues: ConfigIssue[],
    readonly source?: string
  ) {
    super(
      [
        "Configuration validation errors:",
        ...issues.map((issue) => `  ${issue.field}: ${issue.message}`),
        ...(source ? [`Configuration file: ${source}`] : []),
      ].join("\n")
    );
  }
}

export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof NoStagedChangesError || error instanceof NoPendingChangesError) {
    return ExitCode.NothingToCommit;
  }
  if (error instanceof DiffTooLargeError) return ExitCode.DiffTooLarge;
  if (error instanceof AuthenticationError) return ExitCode.Authentication;
  if (error instanceof RequestCancelledError) return ExitCode.Ok;
  return ExitCode.Failure;
}
