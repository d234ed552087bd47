import type { DiffBudgeter } from "./budget.js";
import type { MessageClient, StreamFragment } from "./engines/llm-client.js";
import type { RequestSpec } from "./engines/models.js";
import { formatCandidate, type CommitMessageCandidate } from "./engines/prompt.js";
import {
  CommitFailedError,
  DiffTooLargeError,
  ExitCode,
  ModelRequestError,
  NoPendingChangesError,
  NoStagedChangesError,
  RepositoryStateError,
  RequestCancelledError,
  exitCodeFor,
} from "./errors.js";
import { renderDiff, withoutIgnored } from "./vcs/diff.js";
import type { ChangeSet, VcsBackend } from "./vcs/types.js";

export type AbortReason = "nothing-to-commit" | "cancelled" | "diff-too-large" | "error";

export type ReviewState =
  | { name: "init" }
  | { name: "budgeting"; changes: ChangeSet }
  | { name: "generating" }
  | { name: "presenting" }
  | { name: "editing"; candidate: CommitMessageCandidate }
  | { name: "revising"; candidate: CommitMessageCandidate; instruction: string }
  | { name: "committing"; message: string }
  | { name: "aborted"; reason: AbortReason; error?: unknown }
  | { name: "done"; message: string; commitId?: string };

export type ReviewStateName = ReviewState["name"];

export interface ReviewSession {
  changes?: ChangeSet;
  diff: string;
  candidates: CommitMessageCandidate[];
  instruction?: string;
}

export type ReviewAction =
  | { type: "select"; index: number }
  | { type: "edit"; index: number }
  | { type: "revise"; index: number; instruction: string }
  | { type: "cancel" };

export type CommitFailureChoice = "retry" | "back" | "abort";

/** Everything the loop needs from the person at the terminal. */
export interface ReviewPrompter {
  choose(candidates: readonly CommitMessageCandidate[]): Promise<ReviewAction>;
  /** Resolves with the replacement text, or undefined to go back. */
  edit(message: string): Promise<string | undefined>;
  retryGeneration(error: ModelRequestError): Promise<boolean>;
  commitFailed(error: CommitFailedError, message: string): Promise<CommitFailureChoice>;
  report(error: unknown): void;
  onStateChange?(state: ReviewState, session: Readonly<ReviewSession>): void;
  onFragment?(fragment: StreamFragment): void;
}

export interface ReviewLoopOptions {
  backend: VcsBackend;
  budgeter: DiffBudgeter;
  client: MessageClient;
  prompter: ReviewPrompter;
  spec: RequestSpec;
  amend?: boolean;
  autoCommit?: boolean;
  dryRun?: boolean;
  ignoredFiles?: string[];
  signal?: AbortSignal;
}

export type ReviewOutcome =
  | { status: "committed"; commitId: string; message: string }
  | { status: "dry-run"; message: string }
  | { status: "aborted"; reason: AbortReason; error?: unknown };

/**
 * Drives one review session: fetch changes, fit them to the budget, generate
 * candidates, then let the user commit, edit, revise or cancel. Each state
 * has one transition function; `run` advances until aborted or done.
 */
export class ReviewLoop {
  readonly session: ReviewSession = { diff: "", candidates: [] };
  private readonly options: ReviewLoopOptions;

  constructor(options: ReviewLoopOptions) {
    this.options = options;
  }

  async run(): Promise<ReviewOutcome> {
    let state: ReviewState = { name: "init" };

    while (state.name !== "aborted" && state.name !== "done") {
      this.options.prompter.onStateChange?.(state, this.session);
      state = this.options.signal?.aborted ? { name: "aborted", reason: "cancelled" } : await this.step(state);
    }

    this.options.prompter.onStateChange?.(state, this.session);
    return toOutcome(state, this.options.dryRun ?? false);
  }

  private step(state: ReviewState): Promise<ReviewState> {
    switch (state.name) {
      case "init":
        return this.init();
      case "budgeting":
        return this.budget(state.changes);
      case "generating":
        return this.generate();
      case "presenting":
        return this.present();
      case "editing":
        return this.edit(state.candidate);
      case "revising":
        return this.revise(state.candidate, state.instruction);
      case "committing":
        return this.commit(state.message);
      case "aborted":
      case "done":
        return Promise.resolve(state);
    }
  }

  private async init(): Promise<ReviewState> {
    try {
      const changes = await this.options.backend.pendingChanges();
      return { name: "budgeting", changes: withoutIgnored(changes, this.options.ignoredFiles ?? []) };
    } catch (error) {
      if (error instanceof NoStagedChangesError || error instanceof NoPendingChangesError) {
        return { name: "aborted", reason: "nothing-to-commit", error };
      }
      if (error instanceof RepositoryStateError) {
        this.options.prompter.report(error);
        return { name: "aborted", reason: "error", error };
      }
      throw error;
    }
  }

  private async budget(changes: ChangeSet): Promise<ReviewState> {
    try {
      const { changes: fitted } = await this.options.budgeter.fit(changes);
      this.session.changes = fitted;
      this.session.diff = renderDiff(fitted);
      return { name: "generating" };
    } catch (error) {
      if (!(error instanceof DiffTooLargeError || error instanceof RepositoryStateError)) throw error;

      this.options.prompter.report(error);
      return { name: "aborted", reason: error instanceof DiffTooLargeError ? "diff-too-large" : "error", error };
    }
  }

  private async generate(): Promise<ReviewState> {
    try {
      this.session.candidates = await this.options.client.generate(
        this.session.diff,
        this.options.spec,
        this.callOptions()
      );
      this.session.instruction = undefined;
      return { name: "presenting" };
    } catch (error) {
      if (error instanceof RequestCancelledError) {
        return { name: "aborted", reason: "cancelled", error };
      }
      if (!(error instanceof ModelRequestError)) throw error;

      this.options.prompter.report(error);
      if (!this.options.autoCommit && (await this.options.prompter.retryGeneration(error))) {
        return { name: "generating" };
      }
      return { name: "aborted", reason: "error", error };
    }
  }

  private async present(): Promise<ReviewState> {
    const { candidates } = this.session;

    if (this.options.autoCommit) {
      return { name: "committing", message: formatCandidate(candidates[0]) };
    }

    const action = await this.options.prompter.choose(candidates);
    if (action.type === "cancel") {
      return { name: "aborted", reason: "cancelled" };
    }

    const candidate = candidates[action.index];
    if (!candidate) return { name: "presenting" };

    switch (action.type) {
      case "select":
        return { name: "committing", message: formatCandidate(candidate) };
      case "edit":
        return { name: "editing", candidate };
      case "revise":
        return { name: "revising", candidate, instruction: action.instruction };
    }
  }

  private async edit(candidate: CommitMessageCandidate): Promise<ReviewState> {
    const edited = await this.options.prompter.edit(formatCandidate(candidate));
    if (edited === undefined || edited.trim().length === 0) {
      return { name: "presenting" };
    }
    return { name: "committing", message: edited.trim() };
  }

  private async revise(candidate: CommitMessageCandidate, instruction: string): Promise<ReviewState> {
    this.session.instruction = instruction;
    try {
      this.session.candidates = await this.options.client.revise(
        this.session.diff,
        candidate,
        instruction,
        this.options.spec,
        this.callOptions()
      );
    } catch (error) {
      if (error instanceof RequestCancelledError) {
        return { name: "aborted", reason: "cancelled", error };
      }
      if (!(error instanceof ModelRequestError)) throw error;
      // The previous candidates stay on screen; the user can try again.
      this.options.prompter.report(error);
    }
    return { name: "presenting" };
  }

  private async commit(message: string): Promise<ReviewState> {
    if (this.options.dryRun) {
      return { name: "done", message };
    }

    try {
      const commitId = await this.options.backend.commit(message, this.options.amend ?? false);
      return { name: "done", message, commitId };
    } catch (error) {
      if (!(error instanceof CommitFailedError)) throw error;

      this.options.prompter.report(error);
      const choice = this.options.autoCommit ? "abort" : await this.options.prompter.commitFailed(error, message);
      switch (choice) {
        case "retry":
          return { name: "committing", message };
        case "back":
          return { name: "presenting" };
        case "abort":
          return { name: "aborted", reason: "error", error };
      }
    }
  }

  private callOptions() {
    const { signal, prompter, spec } = this.options;
    return {
      signal,
      onFragment: spec.streaming && prompter.onFragment ? prompter.onFragment.bind(prompter) : undefined,
    };
  }
}

function toOutcome(state: ReviewState, dryRun: boolean): ReviewOutcome {
  switch (state.name) {
    case "done":
      if (dryRun || state.commitId === undefined) {
        return { status: "dry-run", message: state.message };
      }
      return { status: "committed", commitId: state.commitId, message: state.message };
    case "aborted":
      return { status: "aborted", reason: state.reason, error: state.error };
    default:
      throw new Error(`Review ended in non-terminal state ${state.name}`);
  }
}

export function exitCodeForOutcome(outcome: ReviewOutcome): ExitCode {
  if (outcome.status !== "aborted") return ExitCode.Ok;

  switch (outcome.reason) {
    case "nothing-to-commit":
      return ExitCode.NothingToCommit;
    case "cancelled":
      return ExitCode.Ok;
    case "diff-too-large":
      return ExitCode.DiffTooLarge;
    case "error":
      return exitCodeFor(outcome.error);
  }
}
