#!/usr/bin/env node
import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { dirname, join } from "path";
import { Command } from "commander";
import * as p from "@clack/prompts";
import pc from "picocolors";
import updateNotifier from "update-notifier";
import { z } from "zod";
import { DiffBudgeter, estimateTokens } from "./budget.js";
import { loadConfig, type CliOptions, type Config } from "./config.js";
import { DebugLogger } from "./debug-log.js";
import { MessageClient } from "./engines/llm-client.js";
import { validateRequestSpec, type RequestSpec } from "./engines/models.js";
import { reservedText, type ChatMessage } from "./engines/prompt.js";
import { ExitCode, exitCodeFor } from "./errors.js";
import { runInit } from "./init.js";
import { ReviewLoop, exitCodeForOutcome, type ReviewOutcome } from "./review.js";
import { ClackPrompter } from "./ui.js";
import { detectBackend } from "./vcs/detect.js";
import type { VcsKind } from "./vcs/types.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const pkgPath = join(__dirname, "..", "package.json");
const pkg = z
  .object({ name: z.string(), version: z.string() })
  .passthrough()
  .parse(JSON.parse(readFileSync(pkgPath, "utf-8")));

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function echoRequest(config: Config) {
  return (messages: readonly ChatMessage[]) => {
    if (config.debug) {
      p.log.info(pc.dim(`Sending ${messages.length} message(s) to ${config.model}`));
    }
    if (config.debugContext) {
      messages.forEach((message, i) => p.note(message.content, `${i + 1}. ${message.role}`));
    }
  };
}

function printOutcome(outcome: ReviewOutcome, kind: VcsKind): void {
  switch (outcome.status) {
    case "committed":
      p.note(outcome.message, "Commit message");
      p.outro(pc.green(`✔ Committed ${pc.bold(outcome.commitId.slice(0, 12))}`));
      return;
    case "dry-run":
      p.note(outcome.message, "Commit message (dry run)");
      p.outro(pc.yellow("Dry run: nothing was committed"));
      return;
    case "aborted":
      break;
  }

  switch (outcome.reason) {
    case "nothing-to-commit":
      p.note(
        kind === "git"
          ? "Stage your changes first:\n\n  " + pc.cyan("git add <files>")
          : errorMessage(outcome.error),
        "Nothing to commit"
      );
      p.outro(pc.yellow("Exiting..."));
      return;
    case "cancelled":
      p.outro(pc.yellow("Cancelled"));
      return;
    case "diff-too-large":
    case "error":
      p.outro(pc.red("Nothing was committed"));
      return;
  }
}

async function draft(words: string[], options: CliOptions): Promise<ExitCode> {
  const config = await loadConfig(options);

  if (!config.disableUpdateCheck) {
    updateNotifier({ pkg }).notify();
  }

  const spec: RequestSpec = {
    model: config.model,
    reasoningEffort: config.reasoningEffort,
    verbosity: config.verbosity,
    choiceCount: config.choices,
    streaming: config.stream,
  };
  const capabilities = validateRequestSpec(spec);

  const backend = detectBackend(process.cwd(), { amend: config.amend, revision: config.revision });
  const currentDescription = config.rewrite ? await backend.currentDescription() : undefined;
  const extraInstruction = words.join(" ").trim() || undefined;

  const debug = new DebugLogger(config.debugFile);
  debug.info(`backend=${backend.kind}, root=${backend.root}`);

  const client = new MessageClient({
    apiKey: config.apiKey,
    endpoint: config.apiEndpoint,
    systemPrompt: config.systemPrompt,
    currentDescription,
    extraInstruction,
    timeoutMs: config.timeoutMs,
    debug,
    onRequest: echoRequest(config),
  });

  const prompter = new ClackPrompter({
    streaming: config.stream,
    choiceCount: config.choices,
    amend: config.amend,
  });

  const budgeter = new DiffBudgeter(
    backend,
    prompter,
    {
      limit: capabilities.contextSize,
      reserved: estimateTokens(reservedText({ systemPrompt: config.systemPrompt, currentDescription, extraInstruction })),
    },
    { alwaysSelect: config.selectFiles }
  );

  // The first Ctrl+C cancels the request in flight; a second one kills the process.
  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());

  const outcome = await new ReviewLoop({
    backend,
    budgeter,
    client,
    prompter,
    spec,
    amend: config.amend,
    autoCommit: config.autoCommit,
    dryRun: config.dryRun,
    ignoredFiles: config.ignoredFiles,
    signal: controller.signal,
  }).run();

  printOutcome(outcome, backend.kind);
  return exitCodeForOutcome(outcome);
}

const program = new Command();

program
  .name("draftcommit")
  .usage("[options] [instruction...]")
  .description("Draft conventional commit messages from your pending changes")
  .version(pkg.version)
  .argument("[instruction...]", "Extra explanation or instruction for the model")
  // Do not set defaults here; loadConfig provides defaults and merges with .draftcommitrc/env
  .option("-n, --choices <count>", "Number of messages to generate")
  .option("-m, --model <name>", "Model: gpt-5.1|gpt-5.1-codex|gpt-5.1-codex-mini")
  .option("-e, --reasoning-effort <level>", "Reasoning effort: none|low|medium|high")
  .option("-v, --verbosity <level>", "Verbosity: low|medium|high")
  .option("-p, --print-once", "Wait for complete messages instead of streaming")
  .option("-a, --auto-commit", "Commit the first message without asking")
  .option("--amend", "Rewrite the message of the last commit")
  .option("--dry-run", "Show the message without committing")
  .option("-r, --revision <rev>", "Jujutsu revision to describe")
  .option("--rewrite", "Show the current description to the model as a hint")
  .option("--select-files", "Choose which files go into the diff")
  .option("--api-endpoint <url>", "Chat completions endpoint")
  .option("--api-key <key>", "API key (defaults to $OPENAI_API_KEY)")
  .option("--system-prompt-file <path>", "Replace the system prompt with the contents of a file")
  .option("-c, --config <path>", "Use this file instead of ~/.draftcommitrc")
  .option("-d, --debug", "Print request details")
  .option("--debug-file <path>", "Write a request trace to a file (- for stdout)")
  .option("--debug-context", "Print every message sent to the model")
  .option("--disable-update-check", "Do not check npm for a newer version")
  .addHelpText(
    "after",
    `
    Examples:
      $ draftcommit                                # Draft 3 messages for the staged changes
      $ draftcommit -n 1 -a                        # Commit the first draft right away
      $ draftcommit --amend --rewrite              # Redo the message of the last commit
      $ draftcommit -r @- fixes the login race     # Describe a jj revision, with a hint
      $ draftcommit -m gpt-5.1-codex -n 1 -e high  # Use a different model
  `
  )
  .action(async (words: string[], options: CliOptions) => {
    p.intro(pc.bgCyan(pc.black(" draftcommit ")));

    try {
      process.exit(await draft(words, options));
    } catch (err) {
      p.log.error(pc.red(`Error: ${errorMessage(err)}`));
      p.outro(pc.red("Nothing was committed"));
      process.exit(exitCodeFor(err));
    }
  });

program
  .command("init")
  .description("Create a .draftcommitrc in the current directory")
  .action(() => runInit());

await program.parseAsync(process.argv);
