import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import * as p from "@clack/prompts";
import { execa } from "execa";
import pc from "picocolors";
import type { FileSelector, SelectionContext } from "./budget.js";
import type { StreamFragment } from "./engines/llm-client.js";
import type { CommitMessageCandidate } from "./engines/prompt.js";
import type { CommitFailedError, ModelRequestError } from "./errors.js";
import type {
  CommitFailureChoice,
  ReviewAction,
  ReviewPrompter,
  ReviewSession,
  ReviewState,
} from "./review.js";
import type { FileChange } from "./vcs/types.js";

interface SelectOption {
  value: string;
  label: string;
  hint?: string;
}

const CLEAR_LINES = (count: number) => `\x1b[${count}A\x1b[J`;

/**
 * A select list with single-key shortcuts: 1-9 pick a candidate, q quits.
 * Runs the terminal in raw mode while waiting.
 */
export async function selectWithShortcuts(
  title: string,
  options: SelectOption[],
  shortcuts: Record<string, string>
): Promise<string> {
  return new Promise((resolve) => {
    const stdin = process.stdin;
    const stdout = process.stdout;

    let index = 0;
    const total = options.length;
    let linesWritten = 0;

    function render(): void {
      if (linesWritten > 0) {
        stdout.write(CLEAR_LINES(linesWritten));
      }

      let output = "";
      const addLine = (str: string) => (output += str + "\n");

      addLine(`${pc.cyan("◇")} ${pc.bold(title)}`);
      addLine("");

      options.forEach((opt, i) => {
        const isSelected = i === index;
        const prefix = isSelected ? `${pc.cyan("❯")} ` : "  ";
        const label = isSelected ? pc.cyan(opt.label) : pc.dim(opt.label);
        const hint = opt.hint ? ` ${pc.dim(opt.hint)}` : "";
        addLine(`${prefix}${label}${hint}`);
      });

      addLine("");
      addLine(pc.dim(`  Use ↑/↓, Enter, or shortcuts (${Object.keys(shortcuts).join(", ")})`));

      stdout.write(output);
      linesWritten = output.split("\n").length - 1;
    }

    function cleanup(): void {
      stdin.setRawMode(false);
      stdin.removeListener("data", onKey);
      stdin.pause();
    }

    function choose(value: string): void {
      if (linesWritten > 0) {
        stdout.write(CLEAR_LINES(linesWritten));
      }
      cleanup();
      resolve(value);
    }

    function onKey(buffer: Buffer): void {
      // Arrow keys
      if (buffer[0] === 0x1b && buffer[1] === 0x5b) {
        if (buffer[2] === 0x41) {
          index = (index - 1 + total) % total;
          render();
          return;
        }
        if (buffer[2] === 0x42) {
          index = (index + 1) % total;
          render();
          return;
        }
      }

      // Enter
      if (buffer[0] === 0x0d) {
        choose(options[index].value);
        return;
      }

      // Ctrl+C
      if (buffer[0] === 3) {
        choose("quit");
        return;
      }

      const shortcut = shortcuts[buffer.toString()];
      if (shortcut !== undefined) choose(shortcut);
    }

    stdin.setRawMode(true);
    stdin.resume();
    stdin.on("data", onKey);

    render();
  });
}

/** Number of terminal rows `text` occupies at `width` columns. */
export function countLines(text: string, width: number): number {
  if (!text) return 0;
  return text
    .split("\n")
    .reduce((rows, line) => rows + Math.max(1, Math.ceil([...line].length / Math.max(1, width))), 0);
}

/** Redraws every choice in place as fragments arrive. */
export class StreamRenderer {
  private readonly texts: string[] = [];
  private rows = 0;

  constructor(private readonly out: NodeJS.WriteStream = process.stdout) {}

  push(fragment: StreamFragment): void {
    this.texts[fragment.index] = (this.texts[fragment.index] ?? "") + fragment.text;
    this.draw();
  }

  clear(): void {
    if (this.rows > 0) this.out.write(CLEAR_LINES(this.rows));
    this.rows = 0;
    this.texts.length = 0;
  }

  private draw(): void {
    if (this.rows > 0) this.out.write(CLEAR_LINES(this.rows));

    const output = this.texts
      .map((text, i) => `${pc.dim(`[${i + 1}]${"=".repeat(20)}`)}\n${text ?? ""}\n`)
      .join("");
    this.out.write(output);
    // the trailing newline leaves the cursor on a fresh row
    this.rows = countLines(output, this.out.columns || 80) - 1;
  }
}

function describeCandidate(candidate: CommitMessageCandidate): SelectOption {
  const lines = candidate.body ? candidate.body.split("\n").length : 0;
  return {
    value: String(candidate.index),
    label: `${candidate.index + 1}. ${pc.bold(candidate.subject)}`,
    hint: lines > 0 ? `(+${lines} line body)` : undefined,
  };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Terminal implementation of the review prompts and the file picker. */
export class ClackPrompter implements ReviewPrompter, FileSelector {
  private spinner: ReturnType<typeof p.spinner> | undefined;
  private readonly renderer = new StreamRenderer();

  constructor(private readonly options: { streaming: boolean; choiceCount: number; amend: boolean }) {}

  async selectFiles(files: readonly FileChange[], context: SelectionContext): Promise<string[] | undefined> {
    this.stopSpinner();
    if (context.voluntary) {
      p.log.info("Select the files to include in the diff.");
    } else {
      p.log.warn(
        `The diff is ~${context.size} tokens, but only ${context.available} fit. ` +
          pc.dim("Leave out some files; they will still be committed.")
      );
    }

    const picked = await p.multiselect({
      message: "Files to include in the diff:",
      options: files.map((file) => ({ value: file.path, label: file.path, hint: file.status })),
      initialValues: files.map((file) => file.path),
      required: false,
    });

    if (p.isCancel(picked)) return undefined;
    return picked;
  }

  async choose(candidates: readonly CommitMessageCandidate[]): Promise<ReviewAction> {
    for (;;) {
      const picked = await selectWithShortcuts(
        "Choose a commit message:",
        [
          ...candidates.map(describeCandidate),
          { value: "quit", label: pc.red("✕ Quit without committing"), hint: "(q)" },
        ],
        {
          ...Object.fromEntries(candidates.slice(0, 9).map((c): [string, string] => [String(c.index + 1), String(c.index)])),
          q: "quit",
        }
      );
      if (picked === "quit") return { type: "cancel" };

      const index = Number(picked);
      const candidate = candidates[index];
      p.note(candidate.raw, `Message ${index + 1}`);

      const task = await p.select({
        message: "What to do with the message?",
        options: [
          { value: "commit", label: this.options.amend ? "Amend the last commit with it" : "Commit it" },
          { value: "edit", label: "Edit it & commit" },
          { value: "revise", label: "Revise it", hint: "ask the model for changes" },
          { value: "back", label: "Back to the list" },
        ],
      });

      if (p.isCancel(task) || task === "back") continue;
      if (task === "commit") return { type: "select", index };
      if (task === "edit") return { type: "edit", index };

      const instruction = await p.text({
        message: "How should the message change?",
        placeholder: "mention the migration in the body",
        validate(value) {
          if (value.trim().length === 0) return "Instruction cannot be empty.";
        },
      });
      if (p.isCancel(instruction)) continue;
      return { type: "revise", index, instruction: instruction.trim() };
    }
  }

  async edit(message: string): Promise<string | undefined> {
    const editor = process.env.VISUAL || process.env.EDITOR;
    if (editor) return editInEditor(editor, message);

    const edited = await p.text({
      message: `Edit commit message ${pc.dim("(Enter to commit, Ctrl+C to go back)")}`,
      initialValue: message,
      validate(value) {
        if (value.trim().length === 0) return "Commit message cannot be empty.";
      },
    });
    return p.isCancel(edited) ? undefined : edited;
  }

  async retryGeneration(_error: ModelRequestError): Promise<boolean> {
    const again = await p.confirm({ message: "Try generating again?", initialValue: true });
    return !p.isCancel(again) && again;
  }

  async commitFailed(_error: CommitFailedError, message: string): Promise<CommitFailureChoice> {
    p.note(message, "Your message is kept");
    const choice = await p.select({
      message: "The commit failed. What now?",
      options: [
        { value: "retry", label: "Retry with the same message" },
        { value: "back", label: "Back to the suggestions" },
        { value: "abort", label: "Abort" },
      ],
    });
    switch (choice) {
      case "retry":
        return "retry";
      case "back":
        return "back";
      default:
        return "abort";
    }
  }

  report(error: unknown): void {
    this.stopSpinner();
    this.renderer.clear();
    p.log.error(pc.red(`Error: ${errorMessage(error)}`));
  }

  onFragment(fragment: StreamFragment): void {
    this.stopSpinner();
    this.renderer.push(fragment);
  }

  onStateChange(state: ReviewState, session: Readonly<ReviewSession>): void {
    this.stopSpinner();
    this.renderer.clear();

    switch (state.name) {
      case "init":
        this.startSpinner(this.options.amend ? "Reading the last commit" : "Analyzing pending changes");
        break;
      case "generating":
        p.log.step(`Found changes in ${session.changes?.files.length ?? 0} file(s)`);
        this.progress(`Generating ${this.options.choiceCount} message(s)`);
        break;
      case "revising":
        this.progress("Revising");
        break;
      case "committing":
        this.startSpinner(this.options.amend ? "Amending" : "Committing");
        break;
      default:
        break;
    }
  }

  // Streamed text is drawn in place, which a spinner would overwrite.
  private progress(message: string): void {
    if (this.options.streaming) {
      p.log.step(message);
    } else {
      this.startSpinner(message);
    }
  }

  private startSpinner(message: string): void {
    this.spinner = p.spinner();
    this.spinner.start(message);
  }

  private stopSpinner(): void {
    if (!this.spinner) return;
    this.spinner.stop();
    this.spinner = undefined;
  }
}

/** Opens `editor` on a temporary file holding `message`; `#` lines are dropped. */
export async function editInEditor(editor: string, message: string): Promise<string | undefined> {
  const dir = mkdtempSync(join(tmpdir(), "draftcommit-"));
  const file = join(dir, "COMMIT_EDITMSG");

  try {
    writeFileSync(file, `${message}\n\n# Lines starting with '#' are ignored. Leave the file empty to go back.\n`);
    const result = await execa(`${editor} "${file}"`, { shell: true, stdio: "inherit", reject: false });
    if (result.exitCode !== 0) return undefined;

    const edited = readFileSync(file, "utf-8")
      .split("\n")
      .filter((line) => !line.startsWith("#"))
      .join("\n")
      .trim();
    return edited || undefined;
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
}
