export type Role = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: Role;
  content: string;
}

export interface CommitMessageCandidate {
  index: number;
  subject: string;
  body: string;
  raw: string;
}

export const DEFAULT_SYSTEM_PROMPT = `You write commit messages in the Conventional Commits format (https://www.conventionalcommits.org) from the diff you are given.

Input:
- A diff of the changes being committed.
- Optionally a line starting with "Current description:" holding the author's own summary. Keep its intent unless the diff contradicts it.
- Optionally further user messages asking for edits. Apply them exactly.

Output:
- Only the commit message. No Markdown, no code fences, no quotes, no preamble.
- First line: <type>[optional scope][!]: <description>
  - types: feat, fix, docs, style, refactor, perf, test, build, ci, chore, revert
  - description in the imperative mood, lowercase start, no trailing period, at most 72 characters
- Optionally a blank line followed by one short paragraph explaining why the change was made, not what lines changed.
- Mark breaking changes with "!" before the colon or a "BREAKING CHANGE:" footer.

Verbosity:
- low: subject line only unless the reason is not obvious
- medium: add a body when it explains the motivation
- high: almost always add a body`;

export interface PromptContext {
  systemPrompt: string;
  diff: string;
  /** Existing message of the commit being rewritten. */
  currentDescription?: string;
  /** Free-text instruction given on the command line. */
  extraInstruction?: string;
}

export function buildMessages(context: PromptContext): ChatMessage[] {
  const messages: ChatMessage[] = [{ role: 'system', content: context.systemPrompt }];

  if (context.currentDescription) {
    messages.push({ role: 'user', content: `Current description: ${context.currentDescription}` });
  }
  messages.push({ role: 'user', content: context.diff });
  if (context.extraInstruction) {
    messages.push({
      role: 'user',
      content: `User explanation/instruction: '${context.extraInstruction}'`,
    });
  }

  return messages;
}

export function buildRevisionMessages(
  context: PromptContext,
  prior: CommitMessageCandidate,
  instruction: string
): ChatMessage[] {
  return [
    ...buildMessages(context),
    { role: 'assistant', content: prior.raw },
    { role: 'user', content: instruction },
  ];
}

/** Text counted against the budget besides the diff itself. */
export function reservedText(context: Omit<PromptContext, 'diff'>): string {
  return [context.systemPrompt, context.currentDescription ?? '', context.extraInstruction ?? ''].join('\n');
}

/**
 * Turns one completion into a candidate. Returns undefined when no subject
 * line survives cleanup.
 */
export function parseCandidate(text: string, index: number): CommitMessageCandidate | undefined {
  // Models sometimes wrap the whole message in a fence despite instructions
  const unfenced = text
    .trim()
    .replace(/^```[a-z]*\n?/i, '')
    .replace(/\n?```$/, '')
    .trim();

  const lines = unfenced.split('\n');
  const first = lines.findIndex((line) => line.trim().length > 0);
  if (first === -1) return undefined;

  const subject = lines[first]
    .trim()
    .replace(/^["'`]|["'`]$/g, '')
    .replace(/\.+$/, '')
    .trim();
  if (!subject) return undefined;

  const body = lines
    .slice(first + 1)
    .join('\n')
    .trim();

  return { index, subject, body, raw: unfenced };
}

export function formatCandidate(candidate: Pick<CommitMessageCandidate, 'subject' | 'body'>): string {
  return candidate.body ? `${candidate.subject}\n\n${candidate.body}` : candidate.subject;
}
