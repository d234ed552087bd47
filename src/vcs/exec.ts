import { execa } from "execa";

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Runs an executable and resolves with its output, whatever the exit code.
 * Backends take one of these so tests can substitute an in-process fake.
 */
export type CommandRunner = (
  file: string,
  args: string[],
  options: { cwd: string }
) => Promise<CommandResult>;

export const runCommand: CommandRunner = async (file, args, { cwd }) => {
  const result = await execa(file, args, {
    cwd,
    reject: false,
    stripFinalNewline: false,
  });

  return {
    stdout: result.stdout,
    // A binary that could not be spawned has no exit code and no stderr.
    stderr: result.exitCode === undefined && !result.stderr ? `${file} could not be run` : result.stderr,
    exitCode: result.exitCode ?? 1,
  };
};
