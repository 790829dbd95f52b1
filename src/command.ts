import { exec } from "@actions/exec";
import { errorMessage } from "./errors.js";
import { log } from "./logger.js";

/**
 * Outcome of an external process
 */
export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  success: boolean;
}

export interface CommandOptions {
  cwd?: string;
  env?: Record<string, string>;

  /**
   * If true, the command's output is captured but not echoed to the terminal
   */
  silent?: boolean;
}

/**
 * Runs an external command and resolves with its result
 */
export type CommandRunner = (
  command: string,
  args: readonly string[],
  options?: CommandOptions,
) => Promise<CommandResult>;

/**
 * Execute an external command
 *
 * Non-zero exit codes do not reject; they are reported through the
 * `success` flag of the result, so callers decide whether a failure is fatal
 * or should be retried. A command that cannot be spawned at all (for example,
 * because the executable is missing) yields exit code 127 with the spawn
 * error as its standard error output.
 *
 * @param command Executable to run; may be a path containing spaces
 * @param args    Arguments, passed through unchanged
 * @param options Working directory, environment and output handling
 */
export const runCommand: CommandRunner = async (
  command,
  args,
  { cwd, env, silent = false } = {},
) => {
  let stdout = "";
  let stderr = "";

  log.debug(`Running ${formatCommand(command, args)}`);

  try {
    const exitCode = await exec(quoteCommand(command), [...args], {
      cwd,
      env,
      silent,
      ignoreReturnCode: true,
      listeners: {
        stdout: (data) => (stdout += data.toString()),
        stderr: (data) => (stderr += data.toString()),
      },
    });

    return { exitCode, stdout, stderr, success: exitCode === 0 };
  } catch (cause) {
    return {
      exitCode: 127,
      stdout,
      stderr: errorMessage(cause),
      success: false,
    };
  }
};

export function formatCommand(command: string, args: readonly string[]) {
  return [command, ...args].join(" ");
}

/**
 * Quote an executable path for `exec`, which splits its command line on
 * spaces. Only double quotes need escaping inside the quoted form.
 */
export function quoteCommand(command: string) {
  if (!/[ "]/.test(command)) {
    return command;
  }

  return `"${command.replaceAll('"', '\\"')}"`;
}
