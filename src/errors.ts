import type { CommandResult } from "./command.js";

/**
 * A bootstrap or configuration step failed.
 */
export class SetupError extends Error {
  override name = "SetupError";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
  }
}

/**
 * An external command failed on every attempt the retry policy allowed.
 */
export class ExhaustedRetriesError extends Error {
  override name = "ExhaustedRetriesError";

  constructor(
    readonly command: string,
    readonly attempts: number,
    readonly result: CommandResult,
  ) {
    super(
      `Command "${command}" failed after ${attempts} attempts ` +
        `(exit code ${result.exitCode})`,
    );
  }
}

export function errorMessage(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}
