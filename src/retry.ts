import type { CommandResult } from "./command.js";
import { ExhaustedRetriesError } from "./errors.js";
import { log } from "./logger.js";
import { sleep } from "./utils.js";

export interface RetryPolicy {
  /**
   * Maximum number of attempts, including the first one
   */
  attempts: number;

  /**
   * Delay before the second attempt in milliseconds; doubled after every
   * further failure
   */
  delay: number;
}

export const defaultRetryPolicy: Readonly<RetryPolicy> = {
  attempts: 3,
  delay: 5_000,
};

/**
 * Run a command until it succeeds or the policy's attempts are used up
 *
 * Waits between attempts grow exponentially: with the default policy, a
 * command that keeps failing runs three times, waiting 5 and then 10
 * seconds. There is no wait after the final attempt.
 *
 * @param description Human-readable command line, used in messages
 * @param task        Runs one attempt
 * @param policy      Attempt budget and initial delay
 * @param wait        Awaited between attempts
 * @throws {ExhaustedRetriesError} If no attempt succeeded
 */
export async function retry(
  description: string,
  task: () => Promise<CommandResult>,
  policy: Readonly<RetryPolicy> = defaultRetryPolicy,
  wait: (ms: number) => Promise<void> = sleep,
): Promise<CommandResult> {
  let delay = policy.delay;
  let result: CommandResult | undefined;

  for (let attempt = 1; attempt <= policy.attempts; attempt++) {
    log.info(`Attempt ${attempt} of ${policy.attempts}...`);
    result = await task();

    if (result.success) {
      return result;
    }

    if (attempt < policy.attempts) {
      log.warn(
        `Command failed. Retrying in ${Math.round(delay / 1_000)} seconds...`,
      );
      await wait(delay);
      delay *= 2;
    }
  }

  log.error(`Command failed after ${policy.attempts} attempts`);

  throw new ExhaustedRetriesError(
    description,
    policy.attempts,
    result ?? { exitCode: 1, stdout: "", stderr: "", success: false },
  );
}
