import { ExhaustedRetriesError, errorMessage } from "./errors.js";
import {
  restartBackend,
  restartFrontend,
  start,
  stop,
} from "./lifecycle.js";
import { log } from "./logger.js";
import { parseSettings, type Settings } from "./settings.js";

type Operation = (settings: Readonly<Settings>) => Promise<void>;

export const operations: Readonly<Record<string, Operation>> = {
  start,
  stop,
  "restart-frontend": restartFrontend,
  "restart-backend": restartBackend,
};

export const usage = [
  "Platform Management Script",
  "",
  "Usage: platform [command]",
  "",
  "Commands:",
  "  start             Start the platform using run-platform.sh",
  "  stop              Stop all services and clean up",
  "  restart-frontend  Restart the frontend service with clean build",
  "  restart-backend   Restart the backend services with clean build",
  "  help              Display this help message",
  "",
].join("\n");

/**
 * Run the controller
 *
 * @param args Command line arguments, without the executable
 * @param env  Process environment
 * @returns The exit code
 */
export async function run(args: readonly string[], env: NodeJS.ProcessEnv) {
  const command = args[0] || "help";

  if (command === "help") {
    log.raw(usage);

    return 0;
  }

  const operation = Object.hasOwn(operations, command)
    ? operations[command]
    : undefined;

  if (!operation) {
    log.error(`Unknown command: ${command}`);
    log.raw(usage);

    return 1;
  }

  try {
    await operation(parseSettings(env));
  } catch (error) {
    log.error(errorMessage(error));

    if (error instanceof ExhaustedRetriesError && error.result.stderr.trim()) {
      log.error(error.result.stderr.trim());
    }

    return 1;
  }

  return 0;
}
