import { join } from "node:path";
import { SetupError, errorMessage } from "./errors.js";
import { log } from "./logger.js";
import type { Settings } from "./settings.js";
import { emptyDirectory, findDirectories, removePaths } from "./utils.js";

export const frontendArtifacts = [
  "node_modules",
  "build",
  ".next",
  ".cache",
] as const;

export const backendCacheDirectories: readonly string[] = [
  "__pycache__",
  ".pytest_cache",
  ".coverage",
];

export function isBackendCacheDirectory(name: string) {
  return (
    backendCacheDirectories.includes(name) ||
    name.endsWith(".egg-info")
  );
}

/**
 * Remove frontend dependencies, build output and caches
 */
export async function cleanFrontend({
  frontendDirectory,
}: Pick<Readonly<Settings>, "frontendDirectory">) {
  log.info("Cleaning frontend build files...");

  await cleanup("frontend build files", () =>
    removePaths(frontendArtifacts.map((name) => join(frontendDirectory, name))),
  );
}

/**
 * Remove Python caches, test caches and packaging metadata below the backend
 * directory
 */
export async function cleanBackend({
  backendDirectory,
}: Pick<Readonly<Settings>, "backendDirectory">) {
  log.info("Cleaning backend build files...");

  await cleanup("backend build files", async () =>
    removePaths(
      await findDirectories(backendDirectory, isBackendCacheDirectory),
    ),
  );
}

/**
 * Remove workflow data and the generated Compose Files
 */
export async function cleanGeneratedFiles({
  overrideFile,
  volumesFile,
  workflowDataDirectory,
}: Pick<
  Readonly<Settings>,
  "overrideFile" | "volumesFile" | "workflowDataDirectory"
>) {
  log.info("Cleaning up workflow data and configuration files...");

  await cleanup("generated files", async () => {
    await emptyDirectory(workflowDataDirectory);
    await removePaths([volumesFile, overrideFile]);
  });
}

async function cleanup(description: string, task: () => Promise<void>) {
  try {
    await task();
  } catch (cause) {
    throw new SetupError(
      `Failed to remove ${description}: ${errorMessage(cause)}`,
      { cause },
    );
  }
}
