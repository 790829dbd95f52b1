import { formatCommand, runCommand, type CommandResult } from "./command.js";
import { SetupError } from "./errors.js";
import { log } from "./logger.js";
import { retry, type RetryPolicy } from "./retry.js";
import { mapToObject } from "./utils.js";

interface DockerCommandOptions {
  cwd?: string;
  retry?: Readonly<RetryPolicy>;
  silent?: boolean;
  variables?: ReadonlyMap<string, string>;
}

/**
 * Run a Docker Compose command
 *
 * @param composeFiles Compose Files, in merge order
 * @param args         Compose subcommand and its arguments
 * @param options      Retry policy and the variable set for the command
 */
export async function dockerCompose(
  composeFiles: readonly string[],
  args: readonly string[],
  options: DockerCommandOptions = {},
) {
  const fileFlags = composeFiles.flatMap((file) => ["-f", file]);

  return executeDockerCommand(["compose", ...fileFlags, ...args], options);
}

/**
 * Pull an image
 *
 * @param image    Image reference, including the tag
 * @param platform Platform to pull, if it differs from the host's
 * @param options  Retry policy and the variable set for the command
 */
export async function pullImage(
  image: string,
  platform: string | undefined,
  options: DockerCommandOptions = {},
) {
  log.info(`Pulling ${image}...`);

  await executeDockerCommand(
    ["pull", platform ? `--platform=${platform}` : "", image],
    options,
  );
}

export type ResourceFilters = {
  label?: Record<string, string>;
  reference?: string;
};

/**
 * List the IDs of all containers, running or stopped, matching the filters
 */
export async function listContainers(filters: ResourceFilters = {}) {
  return listResources(["ps", "--all", "--quiet"], filters);
}

/**
 * List the names of all volumes matching the filters
 */
export async function listVolumes(filters: ResourceFilters = {}) {
  return listResources(["volume", "ls", "--quiet"], filters);
}

/**
 * List the IDs of all images matching the filters
 */
export async function listImages(filters: ResourceFilters = {}) {
  return listResources(["image", "ls", "--quiet"], filters);
}

/**
 * Forcibly remove containers; failures are reported, not thrown
 */
export async function removeContainers(ids: readonly string[]) {
  return removeResources("containers", ["rm", "--force"], ids);
}

/**
 * Remove volumes; failures are reported, not thrown
 */
export async function removeVolumes(names: readonly string[]) {
  return removeResources("volumes", ["volume", "rm"], names);
}

/**
 * Forcibly remove images; failures are reported, not thrown
 */
export async function removeImages(ids: readonly string[]) {
  return removeResources("images", ["image", "rm", "--force"], ids);
}

async function listResources(
  command: [string, ...string[]],
  filters: ResourceFilters,
) {
  const output = await executeDockerCommand(
    [...command, ...buildFilters(filters)],
    { silent: true },
  );

  return [
    ...new Set(
      output
        .split("\n")
        .map((line) => line.trim())
        .filter((line) => line !== ""),
    ),
  ];
}

async function removeResources(
  kind: string,
  command: [string, ...string[]],
  ids: readonly string[],
) {
  if (ids.length === 0) {
    log.debug(`No ${kind} to remove`);

    return true;
  }

  const result = await runCommand("docker", [...command, ...ids], {
    silent: true,
  });

  if (!result.success) {
    log.warn(
      `Failed to remove some ${kind}: ${result.stderr.trim() || "unknown error"}`,
    );
  }

  return result.success;
}

/**
 * Execute a Docker command
 *
 * With a retry policy, the command is attempted until it succeeds or the
 * policy is exhausted, in which case an `ExhaustedRetriesError` propagates.
 * Without one, a single failure raises a `SetupError`. Empty arguments are
 * dropped, so optional flags may be passed as "".
 *
 * @param args    Arguments to pass to the Docker CLI
 * @param options Retry policy, working directory, variable set and output
 *                handling
 * @returns The standard output of the successful attempt
 */
async function executeDockerCommand(
  args: [string, ...string[]],
  { cwd, retry: policy, silent = false, variables }: DockerCommandOptions = {},
) {
  const filteredArgs = args.filter((arg) => arg !== "");
  const description = formatCommand("docker", filteredArgs);
  const env = variables ? mapToObject(variables) : undefined;
  const attempt = () =>
    runCommand("docker", filteredArgs, { cwd, env, silent });
  let result: CommandResult;

  if (policy) {
    result = await retry(description, attempt, policy);
  } else {
    result = await attempt();

    if (!result.success) {
      throw new SetupError(
        `Failed to execute Docker command "${description}": ` +
          (result.stderr.trim() || `exit code ${result.exitCode}`),
      );
    }
  }

  return result.stdout;
}

/**
 * Build `--filter` flags, one per label and one for the image reference
 */
export function buildFilters({ label = {}, reference }: ResourceFilters) {
  const filters = Object.entries(label).map(
    ([key, value]) => `label=${key}=${value}`,
  );

  if (reference) {
    filters.push(`reference=${reference}`);
  }

  return filters.flatMap((filter) => ["--filter", filter]);
}
