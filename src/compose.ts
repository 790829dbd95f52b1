import { load } from "js-yaml";
import { readFile } from "node:fs/promises";
import { basename, dirname } from "node:path";
import { dockerCompose } from "./engine.js";
import { ensureEnvironment } from "./environment.js";
import { SetupError, errorMessage } from "./errors.js";
import { log } from "./logger.js";
import { setupPlatform } from "./platform.js";
import type { Settings } from "./settings.js";
import { exists } from "./utils.js";
import { setupVolumes } from "./volumes.js";

/**
 * Resolves the Compose Files to pass to Docker Compose
 *
 * The base manifest is mandatory; the platform override is appended if it
 * has been generated for this host.
 */
export async function resolveComposeFiles({
  composeFile,
  overrideFile,
}: Pick<Readonly<Settings>, "composeFile" | "overrideFile">): Promise<
  readonly [string, ...string[]]
> {
  log.debug(`Resolving Compose Files from ${composeFile}`);

  if (!(await exists(composeFile))) {
    throw new SetupError(
      `Compose File "${composeFile}" is missing or not readable`,
    );
  }

  if (await exists(overrideFile)) {
    return [composeFile, overrideFile] as const;
  }

  return [composeFile] as const;
}

/**
 * Load a Compose File
 *
 * @param filename Path of the Compose File
 * @throws {SetupError} If the file cannot be read, does not parse, or has no
 *                      services
 */
export async function loadComposeSpec(filename: string) {
  let parsed: unknown;

  try {
    parsed = load(await readFile(filename, "utf8"), { filename });
  } catch (cause) {
    throw new SetupError(
      `Failed to load Compose File "${filename}": ${errorMessage(cause)}`,
      { cause },
    );
  }

  if (!isComposeSpec(parsed)) {
    throw new SetupError(
      `Invalid Compose File "${filename}": Missing services section`,
    );
  }

  return parsed;
}

/**
 * Resolve the Compose project name the stack runs under
 *
 * Follows the order Docker Compose itself applies: the COMPOSE_PROJECT_NAME
 * variable, the top-level `name` of the Compose File, and finally the name of
 * the directory containing it.
 */
export async function resolveProjectName(
  { composeFile }: Pick<Readonly<Settings>, "composeFile">,
  variables: ReadonlyMap<string, string>,
) {
  const fromVariables = variables.get("COMPOSE_PROJECT_NAME");

  if (fromVariables) {
    return fromVariables;
  }

  const spec = await loadComposeSpec(composeFile);

  if (typeof spec.name === "string" && spec.name) {
    return spec.name;
  }

  return basename(dirname(composeFile)).toLowerCase();
}

/**
 * Run a Docker Compose command against the platform stack
 *
 * Every invocation re-runs the (idempotent) environment, volume and platform
 * setup first, so the command always sees a consistent configuration. The
 * command is retried according to the retry policy.
 *
 * @param settings Controller settings
 * @param command  Compose subcommand, e.g. "up"
 * @param args     Further arguments, e.g. service names
 * @returns The variable set the command ran with
 */
export async function runDockerCompose(
  settings: Readonly<Settings>,
  command: string,
  ...args: string[]
) {
  const variables = await ensureEnvironment(settings);
  await setupVolumes(settings, variables);
  await setupPlatform(settings);

  const composeFiles = await resolveComposeFiles(settings);

  await dockerCompose(composeFiles, [command, ...args], {
    cwd: settings.root,
    retry: settings.retry,
    variables,
  });

  return variables;
}

function isComposeSpec(value: unknown): value is ComposeSpec {
  return (
    typeof value === "object" &&
    value !== null &&
    "services" in value &&
    typeof value.services === "object" &&
    value.services !== null &&
    Object.keys(value.services).length > 0
  );
}

/**
 * Poor Man's Docker Compose specification
 */
export interface ComposeSpec {
  name?: string;
  services: Record<string, Record<string, unknown>>;

  [key: string]: unknown;
}
