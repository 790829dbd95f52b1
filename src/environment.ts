import { copyFile, readFile } from "node:fs/promises";
import { runCommand } from "./command.js";
import { SetupError, errorMessage } from "./errors.js";
import { log } from "./logger.js";
import type { Settings } from "./settings.js";
import { exists } from "./utils.js";

export const fallbackVersion = "latest";

/**
 * Worker autoscale pairs ("max,min") consumed by the task queue workers
 */
export const autoscaleDefaults: ReadonlyMap<string, string> = new Map([
  ["WORKER_API_DEPLOYMENTS_AUTOSCALE", "4,1"],
  ["WORKER_LOGGING_AUTOSCALE", "4,1"],
  ["WORKER_AUTOSCALE", "4,1"],
  ["WORKER_FILE_PROCESSING_AUTOSCALE", "4,1"],
  ["WORKER_API_FILE_PROCESSING_AUTOSCALE", "4,1"],
]);

/**
 * Ensure environment variables are set
 *
 * Creates the `.env` file from the sample if it is missing, then assembles
 * the variable set used for every external command. Precedence, highest
 * first: variables exported in the shell, entries of the `.env` file, and
 * built-in defaults. The version defaults to the latest git tag.
 *
 * @param settings Controller settings
 * @returns The variable set to pass to external commands
 */
export async function ensureEnvironment(
  settings: Pick<
    Readonly<Settings>,
    "envFile" | "root" | "sampleEnvFile" | "variables"
  >,
) {
  log.info("Ensuring environment variables are set...");

  await ensureEnvFile(settings);

  const fileVariables = (await exists(settings.envFile))
    ? await loadEnvFile(settings.envFile)
    : new Map<string, string>();
  const variables = new Map(autoscaleDefaults);

  for (const [key, value] of fileVariables) {
    variables.set(key, value);
  }

  for (const [key, value] of settings.variables) {
    variables.set(key, value);
  }

  if (!variables.get("VERSION")) {
    variables.set("VERSION", await resolveVersion(settings.root));
  }

  log.debug(`Using version ${variables.get("VERSION")}`);
  log.success("Environment variables set");

  return variables;
}

async function ensureEnvFile({
  envFile,
  sampleEnvFile,
}: Pick<Readonly<Settings>, "envFile" | "sampleEnvFile">) {
  if (await exists(envFile)) {
    return;
  }

  if (!(await exists(sampleEnvFile))) {
    log.warn(`Warning: ${sampleEnvFile} not found`);

    return;
  }

  log.info("Creating .env file from sample...");

  try {
    await copyFile(sampleEnvFile, envFile);
  } catch (cause) {
    throw new SetupError(
      `Failed to create ${envFile} from ${sampleEnvFile}: ` +
        errorMessage(cause),
      { cause },
    );
  }
}

/**
 * Load variables from an environment file
 */
export async function loadEnvFile(path: string) {
  let content: string;

  try {
    content = await readFile(path, "utf8");
  } catch (cause) {
    throw new SetupError(`Failed to read ${path}: ${errorMessage(cause)}`, {
      cause,
    });
  }

  return parseEnvFile(content, path);
}

/**
 * Parse the content of an environment file
 *
 * Every line that is neither blank nor a comment must be an assignment of
 * the form `NAME=VALUE`, where NAME is a valid shell identifier. Values are
 * taken verbatim; surrounding quotes are kept.
 *
 * @param content  File content
 * @param filename Used in error messages
 * @throws {SetupError} On the first malformed line
 */
export function parseEnvFile(content: string, filename = ".env") {
  const variables = new Map<string, string>();
  const lines = content.split(/\r?\n/);

  for (const [index, line] of lines.entries()) {
    if (line.trim() === "" || line.startsWith("#")) {
      continue;
    }

    const match = line.match(/^([A-Za-z_][A-Za-z0-9_]*)=(.*)$/);

    if (!match) {
      throw new SetupError(
        `Malformed line ${index + 1} in ${filename}: "${line}" is not a ` +
          "valid NAME=VALUE assignment",
      );
    }

    const [, key, value] = match;
    variables.set(key, value);
  }

  return variables;
}

/**
 * Resolve the version from the most recent git tag
 *
 * @param cwd Repository directory
 * @returns The tag name, or "latest" if there is none
 */
export async function resolveVersion(cwd: string) {
  const result = await runCommand(
    "git",
    ["describe", "--tags", "--abbrev=0"],
    { cwd, silent: true },
  );
  const tag = result.stdout.trim();

  if (!result.success || !tag) {
    log.debug(`No git tag found, using "${fallbackVersion}"`);

    return fallbackVersion;
  }

  return tag;
}
