import { arch, homedir } from "node:os";
import { join, resolve } from "node:path";
import { SetupError } from "./errors.js";
import { log } from "./logger.js";
import { defaultRetryPolicy, type RetryPolicy } from "./retry.js";

export type PruneScope = "project" | "host";

export interface ProxySettings {
  httpProxy: string;
  httpsProxy: string;
  noProxy: string;
}

/**
 * Controller settings
 */
export interface Settings {
  architecture: string;
  backendDirectory: string;
  composeFile: string;
  dockerConfigFile: string;
  envFile: string;
  frontendDirectory: string;
  imageNamespace: string;
  overrideFile: string;
  proxy: ProxySettings;
  pruneScope: PruneScope;
  retry: RetryPolicy;
  root: string;
  sampleEnvFile: string;
  startupScript: string;
  toolRegistryDirectory: string;
  variables: Map<string, string>;
  volumesFile: string;
  workflowDataDirectory: string;
}

export function defineSettings<T extends Settings>(settings: T) {
  return settings;
}

/**
 * Parse settings from the process environment
 *
 * All paths are resolved against the project root, which defaults to the
 * current working directory. The shell's variables are captured in
 * `variables`; they take precedence over the `.env` file during bootstrap.
 */
export function parseSettings(env: NodeJS.ProcessEnv, cwd = process.cwd()) {
  log.debug("Parsing settings from environment");

  const root = resolve(cwd, env.PLATFORM_ROOT || ".");
  const home = env.HOME || homedir();
  const docker = join(root, "docker");

  return defineSettings({
    architecture: env.PLATFORM_ARCH || arch(),
    backendDirectory: join(root, "backend"),
    composeFile: join(docker, "docker-compose.yaml"),
    dockerConfigFile: join(home, ".docker", "config.json"),
    envFile: join(root, ".env"),
    frontendDirectory: join(root, "frontend"),
    imageNamespace: env.PLATFORM_IMAGE_NAMESPACE || "unstract",
    overrideFile: join(docker, "docker-compose.override.yaml"),
    proxy: {
      httpProxy: env.http_proxy ?? "",
      httpsProxy: env.https_proxy ?? "",
      noProxy: env.no_proxy ?? "",
    },
    pruneScope: parsePruneScope(env.PLATFORM_PRUNE_SCOPE),
    retry: {
      attempts: parsePositiveInteger(
        "PLATFORM_RETRY_ATTEMPTS",
        env.PLATFORM_RETRY_ATTEMPTS,
        defaultRetryPolicy.attempts,
      ),
      delay:
        parsePositiveInteger(
          "PLATFORM_RETRY_DELAY",
          env.PLATFORM_RETRY_DELAY,
          defaultRetryPolicy.delay / 1_000,
        ) * 1_000,
    },
    root,
    sampleEnvFile: join(docker, "sample.env"),
    startupScript: resolve(
      root,
      env.PLATFORM_STARTUP_SCRIPT || "run-platform.sh",
    ),
    toolRegistryDirectory: join(root, "tool-registry"),
    variables: inferVariables(env),
    volumesFile: join(docker, "docker-compose.volumes.yaml"),
    workflowDataDirectory: join(docker, "workflow_data"),
  });
}

function parsePruneScope(value: string | undefined): PruneScope {
  if (!value) {
    return "project";
  }

  if (value === "project" || value === "host") {
    return value;
  }

  throw new SetupError(
    `Invalid PLATFORM_PRUNE_SCOPE "${value}": expected "project" or "host"`,
  );
}

function parsePositiveInteger(
  name: string,
  value: string | undefined,
  fallback: number,
) {
  if (!value) {
    return fallback;
  }

  const parsed = Number(value);

  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new SetupError(
      `Invalid ${name} "${value}": expected a positive integer`,
    );
  }

  return parsed;
}

function inferVariables(env: NodeJS.ProcessEnv) {
  const variables = new Map<string, string>();

  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) {
      variables.set(key, value);
    }
  }

  return variables;
}
