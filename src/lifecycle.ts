import { rm } from "node:fs/promises";
import { join } from "node:path";
import { cleanBackend, cleanFrontend, cleanGeneratedFiles } from "./cleanup.js";
import { formatCommand, runCommand } from "./command.js";
import { resolveProjectName, runDockerCompose } from "./compose.js";
import {
  listContainers,
  listImages,
  listVolumes,
  pullImage,
  removeContainers,
  removeImages,
  removeVolumes,
  type ResourceFilters,
} from "./engine.js";
import { ensureEnvironment, fallbackVersion } from "./environment.js";
import { SetupError } from "./errors.js";
import { log } from "./logger.js";
import {
  amd64Platform,
  isArm64,
  platformImages,
  setupPlatform,
} from "./platform.js";
import { configureDockerProxy } from "./proxy.js";
import type { Settings } from "./settings.js";
import { exists, mapToObject } from "./utils.js";

export const frontendService = "frontend";

export const backendServices = [
  "backend",
  "worker",
  "worker-logging",
  "worker-api-deployment",
  "worker-file-processing",
  "worker-api-file-processing",
  "celery-beat",
] as const;

export const projectLabel = "com.docker.compose.project";

/**
 * Start the platform
 *
 * Prepares the host (proxy, environment, platform override, images) and
 * hands off to the startup script.
 */
export async function start(settings: Readonly<Settings>) {
  log.info("Starting platform...");

  await configureDockerProxy(settings);
  const variables = await ensureEnvironment(settings);
  await setupPlatform(settings);
  await pullImages(settings, variables);
  await runStartupScript(settings, variables);
}

/**
 * Stop all services and clean up
 *
 * Safe to run repeatedly: removing resources that no longer exist is not an
 * error.
 */
export async function stop(settings: Readonly<Settings>) {
  log.info("Stopping all services...");

  const variables = await runDockerCompose(
    settings,
    "down",
    "--remove-orphans",
  );

  await pruneResources(settings, variables);

  log.info("Cleaning up temporary and build files...");
  await cleanFrontend(settings);
  await cleanBackend(settings);
  await cleanGeneratedFiles(settings);

  log.success("Platform stopped and cleaned successfully!");
}

/**
 * Rebuild and restart the frontend service
 */
export async function restartFrontend(settings: Readonly<Settings>) {
  await configureDockerProxy(settings);

  log.info("Stopping frontend service...");
  await runDockerCompose(settings, "stop", frontendService);
  const variables = await runDockerCompose(
    settings,
    "rm",
    "-f",
    frontendService,
  );

  await cleanFrontend(settings);

  log.info("Installing frontend dependencies...");
  await runBuildStep("npm", ["install"], settings.frontendDirectory, variables);

  log.info("Building frontend...");
  await runBuildStep(
    "npm",
    ["run", "build"],
    settings.frontendDirectory,
    variables,
  );

  log.info("Starting frontend service...");
  await runDockerCompose(settings, "up", "-d", frontendService);

  log.success("Frontend restarted successfully!");
}

/**
 * Rebuild and restart the backend services
 */
export async function restartBackend(settings: Readonly<Settings>) {
  await configureDockerProxy(settings);

  log.info("Setting up platform configuration...");
  await setupPlatform(settings);

  log.info("Stopping backend services...");
  await runDockerCompose(settings, "stop", ...backendServices);
  const variables = await runDockerCompose(
    settings,
    "rm",
    "-f",
    ...backendServices,
  );

  await cleanBackend(settings);

  const venv = join(settings.backendDirectory, ".venv");
  const pip = join(venv, "bin", "pip");

  if (await exists(venv)) {
    log.info("Removing existing virtual environment...");
    await rm(venv, { recursive: true, force: true });
  }

  log.info("Setting up Python virtual environment...");
  await runBuildStep(
    "python3",
    ["-m", "venv", ".venv"],
    settings.backendDirectory,
    variables,
  );

  log.info("Installing backend dependencies...");
  await runBuildStep(
    pip,
    ["install", "-r", "requirements.txt"],
    settings.backendDirectory,
    variables,
  );

  log.info("Building backend...");
  await runBuildStep(
    pip,
    ["install", "-e", "."],
    settings.backendDirectory,
    variables,
  );

  log.info("Starting backend services...");
  await runDockerCompose(settings, "up", "-d", ...backendServices);

  log.success("Backend services restarted successfully!");
}

/**
 * Pull all platform images for the configured version
 *
 * ARM64 hosts pull the amd64 variants, matching the platform override.
 */
export async function pullImages(
  settings: Pick<
    Readonly<Settings>,
    "architecture" | "imageNamespace" | "retry" | "root"
  >,
  variables: ReadonlyMap<string, string>,
) {
  log.info("Pulling Docker images...");

  const version = variables.get("VERSION") || fallbackVersion;
  const platform = isArm64(settings.architecture) ? amd64Platform : undefined;

  for (const image of platformImages) {
    const reference = `${settings.imageNamespace}/${image}:${version}`;

    await pullImage(reference, platform, {
      cwd: settings.root,
      retry: settings.retry,
      variables,
    });
  }
}

/**
 * Remove containers, volumes and images left behind by the stack
 *
 * In the "project" scope, only containers and volumes labelled with the
 * Compose project and images from the platform's namespace are removed. The
 * "host" scope removes everything on the Docker host.
 */
export async function pruneResources(
  settings: Pick<
    Readonly<Settings>,
    "composeFile" | "imageNamespace" | "pruneScope"
  >,
  variables: ReadonlyMap<string, string>,
) {
  let labelFilters: ResourceFilters = {};
  let imageFilters: ResourceFilters = {};

  if (settings.pruneScope === "project") {
    const project = await resolveProjectName(settings, variables);

    log.info(`Removing resources of project "${project}"...`);
    labelFilters = { label: { [projectLabel]: project } };
    imageFilters = { reference: `${settings.imageNamespace}/*` };
  } else {
    log.warn("Removing ALL containers, volumes and images on this host...");
  }

  await removeContainers(await listContainers(labelFilters));
  await removeVolumes(await listVolumes(labelFilters));
  await removeImages(await listImages(imageFilters));
}

/**
 * Hand off to the startup script
 */
async function runStartupScript(
  { root, startupScript }: Pick<Readonly<Settings>, "root" | "startupScript">,
  variables: ReadonlyMap<string, string>,
) {
  if (!(await exists(startupScript))) {
    throw new SetupError(`Startup script "${startupScript}" not found`);
  }

  await runBuildStep(startupScript, [], root, variables);
}

/**
 * Run a single, non-retried setup command
 *
 * @throws {SetupError} If the command exits with a non-zero status
 */
async function runBuildStep(
  command: string,
  args: readonly string[],
  cwd: string,
  variables: ReadonlyMap<string, string>,
) {
  const result = await runCommand(command, args, {
    cwd,
    env: mapToObject(variables),
  });

  if (!result.success) {
    throw new SetupError(
      `Command "${formatCommand(command, args)}" failed with exit code ` +
        `${result.exitCode}` +
        (result.stderr.trim() ? `: ${result.stderr.trim()}` : ""),
    );
  }
}
