import { dump } from "js-yaml";
import { rm, writeFile } from "node:fs/promises";
import type { ComposeSpec } from "./compose.js";
import { SetupError, errorMessage } from "./errors.js";
import { log } from "./logger.js";
import type { Settings } from "./settings.js";

export const amd64Platform = "linux/amd64";

/**
 * Application images published by the platform
 */
export const platformImages = [
  "backend",
  "frontend",
  "platform-service",
  "prompt-service",
  "x2text-service",
  "runner",
] as const;

export type PlatformImage = (typeof platformImages)[number];

/**
 * Services of the stack mapped to the image each of them runs; the task
 * queue workers and the scheduler all run the backend image.
 */
export const serviceImages: Readonly<Record<string, PlatformImage>> = {
  backend: "backend",
  frontend: "frontend",
  "platform-service": "platform-service",
  "prompt-service": "prompt-service",
  "x2text-service": "x2text-service",
  runner: "runner",
  worker: "backend",
  "worker-api-deployment": "backend",
  "worker-api-file-processing": "backend",
  "worker-file-processing": "backend",
  "worker-logging": "backend",
  "celery-beat": "backend",
};

export function isArm64(architecture: string) {
  return architecture === "arm64" || architecture === "aarch64";
}

/**
 * Build the override document pinning every service to amd64 images
 *
 * The version is left as a Compose interpolation, so the override follows
 * whatever VERSION the stack is started with.
 */
export function buildPlatformOverride(imageNamespace: string): ComposeSpec {
  const services: ComposeSpec["services"] = {};

  for (const [service, image] of Object.entries(serviceImages)) {
    services[service] = {
      platform: amd64Platform,
      image: `${imageNamespace}/${image}:\${VERSION:-latest}`,
    };
  }

  return { services };
}

/**
 * Detect the host architecture and set up the platform override
 *
 * On ARM64 hosts, the override file is rewritten in full. On every other
 * architecture, a stale override is removed so native images are used.
 *
 * @param settings Controller settings
 * @returns Whether an override is in place
 */
export async function setupPlatform({
  architecture,
  imageNamespace,
  overrideFile,
}: Pick<
  Readonly<Settings>,
  "architecture" | "imageNamespace" | "overrideFile"
>) {
  log.info("Detecting architecture and setting up platform...");
  log.info(`Detected architecture: ${architecture}`);

  try {
    if (isArm64(architecture)) {
      log.info("ARM64 architecture detected. Creating platform override...");
      await writeFile(
        overrideFile,
        dump(buildPlatformOverride(imageNamespace), { lineWidth: -1 }),
      );
      log.success("Created platform override for ARM64");

      return true;
    }

    log.info("Using default platform configuration");
    await rm(overrideFile, { force: true });
  } catch (cause) {
    throw new SetupError(
      `Failed to update platform override ${overrideFile}: ` +
        errorMessage(cause),
      { cause },
    );
  }

  return false;
}
