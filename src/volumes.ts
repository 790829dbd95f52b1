import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import { SetupError, errorMessage } from "./errors.js";
import { log } from "./logger.js";
import type { Settings } from "./settings.js";
import { exists } from "./utils.js";

export const toolRegistryConfigVariable = "TOOL_REGISTRY_CONFIG_SRC_PATH";

/**
 * Validate and set up the bind-mounted volume directories
 *
 * @param settings  Controller settings
 * @param variables Variable set; receives the tool registry config path
 */
export async function setupVolumes(
  {
    toolRegistryDirectory,
    workflowDataDirectory,
  }: Pick<Readonly<Settings>, "toolRegistryDirectory" | "workflowDataDirectory">,
  variables: Map<string, string>,
) {
  log.info("Setting up required volumes...");

  const toolRegistryConfigDirectory = join(
    toolRegistryDirectory,
    "tool_registry_config",
  );

  await ensureDirectory(toolRegistryDirectory, "tool registry");
  await ensureDirectory(toolRegistryConfigDirectory, "tool registry config");
  await ensureDirectory(workflowDataDirectory, "workflow data");

  variables.set(toolRegistryConfigVariable, toolRegistryConfigDirectory);

  log.success("Volume directories created");
}

async function ensureDirectory(path: string, description: string) {
  if (await exists(path)) {
    return;
  }

  log.info(`Creating ${description} directory...`);

  try {
    await mkdir(path, { recursive: true });
  } catch (cause) {
    throw new SetupError(
      `Failed to create ${description} directory ${path}: ` +
        errorMessage(cause),
      { cause },
    );
  }
}
