import { copyFile, mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { SetupError, errorMessage } from "./errors.js";
import { log } from "./logger.js";
import type { ProxySettings, Settings } from "./settings.js";
import { exists } from "./utils.js";

/**
 * Configure Docker proxy settings
 *
 * Passes the shell's proxy variables through to the Docker client
 * configuration, so containers and builds use the same proxy as the host.
 * Does nothing if neither `http_proxy` nor `https_proxy` is set.
 *
 * If the configuration file holds a JSON object, the proxy entry is merged
 * into it and all other keys are preserved. Otherwise, the file is patched
 * textually; this only works for simple, single-line `proxies` entries, so a
 * backup of the original file is written next to it.
 *
 * @param settings Controller settings
 * @returns Whether the configuration was modified
 */
export async function configureDockerProxy({
  dockerConfigFile,
  proxy,
}: Pick<Readonly<Settings>, "dockerConfigFile" | "proxy">) {
  log.info("Configuring Docker proxy settings...");

  if (!proxy.httpProxy && !proxy.httpsProxy) {
    log.warn("No proxy settings found in environment");

    return false;
  }

  log.info("Found proxy settings in environment");

  try {
    await mkdir(dirname(dockerConfigFile), { recursive: true });

    if (!(await exists(dockerConfigFile))) {
      await writeFile(dockerConfigFile, "{}\n");
    }

    const content = await readFile(dockerConfigFile, "utf8");
    const config = parseConfig(content);

    if (config) {
      await writeFile(
        dockerConfigFile,
        JSON.stringify(mergeProxyConfig(config, proxy), null, 2) + "\n",
      );
    } else {
      log.warn(
        `${dockerConfigFile} is not valid JSON; falling back to text ` +
          "substitution, which may drop or corrupt proxy entries",
      );
      await copyFile(dockerConfigFile, `${dockerConfigFile}.bak`);
      await writeFile(dockerConfigFile, substituteProxyConfig(content, proxy));
    }
  } catch (cause) {
    throw new SetupError(
      `Failed to configure Docker proxy in ${dockerConfigFile}: ` +
        errorMessage(cause),
      { cause },
    );
  }

  log.success("Docker proxy settings configured");

  return true;
}

type DockerConfig = Record<string, unknown>;

function parseConfig(content: string): DockerConfig | undefined {
  let parsed: unknown;

  try {
    parsed = JSON.parse(content);
  } catch {
    return undefined;
  }

  return isRecord(parsed) ? parsed : undefined;
}

/**
 * Set `proxies.default` on a Docker client configuration, keeping all other
 * keys and any other proxy entries.
 */
export function mergeProxyConfig(
  config: Readonly<DockerConfig>,
  proxy: Readonly<ProxySettings>,
): DockerConfig {
  const proxies = isRecord(config.proxies) ? config.proxies : {};

  return {
    ...config,
    proxies: {
      ...proxies,
      default: {
        httpProxy: proxy.httpProxy,
        httpsProxy: proxy.httpsProxy,
        noProxy: proxy.noProxy,
      },
    },
  };
}

/**
 * Replace a `"proxies":...}` span with the new proxy entry, line by line
 *
 * Content without a matching span is returned unchanged.
 */
export function substituteProxyConfig(
  content: string,
  proxy: Readonly<ProxySettings>,
) {
  const entry = JSON.stringify({
    default: {
      httpProxy: proxy.httpProxy,
      httpsProxy: proxy.httpsProxy,
      noProxy: proxy.noProxy,
    },
  });

  return content
    .split("\n")
    .map((line) => line.replace(/"proxies":.*}/, () => `"proxies":${entry}`))
    .join("\n");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
