import { exec } from "@actions/exec";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  loadComposeSpec,
  resolveComposeFiles,
  resolveProjectName,
  runDockerCompose,
} from "../src/compose.js";
import { SetupError } from "../src/errors.js";
import { defineSettings, parseSettings } from "../src/settings.js";
import { exists } from "../src/utils.js";

vi.mock("@actions/exec");
vi.mock("../src/logger.js");

const mockedExec = vi.mocked(exec);

describe("compose", () => {
  let root: string;
  let composeFile: string;
  let overrideFile: string;

  beforeEach(async () => {
    vi.resetAllMocks();
    root = await mkdtemp(join(tmpdir(), "platform-compose-"));
    await mkdir(join(root, "docker"));
    composeFile = join(root, "docker", "docker-compose.yaml");
    overrideFile = join(root, "docker", "docker-compose.override.yaml");
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  describe("resolveComposeFiles", () => {
    it("should fail if the base Compose File is missing", async () => {
      await expect(
        resolveComposeFiles({ composeFile, overrideFile }),
      ).rejects.toThrow(
        new SetupError(
          `Compose File "${composeFile}" is missing or not readable`,
        ),
      );
    });

    it("should use the base Compose File alone", async () => {
      await writeFile(composeFile, "services:\n  web:\n    image: nginx\n");

      await expect(
        resolveComposeFiles({ composeFile, overrideFile }),
      ).resolves.toEqual([composeFile]);
    });

    it("should append the platform override if present", async () => {
      await writeFile(composeFile, "services:\n  web:\n    image: nginx\n");
      await writeFile(overrideFile, "services: {}\n");

      await expect(
        resolveComposeFiles({ composeFile, overrideFile }),
      ).resolves.toEqual([composeFile, overrideFile]);
    });
  });

  describe("loadComposeSpec", () => {
    it("should load a Compose File", async () => {
      await writeFile(
        composeFile,
        "name: demo\nservices:\n  web:\n    image: nginx\n",
      );

      await expect(loadComposeSpec(composeFile)).resolves.toEqual({
        name: "demo",
        services: { web: { image: "nginx" } },
      });
    });

    it("should fail without services", async () => {
      await writeFile(composeFile, "name: demo\n");

      await expect(loadComposeSpec(composeFile)).rejects.toThrow(
        `Invalid Compose File "${composeFile}": Missing services section`,
      );
    });

    it("should fail on unparseable YAML", async () => {
      await writeFile(composeFile, "services: [\n");

      await expect(loadComposeSpec(composeFile)).rejects.toBeInstanceOf(
        SetupError,
      );
    });
  });

  describe("resolveProjectName", () => {
    it("should prefer COMPOSE_PROJECT_NAME", async () => {
      await expect(
        resolveProjectName(
          { composeFile },
          new Map([["COMPOSE_PROJECT_NAME", "custom"]]),
        ),
      ).resolves.toBe("custom");
    });

    it("should use the top-level name", async () => {
      await writeFile(
        composeFile,
        "name: demo\nservices:\n  web:\n    image: nginx\n",
      );

      await expect(resolveProjectName({ composeFile }, new Map())).resolves.toBe(
        "demo",
      );
    });

    it("should fall back to the directory name", async () => {
      const directory = join(root, "Platform");
      const file = join(directory, "docker-compose.yaml");
      await mkdir(directory);
      await writeFile(file, "services:\n  web:\n    image: nginx\n");

      await expect(
        resolveProjectName({ composeFile: file }, new Map()),
      ).resolves.toBe("platform");
    });
  });

  describe("runDockerCompose", () => {
    it("should prepare the host and run the command", async () => {
      await writeFile(composeFile, "services:\n  web:\n    image: nginx\n");
      await writeFile(join(root, ".env"), "VERSION=v1.2.3\n");
      mockedExec.mockResolvedValue(0);

      const settings = defineSettings({
        ...parseSettings({ HOME: root, PLATFORM_ARCH: "arm64" }, root),
        retry: { attempts: 1, delay: 0 },
      });

      const variables = await runDockerCompose(settings, "up", "-d", "web");

      expect(mockedExec).toHaveBeenCalledTimes(1);
      expect(mockedExec).toHaveBeenCalledWith(
        "docker",
        [
          "compose",
          "-f",
          composeFile,
          "-f",
          overrideFile,
          "up",
          "-d",
          "web",
        ],
        expect.objectContaining({ cwd: root }),
      );
      expect(variables.get("VERSION")).toBe("v1.2.3");
      expect(variables.get("TOOL_REGISTRY_CONFIG_SRC_PATH")).toBe(
        join(root, "tool-registry", "tool_registry_config"),
      );
      await expect(exists(join(root, "docker", "workflow_data"))).resolves.toBe(
        true,
      );
    });
  });
});
