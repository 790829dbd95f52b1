import { load } from "js-yaml";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  buildPlatformOverride,
  isArm64,
  serviceImages,
  setupPlatform,
} from "../src/platform.js";
import { exists } from "../src/utils.js";

vi.mock("../src/logger.js");

describe("platform", () => {
  let root: string;
  let overrideFile: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "platform-arch-"));
    overrideFile = join(root, "docker-compose.override.yaml");
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  describe("setupPlatform", () => {
    it.each(["x64", "amd64", "x86_64", "ppc64"])(
      "should remove a stale override on %s",
      async (architecture) => {
        await writeFile(overrideFile, "services: {}\n");

        await expect(
          setupPlatform({
            architecture,
            imageNamespace: "unstract",
            overrideFile,
          }),
        ).resolves.toBe(false);

        await expect(exists(overrideFile)).resolves.toBe(false);
      },
    );

    it("should succeed without an override to remove", async () => {
      await expect(
        setupPlatform({
          architecture: "x64",
          imageNamespace: "unstract",
          overrideFile,
        }),
      ).resolves.toBe(false);

      await expect(exists(overrideFile)).resolves.toBe(false);
    });

    it.each(["arm64", "aarch64"])(
      "should pin every service to amd64 on %s",
      async (architecture) => {
        await expect(
          setupPlatform({
            architecture,
            imageNamespace: "unstract",
            overrideFile,
          }),
        ).resolves.toBe(true);

        const override = load(await readFile(overrideFile, "utf8"));

        expect(override).toEqual({
          services: {
            backend: {
              platform: "linux/amd64",
              image: "unstract/backend:${VERSION:-latest}",
            },
            frontend: {
              platform: "linux/amd64",
              image: "unstract/frontend:${VERSION:-latest}",
            },
            "platform-service": {
              platform: "linux/amd64",
              image: "unstract/platform-service:${VERSION:-latest}",
            },
            "prompt-service": {
              platform: "linux/amd64",
              image: "unstract/prompt-service:${VERSION:-latest}",
            },
            "x2text-service": {
              platform: "linux/amd64",
              image: "unstract/x2text-service:${VERSION:-latest}",
            },
            runner: {
              platform: "linux/amd64",
              image: "unstract/runner:${VERSION:-latest}",
            },
            worker: {
              platform: "linux/amd64",
              image: "unstract/backend:${VERSION:-latest}",
            },
            "worker-api-deployment": {
              platform: "linux/amd64",
              image: "unstract/backend:${VERSION:-latest}",
            },
            "worker-api-file-processing": {
              platform: "linux/amd64",
              image: "unstract/backend:${VERSION:-latest}",
            },
            "worker-file-processing": {
              platform: "linux/amd64",
              image: "unstract/backend:${VERSION:-latest}",
            },
            "worker-logging": {
              platform: "linux/amd64",
              image: "unstract/backend:${VERSION:-latest}",
            },
            "celery-beat": {
              platform: "linux/amd64",
              image: "unstract/backend:${VERSION:-latest}",
            },
          },
        });
      },
    );

    it("should replace an existing override entirely", async () => {
      await writeFile(
        overrideFile,
        "services:\n  backend:\n    environment:\n      - DEBUG=1\n  extra:\n    image: busybox\n",
      );

      await setupPlatform({
        architecture: "arm64",
        imageNamespace: "unstract",
        overrideFile,
      });

      expect(load(await readFile(overrideFile, "utf8"))).toEqual(
        buildPlatformOverride("unstract"),
      );
    });
  });

  describe("buildPlatformOverride", () => {
    it("should cover every service", () => {
      const { services } = buildPlatformOverride("acme");

      expect(Object.keys(services)).toEqual(Object.keys(serviceImages));
      expect(services["celery-beat"]).toEqual({
        platform: "linux/amd64",
        image: "acme/backend:${VERSION:-latest}",
      });
    });
  });

  describe("isArm64", () => {
    it("should recognize both ARM64 spellings", () => {
      expect(isArm64("arm64")).toBe(true);
      expect(isArm64("aarch64")).toBe(true);
      expect(isArm64("arm")).toBe(false);
      expect(isArm64("x64")).toBe(false);
    });
  });
});
