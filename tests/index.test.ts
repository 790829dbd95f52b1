import { afterEach, describe, expect, it, vi } from "vitest";
import { run } from "../src/main.js";

vi.mock("../src/main.js", () => ({
  run: vi.fn().mockResolvedValue(3),
}));

describe("index", () => {
  afterEach(() => {
    process.exitCode = undefined;
  });

  it("should set the exit code from the command's result", async () => {
    await import("../src/index.js");

    expect(run).toHaveBeenCalledWith(process.argv.slice(2), process.env);
    expect(process.exitCode).toBe(3);
  });
});
