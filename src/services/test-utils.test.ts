// @vitest-environment node
import { describe, it, expect } from "vitest";
import { access, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { createTempDir, withTempDir } from "./test-utils";

describe("createTempDir", () => {
  it("creates a temporary directory", async () => {
    const { path, cleanup } = await createTempDir();

    try {
      const stats = await stat(path);
      expect(stats.isDirectory()).toBe(true);
      expect(path).toContain("lsprovision-test-");
    } finally {
      await cleanup();
    }
  });

  it("cleanup removes the directory with its contents", async () => {
    const { path, cleanup } = await createTempDir();
    await writeFile(join(path, "marksman-2024-12-18"), "binary");

    await cleanup();

    await expect(access(path)).rejects.toThrow();
  });
});

describe("withTempDir", () => {
  it("removes the directory after the callback", async () => {
    let captured = "";

    await withTempDir(async (dirPath) => {
      captured = dirPath;
      const stats = await stat(dirPath);
      expect(stats.isDirectory()).toBe(true);
    });

    await expect(access(captured)).rejects.toThrow();
  });

  it("removes the directory when the callback throws", async () => {
    let captured = "";

    await expect(
      withTempDir(async (dirPath) => {
        captured = dirPath;
        throw new Error("test failure");
      })
    ).rejects.toThrow("test failure");

    await expect(access(captured)).rejects.toThrow();
  });
});
