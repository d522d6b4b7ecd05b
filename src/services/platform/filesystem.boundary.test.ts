// @vitest-environment node
/**
 * Boundary tests for DefaultFileSystemLayer.
 * Tests filesystem operations against real filesystem with temp directories.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import {
  symlink,
  writeFile as nodeWriteFile,
  mkdir as nodeMkdir,
  readFile as nodeReadFile,
  stat as nodeStat,
  readdir as nodeReaddir,
} from "node:fs/promises";
import { DefaultFileSystemLayer } from "./filesystem";
import { FileSystemError } from "../errors";
import { SILENT_LOGGER } from "../logging";
import { createTempDir } from "../test-utils";

async function captureError(promise: Promise<unknown>): Promise<FileSystemError> {
  const error = await promise.then(
    () => undefined,
    (caught: unknown) => caught
  );
  if (!(error instanceof FileSystemError)) {
    throw new Error(`expected FileSystemError, got ${String(error)}`);
  }
  return error;
}

async function* chunksOf(...parts: string[]): AsyncGenerator<Uint8Array> {
  for (const part of parts) {
    yield new TextEncoder().encode(part);
  }
}

describe("DefaultFileSystemLayer", () => {
  let fs: DefaultFileSystemLayer;
  let tempDir: { path: string; cleanup: () => Promise<void> };

  beforeEach(async () => {
    fs = new DefaultFileSystemLayer(SILENT_LOGGER);
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await tempDir.cleanup();
  });

  describe("readFile", () => {
    it("reads UTF-8 content", async () => {
      const filePath = join(tempDir.path, "unicode.txt");
      await nodeWriteFile(filePath, "Hello 世界", "utf-8");

      expect(await fs.readFile(filePath)).toBe("Hello 世界");
    });

    it("throws ENOENT for non-existent file", async () => {
      const filePath = join(tempDir.path, "non-existent.txt");

      const error = await captureError(fs.readFile(filePath));

      expect(error.fsCode).toBe("ENOENT");
      expect(error.path).toBe(filePath);
    });

    it("throws EISDIR when reading a directory", async () => {
      const error = await captureError(fs.readFile(tempDir.path));

      expect(error.fsCode).toBe("EISDIR");
    });
  });

  describe("writeFile", () => {
    it("overwrites existing file", async () => {
      const filePath = join(tempDir.path, "config.json");
      await nodeWriteFile(filePath, "old");

      await fs.writeFile(filePath, "new");

      expect(await nodeReadFile(filePath, "utf-8")).toBe("new");
    });

    it("throws ENOENT when parent directory does not exist", async () => {
      const filePath = join(tempDir.path, "missing", "config.json");

      const error = await captureError(fs.writeFile(filePath, "{}"));

      expect(error.fsCode).toBe("ENOENT");
    });
  });

  describe("writeFileBuffer", () => {
    it("creates a zero-byte file from an empty buffer", async () => {
      const filePath = join(tempDir.path, "marksman-v1");

      await fs.writeFileBuffer(filePath, Buffer.alloc(0));

      expect((await nodeStat(filePath)).size).toBe(0);
    });

    it("writes binary content", async () => {
      const filePath = join(tempDir.path, "data.bin");

      await fs.writeFileBuffer(filePath, Buffer.from([0x7f, 0x45, 0x4c, 0x46]));

      expect([...(await nodeReadFile(filePath))]).toEqual([0x7f, 0x45, 0x4c, 0x46]);
    });
  });

  describe("writeFileStream", () => {
    it("writes all chunks in order", async () => {
      const filePath = join(tempDir.path, "streamed");

      await fs.writeFileStream(filePath, chunksOf("mark", "s", "man"));

      expect(await nodeReadFile(filePath, "utf-8")).toBe("marksman");
    });

    it("replaces existing content", async () => {
      const filePath = join(tempDir.path, "streamed");
      await nodeWriteFile(filePath, "previous content that is longer");

      await fs.writeFileStream(filePath, chunksOf("new"));

      expect(await nodeReadFile(filePath, "utf-8")).toBe("new");
    });

    it("throws ENOENT when parent directory does not exist", async () => {
      const filePath = join(tempDir.path, "missing", "streamed");

      const error = await captureError(fs.writeFileStream(filePath, chunksOf("x")));

      expect(error.fsCode).toBe("ENOENT");
      expect(error.path).toBe(filePath);
    });

    it("rejects when the source fails", async () => {
      const filePath = join(tempDir.path, "broken");
      async function* failing(): AsyncGenerator<Uint8Array> {
        yield new TextEncoder().encode("partial");
        throw new Error("connection reset");
      }

      const error = await captureError(fs.writeFileStream(filePath, failing()));

      expect(error.fsCode).toBe("UNKNOWN");
      expect(error.message).toBe("connection reset");
    });
  });

  describe("mkdir", () => {
    it("creates nested directories by default", async () => {
      const dirPath = join(tempDir.path, "languages", "marksman");

      await fs.mkdir(dirPath);

      expect((await nodeStat(dirPath)).isDirectory()).toBe(true);
    });

    it("is no-op when directory already exists", async () => {
      await fs.mkdir(tempDir.path);

      expect((await nodeStat(tempDir.path)).isDirectory()).toBe(true);
    });

    it("throws EEXIST when file exists at path", async () => {
      const filePath = join(tempDir.path, "file");
      await nodeWriteFile(filePath, "");

      const error = await captureError(fs.mkdir(filePath));

      expect(error.fsCode).toBe("EEXIST");
    });

    it("throws ENOENT when recursive is false and parent does not exist", async () => {
      const dirPath = join(tempDir.path, "a", "b");

      const error = await captureError(fs.mkdir(dirPath, { recursive: false }));

      expect(error.fsCode).toBe("ENOENT");
    });
  });

  describe("readdir", () => {
    it("returns type information for entries", async () => {
      await nodeWriteFile(join(tempDir.path, "file.txt"), "");
      await nodeMkdir(join(tempDir.path, "subdir"));
      await symlink(join(tempDir.path, "file.txt"), join(tempDir.path, "link"));

      const entries = await fs.readdir(tempDir.path);
      const byName = Object.fromEntries(entries.map((entry) => [entry.name, entry]));

      expect(byName["file.txt"]).toEqual({
        name: "file.txt",
        isDirectory: false,
        isFile: true,
        isSymbolicLink: false,
      });
      expect(byName["subdir"]?.isDirectory).toBe(true);
      expect(byName["link"]?.isSymbolicLink).toBe(true);
    });

    it("keeps the order reported by the operating system", async () => {
      for (const name of ["marksman-b", "marksman-a", "marksman-c"]) {
        await nodeWriteFile(join(tempDir.path, name), "");
      }

      const entries = await fs.readdir(tempDir.path);

      expect(entries.map((entry) => entry.name)).toEqual(await nodeReaddir(tempDir.path));
    });

    it("throws ENOENT for non-existent directory", async () => {
      const error = await captureError(fs.readdir(join(tempDir.path, "missing")));

      expect(error.fsCode).toBe("ENOENT");
    });

    it("throws ENOTDIR when path is a file", async () => {
      const filePath = join(tempDir.path, "file");
      await nodeWriteFile(filePath, "");

      const error = await captureError(fs.readdir(filePath));

      expect(error.fsCode).toBe("ENOTDIR");
    });
  });

  describe("stat", () => {
    it("returns size and type for a file", async () => {
      const filePath = join(tempDir.path, "file");
      await nodeWriteFile(filePath, "12345");

      expect(await fs.stat(filePath)).toEqual({ size: 5, isFile: true, isDirectory: false });
    });

    it("reports directories", async () => {
      const result = await fs.stat(tempDir.path);

      expect(result.isDirectory).toBe(true);
      expect(result.isFile).toBe(false);
    });

    it("throws ENOENT for non-existent path", async () => {
      const error = await captureError(fs.stat(join(tempDir.path, "missing")));

      expect(error.fsCode).toBe("ENOENT");
    });
  });

  describe("rm", () => {
    it("deletes file", async () => {
      const filePath = join(tempDir.path, "file");
      await nodeWriteFile(filePath, "");

      await fs.rm(filePath);

      expect(await nodeReaddir(tempDir.path)).toEqual([]);
    });

    it("deletes directory tree with recursive option", async () => {
      const dirPath = join(tempDir.path, "tree");
      await nodeMkdir(join(dirPath, "nested"), { recursive: true });
      await nodeWriteFile(join(dirPath, "nested", "file"), "");

      await fs.rm(dirPath, { recursive: true });

      expect(await nodeReaddir(tempDir.path)).toEqual([]);
    });

    it("throws ENOTEMPTY for non-empty directory without recursive option", async () => {
      const dirPath = join(tempDir.path, "tree");
      await nodeMkdir(dirPath);
      await nodeWriteFile(join(dirPath, "file"), "");

      const error = await captureError(fs.rm(dirPath));

      expect(error.fsCode).toBe("ENOTEMPTY");
    });

    it("throws ENOENT for non-existent path", async () => {
      const error = await captureError(fs.rm(join(tempDir.path, "missing")));

      expect(error.fsCode).toBe("ENOENT");
    });

    it("does not throw with force option for non-existent path", async () => {
      await expect(fs.rm(join(tempDir.path, "missing"), { force: true })).resolves.toBeUndefined();
    });
  });

  describe.skipIf(process.platform === "win32")("makeExecutable", () => {
    it("sets mode 0o755", async () => {
      const filePath = join(tempDir.path, "marksman-v1");
      await nodeWriteFile(filePath, "#!/bin/sh\n", { mode: 0o644 });

      await fs.makeExecutable(filePath);

      expect((await nodeStat(filePath)).mode & 0o777).toBe(0o755);
    });

    it("throws ENOENT for non-existent file", async () => {
      const error = await captureError(fs.makeExecutable(join(tempDir.path, "missing")));

      expect(error.fsCode).toBe("ENOENT");
    });
  });
});
