/**
 * Behavioral mock for FileSystemLayer with in-memory state.
 *
 * Provides a stateful mock that simulates real filesystem behavior:
 * - In-memory file/directory storage
 * - Proper error handling (ENOENT, EISDIR, etc.)
 * - Directory listings in insertion order (like an unsorted readdir)
 * - Custom matchers for behavioral assertions
 *
 * @example
 * const mock = createFileSystemMock({
 *   entries: {
 *     "/data/languages/marksman": directory(),
 *     "/data/languages/marksman/marksman-2024-11-20": file("old"),
 *   },
 * });
 *
 * await mock.writeFile("/data/config.json", "{}");
 * expect(mock).toHaveFile("/data/config.json", "{}");
 */

import { posix } from "node:path";
import { expect, vi, type Mock } from "vitest";
import type { DirEntry, FileStat, FileSystemLayer, MkdirOptions, RmOptions } from "./filesystem";
import { FileSystemError, type FileSystemErrorCode } from "../errors";
import {
  createSnapshot,
  type MockState,
  type MockWithState,
  type Snapshot,
  type MatcherImplementationsFor,
} from "../../test/state-mock";

// =============================================================================
// Entry Types
// =============================================================================

/**
 * File entry in the mock filesystem.
 */
export interface FileEntry {
  readonly type: "file";
  readonly content: string | Buffer;
  readonly executable?: boolean;
  /** If set, accessing this entry throws an error with this code */
  readonly error?: FileSystemErrorCode;
}

/**
 * Directory entry in the mock filesystem.
 */
export interface DirectoryEntry {
  readonly type: "directory";
  /** If set, accessing this entry throws an error with this code */
  readonly error?: FileSystemErrorCode;
}

export type Entry = FileEntry | DirectoryEntry;

// =============================================================================
// State Interface
// =============================================================================

/**
 * State interface for the filesystem mock.
 */
export interface FileSystemMockState extends MockState {
  /**
   * Read-only access to all filesystem entries.
   * Keys are normalized forward-slash paths.
   */
  readonly entries: ReadonlyMap<string, Entry>;

  /**
   * Set an entry in the filesystem.
   * Auto-creates parent directories; does NOT follow real filesystem semantics.
   */
  setEntry(path: string, entry: Entry): void;

  /**
   * Remove an entry (and its children) without any checks.
   */
  deleteEntry(path: string): void;

  snapshot(): Snapshot;

  /**
   * Human-readable representation of filesystem state.
   * Sorted alphabetically for deterministic output.
   */
  toString(): string;
}

/**
 * FileSystemLayer with behavioral mock state access via `$` property.
 */
export type MockFileSystemLayer = FileSystemLayer & MockWithState<FileSystemMockState>;

// =============================================================================
// Entry Helper Functions
// =============================================================================

/**
 * Create a file entry.
 *
 * @example
 * file("hello world")
 * file(Buffer.from([0x7f, 0x45, 0x4c, 0x46]))
 * file("content", { executable: true })
 * file("secret", { error: "EACCES" })
 */
export function file(
  content: string | Buffer,
  options?: {
    executable?: boolean;
    error?: FileSystemErrorCode;
  }
): FileEntry {
  return {
    type: "file" as const,
    content,
    ...(options?.executable !== undefined && { executable: options.executable }),
    ...(options?.error !== undefined && { error: options.error }),
  };
}

/**
 * Create a directory entry.
 *
 * @example
 * directory()
 * directory({ error: "EACCES" })
 */
export function directory(options?: { error?: FileSystemErrorCode }): DirectoryEntry {
  return {
    type: "directory" as const,
    ...(options?.error !== undefined && { error: options.error }),
  };
}

// =============================================================================
// State Implementation
// =============================================================================

/**
 * Normalize a path for use as a map key.
 * Backslashes become forward slashes so win32-style joins map to the same keys.
 */
function normalizePath(path: string): string {
  const normalized = posix.normalize(path.replace(/\\/g, "/"));
  return normalized.length > 1 && normalized.endsWith("/") ? normalized.slice(0, -1) : normalized;
}

/**
 * Get parent path of a normalized path.
 */
function getParentPath(normalizedPath: string): string | null {
  const parent = posix.dirname(normalizedPath);
  return parent === normalizedPath ? null : parent;
}

function childPrefix(path: string): string {
  return path.endsWith("/") ? path : path + "/";
}

function contentLength(content: string | Buffer): number {
  return typeof content === "string" ? Buffer.byteLength(content) : content.length;
}

class FileSystemMockStateImpl implements FileSystemMockState {
  private readonly _entries: Map<string, Entry>;

  constructor(initialEntries?: Map<string, Entry>) {
    this._entries = new Map();
    for (const [path, entry] of initialEntries ?? []) {
      this.setEntry(path, entry);
    }
  }

  get entries(): ReadonlyMap<string, Entry> {
    return this._entries;
  }

  setEntry(path: string, entry: Entry): void {
    const normalizedPath = normalizePath(path);

    // Auto-create parent directories (test helper convenience)
    const missingParents: string[] = [];
    let parent = getParentPath(normalizedPath);
    while (parent !== null) {
      if (!this._entries.has(parent)) {
        missingParents.unshift(parent);
      }
      parent = getParentPath(parent);
    }
    for (const missing of missingParents) {
      this._entries.set(missing, directory());
    }

    this._entries.set(normalizedPath, entry);
  }

  deleteEntry(path: string): void {
    const normalizedPath = normalizePath(path);
    const prefix = childPrefix(normalizedPath);
    for (const key of [...this._entries.keys()]) {
      if (key === normalizedPath || key.startsWith(prefix)) {
        this._entries.delete(key);
      }
    }
  }

  snapshot(): Snapshot {
    return createSnapshot(this.toString());
  }

  toString(): string {
    const sorted = [...this._entries.entries()].sort(([a], [b]) => a.localeCompare(b));
    const lines = sorted.map(([path, entry]) => {
      if (entry.type === "file") {
        const rawContent: string | Buffer = entry.content;
        let content: string;
        if (typeof rawContent === "string") {
          content = rawContent.length > 50 ? rawContent.substring(0, 50) + "..." : rawContent;
        } else {
          content = `<Buffer ${rawContent.length} bytes>`;
        }
        const flags = [
          entry.executable ? "exec" : null,
          entry.error ? `error:${entry.error}` : null,
        ]
          .filter(Boolean)
          .join(",");
        return `${path}: file(${JSON.stringify(content)})${flags ? ` [${flags}]` : ""}`;
      }
      const flags = entry.error ? ` [error:${entry.error}]` : "";
      return `${path}: directory${flags}`;
    });
    return lines.join("\n");
  }
}

// =============================================================================
// Factory Options
// =============================================================================

/**
 * Options for creating a mock filesystem.
 */
export interface MockFileSystemOptions {
  /**
   * Initial entries in the filesystem, in listing order.
   */
  entries?: Map<string, Entry> | Record<string, Entry>;
}

// =============================================================================
// Factory Implementation
// =============================================================================

/**
 * Create a behavioral mock for FileSystemLayer.
 *
 * @example Error simulation
 * const mock = createFileSystemMock({
 *   entries: {
 *     "/data/languages": directory({ error: "EACCES" }),
 *   },
 * });
 */
export function createFileSystemMock(options?: MockFileSystemOptions): MockFileSystemLayer {
  const initialEntries = new Map<string, Entry>();
  if (options?.entries) {
    const entries =
      options.entries instanceof Map ? options.entries.entries() : Object.entries(options.entries);
    for (const [key, entry] of entries) {
      initialEntries.set(key, entry);
    }
  }

  const state = new FileSystemMockStateImpl(initialEntries);

  // Helper to throw configured error
  const throwIfError = (entry: Entry | undefined, path: string): void => {
    if (entry?.error) {
      throw new FileSystemError(entry.error, path, `Mock error: ${entry.error}`);
    }
  };

  // Writes require an existing parent directory and a non-directory target
  const assertWritable = (path: string): void => {
    const existing = state.entries.get(path);
    throwIfError(existing, path);
    if (existing?.type === "directory") {
      throw new FileSystemError("EISDIR", path, `Is a directory: ${path}`);
    }

    const parent = getParentPath(path);
    if (parent !== null) {
      const parentEntry = state.entries.get(parent);
      if (!parentEntry) {
        throw new FileSystemError("ENOENT", path, `Parent directory not found: ${parent}`);
      }
      if (parentEntry.type !== "directory") {
        throw new FileSystemError("ENOTDIR", path, `Parent is not a directory: ${parent}`);
      }
      throwIfError(parentEntry, parent);
    }
  };

  const layer: FileSystemLayer = {
    async readFile(rawPath: string): Promise<string> {
      const path = normalizePath(rawPath);
      const entry = state.entries.get(path);

      if (!entry) {
        throw new FileSystemError("ENOENT", path, `File not found: ${path}`);
      }

      throwIfError(entry, path);

      if (entry.type === "directory") {
        throw new FileSystemError("EISDIR", path, `Is a directory: ${path}`);
      }

      const fileContent: string | Buffer = entry.content;
      if (typeof fileContent === "string") {
        return fileContent;
      }
      return fileContent.toString("utf-8");
    },

    async writeFile(rawPath: string, content: string): Promise<void> {
      const path = normalizePath(rawPath);
      assertWritable(path);
      state.setEntry(path, file(content));
    },

    async writeFileBuffer(rawPath: string, content: Buffer): Promise<void> {
      const path = normalizePath(rawPath);
      assertWritable(path);
      state.setEntry(path, file(Buffer.from(content)));
    },

    async writeFileStream(rawPath: string, chunks: AsyncIterable<Uint8Array>): Promise<void> {
      const path = normalizePath(rawPath);
      assertWritable(path);
      // Truncate first, like opening a write stream does
      state.setEntry(path, file(Buffer.alloc(0)));

      const parts: Buffer[] = [];
      try {
        for await (const chunk of chunks) {
          parts.push(Buffer.from(chunk));
          state.setEntry(path, file(Buffer.concat(parts)));
        }
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new FileSystemError(
          "UNKNOWN",
          path,
          message,
          error instanceof Error ? error : undefined
        );
      }
    },

    async mkdir(rawPath: string, mkdirOptions?: MkdirOptions): Promise<void> {
      const path = normalizePath(rawPath);
      const recursive = mkdirOptions?.recursive ?? true;
      const existing = state.entries.get(path);

      throwIfError(existing, path);

      // If directory already exists, no-op
      if (existing?.type === "directory") {
        return;
      }

      if (existing?.type === "file") {
        throw new FileSystemError("EEXIST", path, `File exists at path: ${path}`);
      }

      const parent = getParentPath(path);
      if (parent !== null) {
        const parentEntry = state.entries.get(parent);
        if (parentEntry?.type === "file") {
          throw new FileSystemError("ENOTDIR", path, `Not a directory: ${parent}`);
        }
        throwIfError(parentEntry, parent);
        if (!parentEntry) {
          if (!recursive) {
            throw new FileSystemError("ENOENT", path, `Parent directory not found: ${parent}`);
          }
          await layer.mkdir(parent, { recursive: true });
        }
      }

      state.setEntry(path, directory());
    },

    async readdir(rawPath: string): Promise<readonly DirEntry[]> {
      const path = normalizePath(rawPath);
      const entry = state.entries.get(path);

      if (!entry) {
        throw new FileSystemError("ENOENT", path, `Directory not found: ${path}`);
      }

      throwIfError(entry, path);

      if (entry.type !== "directory") {
        throw new FileSystemError("ENOTDIR", path, `Not a directory: ${path}`);
      }

      // Direct children in insertion order
      const prefix = childPrefix(path);
      const children: DirEntry[] = [];
      for (const [entryPath, e] of state.entries) {
        if (entryPath.startsWith(prefix)) {
          const relativePath = entryPath.substring(prefix.length);
          if (relativePath.length > 0 && !relativePath.includes("/")) {
            children.push({
              name: relativePath,
              isDirectory: e.type === "directory",
              isFile: e.type === "file",
              isSymbolicLink: false,
            });
          }
        }
      }

      return children;
    },

    async stat(rawPath: string): Promise<FileStat> {
      const path = normalizePath(rawPath);
      const entry = state.entries.get(path);

      if (!entry) {
        throw new FileSystemError("ENOENT", path, `Path not found: ${path}`);
      }

      throwIfError(entry, path);

      return {
        size: entry.type === "file" ? contentLength(entry.content) : 0,
        isFile: entry.type === "file",
        isDirectory: entry.type === "directory",
      };
    },

    async rm(rawPath: string, rmOptions?: RmOptions): Promise<void> {
      const path = normalizePath(rawPath);
      const recursive = rmOptions?.recursive ?? false;
      const force = rmOptions?.force ?? false;
      const entry = state.entries.get(path);

      if (!entry) {
        if (force) return;
        throw new FileSystemError("ENOENT", path, `Path not found: ${path}`);
      }

      throwIfError(entry, path);

      if (entry.type === "directory" && !recursive) {
        const prefix = childPrefix(path);
        const hasChildren = [...state.entries.keys()].some((k) => k.startsWith(prefix));
        if (hasChildren) {
          throw new FileSystemError("ENOTEMPTY", path, `Directory not empty: ${path}`);
        }
      }

      state.deleteEntry(path);
    },

    async makeExecutable(rawPath: string): Promise<void> {
      const path = normalizePath(rawPath);
      const entry = state.entries.get(path);

      if (!entry) {
        throw new FileSystemError("ENOENT", path, `File not found: ${path}`);
      }

      throwIfError(entry, path);

      if (entry.type !== "file") {
        // chmod on a directory succeeds on a real filesystem; the mock only tracks files
        return;
      }

      state.setEntry(path, { ...entry, executable: true });
    },
  };

  return Object.assign(layer, { $: state });
}

// =============================================================================
// Custom Matchers
// =============================================================================

/**
 * Custom matchers for filesystem mock assertions.
 */
interface FileSystemMatchers {
  /**
   * Assert that a file exists with optional content check.
   * Buffer and string content compare by bytes.
   */
  toHaveFile(path: string, content?: string | Buffer): void;

  /**
   * Assert that a directory exists.
   */
  toHaveDirectory(path: string): void;

  /**
   * Assert the exact names directly inside a directory, in listing order.
   */
  toHaveDirectoryEntries(path: string, names: readonly string[]): void;

  /**
   * Assert that a file has its executable flag set.
   */
  toBeExecutable(path: string): void;
}

declare module "vitest" {
  interface Assertion<T> extends FileSystemMatchers {}
}

function toBuffer(content: string | Buffer): Buffer {
  return typeof content === "string" ? Buffer.from(content, "utf-8") : content;
}

function describeContent(content: string | Buffer): string {
  return typeof content === "string"
    ? JSON.stringify(content)
    : `<Buffer ${content.length} bytes>`;
}

export const fileSystemMatchers: MatcherImplementationsFor<
  MockFileSystemLayer,
  FileSystemMatchers
> = {
  toHaveFile(received, path, content?) {
    const normalizedPath = normalizePath(path);
    const entry = received.$.entries.get(normalizedPath);

    if (!entry) {
      return {
        pass: false,
        message: () => `Expected file at ${normalizedPath} but it does not exist`,
      };
    }

    if (entry.type !== "file") {
      return {
        pass: false,
        message: () => `Expected file at ${normalizedPath} but found ${entry.type}`,
      };
    }

    if (content !== undefined && !toBuffer(content).equals(toBuffer(entry.content))) {
      return {
        pass: false,
        message: () =>
          `Expected file ${normalizedPath} to have content ${describeContent(content)} but got ${describeContent(entry.content)}`,
      };
    }

    return {
      pass: true,
      message: () => `Expected ${normalizedPath} not to be a file`,
    };
  },

  toHaveDirectory(received, path) {
    const normalizedPath = normalizePath(path);
    const entry = received.$.entries.get(normalizedPath);

    if (!entry) {
      return {
        pass: false,
        message: () => `Expected directory at ${normalizedPath} but it does not exist`,
      };
    }

    if (entry.type !== "directory") {
      return {
        pass: false,
        message: () => `Expected directory at ${normalizedPath} but found ${entry.type}`,
      };
    }

    return {
      pass: true,
      message: () => `Expected ${normalizedPath} not to be a directory`,
    };
  },

  toHaveDirectoryEntries(received, path, names) {
    const normalizedPath = normalizePath(path);
    const prefix = childPrefix(normalizedPath);
    const actual = [...received.$.entries.keys()]
      .filter((key) => key.startsWith(prefix))
      .map((key) => key.substring(prefix.length))
      .filter((name) => name.length > 0 && !name.includes("/"));
    const pass = actual.length === names.length && actual.every((name, i) => name === names[i]);

    return {
      pass,
      message: () =>
        pass
          ? `Expected ${normalizedPath} not to contain exactly ${JSON.stringify(names)}`
          : `Expected ${normalizedPath} to contain ${JSON.stringify(names)} but found ${JSON.stringify(actual)}`,
    };
  },

  toBeExecutable(received, path) {
    const normalizedPath = normalizePath(path);
    const entry = received.$.entries.get(normalizedPath);

    if (!entry) {
      return {
        pass: false,
        message: () => `Expected file at ${normalizedPath} but it does not exist`,
      };
    }

    if (entry.type !== "file") {
      return {
        pass: false,
        message: () => `Expected file at ${normalizedPath} but found ${entry.type}`,
      };
    }

    if (!entry.executable) {
      return {
        pass: false,
        message: () => `Expected file ${normalizedPath} to be executable`,
      };
    }

    return {
      pass: true,
      message: () => `Expected file ${normalizedPath} not to be executable`,
    };
  },
};

// Register matchers with expect
expect.extend(fileSystemMatchers);

// =============================================================================
// Spy FileSystemLayer Factory
// =============================================================================

/**
 * FileSystemLayer with vi.fn() spies for asserting on method calls.
 * Each method is a Vitest Mock that wraps the behavioral mock implementation.
 */
export interface SpyFileSystemLayer extends FileSystemLayer {
  readFile: Mock<FileSystemLayer["readFile"]>;
  writeFile: Mock<FileSystemLayer["writeFile"]>;
  writeFileBuffer: Mock<FileSystemLayer["writeFileBuffer"]>;
  writeFileStream: Mock<FileSystemLayer["writeFileStream"]>;
  mkdir: Mock<FileSystemLayer["mkdir"]>;
  readdir: Mock<FileSystemLayer["readdir"]>;
  stat: Mock<FileSystemLayer["stat"]>;
  rm: Mock<FileSystemLayer["rm"]>;
  makeExecutable: Mock<FileSystemLayer["makeExecutable"]>;
  /** State access for behavioral mock */
  $: FileSystemMockState;
}

/**
 * Create a FileSystemLayer with vi.fn() spies for testing.
 * Use when you need to assert on method calls.
 *
 * @example
 * ```typescript
 * const fs = createSpyFileSystemLayer({ entries: { "/data": directory() } });
 * await cache.materialize(tool, version, containerDir);
 * expect(fs.makeExecutable).not.toHaveBeenCalled();
 * ```
 */
export function createSpyFileSystemLayer(options?: MockFileSystemOptions): SpyFileSystemLayer {
  const mock = createFileSystemMock(options);
  return {
    readFile: vi.fn(mock.readFile),
    writeFile: vi.fn(mock.writeFile),
    writeFileBuffer: vi.fn(mock.writeFileBuffer),
    writeFileStream: vi.fn(mock.writeFileStream),
    mkdir: vi.fn(mock.mkdir),
    readdir: vi.fn(mock.readdir),
    stat: vi.fn(mock.stat),
    rm: vi.fn(mock.rm),
    makeExecutable: vi.fn(mock.makeExecutable),
    $: mock.$,
  };
}
