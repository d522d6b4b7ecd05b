/**
 * FileSystemLayer - Abstraction over filesystem operations.
 *
 * Provides an injectable interface for filesystem access, enabling:
 * - Unit testing of services with a behavioral mock FileSystemLayer
 * - Boundary testing of DefaultFileSystemLayer against the real filesystem
 * - Consistent error handling via FileSystemError
 */

import { createWriteStream } from "node:fs";
import * as fs from "node:fs/promises";
import { pipeline } from "node:stream/promises";
import { FileSystemError, isFileSystemErrorCode } from "../errors";
import type { Logger } from "../logging";

/**
 * Directory entry returned by readdir.
 */
export interface DirEntry {
  /** Entry name (not full path) */
  readonly name: string;
  /** True if entry is a directory */
  readonly isDirectory: boolean;
  /** True if entry is a regular file */
  readonly isFile: boolean;
  /** True if entry is a symbolic link */
  readonly isSymbolicLink: boolean;
}

/**
 * Metadata returned by stat.
 */
export interface FileStat {
  /** Size in bytes */
  readonly size: number;
  readonly isFile: boolean;
  readonly isDirectory: boolean;
}

/**
 * Options for mkdir operation.
 */
export interface MkdirOptions {
  /** Create parent directories if they don't exist (default: true) */
  readonly recursive?: boolean;
}

/**
 * Options for rm operation.
 */
export interface RmOptions {
  /** Remove directories and their contents recursively (default: false) */
  readonly recursive?: boolean;
  /** Ignore errors if path doesn't exist (default: false) */
  readonly force?: boolean;
}

export type { FileSystemErrorCode } from "../errors";

/**
 * Abstraction over filesystem operations.
 *
 * All paths are absolute native paths.
 * All text operations use UTF-8 encoding.
 * Methods throw FileSystemError on failures.
 */
export interface FileSystemLayer {
  /**
   * Read entire file as UTF-8 string.
   *
   * @throws FileSystemError with code ENOENT if file not found
   * @throws FileSystemError with code EISDIR if path is a directory
   */
  readFile(path: string): Promise<string>;

  /**
   * Write UTF-8 content to file. Overwrites existing file.
   *
   * @throws FileSystemError with code ENOENT if parent directory doesn't exist
   */
  writeFile(path: string, content: string): Promise<void>;

  /**
   * Write binary content to file. Overwrites existing file.
   * An empty buffer creates (or truncates to) a zero-byte file.
   *
   * @throws FileSystemError with code ENOENT if parent directory doesn't exist
   */
  writeFileBuffer(path: string, content: Buffer): Promise<void>;

  /**
   * Stream chunks into a file, overwriting it. Resolves once every chunk is flushed.
   *
   * @example
   * await fs.writeFileStream('/data/languages/marksman/marksman-2024-12-18', chunks);
   */
  writeFileStream(path: string, chunks: AsyncIterable<Uint8Array>): Promise<void>;

  /**
   * Create directory. Creates parent directories by default.
   * No-op if directory already exists.
   *
   * @throws FileSystemError with code EEXIST if path exists as a file
   */
  mkdir(path: string, options?: MkdirOptions): Promise<void>;

  /**
   * List directory contents in the order the operating system reports them.
   *
   * @throws FileSystemError with code ENOENT if directory not found
   * @throws FileSystemError with code ENOTDIR if path is not a directory
   */
  readdir(path: string): Promise<readonly DirEntry[]>;

  /**
   * Read file metadata, following symlinks.
   *
   * @throws FileSystemError with code ENOENT if path not found
   */
  stat(path: string): Promise<FileStat>;

  /**
   * Delete file or directory.
   *
   * @throws FileSystemError with code ENOENT if path not found (unless force: true)
   * @throws FileSystemError with code ENOTEMPTY if directory not empty (unless recursive: true)
   *
   * @example Remove directory tree
   * await fs.rm('/path/to/dir', { recursive: true, force: true });
   */
  rm(path: string, options?: RmOptions): Promise<void>;

  /**
   * Set mode 0o755 on a file.
   * Callers decide whether the platform needs it.
   *
   * @throws FileSystemError with code ENOENT if file not found
   */
  makeExecutable(path: string): Promise<void>;
}

// ============================================================================
// Helper Functions
// ============================================================================

function readStringProperty(value: object, key: string): string | undefined {
  const property: unknown = Reflect.get(value, key);
  return typeof property === "string" ? property : undefined;
}

/**
 * Extract the POSIX error code from a Node.js error.
 * fs.rm() raises SystemErrors with ERR_FS_* codes whose info.code holds the POSIX code.
 */
function extractErrorCode(error: Error): string | undefined {
  const info: unknown = Reflect.get(error, "info");
  if (typeof info === "object" && info !== null) {
    const infoCode = readStringProperty(info, "code");
    if (infoCode) {
      return infoCode;
    }
  }
  return readStringProperty(error, "code");
}

/**
 * Map a Node.js filesystem error to a FileSystemError.
 */
function mapError(error: unknown, path: string): FileSystemError {
  if (!(error instanceof Error)) {
    return new FileSystemError("UNKNOWN", path, String(error));
  }

  const code = extractErrorCode(error);

  if (code !== "UNKNOWN" && isFileSystemErrorCode(code)) {
    return new FileSystemError(code, path, error.message, error);
  }

  // Unknown error code - preserve original code
  return new FileSystemError("UNKNOWN", path, error.message, error, code);
}

// ============================================================================
// DefaultFileSystemLayer Implementation
// ============================================================================

/**
 * Default implementation of FileSystemLayer using node:fs/promises.
 * Maps Node.js errors to FileSystemError for consistent error handling.
 */
export class DefaultFileSystemLayer implements FileSystemLayer {
  constructor(private readonly logger: Logger) {}

  async readFile(filePath: string): Promise<string> {
    this.logger.debug("Read", { path: filePath });
    try {
      return await fs.readFile(filePath, "utf-8");
    } catch (error) {
      throw this.fail("Read failed", filePath, error);
    }
  }

  async writeFile(filePath: string, content: string): Promise<void> {
    this.logger.debug("Write", { path: filePath });
    try {
      await fs.writeFile(filePath, content, "utf-8");
    } catch (error) {
      throw this.fail("Write failed", filePath, error);
    }
  }

  async writeFileBuffer(filePath: string, content: Buffer): Promise<void> {
    this.logger.debug("WriteBuffer", { path: filePath, size: content.length });
    try {
      await fs.writeFile(filePath, content);
    } catch (error) {
      throw this.fail("WriteBuffer failed", filePath, error);
    }
  }

  async writeFileStream(filePath: string, chunks: AsyncIterable<Uint8Array>): Promise<void> {
    this.logger.debug("WriteStream", { path: filePath });
    try {
      await pipeline(chunks, createWriteStream(filePath));
    } catch (error) {
      throw this.fail("WriteStream failed", filePath, error);
    }
    this.logger.debug("WriteStream complete", { path: filePath });
  }

  async mkdir(dirPath: string, options?: MkdirOptions): Promise<void> {
    const recursive = options?.recursive ?? true;
    this.logger.debug("Mkdir", { path: dirPath });
    try {
      await fs.mkdir(dirPath, { recursive });
    } catch (error) {
      throw this.fail("Mkdir failed", dirPath, error);
    }
  }

  async readdir(dirPath: string): Promise<readonly DirEntry[]> {
    try {
      const entries = await fs.readdir(dirPath, { withFileTypes: true });
      const result = entries.map((entry) => ({
        name: entry.name,
        isDirectory: entry.isDirectory(),
        isFile: entry.isFile(),
        isSymbolicLink: entry.isSymbolicLink(),
      }));
      this.logger.debug("Readdir", { path: dirPath, count: result.length });
      return result;
    } catch (error) {
      throw this.fail("Readdir failed", dirPath, error);
    }
  }

  async stat(targetPath: string): Promise<FileStat> {
    try {
      const stats = await fs.stat(targetPath);
      return {
        size: stats.size,
        isFile: stats.isFile(),
        isDirectory: stats.isDirectory(),
      };
    } catch (error) {
      // A missing file is an expected answer for stat; keep it out of the warn log
      const fsError = mapError(error, targetPath);
      if (fsError.fsCode !== "ENOENT") {
        this.logWarn("Stat failed", targetPath, fsError);
      }
      throw fsError;
    }
  }

  async rm(targetPath: string, options?: RmOptions): Promise<void> {
    const recursive = options?.recursive ?? false;
    const force = options?.force ?? false;
    this.logger.debug("Rm", { path: targetPath, recursive });
    try {
      if (recursive) {
        await fs.rm(targetPath, { recursive, force });
      } else {
        const stats = await fs.stat(targetPath);
        if (stats.isDirectory()) {
          // rmdir fails with ENOTEMPTY if not empty
          await fs.rmdir(targetPath);
        } else {
          await fs.rm(targetPath, { force });
        }
      }
    } catch (error) {
      const fsError = mapError(error, targetPath);
      if (force && fsError.fsCode === "ENOENT") {
        return;
      }
      this.logWarn("Rm failed", targetPath, fsError);
      throw fsError;
    }
  }

  async makeExecutable(filePath: string): Promise<void> {
    this.logger.debug("Chmod", { path: filePath, mode: "755" });
    try {
      await fs.chmod(filePath, 0o755);
    } catch (error) {
      throw this.fail("Chmod failed", filePath, error);
    }
  }

  private fail(message: string, path: string, error: unknown): FileSystemError {
    const fsError = mapError(error, path);
    this.logWarn(message, path, fsError);
    return fsError;
  }

  private logWarn(message: string, path: string, fsError: FileSystemError): void {
    this.logger.warn(message, {
      path,
      code: fsError.fsCode,
      error: fsError.message,
    });
  }
}
