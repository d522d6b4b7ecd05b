/**
 * Locates language server binaries that need no download.
 *
 * Both lookups report absence as null. Failures along the way are logged,
 * never thrown.
 */

import { join } from "node:path";
import { getErrorMessage } from "../errors";
import type { Logger } from "../logging";
import type { DirEntry, FileSystemLayer } from "../platform/filesystem";
import type { PlatformInfo } from "../platform/platform-info";
import type { ProcessRunner } from "../platform/process";
import type { LanguageServerBinary } from "../types";

/**
 * Dependencies for BinaryResolutionService.
 */
export interface BinaryResolutionServiceDeps {
  readonly fileSystem: FileSystemLayer;
  readonly processRunner: ProcessRunner;
  readonly platformInfo: PlatformInfo;
  readonly logger: Logger;
}

/**
 * Service for finding installed and cached binaries.
 */
export class BinaryResolutionService {
  private readonly fileSystem: FileSystemLayer;
  private readonly processRunner: ProcessRunner;
  private readonly platformInfo: PlatformInfo;
  private readonly logger: Logger;

  constructor(deps: BinaryResolutionServiceDeps) {
    this.fileSystem = deps.fileSystem;
    this.processRunner = deps.processRunner;
    this.platformInfo = deps.platformInfo;
    this.logger = deps.logger;
  }

  /**
   * Find a system-installed binary using which (Unix) or where (Windows).
   *
   * @param name - Executable name to look up on PATH
   * @returns Absolute path to the binary or null if not found
   */
  async findSystemBinary(name: string): Promise<string | null> {
    const command = this.platformInfo.platform === "win32" ? "where" : "which";

    try {
      const result = await this.processRunner.run(command, [name]).wait();
      if (result.exitCode !== 0) {
        this.logger.debug("System binary not found", { name, exitCode: result.exitCode });
        return null;
      }

      // 'where' can return multiple lines - use first
      const firstLine = result.stdout.trim().split(/\r?\n/)[0]?.trim();
      if (!firstLine) {
        return null;
      }

      const stat = await this.fileSystem.stat(firstLine);
      if (!stat.isFile) {
        this.logger.debug("System binary is not a file", { name, path: firstLine });
        return null;
      }

      this.logger.debug("Found system binary", { name, path: firstLine });
      return firstLine;
    } catch (error) {
      this.logger.debug("System binary lookup failed", { name, error: getErrorMessage(error) });
      return null;
    }
  }

  /**
   * Use the last entry of a container directory, in listing order.
   * Entries are not compared by version.
   *
   * @param containerDir - The tool's container directory
   * @param toolName - Used in log messages
   * @returns Binary launched without arguments, or null for a missing or empty container
   */
  async findCachedBinary(
    containerDir: string,
    toolName: string
  ): Promise<LanguageServerBinary | null> {
    let entries: readonly DirEntry[];
    try {
      entries = await this.fileSystem.readdir(containerDir);
    } catch (error) {
      this.logger.warn("Cache read failed", {
        tool: toolName,
        path: containerDir,
        error: getErrorMessage(error),
      });
      return null;
    }

    const last = entries.at(-1);
    if (last === undefined) {
      this.logger.warn(`no cached ${toolName} binary`, { path: containerDir });
      return null;
    }

    const path = join(containerDir, last.name);
    this.logger.debug("Found cached binary", { tool: toolName, path });
    return { path, env: null, arguments: [] };
  }
}

/**
 * Create a BinaryResolutionService instance.
 */
export function createBinaryResolutionService(
  deps: BinaryResolutionServiceDeps
): BinaryResolutionService {
  return new BinaryResolutionService(deps);
}
