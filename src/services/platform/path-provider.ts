import { join, isAbsolute, resolve } from "node:path";
import type { PlatformInfo } from "./platform-info";

/**
 * Application path provider.
 * Abstracts platform-specific data locations.
 */
export interface PathProvider {
  /** Root directory for all application data */
  readonly dataRootDir: string;

  /** Directory for session log files: `<dataRoot>/logs/` */
  readonly logsDir: string;

  /** Directory holding one cache container per tool: `<dataRoot>/languages/` */
  readonly languagesDir: string;

  /** Path to the configuration file: `<dataRoot>/config.json` */
  readonly configPath: string;

  /**
   * Get the cache container directory for a tool.
   * @param toolName Tool name, e.g. "marksman"
   * @returns `<languagesDir>/<toolName>/`
   * @throws TypeError if toolName is empty or contains a path separator
   */
  getContainerDir(toolName: string): string;
}

/**
 * Validate a tool name used as a single directory component.
 */
export function assertToolDirName(toolName: string): void {
  if (!toolName || /[\\/]/.test(toolName) || toolName === "." || toolName === "..") {
    throw new TypeError(`toolName must be a single path component, got: "${toolName}"`);
  }
}

/**
 * Default PathProvider implementation.
 *
 * Path structure:
 * - `LSPROVISION_DATA_DIR` when set (resolved against process.cwd() if relative)
 * - Linux: `~/.local/share/lsprovision/`
 * - macOS: `~/Library/Application Support/lsprovision/`
 * - Windows: `<home>/AppData/Roaming/lsprovision/`
 */
export class DefaultPathProvider implements PathProvider {
  readonly dataRootDir: string;
  readonly logsDir: string;
  readonly languagesDir: string;
  readonly configPath: string;

  constructor(platformInfo: PlatformInfo, env: NodeJS.ProcessEnv = process.env) {
    this.dataRootDir = this.computeDataRootDir(platformInfo, env);
    this.logsDir = join(this.dataRootDir, "logs");
    this.languagesDir = join(this.dataRootDir, "languages");
    this.configPath = join(this.dataRootDir, "config.json");
  }

  getContainerDir(toolName: string): string {
    assertToolDirName(toolName);
    return join(this.languagesDir, toolName);
  }

  /**
   * Compute the data root directory based on override and platform.
   */
  private computeDataRootDir(platformInfo: PlatformInfo, env: NodeJS.ProcessEnv): string {
    const override = env.LSPROVISION_DATA_DIR?.trim();
    if (override) {
      return isAbsolute(override) ? override : resolve(override);
    }

    const { platform, homeDir } = platformInfo;

    switch (platform) {
      case "darwin":
        return join(homeDir, "Library", "Application Support", "lsprovision");
      case "win32":
        return join(homeDir, "AppData", "Roaming", "lsprovision");
      case "linux":
      default:
        return join(homeDir, ".local", "share", "lsprovision");
    }
  }
}
