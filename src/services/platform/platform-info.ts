/**
 * Platform information provider.
 * Abstracts process.platform, process.arch, and os.homedir() for testability.
 */

import { homedir } from "node:os";

export interface PlatformInfo {
  /** Operating system platform: 'linux', 'darwin', 'win32', ... */
  readonly platform: NodeJS.Platform;

  /** CPU architecture: 'x64', 'arm64', ... */
  readonly arch: NodeJS.Architecture;

  /** User's home directory */
  readonly homeDir: string;
}

/**
 * Read platform information from the running process.
 */
export function createPlatformInfo(): PlatformInfo {
  return {
    platform: process.platform,
    arch: process.arch,
    homeDir: homedir(),
  };
}

/**
 * Whether a downloaded file needs its execute permission bits set before it can run.
 * Windows decides executability by file extension instead.
 */
export function requiresExecutableBit(platformInfo: PlatformInfo): boolean {
  return platformInfo.platform !== "win32";
}
