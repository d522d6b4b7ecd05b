/**
 * Release asset naming per platform.
 */

import { ProvisioningError } from "../errors";
import type { ToolConfig } from "../types";

/**
 * Build the release asset name for a tool on the given OS and architecture.
 *
 * @returns `<name><suffix>`, e.g. "marksman-linux-x64"
 * @throws ProvisioningError UNSUPPORTED_PLATFORM for an OS missing from the table,
 *   or an architecture missing under a known OS
 *
 * @example
 * buildAssetName(MARKSMAN_TOOL, "darwin", "arm64"); // "marksman-macos"
 */
export function buildAssetName(
  tool: ToolConfig,
  platform: NodeJS.Platform,
  arch: NodeJS.Architecture
): string {
  const entry = tool.assetSuffixes[platform];
  if (entry === undefined) {
    throw new ProvisioningError(`Running on unsupported os: ${platform}`, "UNSUPPORTED_PLATFORM");
  }

  if (typeof entry === "string") {
    return `${tool.name}${entry}`;
  }

  const suffix = entry[arch];
  if (suffix === undefined) {
    throw new ProvisioningError(
      `Running on unsupported architecture: ${arch}`,
      "UNSUPPORTED_PLATFORM"
    );
  }
  return `${tool.name}${suffix}`;
}
