/**
 * Resolves the latest release of a tool to the download of this platform's asset.
 */

import { buildAssetName } from "../binary-download/asset-name";
import { ProvisioningError, isProvisioningError, getErrorMessage } from "../errors";
import type { Logger } from "../logging";
import type { PlatformInfo } from "../platform/platform-info";
import type { ReleaseVersion, ToolConfig } from "../types";
import type { Release, ReleaseIndexClient } from "./types";

/**
 * Dependencies for ReleaseResolver.
 */
export interface ReleaseResolverDeps {
  readonly releaseClient: ReleaseIndexClient;
  readonly platformInfo: PlatformInfo;
  readonly logger: Logger;
}

export class ReleaseResolver {
  private readonly releaseClient: ReleaseIndexClient;
  private readonly platformInfo: PlatformInfo;
  private readonly logger: Logger;

  constructor(deps: ReleaseResolverDeps) {
    this.releaseClient = deps.releaseClient;
    this.platformInfo = deps.platformInfo;
    this.logger = deps.logger;
  }

  /**
   * Find the latest qualifying release and its asset for this platform.
   * No retries: one index query per call.
   *
   * @throws ProvisioningError RELEASE_QUERY_FAILED, UNSUPPORTED_PLATFORM or NO_MATCHING_ASSET
   */
  async resolveLatest(tool: ToolConfig): Promise<ReleaseVersion> {
    this.logger.debug("Resolving latest release", { tool: tool.name, repository: tool.repository });

    let release: Release;
    try {
      release = await this.releaseClient.latestRelease(tool.repository, {
        includePrereleases: tool.includePrereleases,
        includeDrafts: false,
      });
    } catch (error) {
      if (isProvisioningError(error)) {
        throw error;
      }
      throw new ProvisioningError(
        `error querying releases of ${tool.repository}: ${getErrorMessage(error)}`,
        "RELEASE_QUERY_FAILED",
        { cause: error }
      );
    }

    const assetName = buildAssetName(tool, this.platformInfo.platform, this.platformInfo.arch);
    const asset = release.assets.find((candidate) => candidate.name === assetName);
    if (asset === undefined) {
      throw new ProvisioningError(`no asset found matching "${assetName}"`, "NO_MATCHING_ASSET");
    }

    this.logger.info("Resolved release", {
      tool: tool.name,
      version: release.tagName,
      asset: assetName,
    });
    return { name: release.tagName, url: asset.downloadUrl };
  }
}
