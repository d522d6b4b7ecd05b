/**
 * Host-side resolution chain for language server binaries.
 *
 * Order: config override, PATH, then either the cache (network disallowed)
 * or the latest release with the cache as fallback.
 */

import type { BinaryResolution } from "../binary-resolution/types";
import type { ConfigService } from "../config/config-service";
import { ProvisioningError, getErrorMessage } from "../errors";
import type { Logger } from "../logging";
import type { PathProvider } from "../platform/path-provider";
import type { DownloadProgressCallback } from "../types";
import type { LanguageServerAdapter } from "./types";

/**
 * Options for a single binary request.
 */
export interface GetBinaryOptions {
  /** Whether releases may be queried and downloaded. Default: config network.allowDownloads */
  readonly allowNetwork?: boolean;
  readonly onProgress?: DownloadProgressCallback;
}

/**
 * Dependencies for LanguageServerBinaryProvider.
 */
export interface LanguageServerBinaryProviderDeps {
  readonly configService: ConfigService;
  readonly pathProvider: PathProvider;
  readonly logger: Logger;
}

export class LanguageServerBinaryProvider {
  private readonly configService: ConfigService;
  private readonly pathProvider: PathProvider;
  private readonly logger: Logger;

  constructor(deps: LanguageServerBinaryProviderDeps) {
    this.configService = deps.configService;
    this.pathProvider = deps.pathProvider;
    this.logger = deps.logger;
  }

  /**
   * Get a launchable binary for the adapter's server.
   *
   * @throws ProvisioningError BINARY_UNAVAILABLE when every source comes up empty;
   *   the last release or download error is its cause
   *
   * @example
   * const { binary, source } = await provider.getBinary(marksman, { allowNetwork: false });
   * spawn(binary.path, binary.arguments);
   */
  async getBinary(
    adapter: LanguageServerAdapter,
    options: GetBinaryOptions = {}
  ): Promise<BinaryResolution> {
    const config = await this.configService.load();

    const override = config.binaries[adapter.name];
    if (override !== undefined) {
      this.logger.info("Using configured binary", { tool: adapter.name, path: override.path });
      return {
        source: "settings",
        binary: {
          path: override.path,
          env: override.env ?? null,
          arguments: override.arguments ?? adapter.serverArguments,
        },
      };
    }

    const installed = await adapter.checkIfUserInstalled();
    if (installed !== null) {
      this.logger.info("Using system binary", { tool: adapter.name, path: installed.path });
      return { source: "system", binary: installed };
    }

    const containerDir = this.pathProvider.getContainerDir(adapter.name);
    const allowNetwork = options.allowNetwork ?? config.network.allowDownloads;

    let networkError: unknown = undefined;
    if (allowNetwork) {
      try {
        const version = await adapter.fetchLatestServerVersion();
        const binary = await adapter.fetchServerBinary(version, containerDir, options.onProgress);
        this.logger.info("Using downloaded binary", {
          tool: adapter.name,
          version: version.name,
          path: binary.path,
        });
        return { source: "downloaded", binary };
      } catch (error) {
        networkError = error;
        this.logger.error(
          "Failed to fetch binary, falling back to cache",
          { tool: adapter.name, error: getErrorMessage(error) },
          error instanceof Error ? error : undefined
        );
      }
    } else {
      this.logger.debug("Network disabled, using cache", { tool: adapter.name });
    }

    const cached = await adapter.cachedServerBinary(containerDir);
    if (cached !== null) {
      this.logger.info("Using cached binary", { tool: adapter.name, path: cached.path });
      return { source: "cached", binary: cached };
    }

    throw new ProvisioningError(
      networkError === undefined
        ? `no ${adapter.name} binary available`
        : `no ${adapter.name} binary available: ${getErrorMessage(networkError)}`,
      "BINARY_UNAVAILABLE",
      networkError === undefined ? {} : { cause: networkError }
    );
  }
}
