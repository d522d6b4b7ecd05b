/**
 * Fetch-and-cache engine for language server binaries.
 *
 * Each tool owns a container directory. A download is stored as
 * `<container>/<name>-<version>`, marked executable where the platform needs it,
 * and every other entry in the container is removed afterwards.
 */

import { join } from "node:path";
import { ProvisioningError, FileSystemError, getErrorMessage, isProvisioningError } from "../errors";
import type { Logger } from "../logging";
import type { DirEntry, FileSystemLayer } from "../platform/filesystem";
import type { HttpClient } from "../platform/network";
import { requiresExecutableBit, type PlatformInfo } from "../platform/platform-info";
import type {
  DownloadProgressCallback,
  LanguageServerBinary,
  ReleaseVersion,
  ToolConfig,
} from "../types";

// Release binaries are tens of megabytes
const DOWNLOAD_TIMEOUT_MS = 300000;

/**
 * Dependencies for BinaryCacheService.
 */
export interface BinaryCacheServiceDeps {
  readonly httpClient: HttpClient;
  readonly fileSystem: FileSystemLayer;
  readonly platformInfo: PlatformInfo;
  readonly logger: Logger;
}

/**
 * Path of the cache entry for a tool version.
 */
export function getCacheEntryPath(
  tool: ToolConfig,
  version: ReleaseVersion,
  containerDir: string
): string {
  return join(containerDir, `${tool.name}-${version.name}`);
}

/** Read error of a response body, kept apart from errors of the file it is written to */
interface StreamFailure {
  error: unknown;
}

async function* readChunks(
  body: ReadableStream<Uint8Array> | null,
  totalBytes: number | null,
  onProgress: DownloadProgressCallback | undefined,
  failure: StreamFailure
): AsyncGenerator<Uint8Array> {
  if (body === null) {
    return;
  }

  const reader = body.getReader();
  let bytesDownloaded = 0;
  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;

      bytesDownloaded += value.byteLength;
      onProgress?.({ bytesDownloaded, totalBytes });
      yield value;
    }
  } catch (error) {
    failure.error = error;
    throw error;
  } finally {
    reader.releaseLock();
  }
}

export class BinaryCacheService {
  private readonly httpClient: HttpClient;
  private readonly fileSystem: FileSystemLayer;
  private readonly platformInfo: PlatformInfo;
  private readonly logger: Logger;

  constructor(deps: BinaryCacheServiceDeps) {
    this.httpClient = deps.httpClient;
    this.fileSystem = deps.fileSystem;
    this.platformInfo = deps.platformInfo;
    this.logger = deps.logger;
  }

  /**
   * Make sure the given version is in the container and return it as a launchable binary.
   * Returns without any network access when the entry already exists.
   *
   * A download that fails after the entry was created leaves the partial file behind.
   *
   * @throws ProvisioningError DOWNLOAD_FAILED on request, status, stream or write failures
   */
  async materialize(
    tool: ToolConfig,
    version: ReleaseVersion,
    containerDir: string,
    onProgress?: DownloadProgressCallback
  ): Promise<LanguageServerBinary> {
    const binaryPath = getCacheEntryPath(tool, version, containerDir);
    const binary: LanguageServerBinary = {
      path: binaryPath,
      env: null,
      arguments: tool.serverArguments,
    };

    if (await this.exists(binaryPath)) {
      this.logger.debug("Cache hit", { tool: tool.name, version: version.name });
      return binary;
    }

    this.logger.info("Fetch", { tool: tool.name, version: version.name, url: version.url });
    try {
      await this.fileSystem.mkdir(containerDir);
      await this.download(version.url, binaryPath, onProgress);

      if (requiresExecutableBit(this.platformInfo)) {
        await this.fileSystem.makeExecutable(binaryPath);
      }
    } catch (error) {
      this.logger.warn("Fetch failed", {
        tool: tool.name,
        version: version.name,
        error: getErrorMessage(error),
      });
      if (isProvisioningError(error)) {
        throw error;
      }
      throw new ProvisioningError(
        `error writing ${binaryPath}: ${getErrorMessage(error)}`,
        "DOWNLOAD_FAILED",
        { cause: error }
      );
    }

    await this.prune(containerDir, binaryPath);
    this.logger.info("Fetch complete", { tool: tool.name, version: version.name });
    return binary;
  }

  private async exists(path: string): Promise<boolean> {
    try {
      await this.fileSystem.stat(path);
      return true;
    } catch {
      return false;
    }
  }

  private async download(
    url: string,
    destPath: string,
    onProgress: DownloadProgressCallback | undefined
  ): Promise<void> {
    let response: Response;
    try {
      response = await this.httpClient.fetch(url, { timeout: DOWNLOAD_TIMEOUT_MS });
    } catch (error) {
      throw new ProvisioningError(
        `error downloading release: ${getErrorMessage(error)}`,
        "DOWNLOAD_FAILED",
        { cause: error }
      );
    }

    // The entry exists from here on, even if the status turns out to be an error
    try {
      await this.fileSystem.writeFileBuffer(destPath, Buffer.alloc(0));
    } catch (error) {
      await response.body?.cancel();
      throw error;
    }

    if (!response.ok) {
      await response.body?.cancel();
      throw new ProvisioningError(
        `download failed with status ${response.status}`,
        "DOWNLOAD_FAILED",
        { status: response.status }
      );
    }

    const contentLength = response.headers.get("content-length");
    const parsedLength = contentLength ? parseInt(contentLength, 10) : NaN;
    const totalBytes = Number.isNaN(parsedLength) ? null : parsedLength;

    const failure: StreamFailure = { error: undefined };
    try {
      await this.fileSystem.writeFileStream(
        destPath,
        readChunks(response.body, totalBytes, onProgress, failure)
      );
    } catch (error) {
      if (failure.error !== undefined) {
        throw new ProvisioningError(
          `error downloading release: ${getErrorMessage(failure.error)}`,
          "DOWNLOAD_FAILED",
          { cause: failure.error }
        );
      }
      throw error;
    }
  }

  /**
   * Remove every container entry except the one just downloaded.
   * Failures are logged and skipped.
   */
  private async prune(containerDir: string, keepPath: string): Promise<void> {
    let entries: readonly DirEntry[];
    try {
      entries = await this.fileSystem.readdir(containerDir);
    } catch (error) {
      this.logger.warn("Prune failed", { path: containerDir, error: getErrorMessage(error) });
      return;
    }

    for (const entry of entries) {
      const entryPath = join(containerDir, entry.name);
      if (entryPath === keepPath) continue;
      try {
        await this.fileSystem.rm(entryPath, { recursive: true, force: true });
        this.logger.debug("Pruned", { path: entryPath });
      } catch (error) {
        this.logger.warn("Prune failed", {
          path: entryPath,
          error: error instanceof FileSystemError ? error.fsCode : getErrorMessage(error),
        });
      }
    }
  }
}
