/**
 * Core types shared by the provisioning services.
 */

/**
 * An executable ready to be launched by the host.
 */
export interface LanguageServerBinary {
  /** Absolute path to the executable */
  readonly path: string;
  /** Environment override, null to inherit the host environment */
  readonly env: Readonly<Record<string, string>> | null;
  /** Arguments to launch with */
  readonly arguments: readonly string[];
}

/**
 * Suffix appended to the tool name for one OS.
 * A string applies to every architecture; a table is keyed by architecture.
 */
export type AssetSuffix = string | Readonly<Partial<Record<NodeJS.Architecture, string>>>;

/**
 * Release asset suffixes keyed by OS.
 */
export type AssetSuffixTable = Readonly<Partial<Record<NodeJS.Platform, AssetSuffix>>>;

/**
 * Everything needed to provision one tool distributed through GitHub releases.
 */
export interface ToolConfig {
  /** Tool name: cache key, PATH lookup name and cache file prefix */
  readonly name: string;
  /** GitHub repository as `owner/name` */
  readonly repository: string;
  readonly assetSuffixes: AssetSuffixTable;
  /** Arguments the server is launched with */
  readonly serverArguments: readonly string[];
  /** Whether prereleases count as the latest release */
  readonly includePrereleases: boolean;
}

/**
 * A resolved release: tag name and the download URL of this platform's asset.
 */
export interface ReleaseVersion {
  readonly name: string;
  readonly url: string;
}

/**
 * Progress information for binary downloads.
 */
export interface DownloadProgress {
  /** Number of bytes downloaded so far */
  readonly bytesDownloaded: number;
  /** Total bytes to download, null if Content-Length not provided */
  readonly totalBytes: number | null;
}

/**
 * Callback for download progress updates.
 */
export type DownloadProgressCallback = (progress: DownloadProgress) => void;
