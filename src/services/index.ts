/**
 * Public API exports for the services layer.
 * All services are plain Node.js behind injectable platform interfaces.
 */

// Core types
export type {
  AssetSuffix,
  AssetSuffixTable,
  DownloadProgress,
  DownloadProgressCallback,
  LanguageServerBinary,
  ReleaseVersion,
  ToolConfig,
} from "./types";

// Error types
export {
  ServiceError,
  ProvisioningError,
  ConfigError,
  FileSystemError,
  isServiceError,
  isProvisioningError,
  getErrorMessage,
} from "./errors";
export type { SerializedError, ProvisioningErrorCode, FileSystemErrorCode } from "./errors";

// Logging
export { NodeLogService, SILENT_LOGGER, createSilentLogger, LogLevel } from "./logging";
export type { Logger, LoggerName, LogContext, LoggingService } from "./logging";

// Platform layer
export {
  createPlatformInfo,
  requiresExecutableBit,
  DefaultPathProvider,
  DefaultFileSystemLayer,
  DefaultHttpClient,
  ExecaProcessRunner,
} from "./platform";
export type {
  PlatformInfo,
  PathProvider,
  FileSystemLayer,
  DirEntry,
  FileStat,
  HttpClient,
  HttpRequestOptions,
  ProcessRunner,
  ProcessResult,
  SpawnedProcess,
} from "./platform";

// Configuration
export { ConfigService, createConfigService, AppConfigSchema, DEFAULT_APP_CONFIG } from "./config";
export type { AppConfig, BinaryOverride, NetworkConfig, ConfigServiceDeps } from "./config";

// Releases
export { GitHubReleaseClient, ReleaseResolver, GITHUB_API_URL } from "./release";
export type { Release, ReleaseAsset, ReleaseIndexClient, ReleaseQueryOptions } from "./release";

// Download and cache
export {
  BinaryCacheService,
  buildAssetName,
  getCacheEntryPath,
  MARKSMAN_TOOL,
} from "./binary-download";

// Installed and cached binaries
export { BinaryResolutionService, createBinaryResolutionService } from "./binary-resolution";
export type { BinaryResolution, BinarySource } from "./binary-resolution";

// Language servers
export {
  CompletionItemKind,
  formatCompletionLabel,
  GitHubReleaseAdapter,
  LanguageServerBinaryProvider,
} from "./language-server";
export type {
  CodeLabel,
  CompletionItem,
  GetBinaryOptions,
  LanguageServerAdapter,
} from "./language-server";

// Composition root
export { createProvisioning, type Provisioning, type ProvisioningOptions } from "./provisioning";
