/**
 * Platform layer exports.
 *
 * Platform layers abstract OS/runtime-specific operations (processes, network,
 * filesystem, paths) behind injectable interfaces.
 */

// Platform info
export { createPlatformInfo, requiresExecutableBit } from "./platform-info";
export type { PlatformInfo } from "./platform-info";

// Paths
export { DefaultPathProvider } from "./path-provider";
export type { PathProvider } from "./path-provider";

// Filesystem
export { DefaultFileSystemLayer } from "./filesystem";
export type {
  FileSystemLayer,
  FileSystemErrorCode,
  DirEntry,
  FileStat,
  MkdirOptions,
  RmOptions,
} from "./filesystem";

// Network
export { DefaultHttpClient } from "./network";
export type { HttpClient, HttpRequestOptions, HttpClientConfig } from "./network";

// Processes
export { ExecaProcessRunner } from "./process";
export type { ProcessRunner, ProcessOptions, ProcessResult, SpawnedProcess } from "./process";
