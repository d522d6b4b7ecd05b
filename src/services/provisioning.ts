/**
 * Composition root: wires the default Node.js platform layer into the
 * provisioning services.
 */

import { BinaryCacheService } from "./binary-download/binary-cache-service";
import { MARKSMAN_TOOL } from "./binary-download/tools";
import { BinaryResolutionService } from "./binary-resolution/binary-resolution-service";
import { ConfigService } from "./config/config-service";
import { GitHubReleaseAdapter } from "./language-server/github-release-adapter";
import { LanguageServerBinaryProvider } from "./language-server/binary-provider";
import type { LanguageServerAdapter } from "./language-server/types";
import { NodeLogService } from "./logging/node-log-service";
import type { LoggingService } from "./logging/types";
import { DefaultFileSystemLayer, type FileSystemLayer } from "./platform/filesystem";
import { DefaultHttpClient, type HttpClient } from "./platform/network";
import { DefaultPathProvider, type PathProvider } from "./platform/path-provider";
import { createPlatformInfo, type PlatformInfo } from "./platform/platform-info";
import { ExecaProcessRunner, type ProcessRunner } from "./platform/process";
import { GitHubReleaseClient } from "./release/github-release-client";
import { ReleaseResolver } from "./release/release-resolver";
import type { ToolConfig } from "./types";

/**
 * Replacements for the default platform layer. Anything omitted uses the Node.js default.
 */
export interface ProvisioningOptions {
  /** Environment read for LSPROVISION_* variables. Default: process.env */
  readonly env?: NodeJS.ProcessEnv;
  readonly platformInfo?: PlatformInfo;
  readonly pathProvider?: PathProvider;
  readonly loggingService?: LoggingService;
  readonly fileSystem?: FileSystemLayer;
  readonly httpClient?: HttpClient;
  readonly processRunner?: ProcessRunner;
}

/**
 * Wired provisioning services.
 */
export interface Provisioning {
  readonly provider: LanguageServerBinaryProvider;
  readonly configService: ConfigService;
  readonly pathProvider: PathProvider;
  readonly loggingService: LoggingService;
  /** Adapter for the Markdown language server */
  readonly marksman: LanguageServerAdapter;
  /** Build an adapter for another tool published as bare executables on GitHub */
  createAdapter(tool: ToolConfig): LanguageServerAdapter;
}

/**
 * Create the provisioning services.
 * Loads the configuration once so the default file exists from the start.
 * Release queries read the GitHub token from the configuration each time.
 *
 * @example
 * const provisioning = await createProvisioning();
 * const { binary } = await provisioning.provider.getBinary(provisioning.marksman);
 */
export async function createProvisioning(
  options: ProvisioningOptions = {}
): Promise<Provisioning> {
  const env = options.env ?? process.env;
  const platformInfo = options.platformInfo ?? createPlatformInfo();
  const pathProvider = options.pathProvider ?? new DefaultPathProvider(platformInfo, env);
  const loggingService = options.loggingService ?? new NodeLogService(pathProvider, { env });

  const fileSystem =
    options.fileSystem ?? new DefaultFileSystemLayer(loggingService.createLogger("fs"));
  const httpClient =
    options.httpClient ?? new DefaultHttpClient(loggingService.createLogger("network"));
  const processRunner =
    options.processRunner ?? new ExecaProcessRunner(loggingService.createLogger("process"));

  const configService = new ConfigService({
    fileSystem,
    pathProvider,
    logger: loggingService.createLogger("config"),
    env,
  });
  await configService.load();

  const resolutionService = new BinaryResolutionService({
    fileSystem,
    processRunner,
    platformInfo,
    logger: loggingService.createLogger("resolution"),
  });
  const releaseResolver = new ReleaseResolver({
    releaseClient: new GitHubReleaseClient({
      httpClient,
      logger: loggingService.createLogger("release"),
      githubToken: async () => (await configService.load()).network.githubToken,
    }),
    platformInfo,
    logger: loggingService.createLogger("release"),
  });
  const cacheService = new BinaryCacheService({
    httpClient,
    fileSystem,
    platformInfo,
    logger: loggingService.createLogger("cache"),
  });

  const createAdapter = (tool: ToolConfig): LanguageServerAdapter =>
    new GitHubReleaseAdapter({ tool, resolutionService, releaseResolver, cacheService });

  return {
    provider: new LanguageServerBinaryProvider({
      configService,
      pathProvider,
      logger: loggingService.createLogger("provider"),
    }),
    configService,
    pathProvider,
    loggingService,
    marksman: createAdapter(MARKSMAN_TOOL),
    createAdapter,
  };
}
