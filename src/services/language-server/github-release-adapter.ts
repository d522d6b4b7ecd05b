/**
 * Adapter for language servers published as bare executables on GitHub releases.
 */

import type { BinaryCacheService } from "../binary-download/binary-cache-service";
import type { BinaryResolutionService } from "../binary-resolution/binary-resolution-service";
import type { ReleaseResolver } from "../release/release-resolver";
import type {
  DownloadProgressCallback,
  LanguageServerBinary,
  ReleaseVersion,
  ToolConfig,
} from "../types";
import { formatCompletionLabel } from "./completion-label";
import type { CodeLabel, CompletionItem, LanguageServerAdapter } from "./types";

/**
 * Dependencies for GitHubReleaseAdapter.
 */
export interface GitHubReleaseAdapterDeps {
  readonly tool: ToolConfig;
  readonly resolutionService: BinaryResolutionService;
  readonly releaseResolver: ReleaseResolver;
  readonly cacheService: BinaryCacheService;
}

export class GitHubReleaseAdapter implements LanguageServerAdapter {
  private readonly tool: ToolConfig;
  private readonly resolutionService: BinaryResolutionService;
  private readonly releaseResolver: ReleaseResolver;
  private readonly cacheService: BinaryCacheService;

  constructor(deps: GitHubReleaseAdapterDeps) {
    this.tool = deps.tool;
    this.resolutionService = deps.resolutionService;
    this.releaseResolver = deps.releaseResolver;
    this.cacheService = deps.cacheService;
  }

  get name(): string {
    return this.tool.name;
  }

  get serverArguments(): readonly string[] {
    return this.tool.serverArguments;
  }

  async checkIfUserInstalled(): Promise<LanguageServerBinary | null> {
    const path = await this.resolutionService.findSystemBinary(this.tool.name);
    if (path === null) {
      return null;
    }
    return { path, env: null, arguments: this.tool.serverArguments };
  }

  fetchLatestServerVersion(): Promise<ReleaseVersion> {
    return this.releaseResolver.resolveLatest(this.tool);
  }

  fetchServerBinary(
    version: ReleaseVersion,
    containerDir: string,
    onProgress?: DownloadProgressCallback
  ): Promise<LanguageServerBinary> {
    return this.cacheService.materialize(this.tool, version, containerDir, onProgress);
  }

  cachedServerBinary(containerDir: string): Promise<LanguageServerBinary | null> {
    return this.resolutionService.findCachedBinary(containerDir, this.tool.name);
  }

  labelForCompletion(item: CompletionItem): CodeLabel | null {
    return formatCompletionLabel(item);
  }
}
