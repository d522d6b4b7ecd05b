/**
 * Configuration service for loading and saving application configuration.
 *
 * This is a pure service (not a boundary abstraction) that uses FileSystemLayer
 * for I/O operations. Configuration is stored as JSON in {dataRootDir}/config.json.
 */

import { dirname } from "node:path";
import type { FileSystemLayer } from "../platform/filesystem";
import type { PathProvider } from "../platform/path-provider";
import type { Logger } from "../logging";
import { ConfigError, FileSystemError, getErrorMessage } from "../errors";
import type { AppConfig, BinaryOverride } from "./types";
import { AppConfigSchema, DEFAULT_APP_CONFIG } from "./types";

/**
 * Dependencies for ConfigService.
 */
export interface ConfigServiceDeps {
  readonly fileSystem: FileSystemLayer;
  readonly pathProvider: PathProvider;
  readonly logger: Logger;
  /** Environment for overrides (LSPROVISION_GITHUB_TOKEN). Default: process.env */
  readonly env?: NodeJS.ProcessEnv;
}

/**
 * Service for managing application configuration.
 */
export class ConfigService {
  private readonly fileSystem: FileSystemLayer;
  private readonly pathProvider: PathProvider;
  private readonly logger: Logger;
  private readonly env: NodeJS.ProcessEnv;

  constructor(deps: ConfigServiceDeps) {
    this.fileSystem = deps.fileSystem;
    this.pathProvider = deps.pathProvider;
    this.logger = deps.logger;
    this.env = deps.env ?? process.env;
  }

  /**
   * Load configuration with environment overrides applied.
   * Writes and returns defaults if the file doesn't exist.
   * Logs warning and returns defaults if the file is corrupt or invalid.
   */
  async load(): Promise<AppConfig> {
    return this.applyEnvironment(await this.loadFile());
  }

  /**
   * Save configuration to disk.
   *
   * @throws ConfigError if the configuration is invalid
   */
  async save(config: AppConfig): Promise<void> {
    const result = AppConfigSchema.safeParse(config);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      throw new ConfigError(`Invalid configuration: ${issues}`);
    }

    const configPath = this.pathProvider.configPath;

    // Ensure parent directory exists
    await this.fileSystem.mkdir(dirname(configPath));

    // Write formatted JSON
    const content = JSON.stringify(result.data, null, 2);
    await this.fileSystem.writeFile(configPath, content);

    this.logger.debug("Config saved", { path: configPath });
  }

  /**
   * Set or clear the binary override for a tool.
   * Environment overrides are not persisted.
   */
  async setBinaryOverride(toolName: string, override: BinaryOverride | null): Promise<void> {
    const current = await this.loadFile();
    const binaries = Object.fromEntries(
      Object.entries(current.binaries).filter(([name]) => name !== toolName)
    );
    const updated: AppConfig = {
      ...current,
      binaries: override ? { ...binaries, [toolName]: override } : binaries,
    };
    await this.save(updated);
    this.logger.info("Binary override saved", { tool: toolName, path: override?.path ?? null });
  }

  private async loadFile(): Promise<AppConfig> {
    const configPath = this.pathProvider.configPath;

    let content: string;
    try {
      content = await this.fileSystem.readFile(configPath);
    } catch (error) {
      // File doesn't exist - expected on first run
      if (error instanceof FileSystemError && error.fsCode === "ENOENT") {
        this.logger.debug("Config not found, using defaults", { path: configPath });
        // Write defaults to disk for next time
        try {
          await this.save(DEFAULT_APP_CONFIG);
        } catch (saveError) {
          this.logger.warn("Config write failed, using defaults", {
            path: configPath,
            error: getErrorMessage(saveError),
          });
        }
        return DEFAULT_APP_CONFIG;
      }

      this.logger.warn("Config load failed, using defaults", {
        path: configPath,
        error: getErrorMessage(error),
      });
      return DEFAULT_APP_CONFIG;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      this.logger.warn("Config load failed, using defaults", {
        path: configPath,
        error: getErrorMessage(error),
      });
      return DEFAULT_APP_CONFIG;
    }

    const result = AppConfigSchema.safeParse(parsed);
    if (!result.success) {
      this.logger.warn("Config validation failed, using defaults", {
        path: configPath,
        error: result.error.issues[0]?.message ?? "invalid",
      });
      return DEFAULT_APP_CONFIG;
    }

    this.logger.debug("Config loaded", { path: configPath });
    return result.data;
  }

  private applyEnvironment(config: AppConfig): AppConfig {
    const token = this.env.LSPROVISION_GITHUB_TOKEN?.trim();
    if (!token) {
      return config;
    }
    return {
      ...config,
      network: { ...config.network, githubToken: token },
    };
  }
}

/**
 * Create a ConfigService instance.
 */
export function createConfigService(deps: ConfigServiceDeps): ConfigService {
  return new ConfigService(deps);
}
