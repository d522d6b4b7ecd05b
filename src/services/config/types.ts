/**
 * Configuration types for the application.
 *
 * The config.json file in the data root stores network policy and per-tool
 * binary overrides. It is loaded whenever a binary is requested.
 */

import { z } from "zod";

/**
 * User-supplied binary for a tool, bypassing lookup and download.
 */
export interface BinaryOverride {
  /** Absolute path to the executable */
  readonly path: string;
  /** Arguments to launch with. Default: the tool's own server arguments */
  readonly arguments?: readonly string[];
  /** Environment to launch with. Default: inherit */
  readonly env?: Readonly<Record<string, string>>;
}

/**
 * Network policy.
 */
export interface NetworkConfig {
  /** Whether releases may be queried and downloaded. Default: true */
  readonly allowDownloads: boolean;
  /** Token for the GitHub API (raises rate limits). Default: null */
  readonly githubToken: string | null;
}

/**
 * Application configuration stored in config.json.
 */
export interface AppConfig {
  readonly network: NetworkConfig;
  /** Overrides keyed by tool name */
  readonly binaries: Readonly<Record<string, BinaryOverride>>;
}

/**
 * Default application configuration for first-run.
 */
export const DEFAULT_APP_CONFIG: AppConfig = {
  network: {
    allowDownloads: true,
    githubToken: null,
  },
  binaries: {},
};

export const BinaryOverrideSchema = z.object({
  path: z.string().min(1),
  arguments: z.array(z.string()).optional(),
  env: z.record(z.string()).optional(),
});

/**
 * Schema for config.json. Missing sections fall back to their defaults.
 */
export const AppConfigSchema: z.ZodType<AppConfig, z.ZodTypeDef, unknown> = z.object({
  network: z
    .object({
      allowDownloads: z.boolean().default(DEFAULT_APP_CONFIG.network.allowDownloads),
      githubToken: z.string().min(1).nullable().default(DEFAULT_APP_CONFIG.network.githubToken),
    })
    .default({}),
  binaries: z.record(BinaryOverrideSchema).default({}),
});
