/**
 * Tool configurations for the language servers this package provisions.
 */

import type { ToolConfig } from "../types";

/**
 * marksman, the Markdown language server.
 * Releases ship bare executables named `marksman-<suffix>`.
 */
export const MARKSMAN_TOOL = {
  name: "marksman",
  repository: "artempyanykh/marksman",
  assetSuffixes: {
    darwin: "-macos",
    linux: {
      x64: "-linux-x64",
      arm64: "-linux-arm64",
    },
    win32: ".exe",
  },
  serverArguments: ["server"],
  includePrereleases: false,
} as const satisfies ToolConfig;
