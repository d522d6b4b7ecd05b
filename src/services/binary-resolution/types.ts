/**
 * Types for binary resolution operations.
 */

import type { LanguageServerBinary } from "../types";

/**
 * Where a resolved binary came from.
 * - settings: user override from config.json
 * - system: found on PATH
 * - downloaded: fetched (or already present) for the latest release
 * - cached: last entry in the tool's container, used without network
 */
export type BinarySource = "settings" | "system" | "downloaded" | "cached";

/**
 * A binary together with its source.
 */
export interface BinaryResolution {
  readonly binary: LanguageServerBinary;
  readonly source: BinarySource;
}
