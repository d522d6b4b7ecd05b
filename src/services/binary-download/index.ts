/**
 * Binary download module public API.
 */

export { buildAssetName } from "./asset-name";
export { MARKSMAN_TOOL } from "./tools";
export {
  BinaryCacheService,
  getCacheEntryPath,
  type BinaryCacheServiceDeps,
} from "./binary-cache-service";
