/**
 * Binary resolution service module.
 */

export {
  BinaryResolutionService,
  createBinaryResolutionService,
  type BinaryResolutionServiceDeps,
} from "./binary-resolution-service";
export type { BinaryResolution, BinarySource } from "./types";
