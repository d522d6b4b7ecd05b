/**
 * Configuration service module.
 */

export { ConfigService, createConfigService, type ConfigServiceDeps } from "./config-service";
export {
  type AppConfig,
  type BinaryOverride,
  type NetworkConfig,
  AppConfigSchema,
  DEFAULT_APP_CONFIG,
} from "./types";
