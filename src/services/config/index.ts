/**
 * Configuration service module.
 */

export { ConfigService, createConfigService, type ConfigServiceDeps } from "./config-service";
export {
  type ProvisionerConfig,
  ProvisionerConfigSchema,
  DEFAULT_PROVISIONER_CONFIG,
} from "./types";
