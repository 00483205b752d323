export { loadConfig, configFromEnv, deepMergeConfigs, type ConfigLoadResult, type ConfigLoadOptions } from './config-manager.js';
export {
  LoopConfigSchema,
  REASONING_EFFORTS,
  defaultConfig,
  configuredModels,
  resolveModelName,
  type LoopConfig,
  type LoopConfigInput,
  type EndpointConfig,
  type RoutingConfig,
  type ContextConfig,
  type ToolsConfig,
  type BackoffConfig,
} from './schema.js';
