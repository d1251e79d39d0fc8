export { loadConfig, configFromEnv, deepMergeConfigs, type ConfigLoadResult, type ConfigLoadOptions } from './config-manager.js';
export {
  AppConfigSchema,
  defineConfig,
  type AppConfig,
  type AppConfigInput,
  type OrchestratorConfig,
  type CacheConfig,
  type LlmConfig,
  type SandboxConfig,
  type UploadConfig,
} from './schema.js';
