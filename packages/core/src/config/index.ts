export {
  type ConfigError,
  type ConfigErrorCode,
  deepMerge,
  type LoadConfigOptions,
  loadConfig,
  parseEnvConfig,
  readTomlFile,
} from "./loader.js";
export {
  APP_DIR_NAME,
  getApiKeyFilePath,
  getCacheDir,
  getConfigDir,
  getConfigFilePath,
  getLogFilePath,
  type PathOptions,
} from "./paths.js";
export {
  type ApiConfig,
  ApiConfigSchema,
  BackoffConfigSchema,
  type CacheConfig,
  CacheConfigSchema,
  type Config,
  type ConfigOverrides,
  ConfigSchema,
  DEFAULT_API_URL,
  LanguageSchema,
  LogLevelSchema,
} from "./schema.js";
