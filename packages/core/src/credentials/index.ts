export {
  ApiKeyResolver,
  type ApiKeyResolverOptions,
  type CreateApiKeyResolverOptions,
  createApiKeyResolver,
} from "./resolver.js";
export { API_KEY_ENV_VARS, EnvApiKeyStore, FileApiKeyStore, KEY_FILE_MODE } from "./stores/index.js";
export {
  type ApiKey,
  type ApiKeySource,
  type ApiKeyStore,
  type ApiKeyStoreError,
  type ApiKeyStoreErrorCode,
  createStoreError,
  generateMaskedHint,
  normalizeApiKey,
} from "./types.js";
