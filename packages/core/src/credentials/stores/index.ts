export { API_KEY_ENV_VARS, EnvApiKeyStore } from "./env-store.js";
export { FileApiKeyStore, KEY_FILE_MODE } from "./file-store.js";
