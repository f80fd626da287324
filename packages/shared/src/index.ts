// ============================================
// fedora-l10n Shared Utilities
// ============================================

export {
  closeDefaultPool,
  createHttpPool,
  DEFAULT_POOL_OPTIONS,
  type FetchWithPoolOptions,
  fetchWithPool,
  getDefaultHttpPool,
  type HttpPool,
  type HttpPoolOptions,
  type HttpResponse,
} from "./http/index.js";
export type { ErrResult, OkResult, Result } from "./types/result.js";
export { Err, Ok } from "./types/result.js";
