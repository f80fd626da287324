/**
 * HTTP utilities module
 *
 * @module @fedora-l10n/shared/http
 */

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
} from "./pool.js";
