// ============================================
// Rate Limiting - Barrel Export
// ============================================

export { Backoff } from "./backoff.js";
export { RequestThrottle } from "./throttle.js";
export {
  type BackoffConfig,
  type BackoffState,
  DEFAULT_BACKOFF_CONFIG,
  DEFAULT_THROTTLE_CONFIG,
  type ThrottleConfig,
} from "./types.js";
