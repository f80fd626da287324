// ============================================
// fedora-l10n Core
// ============================================

/**
 * @module @fedora-l10n/core
 *
 * Weblate statistics for Fedora translators: a typed API client over a
 * TTL disk cache with backoff and request spacing, configuration loading,
 * API key storage, logging and the view helpers shared by the CLI and the TUI.
 */

// ============================================
// Cache
// ============================================
export * from "./cache/index.js";

// ============================================
// Configuration
// ============================================
export * from "./config/index.js";

// ============================================
// Credentials
// ============================================
export * from "./credentials/index.js";

// ============================================
// Errors
// ============================================
export * from "./errors/index.js";

// ============================================
// Logger
// ============================================
export * from "./logger/index.js";

// ============================================
// Rate Limiting
// ============================================
export * from "./rate-limit/index.js";

// ============================================
// Services
// ============================================
export { type BootstrapOptions, bootstrap, type Services, shutdown } from "./services/bootstrap.js";

// ============================================
// Statistics Views
// ============================================
export * from "./stats/index.js";

// ============================================
// Result
// ============================================
export { Err, type ErrResult, Ok, type OkResult, type Result } from "./types/result.js";

// ============================================
// Weblate
// ============================================
export * from "./weblate/index.js";
