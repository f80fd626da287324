/**
 * Re-exports the Result type from @fedora-l10n/shared so core modules
 * import it from one local place.
 */

export type { ErrResult, OkResult, Result } from "@fedora-l10n/shared";
export { Err, Ok } from "@fedora-l10n/shared";
