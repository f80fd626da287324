// ============================================
// Language Detection
// ============================================

/** Used when the locale is unset, `C` or `POSIX` */
export const FALLBACK_LANGUAGE = "en";

const LOCALE_VARIABLES = ["LC_ALL", "LC_MESSAGES", "LANG"] as const;

/**
 * Two-letter language code from the POSIX locale variables.
 *
 * The first non-empty of `LC_ALL`, `LC_MESSAGES` and `LANG` wins, as in the
 * C library's own lookup.
 *
 * @example
 * ```typescript
 * detectLanguage({ LANG: "sv_SE.UTF-8" }); // "sv"
 * detectLanguage({ LANG: "C.UTF-8" });     // "en"
 * ```
 */
export function detectLanguage(env: NodeJS.ProcessEnv = process.env): string {
  for (const name of LOCALE_VARIABLES) {
    const value = env[name];
    if (!value) {
      continue;
    }
    const code = value.slice(0, 2).toLowerCase();
    if (value === "POSIX" || value.startsWith("C.") || value === "C" || !/^[a-z]{2}$/.test(code)) {
      return FALLBACK_LANGUAGE;
    }
    return code;
  }
  return FALLBACK_LANGUAGE;
}
