import type { LowTranslationSummary } from "./types.js";

interface Named {
  readonly slug: string;
  readonly name: string;
}

/**
 * Case-insensitive substring match on name or slug. Blank text keeps
 * everything.
 */
export function filterEntries<T extends Named>(entries: readonly T[], text: string): T[] {
  const needle = text.trim().toLowerCase();
  if (!needle) {
    return [...entries];
  }
  return entries.filter(
    (entry) => entry.name.toLowerCase().includes(needle) || entry.slug.toLowerCase().includes(needle)
  );
}

/**
 * Projects that have started but sit below `threshold` percent.
 */
export function summarizeLowTranslations(
  entries: readonly (Named & { readonly translatedPct: number })[],
  threshold = 50
): LowTranslationSummary {
  const low = entries.filter((entry) => entry.translatedPct > 0 && entry.translatedPct < threshold);
  return {
    count: low.length,
    names: low.slice(0, 5).map((entry) => entry.name),
  };
}
