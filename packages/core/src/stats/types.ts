// ============================================
// Stats Feed Types
// ============================================

/**
 * One row of the project overview for a language.
 */
export interface ProjectOverviewEntry {
  readonly slug: string;
  readonly name: string;
  readonly translatedPct: number;
  /** Set when the project's statistics could not be fetched */
  readonly error?: string;
}

export type OverviewProgress =
  | { readonly phase: "projects"; readonly page: number; readonly totalPages: number }
  | { readonly phase: "statistics"; readonly done: number; readonly total: number };

export type HeatmapTier = "green" | "yellow" | "orange" | "red" | "gray";

export interface LowTranslationSummary {
  /** Projects strictly between 0 and the threshold */
  readonly count: number;
  /** First five of them, in input order */
  readonly names: string[];
}

export interface ExportRow {
  readonly project: string;
  readonly name: string;
  readonly translated_percent: number;
}

export type ExportFormat = "csv" | "json";
