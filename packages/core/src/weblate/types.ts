// ============================================
// Weblate View Models
// ============================================

export interface ProjectSummary {
  readonly slug: string;
  readonly name: string;
  readonly webUrl?: string;
}

export interface ComponentSummary {
  readonly slug: string;
  readonly name: string;
}

export interface TranslationStatistics {
  readonly translatedPct: number;
  readonly fuzzyPct: number;
  /** `max(0, 100 - translated - fuzzy)` */
  readonly untranslatedPct: number;
  /** Source strings */
  readonly total?: number;
  readonly translated?: number;
}

export interface ComponentStats {
  readonly componentId: string;
  readonly name: string;
  readonly translatedPct: number;
  readonly fuzzyPct: number;
  readonly untranslatedPct: number;
  /** Why the statistics are missing; percentages are then 0 */
  readonly error?: string;
}

export interface ProjectStats {
  readonly projectId: string;
  readonly language: string;
  readonly translatedPct: number;
  readonly fuzzyPct: number;
  readonly untranslatedPct: number;
  /** Highest translated percentage first */
  readonly components: ComponentStats[];
}

export interface RequestOptions {
  signal?: AbortSignal;
  /** Bypass valid cache entries */
  forceRefresh?: boolean;
  /** Overrides the client default */
  staleOnError?: boolean;
}

export interface ListProjectsOptions extends RequestOptions {
  /** Called after each page with `(page, totalPages)` */
  onProgress?: (page: number, totalPages: number) => void;
}

export interface ProjectStatsOptions extends RequestOptions {
  /** Defaults to the client language */
  language?: string;
}
