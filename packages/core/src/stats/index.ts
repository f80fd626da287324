export { formatExport, toCsv, toExportRows, toJson } from "./export.js";
export { filterEntries, summarizeLowTranslations } from "./filter.js";
export { colorForPercent, formatPercent, HEATMAP_COLORS, heatmapTier } from "./grading.js";
export { detectLanguage, FALLBACK_LANGUAGE } from "./language.js";
export { type LoadOverviewOptions, loadProjectOverview, sortOverview } from "./overview.js";
export type {
  ExportFormat,
  ExportRow,
  HeatmapTier,
  LowTranslationSummary,
  OverviewProgress,
  ProjectOverviewEntry,
} from "./types.js";
export { weblateWebUrl } from "./web-url.js";
