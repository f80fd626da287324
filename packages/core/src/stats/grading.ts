import type { HeatmapTier } from "./types.js";

/**
 * Display color of a completion percentage.
 */
export function colorForPercent(pct: number): string {
  if (pct >= 100) return "#26a269";
  if (pct >= 80) return "#2ec27e";
  if (pct >= 50) return "#e5a50a";
  if (pct >= 20) return "#ff7800";
  return "#c01c28";
}

/**
 * Heatmap cell class. Untouched projects (0%) are gray.
 */
export function heatmapTier(pct: number): HeatmapTier {
  if (pct >= 100) return "green";
  if (pct >= 75) return "yellow";
  if (pct >= 50) return "orange";
  if (pct > 0) return "red";
  return "gray";
}

export const HEATMAP_COLORS: Record<HeatmapTier, string> = {
  green: "#26a269",
  yellow: "#e5a50a",
  orange: "#ff7800",
  red: "#c01c28",
  gray: "#77767b",
};

/**
 * Whole-number percentage label, e.g. `87%`.
 */
export function formatPercent(pct: number): string {
  return `${Math.round(pct)}%`;
}
