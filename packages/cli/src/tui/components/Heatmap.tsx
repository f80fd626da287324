/**
 * Heatmap Component
 *
 * Every project as one colored cell, grouped by completion tier, with a
 * legend and the projects that have started but sit below 50%.
 *
 * @module tui/components/Heatmap
 */

import {
  HEATMAP_COLORS,
  type HeatmapTier,
  heatmapTier,
  type ProjectOverviewEntry,
  summarizeLowTranslations,
} from "@fedora-l10n/core";
import { Box, Text } from "ink";
import type React from "react";

export interface HeatmapProps {
  readonly entries: readonly ProjectOverviewEntry[];
  /** Cells per row (default: 40) */
  readonly columns?: number;
}

const LEGEND: readonly [HeatmapTier, string][] = [
  ["green", "100%"],
  ["yellow", "75-99%"],
  ["orange", "50-74%"],
  ["red", "1-49%"],
  ["gray", "0%"],
];

function chunk<T>(items: readonly T[], size: number): T[][] {
  const rows: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    rows.push(items.slice(i, i + size));
  }
  return rows;
}

export function Heatmap({ entries, columns = 40 }: HeatmapProps): React.ReactElement {
  const low = summarizeLowTranslations(entries);

  return (
    <Box flexDirection="column">
      {chunk(entries, columns).map((row) => (
        <Text key={row[0]?.slug}>
          {row.map((entry) => (
            <Text key={entry.slug} color={HEATMAP_COLORS[heatmapTier(entry.translatedPct)]}>
              ■
            </Text>
          ))}
        </Text>
      ))}
      <Box marginTop={1}>
        {LEGEND.map(([tier, label]) => (
          <Text key={tier}>
            <Text color={HEATMAP_COLORS[tier]}>■</Text> {label}{"  "}
          </Text>
        ))}
      </Box>
      {low.count > 0 ? (
        <Text color="yellow">
          {low.count} projects below 50%: {low.names.join(", ")}
          {low.count > low.names.length ? ", ..." : ""}
        </Text>
      ) : null}
    </Box>
  );
}
