/**
 * ProjectList Component
 *
 * Scrolling list of projects with their completion for one language. Only
 * a window of `maxRows` rows around the selection is drawn.
 *
 * @module tui/components/ProjectList
 */

import type { ProjectOverviewEntry } from "@fedora-l10n/core";
import { Box, Text } from "ink";
import type React from "react";
import { PercentBar } from "./PercentBar.js";

export interface ProjectListProps {
  readonly entries: readonly ProjectOverviewEntry[];
  readonly selectedIndex: number;
  readonly maxRows?: number;
}

/**
 * First row of the visible window, keeping the selection in view.
 */
export function windowStart(selectedIndex: number, total: number, maxRows: number): number {
  if (total <= maxRows) {
    return 0;
  }
  const centered = selectedIndex - Math.floor(maxRows / 2);
  return Math.min(Math.max(0, centered), total - maxRows);
}

export function ProjectList({
  entries,
  selectedIndex,
  maxRows = 15,
}: ProjectListProps): React.ReactElement {
  if (entries.length === 0) {
    return <Text dimColor>No matching projects</Text>;
  }

  const start = windowStart(selectedIndex, entries.length, maxRows);
  const visible = entries.slice(start, start + maxRows);

  return (
    <Box flexDirection="column">
      {visible.map((entry, offset) => {
        const selected = start + offset === selectedIndex;
        return (
          <Box key={entry.slug}>
            <Text color={selected ? "cyan" : undefined}>{selected ? "❯ " : "  "}</Text>
            <PercentBar pct={entry.translatedPct} />
            <Text bold={selected}> {entry.name}</Text>
            {entry.error ? <Text color="red"> (unavailable)</Text> : null}
          </Box>
        );
      })}
      {entries.length > maxRows ? (
        <Text dimColor>
          {selectedIndex + 1}/{entries.length}
        </Text>
      ) : null}
    </Box>
  );
}
