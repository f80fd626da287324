/**
 * ComponentList Component
 *
 * One project's statistics for a language: the project totals, then each
 * component sorted by completion.
 *
 * @module tui/components/ComponentList
 */

import { formatPercent, type ProjectStats } from "@fedora-l10n/core";
import { Box, Text } from "ink";
import type React from "react";
import { PercentBar } from "./PercentBar.js";
import { windowStart } from "./ProjectList.js";

export interface ComponentListProps {
  readonly name: string;
  readonly stats: ProjectStats;
  /** Link to the project on Weblate */
  readonly webUrl: string;
  readonly selectedIndex: number;
  readonly maxRows?: number;
}

export function ComponentList({
  name,
  stats,
  webUrl,
  selectedIndex,
  maxRows = 15,
}: ComponentListProps): React.ReactElement {
  const start = windowStart(selectedIndex, stats.components.length, maxRows);
  const visible = stats.components.slice(start, start + maxRows);

  return (
    <Box flexDirection="column">
      <Box>
        <Text bold>{name} </Text>
        <Text dimColor>
          [{stats.language}] {formatPercent(stats.translatedPct)} translated,{" "}
          {formatPercent(stats.fuzzyPct)} fuzzy, {formatPercent(stats.untranslatedPct)} untranslated
        </Text>
      </Box>
      <Text dimColor>{webUrl}</Text>
      <Box flexDirection="column" marginTop={1}>
        {visible.length === 0 ? <Text dimColor>No components</Text> : null}
        {visible.map((component, offset) => {
          const selected = start + offset === selectedIndex;
          return (
            <Box key={component.componentId}>
              <Text color={selected ? "cyan" : undefined}>{selected ? "❯ " : "  "}</Text>
              <PercentBar pct={component.translatedPct} />
              <Text bold={selected}> {component.name}</Text>
              {component.error ? <Text color="red"> (unavailable)</Text> : null}
            </Box>
          );
        })}
      </Box>
    </Box>
  );
}
