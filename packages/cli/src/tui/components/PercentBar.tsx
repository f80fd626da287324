/**
 * PercentBar Component
 *
 * Percentage label and a block bar, both in the completion color.
 *
 * @module tui/components/PercentBar
 */

import { colorForPercent, formatPercent } from "@fedora-l10n/core";
import { Text } from "ink";
import type React from "react";

export interface PercentBarProps {
  readonly pct: number;
  /** Bar width in cells (default: 20) */
  readonly width?: number;
}

export function PercentBar({ pct, width = 20 }: PercentBarProps): React.ReactElement {
  const filled = Math.min(width, Math.max(0, Math.round((pct / 100) * width)));
  const color = colorForPercent(pct);

  return (
    <Text>
      <Text color={color}>{formatPercent(pct).padStart(4)} </Text>
      <Text color={color}>{"█".repeat(filled)}</Text>
      <Text dimColor>{"░".repeat(width - filled)}</Text>
    </Text>
  );
}
