/**
 * Plain-text rendering shared by the non-interactive commands.
 *
 * @module cli/commands/output
 */

import { colorForPercent, formatPercent } from "@fedora-l10n/core";
import type { ChalkInstance } from "chalk";

const BAR_WIDTH = 20;

/**
 * Fixed-width bar of filled and empty blocks.
 *
 * @example
 * ```typescript
 * percentBar(50, 10); // "█████░░░░░"
 * ```
 */
export function percentBar(pct: number, width = BAR_WIDTH): string {
  const filled = Math.min(width, Math.max(0, Math.round((pct / 100) * width)));
  return "█".repeat(filled) + "░".repeat(width - filled);
}

/**
 * One row: right-aligned percentage, colored bar, label.
 */
export function statLine(chalk: ChalkInstance, pct: number, label: string, note?: string): string {
  const paint = chalk.hex(colorForPercent(pct));
  const suffix = note ? ` ${chalk.red(`(${note})`)}` : "";
  return `${paint(formatPercent(pct).padStart(4))} ${paint(percentBar(pct))} ${label}${suffix}`;
}
