/**
 * StatusBar Component
 *
 * Bottom line: language, load progress or notice, and the key hints of the
 * current view.
 *
 * @module tui/components/StatusBar
 */

import type { OverviewProgress } from "@fedora-l10n/core";
import { Box, Text } from "ink";
import Spinner from "ink-spinner";
import type React from "react";

export type View = "projects" | "components";

export interface StatusBarProps {
  readonly language: string;
  readonly view: View;
  readonly loading: boolean;
  readonly progress?: OverviewProgress;
  /** Non-fatal message, e.g. a failed refresh */
  readonly notice?: string;
}

const HINTS: Record<View, string> = {
  projects: "↑/↓ select  Enter open  / search  h heatmap  l language  r refresh  c clear cache  q quit",
  components: "↑/↓ select  Esc back  r refresh  c clear cache  q quit",
};

export function describeProgress(progress: OverviewProgress | undefined): string {
  if (!progress) {
    return "Loading...";
  }
  if (progress.phase === "projects") {
    return `Loading projects (page ${progress.page}/${Math.max(progress.page, progress.totalPages)})`;
  }
  return `Loading statistics ${progress.done}/${progress.total}`;
}

export function StatusBar({ language, view, loading, progress, notice }: StatusBarProps): React.ReactElement {
  return (
    <Box flexDirection="column" marginTop={1}>
      <Box>
        <Text color="cyan">[{language}] </Text>
        {loading ? (
          <Text>
            <Spinner type="dots" /> {describeProgress(progress)}
          </Text>
        ) : null}
        {!loading && notice ? <Text color="yellow">{notice}</Text> : null}
      </Box>
      <Text dimColor>{HINTS[view]}</Text>
    </Box>
  );
}
