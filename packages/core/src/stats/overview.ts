// ============================================
// Project Overview
// ============================================

import { isAbortError } from "../errors/retry.js";
import type { Logger } from "../logger/logger.js";
import { silentLogger } from "../logger/logger.js";
import type { WeblateClient } from "../weblate/client.js";
import type { OverviewProgress, ProjectOverviewEntry } from "./types.js";

export interface LoadOverviewOptions {
  /** Defaults to the client language */
  language?: string;
  signal?: AbortSignal;
  forceRefresh?: boolean;
  onProgress?: (progress: OverviewProgress) => void;
  logger?: Logger;
}

/**
 * Highest percentage first, ties by name.
 */
export function sortOverview(entries: readonly ProjectOverviewEntry[]): ProjectOverviewEntry[] {
  return [...entries].sort(
    (a, b) => b.translatedPct - a.translatedPct || a.name.localeCompare(b.name)
  );
}

/**
 * Every project with its completion for one language.
 *
 * A project whose statistics fail is kept at 0% with an `error`, so one
 * broken project never hides the rest. Listing failures and aborts
 * propagate.
 */
export async function loadProjectOverview(
  client: WeblateClient,
  options: LoadOverviewOptions = {}
): Promise<ProjectOverviewEntry[]> {
  const language = options.language ?? client.language;
  const logger = options.logger ?? silentLogger;
  const { signal, forceRefresh } = options;

  const projects = await client.listProjects({
    signal,
    forceRefresh,
    onProgress: (page, totalPages) =>
      options.onProgress?.({ phase: "projects", page, totalPages }),
  });

  const entries: ProjectOverviewEntry[] = [];
  for (const project of projects) {
    try {
      const stats = await client.getLanguageStatistics(project.slug, language, {
        signal,
        forceRefresh,
      });
      entries.push({ slug: project.slug, name: project.name, translatedPct: stats.translatedPct });
    } catch (error) {
      if (isAbortError(error)) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      logger.warn("Project statistics unavailable", { project: project.slug, language, error: message });
      entries.push({ slug: project.slug, name: project.name, translatedPct: 0, error: message });
    }
    options.onProgress?.({ phase: "statistics", done: entries.length, total: projects.length });
  }

  return sortOverview(entries);
}
