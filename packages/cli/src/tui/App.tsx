/**
 * Root TUI Component
 *
 * Two views over the stats feed: the project overview (as a list or a
 * heatmap) and one project's components. All data comes through the
 * cached Weblate client; failures show as a notice over the last data.
 *
 * @module tui/App
 */

import {
  filterEntries,
  LanguageSchema,
  loadProjectOverview,
  type OverviewProgress,
  type ProjectOverviewEntry,
  type ProjectStats,
  type Services,
  weblateWebUrl,
} from "@fedora-l10n/core";
import { Box, Text, useApp, useInput } from "ink";
import type React from "react";
import { useEffect, useMemo, useState } from "react";
import type { StaleListener } from "../context.js";
import { ComponentList } from "./components/ComponentList.js";
import { Heatmap } from "./components/Heatmap.js";
import { ProjectList } from "./components/ProjectList.js";
import { SearchInput } from "./components/SearchInput.js";
import { StatusBar, type View } from "./components/StatusBar.js";
import { useStatsFeed } from "./hooks/useStatsFeed.js";

// =============================================================================
// Types
// =============================================================================

export interface AppProps {
  readonly services: Services;
  /** Subscribes to expired cache entries served after a failed fetch */
  readonly onStale?: (listener: StaleListener) => () => void;
  /** Rows drawn by the lists (default: 15) */
  readonly maxRows?: number;
  /** Skip the cache on the first load of each view */
  readonly initialRefresh?: boolean;
}

interface Reload {
  readonly key: number;
  /** Skip the cache on this load */
  readonly force: boolean;
}

function clampIndex(index: number, length: number): number {
  return Math.max(0, Math.min(index, length - 1));
}

// =============================================================================
// Component
// =============================================================================

export function App({
  services,
  onStale,
  maxRows = 15,
  initialRefresh = false,
}: AppProps): React.ReactElement {
  const { exit } = useApp();
  const { client, cache, config, errorHandler, logger } = services;

  const [view, setView] = useState<View>("projects");
  const [project, setProject] = useState<ProjectOverviewEntry | null>(null);
  const [projectIndex, setProjectIndex] = useState(0);
  const [componentIndex, setComponentIndex] = useState(0);
  const [filter, setFilter] = useState("");
  const [searching, setSearching] = useState(false);
  const [showHeatmap, setShowHeatmap] = useState(false);
  const [language, setLanguage] = useState(client.language);
  const [languageDraft, setLanguageDraft] = useState<string | null>(null);
  const [overviewReload, setOverviewReload] = useState<Reload>({ key: 0, force: initialRefresh });
  const [detailsReload, setDetailsReload] = useState<Reload>({ key: 0, force: initialRefresh });
  const [notice, setNotice] = useState<string | undefined>();

  // ----------------------------------------
  // Data
  // ----------------------------------------

  const overview = useStatsFeed<ProjectOverviewEntry[], OverviewProgress>(
    ({ signal, onProgress }) =>
      loadProjectOverview(client, {
        language,
        signal,
        onProgress,
        forceRefresh: overviewReload.force,
        logger,
      }),
    [client, language, overviewReload]
  );

  const projectSlug = project?.slug;
  const details = useStatsFeed<ProjectStats | null>(
    ({ signal }) =>
      projectSlug === undefined
        ? Promise.resolve(null)
        : client.getProjectStats(projectSlug, { language, signal, forceRefresh: detailsReload.force }),
    [client, language, projectSlug, detailsReload]
  );

  useEffect(
    () => onStale?.((_url, error) => setNotice(errorHandler.notice(error))),
    [onStale, errorHandler]
  );

  useEffect(() => {
    if (overview.error !== undefined) {
      setNotice(errorHandler.notice(errorHandler.handle(overview.error)));
    }
  }, [overview.error, errorHandler]);

  useEffect(() => {
    if (details.error !== undefined) {
      setNotice(errorHandler.notice(errorHandler.handle(details.error)));
    }
  }, [details.error, errorHandler]);

  const filtered = useMemo(() => filterEntries(overview.data ?? [], filter), [overview.data, filter]);
  const selectedProject = clampIndex(projectIndex, filtered.length);
  const componentCount = details.data?.components.length ?? 0;
  const selectedComponent = clampIndex(componentIndex, componentCount);

  // ----------------------------------------
  // Keys
  // ----------------------------------------

  const reloadView = (force: boolean): void => {
    setNotice(undefined);
    if (view === "components") {
      setDetailsReload((prev) => ({ key: prev.key + 1, force }));
    } else {
      setOverviewReload((prev) => ({ key: prev.key + 1, force }));
    }
  };

  // Empties the cache, then reloads in the new language
  const switchLanguage = (draft: string): void => {
    setLanguageDraft(null);
    const parsed = LanguageSchema.safeParse(draft.trim());
    if (!parsed.success) {
      setNotice(`Invalid language code "${draft.trim()}"`);
      return;
    }
    if (parsed.data === language) {
      return;
    }
    void cache.clear().then(
      (removed) => {
        logger.info("Language changed", { from: language, to: parsed.data, removed });
        setNotice(undefined);
        setProjectIndex(0);
        setLanguage(parsed.data);
      },
      (error: unknown) => setNotice(errorHandler.notice(errorHandler.handle(error)))
    );
  };

  const prompting = searching || languageDraft !== null;

  useInput(
    (input, key) => {
      if (input === "q") {
        exit();
        return;
      }
      if (input === "r") {
        reloadView(true);
        return;
      }
      if (input === "c") {
        void cache.clear().then(
          (removed) => {
            logger.info("Cache cleared", { removed });
            reloadView(false);
          },
          (error: unknown) => setNotice(errorHandler.notice(errorHandler.handle(error)))
        );
        return;
      }

      if (view === "components") {
        if (key.escape) {
          setView("projects");
          setProject(null);
        } else if (key.upArrow) {
          setComponentIndex(Math.max(0, selectedComponent - 1));
        } else if (key.downArrow) {
          setComponentIndex(clampIndex(selectedComponent + 1, componentCount));
        }
        return;
      }

      if (input === "/") {
        setSearching(true);
      } else if (input === "l") {
        setLanguageDraft("");
      } else if (input === "h") {
        setShowHeatmap((prev) => !prev);
      } else if (key.escape && filter) {
        setFilter("");
      } else if (key.upArrow) {
        setProjectIndex(Math.max(0, selectedProject - 1));
      } else if (key.downArrow) {
        setProjectIndex(clampIndex(selectedProject + 1, filtered.length));
      } else if (key.return) {
        const entry = filtered[selectedProject];
        if (entry) {
          setProject(entry);
          setComponentIndex(0);
          setView("components");
        }
      }
    },
    { isActive: !prompting }
  );

  useInput(
    (_input, key) => {
      if (!key.escape) {
        return;
      }
      if (languageDraft !== null) {
        setLanguageDraft(null);
      } else {
        setFilter("");
        setSearching(false);
      }
    },
    { isActive: prompting }
  );

  // ----------------------------------------
  // Render
  // ----------------------------------------

  const loading = view === "components" ? details.loading : overview.loading;

  let body: React.ReactNode;
  if (view === "components" && project) {
    body = details.data ? (
      <ComponentList
        name={project.name}
        stats={details.data}
        webUrl={weblateWebUrl(config.api.baseUrl, project.slug)}
        selectedIndex={selectedComponent}
        maxRows={maxRows}
      />
    ) : (
      <Text bold>{project.name}</Text>
    );
  } else if (!overview.data) {
    body = overview.loading ? null : <Text color="red">No data available</Text>;
  } else if (showHeatmap) {
    body = <Heatmap entries={filtered} />;
  } else {
    body = <ProjectList entries={filtered} selectedIndex={selectedProject} maxRows={maxRows} />;
  }

  return (
    <Box flexDirection="column">
      <Text bold>Fedora translation statistics</Text>
      {languageDraft !== null ? (
        <SearchInput
          value={languageDraft}
          onChange={setLanguageDraft}
          onSubmit={switchLanguage}
          focus
          prompt="language: "
          placeholder={language}
        />
      ) : null}
      {view === "projects" && (searching || filter) ? (
        <SearchInput
          value={filter}
          onChange={(value) => {
            setFilter(value);
            setProjectIndex(0);
          }}
          onSubmit={() => setSearching(false)}
          focus={searching && languageDraft === null}
        />
      ) : null}
      <Box flexDirection="column" marginTop={1}>
        {body}
      </Box>
      <StatusBar
        language={language}
        view={view}
        loading={loading}
        progress={view === "projects" ? overview.progress : undefined}
        notice={notice}
      />
    </Box>
  );
}
