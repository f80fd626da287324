/**
 * useStatsFeed Hook
 *
 * Runs one asynchronous load per change of its dependencies and exposes
 * its progress and outcome. The previous data stays visible while a reload
 * runs and after it fails, so a failed refresh falls back to what was
 * already on screen.
 *
 * @module tui/hooks/useStatsFeed
 */

import { isAbortError } from "@fedora-l10n/core";
import { type DependencyList, useEffect, useState } from "react";

// =============================================================================
// Types
// =============================================================================

export interface FeedContext<P> {
  /** Aborted when the dependencies change or the component unmounts */
  readonly signal: AbortSignal;
  readonly onProgress: (progress: P) => void;
}

export interface FeedState<T, P> {
  readonly data: T | undefined;
  readonly loading: boolean;
  readonly progress: P | undefined;
  /** Failure of the latest load */
  readonly error: unknown;
}

const INITIAL_STATE = { data: undefined, loading: true, progress: undefined, error: undefined };

// =============================================================================
// Hook
// =============================================================================

/**
 * @example
 * ```tsx
 * const feed = useStatsFeed(
 *   ({ signal, onProgress }) => loadProjectOverview(client, { signal, onProgress }),
 *   [client, reloadKey]
 * );
 * ```
 */
export function useStatsFeed<T, P = never>(
  load: (context: FeedContext<P>) => Promise<T>,
  deps: DependencyList
): FeedState<T, P> {
  const [state, setState] = useState<FeedState<T, P>>(INITIAL_STATE);

  useEffect(() => {
    const controller = new AbortController();
    setState((prev) => ({ ...prev, loading: true, progress: undefined, error: undefined }));

    load({
      signal: controller.signal,
      onProgress: (progress) => {
        if (!controller.signal.aborted) {
          setState((prev) => ({ ...prev, progress }));
        }
      },
    }).then(
      (data) => {
        if (!controller.signal.aborted) {
          setState({ data, loading: false, progress: undefined, error: undefined });
        }
      },
      (error: unknown) => {
        if (controller.signal.aborted || isAbortError(error)) {
          return;
        }
        setState((prev) => ({ ...prev, loading: false, progress: undefined, error }));
      }
    );

    return () => controller.abort();
    // biome-ignore lint/correctness/useExhaustiveDependencies: callers pass the load inputs as deps
  }, deps);

  return state;
}
