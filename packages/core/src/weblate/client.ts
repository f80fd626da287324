// ============================================
// Weblate API Client
// ============================================

import type { z } from "zod";
import type { CacheLayer } from "../cache/cache-layer.js";
import type { Fetcher } from "../cache/types.js";
import { FetchError } from "../errors/fetch.js";
import { isAbortError } from "../errors/retry.js";
import { isRetryableError } from "../errors/types.js";
import type { Logger } from "../logger/logger.js";
import { silentLogger } from "../logger/logger.js";
import {
  ComponentPageSchema,
  ProjectPageSchema,
  type StatisticsPayload,
  StatisticsSchema,
} from "./schemas.js";
import type { WeblateTransport } from "./transport.js";
import type {
  ComponentStats,
  ComponentSummary,
  ListProjectsOptions,
  ProjectStats,
  ProjectStatsOptions,
  ProjectSummary,
  RequestOptions,
  TranslationStatistics,
} from "./types.js";

export interface WeblateClientOptions {
  /** API root, e.g. https://translate.fedoraproject.org/api */
  baseUrl: string;
  /** Language code used when a call names none */
  language: string;
  cache: CacheLayer;
  transport: WeblateTransport;
  /** Retries of a retryable failure after the first attempt (default: 4) */
  maxRetries?: number;
  pageSize?: number;
  /** Serve expired entries when every attempt fails (default: false) */
  staleOnError?: boolean;
  /** Told about every stale fallback */
  onStale?: (url: string, error: unknown) => void;
  logger?: Logger;
}

type PayloadSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

function parsePayload<T>(schema: PayloadSchema<T>, payload: unknown, url: string): T {
  const result = schema.safeParse(payload);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw FetchError.malformed(url, `${where}${issue?.message ?? "unexpected payload"}`);
  }
  return result.data;
}

export function toTranslationStatistics(payload: StatisticsPayload): TranslationStatistics {
  const translatedPct = payload.translated_percent;
  const fuzzyPct = payload.fuzzy_percent;
  return {
    translatedPct,
    fuzzyPct,
    untranslatedPct: Math.max(0, 100 - translatedPct - fuzzyPct),
    total: payload.total,
    translated: payload.translated,
  };
}

function byPercentThenName<T extends { translatedPct: number; name: string }>(a: T, b: T): number {
  return b.translatedPct - a.translatedPct || a.name.localeCompare(b.name);
}

/**
 * Typed access to the Weblate endpoints the views need.
 *
 * Every request goes through the cache layer keyed by its URL. Retryable
 * failures (429, 5xx, timeouts, network errors) are retried up to
 * `maxRetries` times; each retry passes through the cache layer again and
 * so waits out its growing backoff delay. After one request has used up its
 * retries, or while the cache layer is cooling down, later requests get a
 * single attempt until a fetch succeeds again.
 *
 * @example
 * ```typescript
 * const client = new WeblateClient({ baseUrl, language: "sv", cache, transport });
 * const projects = await client.listProjects({
 *   onProgress: (page, total) => console.log(`page ${page}/${total}`),
 * });
 * ```
 */
export class WeblateClient {
  readonly baseUrl: string;
  readonly language: string;
  private readonly cache: CacheLayer;
  private readonly transport: WeblateTransport;
  private readonly maxRetries: number;
  private readonly pageSize: number;
  private readonly staleOnError: boolean;
  private readonly onStale?: (url: string, error: unknown) => void;
  private readonly logger: Logger;
  /** Set when a request used up its retries; cleared by the next network success */
  private exhausted = false;

  constructor(options: WeblateClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.language = options.language;
    this.cache = options.cache;
    this.transport = options.transport;
    this.maxRetries = options.maxRetries ?? 4;
    this.pageSize = options.pageSize ?? 50;
    this.staleOnError = options.staleOnError ?? false;
    this.onStale = options.onStale;
    this.logger = options.logger ?? silentLogger;
  }

  // ============================================
  // Listings
  // ============================================

  /**
   * Every project, following the `next` links of the paginated listing.
   */
  async listProjects(options: ListProjectsOptions = {}): Promise<ProjectSummary[]> {
    const projects: ProjectSummary[] = [];
    let page = 0;

    let url: string | null = this.url(`/projects/?page_size=${this.pageSize}`);
    const seen = new Set<string>();
    while (url !== null && !seen.has(url)) {
      seen.add(url);
      const data: z.infer<typeof ProjectPageSchema> = await this.request(url, ProjectPageSchema, options);
      for (const project of data.results) {
        projects.push({
          slug: project.slug,
          name: project.name ?? project.slug,
          webUrl: project.web_url,
        });
      }
      page++;
      options.onProgress?.(page, Math.ceil(data.count / this.pageSize));
      url = data.next;
    }

    return projects;
  }

  async listComponents(projectSlug: string, options: RequestOptions = {}): Promise<ComponentSummary[]> {
    const components: ComponentSummary[] = [];

    let url: string | null = this.url(
      `/projects/${encodeURIComponent(projectSlug)}/components/?page_size=${this.pageSize}`
    );
    const seen = new Set<string>();
    while (url !== null && !seen.has(url)) {
      seen.add(url);
      const data: z.infer<typeof ComponentPageSchema> = await this.request(url, ComponentPageSchema, options);
      for (const component of data.results) {
        components.push({ slug: component.slug, name: component.name ?? component.slug });
      }
      url = data.next;
    }

    return components;
  }

  // ============================================
  // Statistics
  // ============================================

  /** All languages of a project combined */
  async getProjectStatistics(projectSlug: string, options: RequestOptions = {}): Promise<TranslationStatistics> {
    const url = this.url(`/projects/${encodeURIComponent(projectSlug)}/statistics/`);
    return toTranslationStatistics(await this.request(url, StatisticsSchema, options));
  }

  /** One language across all components of a project */
  async getLanguageStatistics(
    projectSlug: string,
    language: string,
    options: RequestOptions = {}
  ): Promise<TranslationStatistics> {
    const url = this.url(
      `/projects/${encodeURIComponent(projectSlug)}/statistics/${encodeURIComponent(language)}/`
    );
    return toTranslationStatistics(await this.request(url, StatisticsSchema, options));
  }

  /** One translation: a component in one language */
  async getComponentStatistics(
    projectSlug: string,
    componentSlug: string,
    language: string,
    options: RequestOptions = {}
  ): Promise<TranslationStatistics> {
    const url = this.url(
      `/components/${encodeURIComponent(projectSlug)}/${encodeURIComponent(componentSlug)}` +
        `/statistics/${encodeURIComponent(language)}/`
    );
    return toTranslationStatistics(await this.request(url, StatisticsSchema, options));
  }

  /**
   * The project's statistics for one language plus each component's.
   *
   * A component whose statistics cannot be fetched is listed with zero
   * percentages and an `error`; failures of the project itself propagate.
   */
  async getProjectStats(projectId: string, options: ProjectStatsOptions = {}): Promise<ProjectStats> {
    const language = options.language ?? this.language;
    const overall = await this.getLanguageStatistics(projectId, language, options);
    const components = await this.listComponents(projectId, options);

    const stats: ComponentStats[] = [];
    for (const component of components) {
      try {
        const s = await this.getComponentStatistics(projectId, component.slug, language, options);
        stats.push({
          componentId: component.slug,
          name: component.name,
          translatedPct: s.translatedPct,
          fuzzyPct: s.fuzzyPct,
          untranslatedPct: s.untranslatedPct,
        });
      } catch (error) {
        if (isAbortError(error)) {
          throw error;
        }
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn("Component statistics unavailable", {
          project: projectId,
          component: component.slug,
          error: message,
        });
        stats.push({
          componentId: component.slug,
          name: component.name,
          translatedPct: 0,
          fuzzyPct: 0,
          untranslatedPct: 0,
          error: message,
        });
      }
    }

    return {
      projectId,
      language,
      translatedPct: overall.translatedPct,
      fuzzyPct: overall.fuzzyPct,
      untranslatedPct: overall.untranslatedPct,
      components: stats.sort(byPercentThenName),
    };
  }

  // ============================================
  // Internals
  // ============================================

  private url(path: string): string {
    return `${this.baseUrl}${path}`;
  }

  private async request<T>(url: string, schema: PayloadSchema<T>, options: RequestOptions): Promise<T> {
    // Payloads are validated before they reach the cache
    const fetcher: Fetcher = async (signal) => {
      const payload = await this.transport.getJson(url, signal);
      parsePayload(schema, payload, url);
      return payload;
    };
    const staleOnError = options.staleOnError ?? this.staleOnError;

    for (let attempt = 0; ; attempt++) {
      const lastAttempt = attempt >= this.maxRetries || this.exhausted || this.cache.coolingDown;
      try {
        const resolution = await this.cache.resolve(url, fetcher, {
          signal: options.signal,
          forceRefresh: options.forceRefresh,
          staleOnError: staleOnError && lastAttempt,
        });
        if (resolution.source === "network") {
          this.exhausted = false;
        }
        if (resolution.source === "stale") {
          this.exhausted = true;
          this.logger.warn("Serving expired data", { url });
          this.onStale?.(url, resolution.error);
        }
        return parsePayload(schema, resolution.value, url);
      } catch (error) {
        if (!isRetryableError(error)) {
          throw error;
        }
        if (lastAttempt) {
          this.exhausted = true;
          throw error;
        }
        this.logger.info("Retrying request", {
          url,
          attempt: attempt + 1,
          maxRetries: this.maxRetries,
        });
      }
    }
  }
}
