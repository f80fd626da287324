import { z } from "zod";
import { LOG_LEVELS } from "../logger/types.js";

// ============================================
// Configuration Schemas
// ============================================

export const DEFAULT_API_URL = "https://translate.fedoraproject.org/api";

export const LogLevelSchema = z.enum(LOG_LEVELS);

/**
 * Weblate language codes: `sv`, `pt_BR`, `zh_Hans`, `sr@latin`.
 */
export const LanguageSchema = z
  .string()
  .regex(/^[A-Za-z]{2,3}([_@-][A-Za-z0-9]+)*$/, "Expected a language code such as sv or pt_BR");

export const ApiConfigSchema = z.object({
  baseUrl: z.string().url().default(DEFAULT_API_URL),
  /** Per-request timeout */
  timeoutMs: z.number().int().positive().default(30_000),
  /** Minimum spacing between two network dispatches */
  minIntervalMs: z.number().int().nonnegative().default(600),
  /** Retries of a retryable failure after the first attempt */
  maxRetries: z.number().int().min(0).max(10).default(4),
  pageSize: z.number().int().min(1).max(1000).default(50),
});

export const BackoffConfigSchema = z
  .object({
    baseDelayMs: z.number().int().nonnegative().default(600),
    maxDelayMs: z.number().int().positive().default(30_000),
  })
  .refine((value) => value.maxDelayMs >= value.baseDelayMs, {
    message: "maxDelayMs must be at least baseDelayMs",
    path: ["maxDelayMs"],
  });

export const CacheConfigSchema = z.object({
  enabled: z.boolean().default(true),
  dir: z.string().min(1),
  ttlMs: z.number().int().positive().default(3_600_000),
});

/**
 * Complete configuration. `cache.dir` and `language` have no static
 * default; the loader supplies them from the environment.
 */
export const ConfigSchema = z.object({
  api: ApiConfigSchema.default({}),
  backoff: BackoffConfigSchema.default({}),
  cache: CacheConfigSchema,
  language: LanguageSchema,
  logLevel: LogLevelSchema.default("info"),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ApiConfig = z.infer<typeof ApiConfigSchema>;
export type CacheConfig = z.infer<typeof CacheConfigSchema>;

/**
 * Sparse configuration as read from a file, the environment or flags.
 */
export type ConfigOverrides = {
  [K in keyof Config]?: Config[K] extends object ? Partial<Config[K]> : Config[K];
};
