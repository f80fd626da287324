import * as fs from "node:fs";
import * as TOML from "@iarna/toml";
import { detectLanguage } from "../stats/language.js";
import { Err, Ok, type Result } from "../types/result.js";
import { getCacheDir, getConfigFilePath, type PathOptions } from "./paths.js";
import { type Config, ConfigSchema, type ConfigOverrides } from "./schema.js";

// ============================================
// Configuration Loader
// ============================================

export type ConfigErrorCode = "FILE_NOT_FOUND" | "PARSE_ERROR" | "VALIDATION_ERROR" | "READ_ERROR";

/**
 * Configuration error with code and context
 */
export interface ConfigError {
  code: ConfigErrorCode;
  message: string;
  path?: string;
  cause?: unknown;
}

export interface LoadConfigOptions extends PathOptions {
  /**
   * Explicit config file. Unlike the default location it must exist.
   */
  configPath?: string;
  /** Flag values (highest priority) */
  overrides?: ConfigOverrides;
  /** Skip FEDORA_L10N_* environment variables */
  skipEnv?: boolean;
}

// ============================================
// Environment
// ============================================

/**
 * Environment variable to config path mappings
 */
const ENV_MAPPINGS: Record<string, readonly string[]> = {
  FEDORA_L10N_API_URL: ["api", "baseUrl"],
  FEDORA_L10N_CACHE_DIR: ["cache", "dir"],
  FEDORA_L10N_CACHE_TTL: ["cache", "ttlMs"],
  FEDORA_L10N_NO_CACHE: ["cache", "enabled"],
  FEDORA_L10N_LANG: ["language"],
  FEDORA_L10N_LOG_LEVEL: ["logLevel"],
};

/**
 * Numbers and flags arrive as strings; anything that does not coerce is
 * passed through for the schema to reject.
 */
function coerceValue(value: string, keys: readonly string[]): unknown {
  const leaf = keys[keys.length - 1];
  if (leaf === "ttlMs") {
    const n = Number(value);
    return Number.isFinite(n) ? n : value;
  }
  if (leaf === "enabled") {
    // FEDORA_L10N_NO_CACHE=1 disables the cache
    return !(value === "true" || value === "1");
  }
  return value;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    Object.prototype.toString.call(value) === "[object Object]"
  );
}

function setNestedValue(obj: Record<string, unknown>, keys: readonly string[], value: unknown): void {
  const [head, ...rest] = keys;
  if (head === undefined) return;
  if (rest.length === 0) {
    obj[head] = value;
    return;
  }
  const existing = obj[head];
  const child = isPlainObject(existing) ? existing : {};
  obj[head] = child;
  setNestedValue(child, rest, value);
}

/**
 * Parse FEDORA_L10N_* variables into a sparse config object.
 *
 * @example
 * ```typescript
 * parseEnvConfig({ FEDORA_L10N_LANG: "sv", FEDORA_L10N_CACHE_TTL: "60000" });
 * // { language: "sv", cache: { ttlMs: 60000 } }
 * ```
 */
export function parseEnvConfig(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [envVar, keys] of Object.entries(ENV_MAPPINGS)) {
    const value = env[envVar];
    if (value !== undefined && value !== "") {
      setNestedValue(result, keys, coerceValue(value, keys));
    }
  }

  return result;
}

// ============================================
// Merging
// ============================================

/**
 * Deep merge plain objects. Later sources win, arrays are replaced and
 * undefined values never overwrite.
 *
 * @example
 * ```typescript
 * deepMerge({ a: 1, b: { c: 2 } }, { b: { d: 3 } });
 * // { a: 1, b: { c: 2, d: 3 } }
 * ```
 */
export function deepMerge(...sources: Record<string, unknown>[]): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const source of sources) {
    for (const [key, sourceValue] of Object.entries(source)) {
      if (sourceValue === undefined) continue;

      const targetValue = result[key];
      if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
        result[key] = deepMerge(targetValue, sourceValue);
      } else if (isPlainObject(sourceValue)) {
        result[key] = deepMerge(sourceValue);
      } else {
        result[key] = sourceValue;
      }
    }
  }

  return result;
}

// ============================================
// Loading
// ============================================

/**
 * Read and parse a TOML config file
 */
export function readTomlFile(filePath: string): Result<Record<string, unknown>, ConfigError> {
  let content: string;
  try {
    if (!fs.existsSync(filePath)) {
      return Err({
        code: "FILE_NOT_FOUND",
        message: `Config file not found: ${filePath}`,
        path: filePath,
      });
    }
    content = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    return Err({
      code: "READ_ERROR",
      message: `Failed to read config file: ${error instanceof Error ? error.message : String(error)}`,
      path: filePath,
      cause: error,
    });
  }

  try {
    return Ok(TOML.parse(content));
  } catch (error) {
    return Err({
      code: "PARSE_ERROR",
      message: `Failed to parse TOML: ${error instanceof Error ? error.message : String(error)}`,
      path: filePath,
      cause: error,
    });
  }
}

/**
 * Load configuration with cascading priority.
 *
 * Load order (later overrides earlier):
 * 1. Schema defaults, plus the cache directory and the locale language
 * 2. Config file: `configPath`, or ~/.config/fedora-l10n/config.toml when present
 * 3. Environment variables (unless skipEnv)
 * 4. Flag overrides
 *
 * @example
 * ```typescript
 * const result = loadConfig({ overrides: { language: "sv" } });
 * if (result.ok) {
 *   console.log(result.value.api.baseUrl);
 * } else {
 *   console.error(result.error.message);
 * }
 * ```
 */
export function loadConfig(options: LoadConfigOptions = {}): Result<Config, ConfigError> {
  const env = options.env ?? process.env;
  const paths: PathOptions = { env, homeDir: options.homeDir };

  const layers: Record<string, unknown>[] = [
    { cache: { dir: getCacheDir(paths) }, language: detectLanguage(env) },
  ];

  const filePath = options.configPath ?? getConfigFilePath(paths);
  const fileResult = readTomlFile(filePath);
  if (fileResult.ok) {
    layers.push(fileResult.value);
  } else if (options.configPath !== undefined || fileResult.error.code !== "FILE_NOT_FOUND") {
    // The default file is optional; an explicit one is not
    return fileResult;
  }

  if (!options.skipEnv) {
    layers.push(parseEnvConfig(env));
  }

  if (options.overrides) {
    layers.push(options.overrides);
  }

  const parseResult = ConfigSchema.safeParse(deepMerge(...layers));

  if (!parseResult.success) {
    const issues = parseResult.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    return Err({
      code: "VALIDATION_ERROR",
      message: `Invalid configuration: ${issues}`,
      path: fileResult.ok ? filePath : undefined,
      cause: parseResult.error,
    });
  }

  return Ok(parseResult.data);
}
