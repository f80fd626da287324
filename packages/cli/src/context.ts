/**
 * Command Context
 *
 * Turns the global flags into loaded configuration, a logger and the core
 * services. Process globals (streams, environment, fetch) come in through
 * {@link CliIO} so commands run the same under test.
 *
 * @module cli/context
 */

import * as os from "node:os";
import { password } from "@inquirer/prompts";
import {
  bootstrap,
  type Config,
  type ConfigError,
  type ConfigOverrides,
  createLogger,
  ErrorCode,
  type FetchLike,
  getLogFilePath,
  L10nError,
  LanguageSchema,
  type Logger,
  loadConfig,
  type Services,
} from "@fedora-l10n/core";
import chalk, { type ChalkInstance } from "chalk";
import { z } from "zod";
import { UsageError } from "./commands/exit-codes.js";
import { version } from "./version.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Everything a command touches outside the core services.
 */
export interface CliIO {
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
  readonly chalk: ChalkInstance;
  readonly env: NodeJS.ProcessEnv;
  readonly homeDir?: string;
  /** Replaces the pooled undici fetch */
  readonly fetch?: FetchLike;
  /** Aborted on SIGINT */
  readonly signal?: AbortSignal;
  /** Asks for a secret without echoing it */
  readonly readSecret: (message: string) => Promise<string>;
}

/**
 * Flags shared by every command, validated from commander's loose values.
 */
export const GlobalOptionsSchema = z.object({
  lang: z.string().optional(),
  config: z.string().optional(),
  refresh: z.boolean().default(false),
  cache: z.boolean().default(true),
  verbose: z.boolean().default(false),
});

export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>;

/** `command`: warnings to stderr. `tui`: log file only. */
export type RunMode = "command" | "tui";

export type StaleListener = (url: string, error: unknown) => void;

export interface CommandContext {
  readonly services: Services;
  readonly io: CliIO;
  readonly globals: GlobalOptions;
  /** Subscribe to expired cache entries served in place of a failed fetch */
  readonly onStale: (listener: StaleListener) => () => void;
}

// =============================================================================
// Process IO
// =============================================================================

export function createProcessIO(signal?: AbortSignal): CliIO {
  return {
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    chalk,
    env: process.env,
    homeDir: os.homedir(),
    signal,
    readSecret: (message) => password({ message, mask: "*" }),
  };
}

// =============================================================================
// Services
// =============================================================================

const CONFIG_ERROR_CODES: Record<ConfigError["code"], ErrorCode> = {
  FILE_NOT_FOUND: ErrorCode.CONFIG_NOT_FOUND,
  PARSE_ERROR: ErrorCode.CONFIG_PARSE_ERROR,
  READ_ERROR: ErrorCode.CONFIG_PARSE_ERROR,
  VALIDATION_ERROR: ErrorCode.CONFIG_INVALID,
};

function buildOverrides(globals: GlobalOptions): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  if (globals.lang !== undefined) {
    if (!LanguageSchema.safeParse(globals.lang).success) {
      throw new UsageError(`Invalid language code: ${globals.lang}`);
    }
    overrides.language = globals.lang;
  }
  if (!globals.cache) {
    overrides.cache = { enabled: false };
  }
  return overrides;
}

function buildLogger(mode: RunMode, config: Config, verbose: boolean): Logger {
  if (mode === "tui") {
    // Anything on the terminal would tear the Ink frame
    return createLogger({
      console: false,
      file: getLogFilePath(config.cache.dir),
      level: verbose ? "debug" : config.logLevel,
    });
  }
  return createLogger({ level: verbose ? "debug" : "warn" });
}

/**
 * Load configuration and wire the services for one run.
 *
 * @throws UsageError for an invalid `--lang`
 * @throws L10nError when the configuration cannot be loaded
 */
export function createCommandContext(
  globals: GlobalOptions,
  io: CliIO,
  mode: RunMode = "command"
): CommandContext {
  const loaded = loadConfig({
    configPath: globals.config,
    env: io.env,
    homeDir: io.homeDir,
    overrides: buildOverrides(globals),
  });
  if (!loaded.ok) {
    throw new L10nError(loaded.error.message, CONFIG_ERROR_CODES[loaded.error.code], {
      cause: loaded.error.cause,
      context: loaded.error.path ? { path: loaded.error.path } : undefined,
    });
  }
  const config = loaded.value;

  const logger = buildLogger(mode, config, globals.verbose);
  const staleListeners = new Set<StaleListener>();

  const services = bootstrap({
    config,
    logger,
    fetch: io.fetch,
    env: io.env,
    homeDir: io.homeDir,
    staleOnError: true,
    onStale: (url, error) => {
      for (const listener of staleListeners) {
        listener(url, error);
      }
    },
    userAgent: `fedora-l10n/${version}`,
  });

  if (mode === "command") {
    staleListeners.add((_url, error) => {
      io.stderr(`${io.chalk.yellow(`${services.errorHandler.notice(error)}; showing cached data`)}\n`);
    });
  }

  return {
    services,
    io,
    globals,
    onStale: (listener) => {
      staleListeners.add(listener);
      return () => {
        staleListeners.delete(listener);
      };
    },
  };
}
