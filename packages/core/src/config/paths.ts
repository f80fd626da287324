import * as os from "node:os";
import * as path from "node:path";

export const APP_DIR_NAME = "fedora-l10n";

export interface PathOptions {
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
}

/**
 * `$XDG_CONFIG_HOME/fedora-l10n`, falling back to `~/.config/fedora-l10n`.
 */
export function getConfigDir(options: PathOptions = {}): string {
  const env = options.env ?? process.env;
  const base = env.XDG_CONFIG_HOME || path.join(options.homeDir ?? os.homedir(), ".config");
  return path.join(base, APP_DIR_NAME);
}

/**
 * `$XDG_CACHE_HOME/fedora-l10n`, falling back to `~/.cache/fedora-l10n`.
 */
export function getCacheDir(options: PathOptions = {}): string {
  const env = options.env ?? process.env;
  const base = env.XDG_CACHE_HOME || path.join(options.homeDir ?? os.homedir(), ".cache");
  return path.join(base, APP_DIR_NAME);
}

export function getConfigFilePath(options: PathOptions = {}): string {
  return path.join(getConfigDir(options), "config.toml");
}

export function getApiKeyFilePath(options: PathOptions = {}): string {
  return path.join(getConfigDir(options), "api-key");
}

export function getLogFilePath(cacheDir: string): string {
  return path.join(cacheDir, "fedora-l10n.log");
}
