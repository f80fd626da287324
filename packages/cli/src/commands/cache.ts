/**
 * `fedora-l10n cache clear|stats`
 *
 * @module cli/commands/cache
 */

import type { CommandContext } from "../context.js";
import { EXIT_CODES, type ExitCode } from "./exit-codes.js";

export async function runCacheClear(ctx: CommandContext): Promise<ExitCode> {
  const removed = await ctx.services.cache.clear();
  ctx.io.stdout(`Removed ${removed} cached ${removed === 1 ? "response" : "responses"}\n`);
  return EXIT_CODES.SUCCESS;
}

export async function runCacheStats(ctx: CommandContext): Promise<ExitCode> {
  const { services, io } = ctx;
  const stats = await services.cache.stats();
  const { cache } = services.config;

  const lines = [
    ["Directory", cache.enabled ? cache.dir : `${cache.dir} (disabled)`],
    ["TTL", `${Math.round(cache.ttlMs / 60_000)} min`],
    ["Entries", String(stats.total)],
    ["Valid", String(stats.valid)],
    ["Expired", String(stats.total - stats.valid)],
  ];
  for (const [label, value] of lines) {
    io.stdout(`${io.chalk.bold(`${label}:`.padEnd(11))}${value}\n`);
  }
  return EXIT_CODES.SUCCESS;
}
