/**
 * `fedora-l10n components <project>` - per-component completion.
 *
 * @module cli/commands/components
 */

import { formatPercent, weblateWebUrl } from "@fedora-l10n/core";
import type { CommandContext } from "../context.js";
import { EXIT_CODES, type ExitCode } from "./exit-codes.js";
import { statLine } from "./output.js";

export interface ComponentsOptions {
  json: boolean;
}

export async function runComponents(
  ctx: CommandContext,
  project: string,
  options: ComponentsOptions
): Promise<ExitCode> {
  const { services, io, globals } = ctx;

  const stats = await services.client.getProjectStats(project, {
    signal: io.signal,
    forceRefresh: globals.refresh,
  });

  if (options.json) {
    io.stdout(`${JSON.stringify(stats, null, 2)}\n`);
    return EXIT_CODES.SUCCESS;
  }

  const { chalk } = io;
  io.stdout(
    `${chalk.bold(project)} [${stats.language}]: ${formatPercent(stats.translatedPct)} translated, ` +
      `${formatPercent(stats.fuzzyPct)} fuzzy\n`
  );
  io.stdout(`${chalk.dim(weblateWebUrl(services.config.api.baseUrl, project))}\n\n`);
  for (const component of stats.components) {
    io.stdout(
      `${statLine(chalk, component.translatedPct, component.name, component.error ? "unavailable" : undefined)}\n`
    );
  }
  if (stats.components.length === 0) {
    io.stdout(`${chalk.dim("No components")}\n`);
  }

  return EXIT_CODES.SUCCESS;
}
