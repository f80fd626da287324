/**
 * `fedora-l10n projects` - completion of every project for one language.
 *
 * @module cli/commands/projects
 */

import {
  loadProjectOverview,
  summarizeLowTranslations,
  toExportRows,
  toJson,
} from "@fedora-l10n/core";
import type { CommandContext } from "../context.js";
import { EXIT_CODES, type ExitCode } from "./exit-codes.js";
import { statLine } from "./output.js";

export interface ProjectsOptions {
  json: boolean;
}

export async function runProjects(ctx: CommandContext, options: ProjectsOptions): Promise<ExitCode> {
  const { services, io, globals } = ctx;
  const language = services.config.language;

  const entries = await loadProjectOverview(services.client, {
    language,
    signal: io.signal,
    forceRefresh: globals.refresh,
    logger: services.logger,
  });

  if (options.json) {
    io.stdout(toJson(toExportRows(entries)));
    return EXIT_CODES.SUCCESS;
  }

  io.stdout(`${io.chalk.bold(`Translation status for ${language}`)} (${entries.length} projects)\n`);
  for (const entry of entries) {
    io.stdout(`${statLine(io.chalk, entry.translatedPct, entry.name, entry.error ? "unavailable" : undefined)}\n`);
  }

  const low = summarizeLowTranslations(entries);
  if (low.count > 0) {
    const more = low.count > low.names.length ? ", ..." : "";
    io.stdout(`\n${io.chalk.yellow(`${low.count} projects below 50%: ${low.names.join(", ")}${more}`)}\n`);
  }

  return EXIT_CODES.SUCCESS;
}
