/**
 * `fedora-l10n export` - the project overview as CSV or JSON.
 *
 * @module cli/commands/export
 */

import { writeFile } from "node:fs/promises";
import { type ExportFormat, formatExport, loadProjectOverview, toExportRows } from "@fedora-l10n/core";
import type { CommandContext } from "../context.js";
import { EXIT_CODES, type ExitCode } from "./exit-codes.js";

export interface ExportOptions {
  format: ExportFormat;
  /** Writes to stdout when omitted */
  output?: string;
}

export async function runExport(ctx: CommandContext, options: ExportOptions): Promise<ExitCode> {
  const { services, io, globals } = ctx;

  const entries = await loadProjectOverview(services.client, {
    signal: io.signal,
    forceRefresh: globals.refresh,
    logger: services.logger,
  });
  const text = formatExport(toExportRows(entries), options.format);

  if (options.output === undefined) {
    io.stdout(text);
  } else {
    await writeFile(options.output, text, "utf8");
    io.stderr(`Exported ${entries.length} projects to ${options.output}\n`);
  }

  return EXIT_CODES.SUCCESS;
}
