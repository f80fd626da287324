/**
 * Command-line program: the TUI by default, plus plain-text commands for
 * scripts and pipes.
 *
 * @module cli/program
 */

import { describeError, shutdown } from "@fedora-l10n/core";
import { Command, CommanderError, Option } from "commander";
import { z } from "zod";
import { runApiKeyRemove, runApiKeySet, runApiKeyStatus } from "./commands/api-key.js";
import { runCacheClear, runCacheStats } from "./commands/cache.js";
import { runComponents } from "./commands/components.js";
import { EXIT_CODES, type ExitCode, exitCodeFor } from "./commands/exit-codes.js";
import { runExport } from "./commands/export.js";
import { runProjects } from "./commands/projects.js";
import {
  type CliIO,
  type CommandContext,
  createCommandContext,
  GlobalOptionsSchema,
  type RunMode,
} from "./context.js";
import { version } from "./version.js";

const JsonFlagSchema = z.object({ json: z.boolean().default(false) });

const ExportFlagsSchema = z.object({
  format: z.enum(["csv", "json"]),
  output: z.string().optional(),
});

export type TuiRunner = (ctx: CommandContext) => Promise<ExitCode>;

/**
 * Parse `argv` (without the node and script entries), run the command and
 * return its exit code. Nothing here calls `process.exit`.
 *
 * @example
 * ```typescript
 * process.exitCode = await runCli(process.argv.slice(2), createProcessIO(), runTui);
 * ```
 */
export async function runCli(argv: readonly string[], io: CliIO, runTui: TuiRunner): Promise<ExitCode> {
  let exitCode: ExitCode = EXIT_CODES.SUCCESS;

  async function execute(
    command: Command,
    mode: RunMode,
    run: (ctx: CommandContext) => Promise<ExitCode>
  ): Promise<void> {
    const ctx = createCommandContext(GlobalOptionsSchema.parse(command.optsWithGlobals()), io, mode);
    try {
      exitCode = await run(ctx);
    } finally {
      await shutdown(ctx.services);
    }
  }

  const program = new Command()
    .name("fedora-l10n")
    .description("Translation statistics for Fedora projects on Weblate")
    .version(version)
    .option("-l, --lang <code>", "language code (default: from the locale)")
    .option("--config <path>", "configuration file")
    .option("-r, --refresh", "ignore cached responses")
    .option("--no-cache", "neither read nor write the response cache")
    .option("-v, --verbose", "debug logging")
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr })
    .action(async (_options: unknown, command: Command) => {
      await execute(command, "tui", runTui);
    });

  program
    .command("projects")
    .description("completion of every project")
    .option("--json", "print JSON")
    .action(async (options: unknown, command: Command) => {
      const { json } = JsonFlagSchema.parse(options);
      await execute(command, "command", (ctx) => runProjects(ctx, { json }));
    });

  program
    .command("components <project>")
    .description("completion of each component of a project")
    .option("--json", "print JSON")
    .action(async (project: string, options: unknown, command: Command) => {
      const { json } = JsonFlagSchema.parse(options);
      await execute(command, "command", (ctx) => runComponents(ctx, project, { json }));
    });

  program
    .command("export")
    .description("export the project overview")
    .addOption(new Option("-f, --format <format>", "output format").choices(["csv", "json"]).default("csv"))
    .option("-o, --output <file>", "write to a file instead of stdout")
    .action(async (options: unknown, command: Command) => {
      const flags = ExportFlagsSchema.parse(options);
      await execute(command, "command", (ctx) => runExport(ctx, flags));
    });

  const cache = program.command("cache").description("manage the response cache");
  cache
    .command("clear")
    .description("remove every cached response")
    .action(async (_options: unknown, command: Command) => {
      await execute(command, "command", runCacheClear);
    });
  cache
    .command("stats")
    .description("show cache location and entry counts")
    .action(async (_options: unknown, command: Command) => {
      await execute(command, "command", runCacheStats);
    });

  const apiKey = program.command("api-key").description("manage the Weblate API key");
  apiKey
    .command("set [key]")
    .description("store a key (prompts when omitted)")
    .action(async (key: string | undefined, _options: unknown, command: Command) => {
      await execute(command, "command", (ctx) => runApiKeySet(ctx, key));
    });
  apiKey
    .command("status")
    .description("show which key is used")
    .action(async (_options: unknown, command: Command) => {
      await execute(command, "command", runApiKeyStatus);
    });
  apiKey
    .command("remove")
    .description("delete the stored key")
    .action(async (_options: unknown, command: Command) => {
      await execute(command, "command", runApiKeyRemove);
    });

  try {
    await program.parseAsync([...argv], { from: "user" });
    return exitCode;
  } catch (error) {
    const code = exitCodeFor(error);
    // Commander has already printed its own messages
    if (code === EXIT_CODES.ERROR || (code === EXIT_CODES.USAGE_ERROR && !(error instanceof CommanderError))) {
      io.stderr(`${io.chalk.red("Error:")} ${describeError(error)}\n`);
    }
    return code;
  }
}
