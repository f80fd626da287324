/**
 * `fedora-l10n api-key set|status|remove`
 *
 * Keys from the environment win over the key file; `set` always writes
 * the file.
 *
 * @module cli/commands/api-key
 */

import type { CommandContext } from "../context.js";
import { EXIT_CODES, type ExitCode } from "./exit-codes.js";

export async function runApiKeySet(ctx: CommandContext, key?: string): Promise<ExitCode> {
  const { services, io } = ctx;
  const value = key ?? (await io.readSecret("Weblate API key"));

  const result = await services.apiKeys.save(value);
  if (!result.ok) {
    io.stderr(`${io.chalk.red("Error:")} ${result.error.message}\n`);
    return EXIT_CODES.ERROR;
  }

  io.stdout(`Saved API key ${result.value.maskedHint} to ${result.value.location}\n`);
  return EXIT_CODES.SUCCESS;
}

export async function runApiKeyStatus(ctx: CommandContext): Promise<ExitCode> {
  const { services, io } = ctx;
  const key = await services.apiKeys.resolve();

  if (!key) {
    io.stdout("No API key configured; requests are anonymous\n");
    return EXIT_CODES.SUCCESS;
  }

  const where = key.source === "env" ? `environment variable ${key.location}` : key.location;
  io.stdout(`API key ${key.maskedHint} from ${where}\n`);
  return EXIT_CODES.SUCCESS;
}

export async function runApiKeyRemove(ctx: CommandContext): Promise<ExitCode> {
  const { services, io } = ctx;
  const result = await services.apiKeys.remove();
  if (!result.ok) {
    io.stderr(`${io.chalk.red("Error:")} ${result.error.message}\n`);
    return EXIT_CODES.ERROR;
  }
  io.stdout(result.value ? "Removed the stored API key\n" : "No stored API key\n");
  return EXIT_CODES.SUCCESS;
}
