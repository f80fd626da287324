/**
 * Mounts the TUI and resolves once the user quits.
 *
 * @module tui/run
 */

import { render } from "ink";
import { EXIT_CODES, type ExitCode } from "../commands/exit-codes.js";
import type { CommandContext } from "../context.js";
import { App } from "./App.js";

export async function runTui(ctx: CommandContext): Promise<ExitCode> {
  const instance = render(
    <App services={ctx.services} onStale={ctx.onStale} initialRefresh={ctx.globals.refresh} />
  );
  await instance.waitUntilExit();
  return EXIT_CODES.SUCCESS;
}
