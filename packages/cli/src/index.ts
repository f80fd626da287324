#!/usr/bin/env node
import { EXIT_CODES } from "./commands/exit-codes.js";
import { createProcessIO } from "./context.js";
import { runCli } from "./program.js";
import { runTui } from "./tui/run.js";

// ============================================
// Interrupt Handling
// ============================================

const controller = new AbortController();

process.once("SIGINT", () => {
  controller.abort();
  // A second Ctrl+C does not wait for the abort to unwind
  process.once("SIGINT", () => process.exit(EXIT_CODES.INTERRUPTED));
});

process.exitCode = await runCli(process.argv.slice(2), createProcessIO(controller.signal), runTui);
