/**
 * Vitest Global Setup
 *
 * Ink renders attach listeners to the process streams; many renders in one
 * file would otherwise trip the leak warning.
 */

process.stdout.setMaxListeners(0);
process.stdin.setMaxListeners(0);
process.setMaxListeners(0);
