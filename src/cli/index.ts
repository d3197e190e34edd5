/**
 * CLI module, a thin wrapper over core.
 * Parses arguments, delegates to core, maps failures to exit codes.
 * No business logic lives here.
 */

export { createProgram, runCli } from './run.js';
export type { CliDeps } from './run.js';
export { longFlags, normalizeArgv } from './argv.js';
