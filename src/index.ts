/**
 * nats-pubsub: publish/subscribe demo over NATS.
 * Library surface for embedding the runner or the CLI.
 */

export * from './broker/index.js';
export * from './config/index.js';
export * from './core/index.js';
export * from './schema/index.js';
export { createLogger, formatTimestamp } from './utils/logger.js';
export type { LogSink, Logger, LoggerOptions } from './utils/logger.js';
export { withTimeout } from './utils/timeout.js';
export { runCli, createProgram } from './cli/index.js';
export type { CliDeps } from './cli/index.js';
