/**
 * Configuration module.
 * Resolves the invocation config from CLI flags, env and an optional config file.
 * Zod-validated. Precedence: flag > env > file > default.
 */

export { APP_NAME, VERSION, DEFAULTS, TIMEOUTS, EXIT_CODES } from './defaults.js';
export { loadConfigFile, loadEnvConfig, resolveInvocation } from './loader.js';
export type { EnvConfig, RawFlags } from './loader.js';
