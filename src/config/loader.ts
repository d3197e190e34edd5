import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';
import type { ZodError } from 'zod';

import { ConfigError, describeError } from '../core/errors.js';
import { fileConfigSchema, invocationSchema } from '../schema/config.js';
import type { FileConfig, InvocationConfig } from '../schema/config.js';
import { APP_NAME, DEFAULTS, TIMEOUTS } from './defaults.js';

// ── Input shapes ─────────────────────────────────────────────

/** Flag values exactly as the command line produced them. */
export interface RawFlags {
  mode?: string | undefined;
  subject?: string | undefined;
  msg?: string | undefined;
  url?: string | undefined;
  name?: string | undefined;
  user?: string | undefined;
  password?: string | undefined;
  flushTimeout?: string | undefined;
  drainTimeout?: string | undefined;
  config?: string | undefined;
}

export interface EnvConfig {
  url?: string | undefined;
  name?: string | undefined;
  user?: string | undefined;
  password?: string | undefined;
  broker?: string | undefined;
}

// ── Helpers ──────────────────────────────────────────────────

function blankToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim().length === 0 ? undefined : value;
}

function parseMillis(value: string | undefined): number | undefined {
  const raw = blankToUndefined(value);
  if (raw === undefined) return undefined;
  return /^\d+$/.test(raw.trim()) ? Number(raw) : Number.NaN;
}

function formatIssues(error: ZodError): string {
  return error.issues.map((issue) => issue.message).join('; ');
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

// ── Env loader ───────────────────────────────────────────────

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  return {
    url: blankToUndefined(env['NATS_URL']),
    name: blankToUndefined(env['NATS_NAME']),
    user: blankToUndefined(env['NATS_USER']),
    password: blankToUndefined(env['NATS_PASSWORD']),
    broker: blankToUndefined(env['PUBSUB_BROKER']),
  };
}

// ── Config file loading ──────────────────────────────────────

/**
 * Load and validate a `.pubsub.yaml` (or JSON) config file.
 * A missing file yields `{}` unless `required` is set.
 */
export async function loadConfigFile(
  configPath: string,
  required: boolean,
): Promise<FileConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (err) {
    if (!required && isMissingFile(err)) return {};
    throw new ConfigError(
      `cannot read config file ${configPath}: ${describeError(err)}`,
      { cause: err },
    );
  }

  let parsed: unknown;
  try {
    parsed = configPath.endsWith('.json') ? JSON.parse(raw) : parseYaml(raw);
  } catch (err) {
    throw new ConfigError(
      `cannot parse config file ${configPath}: ${describeError(err)}`,
      { cause: err },
    );
  }

  const result = fileConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`invalid config file ${configPath}: ${details}`);
  }
  return result.data;
}

// ── Resolution ───────────────────────────────────────────────

/**
 * Merge flags, env and config file into a frozen invocation config.
 * Throws `ConfigError` before anything touches the network.
 */
export async function resolveInvocation(
  flags: RawFlags,
  env: EnvConfig,
): Promise<InvocationConfig> {
  const configPath = blankToUndefined(flags.config);
  const file = await loadConfigFile(
    configPath ?? DEFAULTS.CONFIG_PATH,
    configPath !== undefined,
  );

  const result = invocationSchema.safeParse({
    mode: blankToUndefined(flags.mode),
    subject: blankToUndefined(flags.subject),
    payload: flags.msg,
    url: flags.url ?? env.url ?? file.url ?? DEFAULTS.URL,
    name: flags.name ?? env.name ?? file.name ?? APP_NAME,
    user: flags.user ?? env.user ?? file.user,
    password: flags.password ?? env.password ?? file.password,
    broker: env.broker ?? file.broker ?? DEFAULTS.BROKER,
    flushTimeoutMs:
      parseMillis(flags.flushTimeout) ??
      file.flushTimeoutMs ??
      TIMEOUTS.FLUSH_TIMEOUT,
    drainTimeoutMs:
      parseMillis(flags.drainTimeout) ??
      file.drainTimeoutMs ??
      TIMEOUTS.DRAIN_TIMEOUT,
  });

  if (!result.success) {
    throw new ConfigError(formatIssues(result.error));
  }
  return Object.freeze(result.data);
}
