import { Command, CommanderError } from 'commander';

import { createBroker } from '../broker/index.js';
import type { Broker } from '../broker/index.js';
import { APP_NAME, DEFAULTS, EXIT_CODES, TIMEOUTS, VERSION } from '../config/defaults.js';
import { loadEnvConfig, resolveInvocation } from '../config/loader.js';
import type { RawFlags } from '../config/loader.js';
import { ConfigError, PubSubError } from '../core/errors.js';
import { runPubSub } from '../core/runner.js';
import type { SignalSource } from '../core/shutdown.js';
import type { InvocationConfig } from '../schema/config.js';
import { createLogger } from '../utils/logger.js';
import type { LogSink } from '../utils/logger.js';
import { longFlags, normalizeArgv } from './argv.js';

// ── Dependencies ─────────────────────────────────────────────

/** Everything the CLI touches outside itself. Defaults are the real process. */
export interface CliDeps {
  env?: NodeJS.ProcessEnv | undefined;
  stdout?: LogSink | undefined;
  stderr?: LogSink | undefined;
  broker?: Broker | undefined;
  signals?: SignalSource | undefined;
  now?: (() => Date) | undefined;
}

// ── Program ──────────────────────────────────────────────────

export function createProgram(): Command {
  return new Command()
    .name('nats-pubsub')
    .description(
      'Publish one message to a NATS subject, or subscribe and print messages until interrupted.',
    )
    .version(VERSION)
    .option('--mode <mode>', 'operating mode: "pub" (publish) or "sub" (subscribe), required')
    .option('--subject <subject>', 'subject to publish or subscribe to, required')
    .option('--msg <message>', 'message payload, required in "pub" mode')
    .option('--url <url>', `NATS server URL (default: ${DEFAULTS.URL})`)
    .option('--name <name>', `connection name (default: ${APP_NAME})`)
    .option('--user <user>', 'NATS user')
    .option('--password <password>', 'NATS password')
    .option(
      '--flush-timeout <ms>',
      `publish acknowledgement timeout (default: ${String(TIMEOUTS.FLUSH_TIMEOUT)})`,
    )
    .option(
      '--drain-timeout <ms>',
      `graceful shutdown timeout (default: ${String(TIMEOUTS.DRAIN_TIMEOUT)})`,
    )
    .option('--config <path>', `config file (default: ${DEFAULTS.CONFIG_PATH})`)
    .addHelpText(
      'after',
      [
        '',
        'Examples:',
        '  nats-pubsub -mode sub -subject "events.>"',
        '  nats-pubsub -mode pub -subject events.user.login -msg "Hello NATS World!"',
      ].join('\n'),
    );
}

// ── Execution ────────────────────────────────────────────────

async function execute(
  opts: RawFlags,
  program: Command,
  deps: CliDeps,
  stdout: LogSink,
  stderr: LogSink,
): Promise<number> {
  let config: InvocationConfig;
  try {
    config = await resolveInvocation(opts, loadEnvConfig(deps.env));
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    stderr.write(`Error: ${err.message}\n\n`);
    stderr.write(program.helpInformation());
    return err.exitCode;
  }

  const logger = createLogger({
    mode: config.mode,
    out: stdout,
    err: stderr,
    now: deps.now,
  });

  try {
    await runPubSub(config, {
      broker: deps.broker ?? createBroker(config.broker),
      logger,
      signals: deps.signals,
    });
    return EXIT_CODES.OK;
  } catch (err) {
    if (!(err instanceof PubSubError)) throw err;
    logger.error(`${err.name}: ${err.message}`);
    return err.exitCode;
  }
}

/**
 * Parse `argv` (without the node and script entries), run one invocation
 * and resolve with the process exit code.
 */
export async function runCli(
  argv: readonly string[],
  deps: CliDeps = {},
): Promise<number> {
  const stdout = deps.stdout ?? process.stdout;
  const stderr = deps.stderr ?? process.stderr;

  const program = createProgram()
    .exitOverride()
    .configureOutput({
      writeOut: (str) => {
        stdout.write(str);
      },
      writeErr: (str) => {
        stderr.write(str);
      },
    });

  let exitCode: number = EXIT_CODES.OK;
  program.action(async (opts: RawFlags) => {
    exitCode = await execute(opts, program, deps, stdout, stderr);
  });

  try {
    await program.parseAsync(normalizeArgv(argv, longFlags(program)), {
      from: 'user',
    });
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }
  return exitCode;
}
