#!/usr/bin/env node

/**
 * nats-pubsub CLI entry point.
 * Thin wrapper; all logic delegated to core.
 */

import 'dotenv/config';

import { describeError } from '../core/errors.js';
import { runCli } from './run.js';

try {
  process.exitCode = await runCli(process.argv.slice(2));
} catch (err) {
  process.stderr.write(`💥 Unexpected error: ${describeError(err)}\n`);
  process.exitCode = 1;
}
