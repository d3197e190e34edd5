import { BROKER_LABELS } from '../broker/client.js';
import type { Broker, BrokerConnection } from '../broker/client.js';
import type { InvocationConfig } from '../schema/config.js';
import type { Logger } from '../utils/logger.js';
import { ConfigError, ConnectionError, describeError } from './errors.js';
import { createLifecycle } from './lifecycle.js';
import type { Lifecycle, StateListener } from './lifecycle.js';
import { publishOnce } from './publish.js';
import type { PublishReceipt } from './publish.js';
import { createTerminationSignal } from './shutdown.js';
import type { SignalSource } from './shutdown.js';
import { subscribeUntilSignal } from './subscribe.js';
import type { SubscribeOutcome } from './subscribe.js';

// ── Public types ─────────────────────────────────────────────

export interface RunnerDeps {
  broker: Broker;
  logger: Logger;
  /** Where SIGINT/SIGTERM come from in subscribe mode. Defaults to `process`. */
  signals?: SignalSource | undefined;
  onStateChange?: StateListener | undefined;
}

export type RunOutcome =
  | { mode: 'pub'; receipt: PublishReceipt }
  | { mode: 'sub'; outcome: SubscribeOutcome };

// ── Helpers ──────────────────────────────────────────────────

async function connect(
  config: InvocationConfig,
  deps: RunnerDeps,
  lifecycle: Lifecycle,
): Promise<BrokerConnection> {
  const label = BROKER_LABELS[deps.broker.provider];
  deps.logger.info(`Connecting to ${label} at ${config.url} …`);
  let conn: BrokerConnection;
  try {
    conn = await deps.broker.connect({
      url: config.url,
      name: config.name,
      user: config.user,
      password: config.password,
    });
  } catch (err) {
    lifecycle.transition('closed');
    throw new ConnectionError(
      `Failed to connect to ${label} at ${config.url}: ${describeError(err)}`,
      { cause: err },
    );
  }
  lifecycle.transition('connected');
  deps.logger.success(`Connected to ${label} successfully.`);
  return conn;
}

async function release(conn: BrokerConnection, logger: Logger): Promise<void> {
  if (conn.isClosed()) return;
  try {
    await conn.close();
  } catch (err) {
    logger.warn(`Error while closing connection: ${describeError(err)}`);
  }
}

async function dispatch(
  conn: BrokerConnection,
  config: InvocationConfig,
  deps: RunnerDeps,
  lifecycle: Lifecycle,
): Promise<RunOutcome> {
  switch (config.mode) {
    case 'pub': {
      if (config.payload === undefined) {
        throw new ConfigError('-msg flag is required when using -mode "pub"');
      }
      const receipt = await publishOnce(
        conn,
        {
          subject: config.subject,
          payload: config.payload,
          flushTimeoutMs: config.flushTimeoutMs,
        },
        deps.logger,
      );
      return { mode: 'pub', receipt };
    }
    case 'sub': {
      const termination = createTerminationSignal(deps.signals);
      try {
        const outcome = await subscribeUntilSignal(
          conn,
          {
            subject: config.subject,
            drainTimeoutMs: config.drainTimeoutMs,
            signal: termination.signal,
          },
          deps.logger,
          lifecycle,
        );
        return { mode: 'sub', outcome };
      } finally {
        termination.dispose();
      }
    }
  }
}

// ── Public API ───────────────────────────────────────────────

/**
 * Connect, run exactly one mode, and close the connection on every path.
 * Fatal failures surface as `PubSubError` subclasses.
 */
export async function runPubSub(
  config: InvocationConfig,
  deps: RunnerDeps,
): Promise<RunOutcome> {
  const lifecycle = createLifecycle(deps.onStateChange);
  const conn = await connect(config, deps, lifecycle);

  try {
    const result = await dispatch(conn, config, deps, lifecycle);
    if (result.mode === 'sub') deps.logger.bye('Bye!');
    return result;
  } finally {
    await release(conn, deps.logger);
    lifecycle.transition('closed');
  }
}
