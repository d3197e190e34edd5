import type { BrokerConnection, BrokerSubscription } from '../broker/index.js';
import type { Logger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import { DrainError, SubscribeError, describeError } from './errors.js';
import type { Lifecycle } from './lifecycle.js';
import { waitForAbort } from './shutdown.js';

export interface SubscribeInput {
  subject: string;
  drainTimeoutMs: number;
  /** Aborted on termination; the reason is logged. */
  signal: AbortSignal;
}

export interface SubscribeOutcome {
  received: number;
  reason: string;
  drained: boolean;
}

const decoder = new TextDecoder();

async function drain(
  conn: BrokerConnection,
  subscription: BrokerSubscription,
  drainTimeoutMs: number,
  logger: Logger,
): Promise<boolean> {
  try {
    await withTimeout(
      conn.drain(),
      drainTimeoutMs,
      () => new Error(`drain did not complete within ${String(drainTimeoutMs)}ms`),
    );
    return true;
  } catch (err) {
    const drainError = new DrainError(`Failed to drain: ${describeError(err)}`, {
      cause: err,
    });
    logger.warn(`${drainError.name}: ${drainError.message}`);
    subscription.unsubscribe();
    return false;
  }
}

/**
 * Subscribe, log every delivery, and block until `signal` aborts.
 * Then drain; drain failures are logged and never escalated.
 */
export async function subscribeUntilSignal(
  conn: BrokerConnection,
  input: SubscribeInput,
  logger: Logger,
  lifecycle: Lifecycle,
): Promise<SubscribeOutcome> {
  const { subject, drainTimeoutMs, signal } = input;
  logger.info(
    `Subscribing to subject ${JSON.stringify(subject)}, waiting for messages (Ctrl+C to quit) …`,
  );

  let subscription: BrokerSubscription;
  try {
    subscription = conn.subscribe(
      subject,
      (message) => logger.received(message.subject, decoder.decode(message.data)),
      (err) => logger.warn(`Subscription error on ${JSON.stringify(subject)}: ${err.message}`),
    );
  } catch (err) {
    throw new SubscribeError(`Failed to subscribe: ${describeError(err)}`, {
      cause: err,
    });
  }
  lifecycle.transition('subscribed');

  const reason = await waitForAbort(signal);
  logger.signal(`Received signal ${reason}, shutting down gracefully …`);

  lifecycle.transition('draining');
  const drained = await drain(conn, subscription, drainTimeoutMs, logger);

  return { received: subscription.getReceived(), reason, drained };
}
