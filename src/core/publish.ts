import type { BrokerConnection } from '../broker/index.js';
import type { Logger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import { FlushError, PublishError, describeError } from './errors.js';

export interface PublishInput {
  subject: string;
  payload: string;
  flushTimeoutMs: number;
}

export interface PublishReceipt {
  subject: string;
  bytes: number;
}

const encoder = new TextEncoder();

/**
 * Publish one message and flush it.
 *
 * Publishing only buffers locally; the message counts as sent once the
 * flush has been acknowledged by the broker.
 */
export async function publishOnce(
  conn: BrokerConnection,
  input: PublishInput,
  logger: Logger,
): Promise<PublishReceipt> {
  const { subject, payload, flushTimeoutMs } = input;
  logger.info(`Publishing to subject ${JSON.stringify(subject)} …`);

  const data = encoder.encode(payload);

  try {
    conn.publish(subject, data);
  } catch (err) {
    throw new PublishError(`Failed to publish: ${describeError(err)}`, {
      cause: err,
    });
  }

  try {
    await withTimeout(
      conn.flush(),
      flushTimeoutMs,
      () => new Error(`no acknowledgement within ${String(flushTimeoutMs)}ms`),
    );
  } catch (err) {
    throw new FlushError(`Failed to flush: ${describeError(err)}`, {
      cause: err,
    });
  }

  logger.success(
    `Message published, subject: ${JSON.stringify(subject)}, payload: ${JSON.stringify(payload)}`,
  );
  return { subject, bytes: data.byteLength };
}
