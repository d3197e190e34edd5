import { setImmediate as nextTurn } from 'node:timers/promises';

import type { BrokerConnection } from '../src/broker/index.js';
import type { InvocationConfig } from '../src/schema/config.js';
import { createLogger } from '../src/utils/logger.js';
import type { LogSink, Logger } from '../src/utils/logger.js';

export const STAMP = '2026/01/02 03:04:05';

export const fixedNow = (): Date => new Date(2026, 0, 2, 3, 4, 5);

export interface CapturedSink extends LogSink {
  readonly chunks: string[];
  text(): string;
  lines(): string[];
}

export function captureSink(): CapturedSink {
  const chunks: string[] = [];
  return {
    chunks,
    write(chunk: string) {
      chunks.push(chunk);
      return true;
    },
    text: () => chunks.join(''),
    lines: () =>
      chunks
        .join('')
        .split('\n')
        .filter((line) => line.length > 0),
  };
}

export function testLogger(mode: string): {
  logger: Logger;
  out: CapturedSink;
  err: CapturedSink;
} {
  const out = captureSink();
  const err = captureSink();
  return { logger: createLogger({ mode, out, err, now: fixedNow }), out, err };
}

/** Line as the logger writes it, without the trailing newline. */
export function logLine(mode: string, icon: string, message: string): string {
  return `NATS-PUBSUB [${mode}] ${STAMP} ${icon} ${message}`;
}

export async function until(
  predicate: () => boolean,
  attempts = 100,
): Promise<void> {
  for (let i = 0; i < attempts; i++) {
    if (predicate()) return;
    await nextTurn();
  }
  throw new Error('condition not reached');
}

export function fakeConnection(
  overrides: Partial<BrokerConnection> = {},
): BrokerConnection {
  let closed = false;
  return {
    server: 'fake://broker',
    publish: () => undefined,
    flush: async () => undefined,
    subscribe: (subject) => ({
      subject,
      getReceived: () => 0,
      unsubscribe: () => undefined,
    }),
    drain: async () => {
      closed = true;
    },
    close: async () => {
      closed = true;
    },
    isClosed: () => closed,
    ...overrides,
  };
}

export function makeConfig(
  overrides: Partial<InvocationConfig> = {},
): InvocationConfig {
  return {
    mode: 'sub',
    subject: 'events.>',
    url: 'memory://local',
    name: 'test-client',
    broker: 'memory',
    flushTimeoutMs: 1000,
    drainTimeoutMs: 1000,
    ...overrides,
  };
}

export const encode = (text: string): Uint8Array => new TextEncoder().encode(text);
export const decode = (data: Uint8Array): string => new TextDecoder().decode(data);
