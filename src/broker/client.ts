import type { BrokerProvider } from '../schema/config.js';

// ── Messages ─────────────────────────────────────────────────

export interface BrokerMessage {
  readonly subject: string;
  readonly data: Uint8Array;
}

export type MessageHandler = (message: BrokerMessage) => void;

/** Asynchronous subscription failures, e.g. a permissions violation. */
export type SubscriptionErrorHandler = (error: Error) => void;

// ── Handles ──────────────────────────────────────────────────

export interface BrokerSubscription {
  readonly subject: string;
  /** Messages delivered to the handler so far. */
  getReceived(): number;
  unsubscribe(): void;
}

/**
 * One live connection to a broker.
 *
 * `publish` is fire-and-forget: it buffers and returns. Only a resolved
 * `flush` means the broker has seen everything published before it.
 * `drain` stops new deliveries, lets in-flight handlers finish, releases
 * every subscription and closes the connection.
 */
export interface BrokerConnection {
  readonly server: string;
  publish(subject: string, data: Uint8Array): void;
  flush(): Promise<void>;
  subscribe(
    subject: string,
    onMessage: MessageHandler,
    onError: SubscriptionErrorHandler,
  ): BrokerSubscription;
  drain(): Promise<void>;
  close(): Promise<void>;
  isClosed(): boolean;
}

// ── Broker ───────────────────────────────────────────────────

export interface ConnectOptions {
  url: string;
  name: string;
  user?: string | undefined;
  password?: string | undefined;
}

/** How log lines name each provider's server. */
export const BROKER_LABELS: Record<BrokerProvider, string> = {
  nats: 'NATS server',
  memory: 'memory broker',
};

export interface Broker {
  readonly provider: BrokerProvider;
  connect(options: ConnectOptions): Promise<BrokerConnection>;
}
