import { connect } from 'nats';
import type { ConnectionOptions, Msg, Subscription } from 'nats';

import type { Broker, BrokerConnection, ConnectOptions } from './client.js';

// ── Client surface ───────────────────────────────────────────

/** The part of a `NatsConnection` the adapter relies on. */
export interface NatsHandle {
  getServer(): string;
  publish(subject: string, payload: Uint8Array): void;
  flush(): Promise<void>;
  subscribe(
    subject: string,
    opts: { callback: (err: Error | null, msg: Pick<Msg, 'subject' | 'data'>) => void },
  ): Pick<Subscription, 'getReceived' | 'unsubscribe'>;
  drain(): Promise<void>;
  close(): Promise<void>;
  isClosed(): boolean;
}

export type NatsConnector = (options: ConnectionOptions) => Promise<NatsHandle>;

// ── Adapter ──────────────────────────────────────────────────

export function toConnectionOptions(options: ConnectOptions): ConnectionOptions {
  return {
    servers: options.url,
    name: options.name,
    ...(options.user !== undefined ? { user: options.user } : {}),
    ...(options.password !== undefined ? { pass: options.password } : {}),
  };
}

export function wrapConnection(nc: NatsHandle): BrokerConnection {
  return {
    server: nc.getServer(),

    publish(subject, data) {
      nc.publish(subject, data);
    },

    flush: () => nc.flush(),

    subscribe(subject, onMessage, onError) {
      const sub = nc.subscribe(subject, {
        callback: (err, msg) => {
          if (err) {
            onError(err);
            return;
          }
          onMessage({ subject: msg.subject, data: msg.data });
        },
      });

      return {
        subject,
        getReceived: () => sub.getReceived(),
        unsubscribe: () => sub.unsubscribe(),
      };
    },

    drain: () => nc.drain(),
    close: () => nc.close(),
    isClosed: () => nc.isClosed(),
  };
}

// ── Provider factory ─────────────────────────────────────────

/**
 * Broker backed by the `nats` client. Reconnects, buffering and delivery
 * stay inside the client library.
 */
export function createNatsBroker(connectTo: NatsConnector = connect): Broker {
  return {
    provider: 'nats',
    async connect(options: ConnectOptions): Promise<BrokerConnection> {
      const nc = await connectTo(toConnectionOptions(options));
      return wrapConnection(nc);
    },
  };
}
