import { hasWildcard, matchSubject, subjectProblem } from '../schema/subject.js';
import type {
  Broker,
  BrokerConnection,
  BrokerMessage,
  ConnectOptions,
  MessageHandler,
  SubscriptionErrorHandler,
} from './client.js';

// ── Internal state ───────────────────────────────────────────

interface Inbox {
  readonly pattern: string;
  readonly onMessage: MessageHandler;
  readonly onError: SubscriptionErrorHandler;
  readonly queue: BrokerMessage[];
  received: number;
  active: boolean;
  pumping: boolean;
  idle: Array<() => void>;
}

export interface MemoryBrokerOptions {
  /** When set, `connect` requires a matching user/password pair. */
  users?: Readonly<Record<string, string>> | undefined;
}

// ── Delivery ─────────────────────────────────────────────────

/** A throwing handler is reported on the subscription and the queue keeps going. */
function pump(inbox: Inbox): void {
  while (inbox.active) {
    const next = inbox.queue.shift();
    if (next === undefined) break;
    inbox.received++;
    try {
      inbox.onMessage(next);
    } catch (err) {
      inbox.onError(err instanceof Error ? err : new Error(String(err)));
    }
  }
  if (!inbox.active) inbox.queue.length = 0;
  inbox.pumping = false;
  for (const resolve of inbox.idle.splice(0)) resolve();
}

function enqueue(inbox: Inbox, message: BrokerMessage): void {
  inbox.queue.push(message);
  if (!inbox.pumping) {
    inbox.pumping = true;
    setImmediate(() => pump(inbox));
  }
}

function whenIdle(inbox: Inbox): Promise<void> {
  if (!inbox.pumping) return Promise.resolve();
  return new Promise((resolve) => inbox.idle.push(resolve));
}

// ── Provider factory ─────────────────────────────────────────

/**
 * In-process broker with the same routing semantics as a NATS server:
 * wildcard subjects, fire-and-forget publish, flush, drain and in-order
 * delivery per subscription on a later event-loop turn.
 */
export function createMemoryBroker(options: MemoryBrokerOptions = {}): Broker {
  const routes = new Set<Inbox>();

  function route(message: BrokerMessage): void {
    for (const inbox of routes) {
      if (matchSubject(inbox.pattern, message.subject)) enqueue(inbox, message);
    }
  }

  function authorize(connectOptions: ConnectOptions): void {
    if (options.users === undefined) return;
    const { user, password } = connectOptions;
    if (user === undefined || options.users[user] !== password) {
      throw new Error('Authorization Violation');
    }
  }

  return {
    provider: 'memory',

    async connect(connectOptions: ConnectOptions): Promise<BrokerConnection> {
      authorize(connectOptions);

      let closed = false;
      let scheduled = false;
      const outbox: BrokerMessage[] = [];
      const owned = new Set<Inbox>();

      function deliverOutbox(): void {
        scheduled = false;
        for (const message of outbox.splice(0)) route(message);
      }

      function release(inbox: Inbox): void {
        inbox.active = false;
        routes.delete(inbox);
        owned.delete(inbox);
      }

      function assertOpen(): void {
        if (closed) throw new Error('connection closed');
      }

      return {
        server: connectOptions.url,

        publish(subject, data) {
          assertOpen();
          if (subjectProblem(subject) !== undefined || hasWildcard(subject)) {
            throw new Error(`invalid publish subject ${JSON.stringify(subject)}`);
          }
          outbox.push({ subject, data: Uint8Array.from(data) });
          if (!scheduled) {
            scheduled = true;
            setImmediate(deliverOutbox);
          }
        },

        async flush() {
          assertOpen();
          deliverOutbox();
        },

        subscribe(subject, onMessage, onError) {
          assertOpen();
          const problem = subjectProblem(subject);
          if (problem !== undefined) throw new Error(problem);

          const inbox: Inbox = {
            pattern: subject,
            onMessage,
            onError,
            queue: [],
            received: 0,
            active: true,
            pumping: false,
            idle: [],
          };
          routes.add(inbox);
          owned.add(inbox);

          return {
            subject,
            getReceived: () => inbox.received,
            unsubscribe: () => release(inbox),
          };
        },

        async drain() {
          assertOpen();
          deliverOutbox();
          const draining = [...owned];
          for (const inbox of draining) routes.delete(inbox);
          await Promise.all(draining.map(whenIdle));
          for (const inbox of draining) release(inbox);
          closed = true;
        },

        async close() {
          if (closed) return;
          closed = true;
          outbox.length = 0;
          for (const inbox of [...owned]) {
            release(inbox);
            inbox.queue.length = 0;
          }
        },

        isClosed: () => closed,
      };
    },
  };
}
