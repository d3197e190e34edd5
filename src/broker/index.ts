/**
 * Broker abstraction module.
 * Provider-agnostic connection interface for the publish and subscribe flows.
 * Only module allowed to talk to the message broker.
 */

import type { BrokerProvider } from '../schema/config.js';
import type { Broker } from './client.js';
import { createMemoryBroker } from './memory.js';
import { createNatsBroker } from './nats.js';

export * from './client.js';
export { createNatsBroker } from './nats.js';
export type { NatsConnector, NatsHandle } from './nats.js';
export { createMemoryBroker } from './memory.js';
export type { MemoryBrokerOptions } from './memory.js';

// ── Provider factory ─────────────────────────────────────────

export function createBroker(provider: BrokerProvider): Broker {
  switch (provider) {
    case 'nats':
      return createNatsBroker();
    case 'memory':
      return createMemoryBroker();
  }
}
