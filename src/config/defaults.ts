/**
 * Default configuration values.
 * All values are overridable via env, config file or CLI flags.
 */

export const APP_NAME = 'NATS-PUBSUB';

export const VERSION = '0.1.0';

export const DEFAULTS = {
  URL: 'nats://127.0.0.1:4222',
  CONFIG_PATH: '.pubsub.yaml',
  BROKER: 'nats',
} as const;

export const TIMEOUTS = {
  FLUSH_TIMEOUT: 10_000,
  DRAIN_TIMEOUT: 5_000,
  /** Largest delay `setTimeout` honours; longer ones fire after 1ms. */
  MAX_TIMER_DELAY: 2_147_483_647,
} as const;

export const EXIT_CODES = {
  OK: 0,
  FAILURE: 1,
} as const;
