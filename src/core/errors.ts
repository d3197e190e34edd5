import { EXIT_CODES } from '../config/defaults.js';

/** Root of every failure the runner reports. */
export class PubSubError extends Error {
  readonly exitCode: number = EXIT_CODES.FAILURE;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'PubSubError';
  }
}

/** Bad or missing flags. User-correctable; reported with usage. */
export class ConfigError extends PubSubError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export class ConnectionError extends PubSubError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConnectionError';
  }
}

export class PublishError extends PubSubError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'PublishError';
  }
}

export class FlushError extends PubSubError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'FlushError';
  }
}

export class SubscribeError extends PubSubError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SubscribeError';
  }
}

/** Raised during shutdown. Logged, never escalated. */
export class DrainError extends PubSubError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'DrainError';
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
