/**
 * Execution logger for nats-pubsub.
 *
 * One logger is created per invocation and handed to each operation, so the
 * mode prefix lives in the object instead of process-wide state.
 * Progress goes to `out`, warnings and failures to `err`.
 * Emoji prefixes give instant visual context in the terminal.
 */

import { APP_NAME } from '../config/defaults.js';

export interface LogSink {
  write(chunk: string): unknown;
}

export interface LoggerOptions {
  mode: string;
  app?: string | undefined;
  out?: LogSink | undefined;
  err?: LogSink | undefined;
  now?: (() => Date) | undefined;
}

export interface Logger {
  readonly mode: string;
  info(message: string): void;
  success(message: string): void;
  received(subject: string, payload: string): void;
  signal(message: string): void;
  bye(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

// ── Formatting ──────────────────────────────────────────────

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local time as `YYYY/MM/DD HH:MM:SS`. */
export function formatTimestamp(date: Date): string {
  const day = `${String(date.getFullYear())}/${pad(date.getMonth() + 1)}/${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

// ── Public API ──────────────────────────────────────────────

export function createLogger(options: LoggerOptions): Logger {
  const app = options.app ?? APP_NAME;
  const out = options.out ?? process.stdout;
  const err = options.err ?? process.stderr;
  const now = options.now ?? (() => new Date());

  function line(sink: LogSink, icon: string, message: string): void {
    sink.write(`${app} [${options.mode}] ${formatTimestamp(now())} ${icon} ${message}\n`);
  }

  return {
    mode: options.mode,
    info: (message) => line(out, 'ℹ️ ', message),
    success: (message) => line(out, '✅', message),
    received: (subject, payload) =>
      line(out, '📩', `Received on [${subject}]: ${payload}`),
    signal: (message) => line(out, '🛑', message),
    bye: (message) => line(out, '👋', message),
    warn: (message) => line(err, '⚠️ ', message),
    error: (message) => line(err, '💥', message),
  };
}
