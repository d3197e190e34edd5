export const TERMINATION_SIGNALS = ['SIGINT', 'SIGTERM'] as const;

export type TerminationSignal = (typeof TERMINATION_SIGNALS)[number];

/** The slice of `process` used to observe termination requests. */
export interface SignalSource {
  once(event: TerminationSignal, listener: () => void): unknown;
  off(event: TerminationSignal, listener: () => void): unknown;
}

export interface TerminationHandle {
  readonly signal: AbortSignal;
  dispose(): void;
}

/**
 * Abort signal satisfied by the first SIGINT or SIGTERM.
 * The abort reason is the signal name.
 */
export function createTerminationSignal(
  source: SignalSource = process,
): TerminationHandle {
  const controller = new AbortController();

  const listeners = TERMINATION_SIGNALS.map((name) => {
    const listener = (): void => controller.abort(name);
    source.once(name, listener);
    return { name, listener };
  });

  return {
    signal: controller.signal,
    dispose() {
      for (const { name, listener } of listeners) source.off(name, listener);
    },
  };
}

function describeReason(reason: unknown): string {
  if (typeof reason === 'string') return reason;
  return reason instanceof Error ? reason.message : String(reason);
}

/** Resolves with the abort reason once `signal` fires. Never rejects. */
export function waitForAbort(signal: AbortSignal): Promise<string> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve(describeReason(signal.reason));
      return;
    }
    signal.addEventListener(
      'abort',
      () => resolve(describeReason(signal.reason)),
      { once: true },
    );
  });
}
