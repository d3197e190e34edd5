// ── States ───────────────────────────────────────────────────

export type RunnerState =
  | 'idle'
  | 'connected'
  | 'subscribed'
  | 'draining'
  | 'closed';

const TRANSITIONS: Readonly<Record<RunnerState, readonly RunnerState[]>> = {
  idle: ['connected', 'closed'],
  connected: ['subscribed', 'closed'],
  subscribed: ['draining', 'closed'],
  draining: ['closed'],
  closed: [],
};

export class LifecycleError extends Error {
  constructor(from: RunnerState, to: RunnerState) {
    super(`illegal runner transition ${from} → ${to}`);
    this.name = 'LifecycleError';
  }
}

export type StateListener = (state: RunnerState, previous: RunnerState) => void;

export interface Lifecycle {
  readonly state: RunnerState;
  transition(next: RunnerState): void;
}

/**
 * Tracks `idle → connected → subscribed → draining → closed`.
 * `closed` is terminal and nothing re-enters `subscribed`.
 */
export function createLifecycle(onChange?: StateListener): Lifecycle {
  let state: RunnerState = 'idle';

  return {
    get state() {
      return state;
    },
    transition(next) {
      if (!TRANSITIONS[state].includes(next)) {
        throw new LifecycleError(state, next);
      }
      const previous = state;
      state = next;
      onChange?.(next, previous);
    },
  };
}
