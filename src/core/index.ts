/**
 * Core orchestration module.
 * Coordinates connect → publish-once | subscribe-and-wait → shutdown.
 * No CLI parsing and no broker-specific APIs.
 */

export * from './errors.js';
export { createLifecycle, LifecycleError } from './lifecycle.js';
export type { Lifecycle, RunnerState, StateListener } from './lifecycle.js';
export { publishOnce } from './publish.js';
export type { PublishInput, PublishReceipt } from './publish.js';
export { subscribeUntilSignal } from './subscribe.js';
export type { SubscribeInput, SubscribeOutcome } from './subscribe.js';
export {
  createTerminationSignal,
  waitForAbort,
  TERMINATION_SIGNALS,
} from './shutdown.js';
export type { SignalSource, TerminationHandle, TerminationSignal } from './shutdown.js';
export { runPubSub } from './runner.js';
export type { RunnerDeps, RunOutcome } from './runner.js';
