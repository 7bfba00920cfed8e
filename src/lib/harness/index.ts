export { ProcessorHarness, createHarness } from './processor-harness';
export { InvocationEngine, type InvocationEngineOptions } from './invocation-engine';
export { FixedWorkerPool } from './worker-pool';
export {
  HarnessEvents,
  type HarnessEmit,
  type HarnessEventMap,
  type HarnessEventName,
  type RunSummary,
} from './events';
export {
  TRIGGER_FAILURE_MODES,
  harnessOptionsSchema,
  resolveHarnessOptions,
  type HarnessOptions,
  type ResolvedHarnessOptions,
  type TriggerFailureMode,
} from './options';
