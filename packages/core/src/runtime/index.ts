/**
 * Runtime Module
 * Execution engine, runtime context and I/O helpers
 */

export { createRuntimeContext } from './core/context.js';
export { createStepper, execute, tryExecute } from './core/execute.js';
export { interpret, type InterpretResult } from './core/interpret.js';
export {
  bytesInput,
  collectingSink,
  discardSink,
  emptyInput,
  type CollectingSink,
  type InputSource,
  type OutputSink,
} from './core/io.js';
export { Tape } from './core/tape.js';
export {
  EOF_BEHAVIORS,
  type EofBehavior,
  type ErrorEvent,
  type ExecutionResult,
  type ExecutionStepper,
  type ObservabilityCallbacks,
  type RunEndEvent,
  type RunStartEvent,
  type RuntimeContext,
  type RuntimeOptions,
  type StepResult,
  type StepStartEvent,
} from './core/types.js';
