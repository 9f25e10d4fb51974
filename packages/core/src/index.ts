/**
 * Eightfold Module
 * Exports the program loader, execution engine and error taxonomy
 */

export { load, tryLoad } from './loader/index.js';
export {
  bytesInput,
  collectingSink,
  createRuntimeContext,
  createStepper,
  discardSink,
  emptyInput,
  EOF_BEHAVIORS,
  execute,
  interpret,
  Tape,
  tryExecute,
  type CollectingSink,
  type EofBehavior,
  type ErrorEvent,
  type ExecutionResult,
  type ExecutionStepper,
  type InputSource,
  type InterpretResult,
  type ObservabilityCallbacks,
  type OutputSink,
  type RunEndEvent,
  type RunStartEvent,
  type RuntimeContext,
  type RuntimeOptions,
  type StepResult,
  type StepStartEvent,
} from './runtime/index.js';
export { VERSION } from './version.js';

// ============================================================
// ERROR TAXONOMY
// ============================================================
export {
  CATEGORY_PREFIXES,
  ERROR_ID_PATTERN,
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorExample,
  type ErrorRegistry,
} from './error-registry.js';

export * from './types.js';
