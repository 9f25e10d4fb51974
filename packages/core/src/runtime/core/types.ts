/**
 * Runtime Types
 *
 * Public types for engine configuration and execution results.
 * These types are the primary interface for host applications.
 */

import type { Instruction, Program } from '../../types.js';
import type { InputSource, OutputSink } from './io.js';

/** What `,` does to the current cell once input is exhausted */
export type EofBehavior = 'set_zero' | 'leave_unchanged';

export const EOF_BEHAVIORS: readonly EofBehavior[] = [
  'set_zero',
  'leave_unchanged',
];

/**
 * Observability callbacks for monitoring execution.
 * `onRunStart` and `onRunEnd` fire only from `execute()`; a stepper
 * reports `onStepStart` and `onError`.
 */
export interface ObservabilityCallbacks {
  /** Called once before the first instruction */
  onRunStart?: (event: RunStartEvent) => void;
  /** Called before each instruction executes */
  onStepStart?: (event: StepStartEvent) => void;
  /** Called after the program runs off its end */
  onRunEnd?: (event: RunEndEvent) => void;
  /** Called when execution fails, before the error propagates */
  onError?: (event: ErrorEvent) => void;
}

/** Event emitted before the first instruction */
export interface RunStartEvent {
  instructionCount: number;
}

/** Event emitted before an instruction executes */
export interface StepStartEvent {
  /** Instruction pointer */
  position: number;
  instruction: Instruction;
  dataPointer: number;
  /** Instructions executed so far */
  steps: number;
}

/** Event emitted on normal termination */
export interface RunEndEvent {
  steps: number;
  /** Tape length in cells */
  tapeLength: number;
  /** Execution time in milliseconds */
  durationMs: number;
}

/** Event emitted on error */
export interface ErrorEvent {
  error: Error;
  /** Instruction pointer where execution stopped */
  position: number;
}

/** Options for creating a runtime context */
export interface RuntimeOptions {
  /** Byte source for `,` (default: always at end of input) */
  input?: InputSource | undefined;
  /** Byte sink for `.` (default: output discarded) */
  output?: OutputSink | undefined;
  /** Maximum instructions executed per run (undefined = unlimited) */
  stepLimit?: number | undefined;
  /** Maximum tape length in cells (undefined = unlimited) */
  tapeLimit?: number | undefined;
  /** End-of-input policy (default: 'set_zero') */
  eofBehavior?: EofBehavior | undefined;
  /** AbortSignal checked before each instruction */
  signal?: AbortSignal | undefined;
  observability?: ObservabilityCallbacks | undefined;
}

/** Validated engine configuration shared by every run that uses it */
export interface RuntimeContext {
  readonly input: InputSource;
  readonly output: OutputSink;
  readonly stepLimit: number | undefined;
  readonly tapeLimit: number | undefined;
  readonly eofBehavior: EofBehavior;
  readonly signal: AbortSignal | undefined;
  readonly observability: ObservabilityCallbacks;
}

/** Final machine state after a successful run */
export interface ExecutionResult {
  /** Instructions executed */
  readonly steps: number;
  readonly dataPointer: number;
  /** Copy of every cell the run touched */
  readonly tape: Uint8Array;
}

/** Result of executing one instruction through a stepper */
export interface StepResult {
  /** Position of the instruction just executed */
  readonly position: number;
  readonly instruction: Instruction;
  /** True once the instruction pointer has passed the end */
  readonly done: boolean;
}

/** Controlled step-by-step execution of one program run */
export interface ExecutionStepper {
  readonly program: Program;
  readonly context: RuntimeContext;
  readonly done: boolean;
  /** Instruction pointer of the next instruction */
  readonly position: number;
  readonly steps: number;
  readonly dataPointer: number;
  /** Value of a tape cell (default: the cell under the data pointer) */
  cell(index?: number): number;
  /**
   * Execute the next instruction.
   * @throws Error if the program has already finished
   */
  step(): StepResult;
  getResult(): ExecutionResult;
}
