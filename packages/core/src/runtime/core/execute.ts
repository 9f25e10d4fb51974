/**
 * Program Execution
 *
 * Public API for running loaded programs.
 * Provides both full execution and step-by-step execution.
 */

import { attempt, type Outcome, type Program } from '../../types.js';
import { Machine } from './machine.js';
import type {
  ExecutionResult,
  ExecutionStepper,
  RuntimeContext,
  StepResult,
} from './types.js';

function reportError(
  context: RuntimeContext,
  machine: Machine,
  error: unknown
): void {
  context.observability.onError?.({
    error: error instanceof Error ? error : new Error(String(error)),
    position: machine.position,
  });
}

/**
 * Execute a loaded program until the instruction pointer passes its end.
 * A program that never terminates runs forever unless the context sets a
 * step limit, a tape limit or an abort signal.
 *
 * @param program The loaded program (from load())
 * @param context The runtime context (from createRuntimeContext())
 * @returns Step count and final machine state
 */
export function execute(
  program: Program,
  context: RuntimeContext
): ExecutionResult {
  const machine = new Machine(program, context);
  const startTime = Date.now();

  context.observability.onRunStart?.({
    instructionCount: program.instructions.length,
  });

  try {
    while (!machine.done) {
      machine.dispatch();
    }
  } catch (error) {
    reportError(context, machine, error);
    throw error;
  }

  context.observability.onRunEnd?.({
    steps: machine.steps,
    tapeLength: machine.tapeLength,
    durationMs: Date.now() - startTime,
  });

  return machine.result();
}

/** Execute a program, returning engine errors as a failed outcome */
export function tryExecute(
  program: Program,
  context: RuntimeContext
): Outcome<ExecutionResult> {
  return attempt(() => execute(program, context));
}

/**
 * Create a stepper for controlled step-by-step execution.
 * Each stepper owns a fresh tape, so steppers over the same program and
 * context do not share state.
 *
 * @param program The loaded program (from load())
 * @param context The runtime context (from createRuntimeContext())
 */
export function createStepper(
  program: Program,
  context: RuntimeContext
): ExecutionStepper {
  const machine = new Machine(program, context);

  return {
    program,
    context,
    get done() {
      return machine.done;
    },
    get position() {
      return machine.position;
    },
    get steps() {
      return machine.steps;
    },
    get dataPointer() {
      return machine.dataPointer;
    },

    cell(index?: number): number {
      return machine.cell(index);
    },

    step(): StepResult {
      if (machine.done) {
        throw new Error('Program has already finished');
      }
      const position = machine.position;
      try {
        const instruction = machine.dispatch();
        return { position, instruction, done: machine.done };
      } catch (error) {
        reportError(context, machine, error);
        throw error;
      }
    },

    getResult(): ExecutionResult {
      return machine.result();
    },
  };
}
