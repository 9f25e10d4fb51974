/**
 * Program Loader
 * Filters source text down to instructions and matches loop brackets
 */

import {
  INSTRUCTION_SYMBOLS,
  INSTRUCTION_TYPES,
  UnbalancedLoopError,
  attempt,
  type Instruction,
  type Outcome,
  type Program,
  type SourceLocation,
} from '../types.js';
import {
  advance,
  createLoaderState,
  currentLocation,
  isAtEnd,
} from './state.js';

interface PendingLoop {
  readonly position: number;
  readonly location: SourceLocation;
}

/**
 * Load a program from source text.
 *
 * Every character outside the eight instruction symbols is a comment and is
 * dropped. Brackets are matched in one pass with a stack of open loop-starts.
 *
 * @throws UnbalancedLoopError on a loop-end with no open loop-start (at that
 * loop-end), or on loop-starts still open at the end (at the earliest one)
 */
export function load(source: string): Program {
  const state = createLoaderState(source);
  const instructions: Instruction[] = [];
  const jumpTable = new Map<number, number>();
  const pending: PendingLoop[] = [];

  while (!isAtEnd(state)) {
    const location = currentLocation(state);
    const symbol = advance(state);
    const type = INSTRUCTION_SYMBOLS.get(symbol);
    if (type === undefined) {
      continue;
    }

    const position = instructions.length;
    instructions.push(Object.freeze({ type, symbol, location }));

    if (type === INSTRUCTION_TYPES.LOOP_START) {
      pending.push({ position, location });
    } else if (type === INSTRUCTION_TYPES.LOOP_END) {
      const open = pending.pop();
      if (open === undefined) {
        throw new UnbalancedLoopError('unmatched-end', position, location);
      }
      jumpTable.set(open.position, position);
      jumpTable.set(position, open.position);
    }
  }

  const unclosed = pending[0];
  if (unclosed !== undefined) {
    throw new UnbalancedLoopError(
      'unclosed-start',
      unclosed.position,
      unclosed.location,
      instructions.length
    );
  }

  return Object.freeze({
    instructions: Object.freeze(instructions),
    jumpTable,
  });
}

/** Load a program, returning bracket errors as a failed outcome */
export function tryLoad(source: string): Outcome<Program> {
  return attempt(() => load(source));
}

