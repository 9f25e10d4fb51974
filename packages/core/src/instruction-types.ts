import type { SourceLocation } from './source-location.js';

// ============================================================
// INSTRUCTION TYPES
// ============================================================

export const INSTRUCTION_TYPES = {
  POINTER_RIGHT: 'POINTER_RIGHT', // >
  POINTER_LEFT: 'POINTER_LEFT', // <
  INCREMENT: 'INCREMENT', // +
  DECREMENT: 'DECREMENT', // -
  OUTPUT: 'OUTPUT', // .
  INPUT: 'INPUT', // ,
  LOOP_START: 'LOOP_START', // [
  LOOP_END: 'LOOP_END', // ]
} as const;

export type InstructionType =
  (typeof INSTRUCTION_TYPES)[keyof typeof INSTRUCTION_TYPES];

/** Source symbol for each instruction. Every other character is a comment. */
export const INSTRUCTION_SYMBOLS: ReadonlyMap<string, InstructionType> =
  new Map([
    ['>', INSTRUCTION_TYPES.POINTER_RIGHT],
    ['<', INSTRUCTION_TYPES.POINTER_LEFT],
    ['+', INSTRUCTION_TYPES.INCREMENT],
    ['-', INSTRUCTION_TYPES.DECREMENT],
    ['.', INSTRUCTION_TYPES.OUTPUT],
    [',', INSTRUCTION_TYPES.INPUT],
    ['[', INSTRUCTION_TYPES.LOOP_START],
    [']', INSTRUCTION_TYPES.LOOP_END],
  ]);

export interface Instruction {
  readonly type: InstructionType;
  readonly symbol: string;
  readonly location: SourceLocation;
}

// ============================================================
// PROGRAM
// ============================================================

/**
 * A loaded program: the filtered instruction sequence and the jump table
 * pairing every loop-start position with its loop-end position, both ways.
 */
export interface Program {
  readonly instructions: readonly Instruction[];
  readonly jumpTable: ReadonlyMap<number, number>;
}
