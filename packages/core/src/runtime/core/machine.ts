/**
 * Machine
 *
 * Tape, data pointer and instruction pointer for one program run,
 * with the fetch-execute dispatch.
 * @internal
 */

import {
  AbortError,
  ExecutionLimitExceededError,
  INSTRUCTION_TYPES,
  PointerUnderflowError,
  TapeLimitExceededError,
  type Instruction,
  type Program,
} from '../../types.js';
import { Tape } from './tape.js';
import type { ExecutionResult, RuntimeContext } from './types.js';

export class Machine {
  private readonly tape: Tape;
  private ip = 0;
  private dp = 0;
  private executed = 0;

  constructor(
    readonly program: Program,
    readonly context: RuntimeContext
  ) {
    this.tape = new Tape(context.tapeLimit);
  }

  get done(): boolean {
    return this.ip >= this.program.instructions.length;
  }

  get position(): number {
    return this.ip;
  }

  get dataPointer(): number {
    return this.dp;
  }

  get steps(): number {
    return this.executed;
  }

  get tapeLength(): number {
    return this.tape.length;
  }

  cell(index: number = this.dp): number {
    return this.tape.get(index);
  }

  /**
   * Execute the instruction at the instruction pointer.
   * Callers check `done` first.
   */
  dispatch(): Instruction {
    const ctx = this.context;
    const ip = this.ip;
    const instruction = this.program.instructions[ip];
    if (instruction === undefined) {
      throw new Error(`No instruction at position ${ip}`);
    }

    if (ctx.signal?.aborted) {
      throw new AbortError(ip, instruction.location);
    }
    if (ctx.stepLimit !== undefined && this.executed >= ctx.stepLimit) {
      throw new ExecutionLimitExceededError(
        ctx.stepLimit,
        ip,
        instruction.location
      );
    }

    ctx.observability.onStepStart?.({
      position: ip,
      instruction,
      dataPointer: this.dp,
      steps: this.executed,
    });

    let next = ip + 1;

    switch (instruction.type) {
      case INSTRUCTION_TYPES.POINTER_RIGHT: {
        if (!this.tape.reach(this.dp + 1)) {
          throw new TapeLimitExceededError(
            ctx.tapeLimit ?? this.tape.length,
            ip,
            instruction.location
          );
        }
        this.dp++;
        break;
      }

      case INSTRUCTION_TYPES.POINTER_LEFT:
        if (this.dp === 0) {
          throw new PointerUnderflowError(ip, instruction.location);
        }
        this.dp--;
        break;

      case INSTRUCTION_TYPES.INCREMENT:
        this.tape.set(this.dp, this.tape.get(this.dp) + 1);
        break;

      case INSTRUCTION_TYPES.DECREMENT:
        this.tape.set(this.dp, this.tape.get(this.dp) - 1);
        break;

      case INSTRUCTION_TYPES.OUTPUT:
        ctx.output.write(this.tape.get(this.dp));
        break;

      case INSTRUCTION_TYPES.INPUT: {
        const byte = ctx.input.read();
        if (byte !== null) {
          this.tape.set(this.dp, byte);
        } else if (ctx.eofBehavior === 'set_zero') {
          this.tape.set(this.dp, 0);
        }
        break;
      }

      case INSTRUCTION_TYPES.LOOP_START:
        if (this.tape.get(this.dp) === 0) {
          next = this.jumpFrom(ip) + 1;
        }
        break;

      case INSTRUCTION_TYPES.LOOP_END:
        if (this.tape.get(this.dp) !== 0) {
          next = this.jumpFrom(ip) + 1;
        }
        break;
    }

    this.executed++;
    this.ip = next;
    return instruction;
  }

  result(): ExecutionResult {
    return {
      steps: this.executed,
      dataPointer: this.dp,
      tape: this.tape.snapshot(),
    };
  }

  private jumpFrom(ip: number): number {
    const target = this.program.jumpTable.get(ip);
    if (target === undefined) {
      throw new Error(`No matching bracket for instruction ${ip}`);
    }
    return target;
  }
}
