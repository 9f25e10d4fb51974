/**
 * Eightfold Runtime Tests: Stepper
 */

import { describe, expect, it } from 'vitest';

import {
  createRuntimeContext,
  createStepper,
  INSTRUCTION_TYPES,
  load,
  PointerUnderflowError,
} from 'eightfold';

describe('createStepper', () => {
  it('executes one instruction per step', () => {
    const stepper = createStepper(load('+>+'), createRuntimeContext());

    const first = stepper.step();
    expect(first.position).toBe(0);
    expect(first.instruction.type).toBe(INSTRUCTION_TYPES.INCREMENT);
    expect(first.done).toBe(false);
    expect(stepper.cell()).toBe(1);

    stepper.step();
    expect(stepper.dataPointer).toBe(1);
    expect(stepper.cell()).toBe(0);

    expect(stepper.step().done).toBe(true);
    expect(stepper.done).toBe(true);
    expect(stepper.steps).toBe(3);
    expect(stepper.cell(0)).toBe(1);
    expect(stepper.getResult().tape).toEqual(Uint8Array.of(1, 1));
  });

  it('follows loop jumps', () => {
    const stepper = createStepper(load('[+]+'), createRuntimeContext());
    const result = stepper.step();
    expect(result.position).toBe(0);
    expect(stepper.position).toBe(3);
  });

  it('is done immediately for the empty program', () => {
    const stepper = createStepper(load(''), createRuntimeContext());
    expect(stepper.done).toBe(true);
    expect(() => stepper.step()).toThrow('Program has already finished');
  });

  it('keeps separate state per stepper', () => {
    const program = load('+');
    const ctx = createRuntimeContext();
    const a = createStepper(program, ctx);
    const b = createStepper(program, ctx);
    a.step();
    expect(a.cell()).toBe(1);
    expect(b.cell()).toBe(0);
    expect(b.done).toBe(false);
  });

  it('reports errors through onError', () => {
    const positions: number[] = [];
    const stepper = createStepper(
      load('<'),
      createRuntimeContext({
        observability: { onError: (event) => positions.push(event.position) },
      })
    );
    expect(() => stepper.step()).toThrow(PointerUnderflowError);
    expect(positions).toEqual([0]);
  });
});
