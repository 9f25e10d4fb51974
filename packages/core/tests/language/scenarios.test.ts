/**
 * Eightfold Language Tests: End-to-End Scenarios
 */

import { describe, expect, it } from 'vitest';

import {
  ExecutionLimitExceededError,
  load,
  UnbalancedLoopError,
} from 'eightfold';
import { run } from '../helpers/runtime.js';

describe('End-to-end scenarios', () => {
  it('"+++." outputs one byte with value 3', () => {
    expect(run('+++.').bytes).toEqual([3]);
  });

  it('"+[-]" runs its loop once and outputs nothing', () => {
    const { bytes, result } = run('+[-]');
    expect(bytes).toEqual([]);
    expect(result.tape).toEqual(Uint8Array.of(0));
  });

  it('"[-]" on a zero cell performs zero iterations', () => {
    const { bytes, result } = run('[-]');
    expect(bytes).toEqual([]);
    expect(result.steps).toBe(1);
  });

  it('"," at end of input sets the cell to zero', () => {
    const { result } = run(',', { eofBehavior: 'set_zero' });
    expect(result.tape).toEqual(Uint8Array.of(0));
    expect(result.steps).toBe(1);
  });

  it('one extra loop-start fails at the end of the scan', () => {
    try {
      load('+[>+[-]<');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(UnbalancedLoopError);
      if (error instanceof UnbalancedLoopError) {
        expect(error.errorId).toBe('EF-L002');
        expect(error.scanEnd).toBe(8);
        expect(error.position).toBe(1);
      }
    }
  });

  it('an infinite loop under step_limit 1000 fails instead of hanging', () => {
    expect(() => run('+[]', { stepLimit: 1000 })).toThrow(
      ExecutionLimitExceededError
    );
  });
});
