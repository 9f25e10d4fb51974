/**
 * Runtime Context Factory
 *
 * Creates and validates the engine configuration for program execution.
 * Public API for host applications.
 */

import { ConfigError } from '../../types.js';
import { discardSink, emptyInput } from './io.js';
import {
  EOF_BEHAVIORS,
  type EofBehavior,
  type RuntimeContext,
  type RuntimeOptions,
} from './types.js';

function validateLimit(
  option: string,
  value: number | undefined
): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new ConfigError('EF-C001', {
      option,
      reason: `expected a positive integer, got ${String(value)}`,
    });
  }
  return value;
}

function isEofBehavior(value: unknown): value is EofBehavior {
  return EOF_BEHAVIORS.some((behavior) => behavior === value);
}

/**
 * Create a runtime context for program execution.
 * This is the main entry point for configuring the engine.
 *
 * @throws ConfigError (EF-C001) for a non-positive or fractional limit, or an
 * unknown EOF behavior
 */
export function createRuntimeContext(
  options: RuntimeOptions = {}
): RuntimeContext {
  const eofBehavior = options.eofBehavior ?? 'set_zero';
  if (!isEofBehavior(eofBehavior)) {
    throw new ConfigError('EF-C001', {
      option: 'eofBehavior',
      reason: `expected one of ${EOF_BEHAVIORS.join(', ')}, got ${String(eofBehavior)}`,
    });
  }

  return {
    input: options.input ?? emptyInput(),
    output: options.output ?? discardSink(),
    stepLimit: validateLimit('stepLimit', options.stepLimit),
    tapeLimit: validateLimit('tapeLimit', options.tapeLimit),
    eofBehavior,
    signal: options.signal,
    observability: options.observability ?? {},
  };
}
