/**
 * One-call interpretation of source text with in-memory I/O.
 */

import { load } from '../../loader/index.js';
import { createRuntimeContext } from './context.js';
import { execute } from './execute.js';
import { bytesInput, collectingSink } from './io.js';
import type { RuntimeOptions } from './types.js';

export interface InterpretResult {
  readonly output: Uint8Array;
  /** Output decoded as UTF-8 */
  readonly text: string;
  readonly steps: number;
}

/**
 * Load and run `source`, feeding it `input` and collecting its output.
 *
 * @example
 * interpret(',[.,]', 'echo').text
 * // Returns: "echo"
 */
export function interpret(
  source: string,
  input: string | Uint8Array = '',
  options: Omit<RuntimeOptions, 'input' | 'output'> = {}
): InterpretResult {
  const program = load(source);
  const sink = collectingSink();
  const ctx = createRuntimeContext({
    ...options,
    input: bytesInput(input),
    output: sink,
  });
  const { steps } = execute(program, ctx);
  return { output: sink.bytes(), text: sink.text(), steps };
}
