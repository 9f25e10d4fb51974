/**
 * Test utilities for engine tests
 */

import {
  bytesInput,
  collectingSink,
  createRuntimeContext,
  execute,
  load,
  type ExecutionResult,
  type InputSource,
  type RuntimeOptions,
} from 'eightfold';

/** Options for test execution */
export interface TestOptions extends Omit<RuntimeOptions, 'input' | 'output'> {
  input?: string | Uint8Array;
}

export interface TestRun {
  /** Every byte written by `.` */
  bytes: number[];
  /** Output decoded as UTF-8 */
  text: string;
  result: ExecutionResult;
}

/** Load and execute a program with in-memory input and output */
export function run(source: string, options: TestOptions = {}): TestRun {
  const { input = '', ...rest } = options;
  const sink = collectingSink();
  const ctx = createRuntimeContext({
    ...rest,
    input: bytesInput(input),
    output: sink,
  });
  const result = execute(load(source), ctx);
  return { bytes: Array.from(sink.bytes()), text: sink.text(), result };
}

/** Input source that records how many times it was read */
export function countingInput(data: number[]): InputSource & {
  reads: number;
} {
  let index = 0;
  const source = {
    reads: 0,
    read(): number | null {
      source.reads++;
      const byte = data[index];
      if (byte === undefined) {
        return null;
      }
      index++;
      return byte;
    },
  };
  return source;
}
