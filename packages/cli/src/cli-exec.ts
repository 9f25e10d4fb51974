#!/usr/bin/env node
/**
 * CLI Execution Entry Point
 *
 * Implements main(), parseArgs(), readProgram() and runProgram() for the
 * eightfold binary. Handles program files, inline code, stdin and config.
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  bytesInput,
  createRuntimeContext,
  emptyInput,
  EOF_BEHAVIORS,
  ERROR_ID_PATTERN,
  execute,
  load,
  type EofBehavior,
  type ExecutionResult,
  type InputSource,
  type ObservabilityCallbacks,
  type OutputSink,
} from 'eightfold';
import { loadConfig } from './cli-config.js';
import { renderDemo } from './cli-demo.js';
import {
  isOutputFormat,
  OUTPUT_FORMATS,
  type OutputFormat,
} from './cli-error-formatter.js';
import { explainError } from './cli-explain.js';
import { fdInput, fdSink } from './cli-io.js';
import { formatError, formatStats, VERSION } from './cli-shared.js';

/**
 * Where the program text comes from
 */
export type ProgramSource =
  | { kind: 'file'; path: string }
  | { kind: 'inline'; code: string }
  | { kind: 'stdin' };

export interface RunArgs {
  mode: 'run';
  source: ProgramSource;
  /** Program input given with --input; stdin is used when absent */
  input: string | undefined;
  stepLimit: number | undefined;
  tapeLimit: number | undefined;
  eofBehavior: EofBehavior | undefined;
  configPath: string | undefined;
  format: OutputFormat;
  stats: boolean;
}

/**
 * Parsed command-line arguments
 */
export type ParsedArgs =
  | RunArgs
  | { mode: 'demo' }
  | { mode: 'help' | 'version' }
  | { mode: 'explain'; errorId: string };

const VALUE_FLAGS = [
  '--explain',
  '--input',
  '--step-limit',
  '--tape-limit',
  '--eof',
  '--config',
  '--format',
  '-e',
];
const BOOLEAN_FLAGS = ['--help', '-h', '--version', '-v', '--stats'];

export const USAGE = `Usage:
  eightfold <program.bf>          Run a program file
  eightfold -e <code>             Run program text given on the command line
  eightfold -                     Read the program from stdin
  eightfold demo                  Run the bundled sample programs
  eightfold --explain EF-XXXX     Show error documentation
  eightfold --help                Show this help message
  eightfold --version             Show version information

Options:
  --input <text>        Program input (default: stdin; empty when the program comes from stdin)
  --step-limit <n>      Maximum instructions to execute
  --tape-limit <n>      Maximum tape cells
  --eof <behavior>      End of input: set_zero or leave_unchanged (default: set_zero)
  --config <path>       Config file (default: ./.eightfold.yaml when present)
  --format <format>     Error format: human, json, compact (default: human)
  --stats               Print steps, tape size and run time to stderr

Examples:
  eightfold programs/hello.bf
  eightfold -e ',[.,]' --input 'echo'
  eightfold --step-limit 100000 loop.bf
  eightfold --explain EF-L001`;

function parseLimit(flag: string, value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new Error(`${flag} must be a whole number, got: ${value}`);
  }
  return Number(value);
}

function isEofBehavior(value: string): value is EofBehavior {
  return EOF_BEHAVIORS.some((behavior) => behavior === value);
}

/**
 * Parse command-line arguments into structured command
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const values = new Map<string, string>();
  const flags = new Set<string>();
  const positionalArgs: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (VALUE_FLAGS.includes(arg)) {
      const value = argv[i + 1];
      if (value === undefined) {
        throw new Error(`Missing value after ${arg}`);
      }
      values.set(arg, value);
      i++;
    } else if (BOOLEAN_FLAGS.includes(arg)) {
      flags.add(arg);
    } else if (arg.startsWith('-') && arg !== '-') {
      throw new Error(`Unknown option: ${arg}`);
    } else {
      positionalArgs.push(arg);
    }
  }

  // Help takes precedence over version
  if (flags.has('--help') || flags.has('-h')) {
    return { mode: 'help' };
  }
  if (flags.has('--version') || flags.has('-v')) {
    return { mode: 'version' };
  }

  const errorId = values.get('--explain');
  if (errorId !== undefined) {
    return { mode: 'explain', errorId };
  }

  const code = values.get('-e');
  const [first, ...rest] = positionalArgs;
  if (rest.length > 0) {
    throw new Error(`Unexpected argument: ${rest[0]}`);
  }
  if (code !== undefined && first !== undefined) {
    throw new Error(`Cannot combine -e with a program argument: ${first}`);
  }

  if (first === 'demo') {
    return { mode: 'demo' };
  }

  let source: ProgramSource;
  if (code !== undefined) {
    source = { kind: 'inline', code };
  } else if (first === '-') {
    source = { kind: 'stdin' };
  } else if (first !== undefined) {
    source = { kind: 'file', path: first };
  } else {
    throw new Error('Missing program file argument');
  }

  let format: OutputFormat = 'human';
  const formatValue = values.get('--format');
  if (formatValue !== undefined) {
    if (!isOutputFormat(formatValue)) {
      throw new Error(
        `Invalid --format value: ${formatValue}. Must be one of: ${OUTPUT_FORMATS.join(', ')}`
      );
    }
    format = formatValue;
  }

  let eofBehavior: EofBehavior | undefined;
  const eofValue = values.get('--eof');
  if (eofValue !== undefined) {
    if (!isEofBehavior(eofValue)) {
      throw new Error(
        `Invalid --eof value: ${eofValue}. Must be one of: ${EOF_BEHAVIORS.join(', ')}`
      );
    }
    eofBehavior = eofValue;
  }

  const stepLimit = values.get('--step-limit');
  const tapeLimit = values.get('--tape-limit');

  return {
    mode: 'run',
    source,
    input: values.get('--input'),
    stepLimit:
      stepLimit === undefined
        ? undefined
        : parseLimit('--step-limit', stepLimit),
    tapeLimit:
      tapeLimit === undefined
        ? undefined
        : parseLimit('--tape-limit', tapeLimit),
    eofBehavior,
    configPath: values.get('--config'),
    format,
    stats: flags.has('--stats'),
  };
}

/**
 * Read program text from a file, the command line, or stdin
 *
 * @throws Error if a program file does not exist
 */
export function readProgram(
  source: ProgramSource,
  cwd: string,
  readStdin: () => string
): string {
  switch (source.kind) {
    case 'inline':
      return source.code;
    case 'stdin':
      return readStdin();
    case 'file': {
      const fullPath = path.resolve(cwd, source.path);
      if (!fs.existsSync(fullPath)) {
        throw new Error(`File not found: ${source.path}`);
      }
      return fs.readFileSync(fullPath, 'utf-8');
    }
  }
}

/**
 * Host wiring for a program run
 */
export interface ProgramIO {
  readonly cwd: string;
  /** Program input used when --input is absent and stdin is free */
  readonly input: InputSource;
  readonly output: OutputSink;
  readonly observability?: ObservabilityCallbacks | undefined;
}

/**
 * Load and run program text.
 * Command-line limits override the config file; the engine applies its
 * defaults to anything neither sets.
 */
export function runProgram(
  text: string,
  args: RunArgs,
  io: ProgramIO
): ExecutionResult {
  const config = loadConfig(args.configPath, io.cwd);

  let input: InputSource;
  if (args.input !== undefined) {
    input = bytesInput(args.input);
  } else if (args.source.kind === 'stdin') {
    // stdin already held the program text
    input = emptyInput();
  } else {
    input = io.input;
  }

  const ctx = createRuntimeContext({
    input,
    output: io.output,
    stepLimit: args.stepLimit ?? config.stepLimit,
    tapeLimit: args.tapeLimit ?? config.tapeLimit,
    eofBehavior: args.eofBehavior ?? config.eofBehavior,
    observability: io.observability,
  });

  return execute(load(text), ctx);
}

/**
 * Entry point for the eightfold binary
 *
 * Parses command-line arguments, runs programs, and handles errors.
 * Program output goes to stdout; errors and stats go to stderr.
 *
 * @returns Process exit code
 */
export function main(argv: string[] = process.argv.slice(2)): number {
  let source: string | undefined;
  let format: OutputFormat = 'human';
  const stdout = fdSink(1);

  try {
    const parsed = parseArgs(argv);

    switch (parsed.mode) {
      case 'help':
        console.log(USAGE);
        return 0;

      case 'version':
        console.log(VERSION);
        return 0;

      case 'explain': {
        const documentation = explainError(parsed.errorId);
        if (documentation === null) {
          if (ERROR_ID_PATTERN.test(parsed.errorId)) {
            console.error(`Unknown error ID: ${parsed.errorId}`);
          } else {
            console.error(`Invalid error ID: ${parsed.errorId}`);
            console.error(
              'Error ID must be in format EF-{L|R|C}{3-digit}, e.g., EF-L001'
            );
          }
          return 1;
        }
        console.log(documentation);
        return 0;
      }

      case 'demo':
        console.log(renderDemo().join('\n'));
        return 0;

      case 'run': {
        format = parsed.format;
        const cwd = process.cwd();
        source = readProgram(parsed.source, cwd, () =>
          fs.readFileSync(0, 'utf-8')
        );
        const observability: ObservabilityCallbacks = parsed.stats
          ? { onRunEnd: (event) => console.error(formatStats(event)) }
          : {};
        runProgram(source, parsed, {
          cwd,
          input: fdInput(0, () => stdout.flush()),
          output: stdout,
          observability,
        });
        return 0;
      }
    }
  } catch (err) {
    stdout.flush();
    console.error(
      formatError(
        err instanceof Error ? err : new Error(String(err)),
        source,
        format
      )
    );
    return 1;
  } finally {
    stdout.flush();
  }
}

// Only run main if not in test environment
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  process.exitCode = main();
}
