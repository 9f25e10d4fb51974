/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'load' | 'runtime' | 'config';

/**
 * Example demonstrating an error condition.
 * Used by `--explain` to show common scenarios.
 */
export interface ErrorExample {
  /** Description of the example scenario */
  readonly description: string;
  /** Program or config text that triggers the error */
  readonly code: string;
}

/** Registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: EF-{category}{3-digit} (e.g., EF-R001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Human-readable description */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** What causes this error */
  readonly cause?: string | undefined;
  /** How to resolve this error */
  readonly resolution?: string | undefined;
  readonly examples?: readonly ErrorExample[] | undefined;
}

/** Prefix letter used in error IDs for each category */
export const CATEGORY_PREFIXES: Readonly<Record<ErrorCategory, string>> = {
  load: 'L',
  runtime: 'R',
  config: 'C',
};

/** Matches well-formed error IDs such as EF-L001 */
export const ERROR_ID_PATTERN = /^EF-[LRC]\d{3}$/;

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Central registry for all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: readonly ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();
    for (const def of definitions) {
      if (!ERROR_ID_PATTERN.test(def.errorId)) {
        throw new TypeError(`Malformed error ID: ${def.errorId}`);
      }
      if (def.errorId[3] !== CATEGORY_PREFIXES[def.category]) {
        throw new TypeError(
          `Error ID ${def.errorId} does not match category ${def.category}`
        );
      }
      idMap.set(def.errorId, def);
    }
    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Load Errors (EF-L0xx)
  {
    errorId: 'EF-L001',
    category: 'load',
    description: 'Unmatched loop-end',
    messageTemplate: 'Unmatched loop-end at instruction {position}',
    cause:
      'A ] appears with no open [ before it, so the loop has nowhere to jump back to.',
    resolution:
      'Remove the stray ] or add the missing [ earlier in the program.',
    examples: [
      { description: 'Loop-end before any loop-start', code: '+]' },
      { description: 'One loop-end too many', code: '+[-]]' },
    ],
  },
  {
    errorId: 'EF-L002',
    category: 'load',
    description: 'Unclosed loop-start',
    messageTemplate:
      'Unclosed loop-start at instruction {position} (end of program reached at instruction {scanEnd})',
    cause:
      'A [ is still open when the end of the program is reached. The error names the earliest open [.',
    resolution: 'Add the missing ] or remove the extra [.',
    examples: [
      { description: 'Loop never closed', code: '+[-' },
      { description: 'Nested loop missing its end', code: '[[-]' },
    ],
  },

  // Runtime Errors (EF-R0xx)
  {
    errorId: 'EF-R001',
    category: 'runtime',
    description: 'Pointer underflow',
    messageTemplate: 'Data pointer moved below cell 0 at instruction {position}',
    cause:
      'A < ran while the data pointer was on cell 0. The tape has no cells to the left of the start.',
    resolution:
      'Move right with > before moving left, or check the loop that walks the pointer back.',
    examples: [{ description: 'Moving left from the first cell', code: '<' }],
  },
  {
    errorId: 'EF-R002',
    category: 'runtime',
    description: 'Step limit exceeded',
    messageTemplate: 'Step limit of {limit} exceeded at instruction {position}',
    cause:
      'The program executed more instructions than the configured step limit allows.',
    resolution:
      'Raise the step limit, or fix a loop whose cell never reaches zero.',
    examples: [{ description: 'Loop that never exits', code: '+[]' }],
  },
  {
    errorId: 'EF-R003',
    category: 'runtime',
    description: 'Tape limit exceeded',
    messageTemplate:
      'Tape limit of {limit} cells exceeded at instruction {position}',
    cause:
      'A > moved the data pointer past the last cell the configured tape limit allows.',
    resolution:
      'Raise the tape limit, or fix a loop that keeps moving the pointer right.',
    examples: [{ description: 'Pointer walking right forever', code: '+[>+]' }],
  },
  {
    errorId: 'EF-R004',
    category: 'runtime',
    description: 'Execution aborted',
    messageTemplate: 'Execution aborted at instruction {position}',
    cause: 'The host signalled cancellation through the abort signal.',
    resolution: 'None required. The host stopped the program on purpose.',
  },

  // Config Errors (EF-C0xx)
  {
    errorId: 'EF-C001',
    category: 'config',
    description: 'Invalid engine option',
    messageTemplate: 'Invalid engine option {option}: {reason}',
    cause: 'An engine option has a value the engine cannot use.',
    resolution:
      'Limits must be positive integers. eof_behavior must be set_zero or leave_unchanged.',
    examples: [{ description: 'Zero step limit', code: '--step-limit 0' }],
  },
  {
    errorId: 'EF-C002',
    category: 'config',
    description: 'Invalid config file',
    messageTemplate: 'Invalid config file {path}: {reason}',
    cause:
      'The YAML config file is missing, malformed, or holds unknown keys or bad values.',
    resolution:
      'Use only step_limit, tape_limit and eof_behavior, with positive integer limits.',
    examples: [
      {
        description: 'Misspelled key',
        code: 'steplimit: 1000',
      },
      {
        description: 'Unknown EOF behavior',
        code: 'eof_behavior: minus_one',
      },
    ],
  },
];

/**
 * Global error registry instance.
 * Read-only singleton initialized at module load.
 */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing placeholders with context values.
 *
 * Placeholder format: {varName}
 * Missing context values render as empty string.
 * A template with an unclosed brace is returned unchanged.
 *
 * @example
 * renderMessage('Step limit of {limit} exceeded', { limit: 1000 })
 * // Returns: "Step limit of 1000 exceeded"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const open = template.indexOf('{', i);
    if (open === -1) {
      return result + template.slice(i);
    }

    const close = template.indexOf('}', open + 1);
    if (close === -1) {
      return template;
    }

    result += template.slice(i, open);
    const value = context[template.slice(open + 1, close)];
    if (value !== undefined) {
      result += String(value);
    }
    i = close + 1;
  }

  return result;
}
