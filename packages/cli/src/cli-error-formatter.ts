/**
 * CLI Error Formatter
 * Format enriched errors for human-readable, JSON, or compact output
 */

import type { EnrichedError } from './cli-error-enrichment.js';

// ============================================================
// PUBLIC TYPES
// ============================================================

export type OutputFormat = 'human' | 'json' | 'compact';

export const OUTPUT_FORMATS: readonly OutputFormat[] = [
  'human',
  'json',
  'compact',
];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/** LSP-style position: zero-based line and character */
interface DiagnosticPosition {
  line: number;
  character: number;
}

interface Diagnostic {
  errorId: string;
  severity: number;
  message: string;
  range?: { start: DiagnosticPosition; end: DiagnosticPosition };
  source: string;
  code: string;
  suggestions?: string[];
}

// ============================================================
// ERROR FORMATTING
// ============================================================

/**
 * Format enriched error for output.
 *
 * - Human format: multi-line with snippet and caret
 * - JSON format: LSP Diagnostic compatible
 * - Compact format: single line for CI output
 */
export function formatEnrichedError(
  error: EnrichedError,
  format: OutputFormat
): string {
  switch (format) {
    case 'json':
      return formatErrorJson(error);
    case 'compact':
      return formatErrorCompact(error);
    case 'human':
      return formatErrorHuman(error);
  }
}

/**
 * Format error in human-readable format.
 *
 * ```
 * error[EF-L001]: Unmatched loop-end at instruction 4
 *   --> 2:3
 *    |
 *  1 | +[-]
 *  2 |   ]
 *    |   ^
 *    |
 *    = help: Remove the stray ] or add the missing [ earlier in the program.
 * ```
 */
function formatErrorHuman(error: EnrichedError): string {
  const lines: string[] = [];

  lines.push(`error[${error.errorId}]: ${error.message}`);

  if (error.location) {
    lines.push(`  --> ${error.location.line}:${error.location.column}`);
  }

  const snippet = error.sourceSnippet;
  if (snippet && snippet.lines.length > 0) {
    lines.push('   |');

    const maxLineNumber = Math.max(...snippet.lines.map((l) => l.lineNumber));
    const lineNumberWidth = String(maxLineNumber).length;

    for (const line of snippet.lines) {
      const lineNumStr = String(line.lineNumber).padStart(lineNumberWidth, ' ');
      lines.push(` ${lineNumStr} | ${line.content}`);

      if (line.isErrorLine) {
        const padding = ' '.repeat(lineNumberWidth);
        lines.push(` ${padding} | ${renderCaret(snippet.highlight.column)}`);
      }
    }
    lines.push('   |');
  }

  for (const suggestion of error.suggestions ?? []) {
    lines.push(`   = help: ${suggestion}`);
  }

  return lines.join('\n');
}

/**
 * Format error in JSON format (LSP Diagnostic compatible).
 */
function formatErrorJson(error: EnrichedError): string {
  const diagnostic: Diagnostic = {
    errorId: error.errorId,
    severity: 1, // LSP: 1 = Error
    message: error.message,
    source: 'eightfold',
    code: error.errorId,
  };

  if (error.location) {
    const line = error.location.line - 1;
    const character = error.location.column - 1;
    diagnostic.range = {
      start: { line, character },
      end: { line, character: character + 1 },
    };
  }

  if (error.suggestions && error.suggestions.length > 0) {
    diagnostic.suggestions = [...error.suggestions];
  }

  return JSON.stringify(diagnostic, null, 2);
}

/**
 * Format error in compact format (single line for CI).
 */
function formatErrorCompact(error: EnrichedError): string {
  const parts: string[] = [`[${error.errorId}]`, error.message];

  if (error.location) {
    parts.push(`at ${error.location.line}:${error.location.column}`);
  }

  const hint = error.suggestions?.[0];
  if (hint !== undefined) {
    parts.push(`(hint: ${hint})`);
  }

  return parts.join(' ');
}

// ============================================================
// CARET
// ============================================================

/**
 * Render a caret under a one-based column.
 *
 * @throws RangeError for columns below 1
 */
export function renderCaret(column: number): string {
  if (column < 1) {
    throw new RangeError(`Column must be at least 1, got ${column}`);
  }
  return ' '.repeat(column - 1) + '^';
}
