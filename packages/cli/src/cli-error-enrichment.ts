/**
 * CLI Error Enrichment
 * Attach source snippets and registry help to Eightfold errors
 */

import {
  ERROR_REGISTRY,
  type EightfoldError,
  type SourceLocation,
} from 'eightfold';

// ============================================================
// TYPES
// ============================================================

/** One line of source shown around an error */
export interface SnippetLine {
  readonly lineNumber: number;
  readonly content: string;
  readonly isErrorLine: boolean;
}

/** Source excerpt centred on the error location */
export interface SourceSnippet {
  readonly lines: readonly SnippetLine[];
  readonly highlight: SourceLocation;
}

/** Error data ready for any output format */
export interface EnrichedError {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
  readonly sourceSnippet?: SourceSnippet | undefined;
  readonly suggestions?: readonly string[] | undefined;
}

// ============================================================
// SNIPPETS
// ============================================================

/**
 * Extract the error line plus up to `contextLines` lines either side.
 *
 * @throws RangeError when the location lies outside the source
 */
export function extractSnippet(
  source: string,
  location: SourceLocation,
  contextLines = 2
): SourceSnippet {
  const sourceLines = source.split(/\r?\n/);
  if (location.line < 1 || location.line > sourceLines.length) {
    throw new RangeError(
      `Line ${location.line} is outside the source (1-${sourceLines.length})`
    );
  }

  const first = Math.max(1, location.line - contextLines);
  const last = Math.min(sourceLines.length, location.line + contextLines);
  const lines: SnippetLine[] = [];
  for (let lineNumber = first; lineNumber <= last; lineNumber++) {
    lines.push({
      lineNumber,
      content: sourceLines[lineNumber - 1] ?? '',
      isErrorLine: lineNumber === location.line,
    });
  }

  return { lines, highlight: location };
}

// ============================================================
// ENRICHMENT
// ============================================================

/**
 * Combine an error with its source text and registry resolution.
 * Errors without a location (config errors) carry no snippet.
 */
export function enrichError(
  error: EightfoldError,
  source: string | undefined
): EnrichedError {
  const data = error.toData();
  const resolution = ERROR_REGISTRY.get(data.errorId)?.resolution;

  return {
    errorId: data.errorId,
    message: data.message,
    location: data.location,
    context: data.context,
    sourceSnippet:
      source !== undefined && data.location !== undefined
        ? extractSnippet(source, data.location)
        : undefined,
    suggestions: resolution !== undefined ? [resolution] : undefined,
  };
}
