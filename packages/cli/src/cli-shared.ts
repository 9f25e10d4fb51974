/**
 * CLI Shared Utilities
 * Common formatting functions for the eightfold CLI
 */

import { EightfoldError, VERSION, type RunEndEvent } from 'eightfold';
import { enrichError } from './cli-error-enrichment.js';
import {
  formatEnrichedError,
  type OutputFormat,
} from './cli-error-formatter.js';

/**
 * Format error for stderr output.
 *
 * Eightfold errors go through the enrichment pipeline, with a source snippet
 * when the program text is available. Anything else prints its message.
 */
export function formatError(
  err: Error,
  source?: string,
  format: OutputFormat = 'human'
): string {
  if (err instanceof EightfoldError) {
    return formatEnrichedError(enrichError(err, source), format);
  }

  if ('code' in err && err.code === 'ENOENT' && 'path' in err) {
    return `File not found: ${String(err.path)}`;
  }

  return err.message;
}

/**
 * One-line run summary for `--stats`
 */
export function formatStats(event: RunEndEvent): string {
  return `steps: ${event.steps}, tape: ${event.tapeLength} cells, time: ${event.durationMs}ms`;
}

export { VERSION };
