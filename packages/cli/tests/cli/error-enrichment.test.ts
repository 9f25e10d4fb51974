/**
 * Tests for CLI Error Enrichment and Formatting
 */

import { describe, expect, it } from 'vitest';
import {
  ConfigError,
  tryLoad,
  type EightfoldError,
  type SourceLocation,
} from 'eightfold';
import {
  enrichError,
  extractSnippet,
} from '../../src/cli-error-enrichment.js';
import {
  formatEnrichedError,
  renderCaret,
} from '../../src/cli-error-formatter.js';

const STRAY_END_HELP =
  'Remove the stray ] or add the missing [ earlier in the program.';

function loadFailure(source: string): EightfoldError {
  const outcome = tryLoad(source);
  if (outcome.ok) {
    throw new Error(`Expected ${JSON.stringify(source)} to fail`);
  }
  return outcome.error;
}

describe('extractSnippet', () => {
  it('extracts 2 context lines before and after by default', () => {
    const source = 'l1\nl2\nl3\nERR\nl5\nl6\nl7';
    const location: SourceLocation = { line: 4, column: 1, offset: 9 };

    const snippet = extractSnippet(source, location);

    expect(snippet.lines.map((l) => l.lineNumber)).toEqual([2, 3, 4, 5, 6]);
    expect(snippet.lines[2]).toEqual({
      lineNumber: 4,
      content: 'ERR',
      isErrorLine: true,
    });
    expect(snippet.highlight).toBe(location);
  });

  it('clamps context at the start of the source', () => {
    const snippet = extractSnippet('a\nb\nc\nd', { line: 1, column: 1, offset: 0 }, 1);
    expect(snippet.lines).toEqual([
      { lineNumber: 1, content: 'a', isErrorLine: true },
      { lineNumber: 2, content: 'b', isErrorLine: false },
    ]);
  });

  it('handles CRLF line endings', () => {
    const snippet = extractSnippet('+\r\n]', { line: 2, column: 1, offset: 3 }, 0);
    expect(snippet.lines).toEqual([
      { lineNumber: 2, content: ']', isErrorLine: true },
    ]);
  });

  it('rejects locations outside the source', () => {
    expect(() =>
      extractSnippet('+', { line: 3, column: 1, offset: 5 })
    ).toThrow(RangeError);
  });
});

describe('enrichError', () => {
  it('adds a snippet and the registry resolution', () => {
    const enriched = enrichError(loadFailure('+\n]'), '+\n]');
    expect(enriched.errorId).toBe('EF-L001');
    expect(enriched.message).toBe('Unmatched loop-end at instruction 1');
    expect(enriched.location).toEqual({ line: 2, column: 1, offset: 2 });
    expect(enriched.sourceSnippet?.lines).toEqual([
      { lineNumber: 1, content: '+', isErrorLine: false },
      { lineNumber: 2, content: ']', isErrorLine: true },
    ]);
    expect(enriched.suggestions).toEqual([STRAY_END_HELP]);
  });

  it('omits the snippet without source text', () => {
    expect(enrichError(loadFailure(']'), undefined).sourceSnippet).toBeUndefined();
  });

  it('omits the snippet for errors without a location', () => {
    const error = new ConfigError('EF-C002', {
      path: 'cfg.yaml',
      reason: 'file not found',
    });
    const enriched = enrichError(error, 'some source');
    expect(enriched.location).toBeUndefined();
    expect(enriched.sourceSnippet).toBeUndefined();
  });
});

describe('formatEnrichedError', () => {
  const enriched = enrichError(loadFailure('+\n]'), '+\n]');

  it('renders the human format with a caret under the symbol', () => {
    expect(formatEnrichedError(enriched, 'human')).toBe(
      [
        'error[EF-L001]: Unmatched loop-end at instruction 1',
        '  --> 2:1',
        '   |',
        ' 1 | +',
        ' 2 | ]',
        '   | ^',
        '   |',
        `   = help: ${STRAY_END_HELP}`,
      ].join('\n')
    );
  });

  it('renders the compact format on one line', () => {
    expect(formatEnrichedError(enriched, 'compact')).toBe(
      `[EF-L001] Unmatched loop-end at instruction 1 at 2:1 (hint: ${STRAY_END_HELP})`
    );
  });

  it('renders an LSP diagnostic with zero-based positions', () => {
    expect(JSON.parse(formatEnrichedError(enriched, 'json'))).toEqual({
      errorId: 'EF-L001',
      severity: 1,
      message: 'Unmatched loop-end at instruction 1',
      source: 'eightfold',
      code: 'EF-L001',
      range: {
        start: { line: 1, character: 0 },
        end: { line: 1, character: 1 },
      },
      suggestions: [STRAY_END_HELP],
    });
  });

  it('leaves out the range when there is no location', () => {
    const error = new ConfigError('EF-C001', {
      option: 'tapeLimit',
      reason: 'expected a positive integer, got 0',
    });
    const diagnostic: unknown = JSON.parse(
      formatEnrichedError(enrichError(error, undefined), 'json')
    );
    expect(diagnostic).not.toHaveProperty('range');
  });
});

describe('renderCaret', () => {
  it('places the caret under a one-based column', () => {
    expect(renderCaret(1)).toBe('^');
    expect(renderCaret(4)).toBe('   ^');
  });

  it('rejects columns below 1', () => {
    expect(() => renderCaret(0)).toThrow(RangeError);
  });
});
