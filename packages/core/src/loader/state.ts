/**
 * Loader State
 * Tracks position in source text while filtering instructions
 */

import type { SourceLocation } from '../types.js';

export interface LoaderState {
  readonly source: string;
  pos: number;
  line: number;
  column: number;
}

export function createLoaderState(source: string): LoaderState {
  return { source, pos: 0, line: 1, column: 1 };
}

export function currentLocation(state: LoaderState): SourceLocation {
  return {
    line: state.line,
    column: state.column,
    offset: state.pos,
  };
}

/**
 * Consume one character. Surrogate pairs are consumed whole so that
 * columns count characters rather than UTF-16 code units.
 */
export function advance(state: LoaderState): string {
  const code = state.source.codePointAt(state.pos);
  if (code === undefined) {
    return '';
  }
  const ch = String.fromCodePoint(code);
  state.pos += ch.length;
  if (ch === '\n') {
    state.line++;
    state.column = 1;
  } else {
    state.column++;
  }
  return ch;
}

export function isAtEnd(state: LoaderState): boolean {
  return state.pos >= state.source.length;
}
