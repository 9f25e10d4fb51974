// ============================================================
// SOURCE LOCATION
// ============================================================

/** Position of a symbol in program source text (line and column are 1-based) */
export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

/** Render a location as `line:column` */
export function formatLocation(location: SourceLocation): string {
  return `${location.line}:${location.column}`;
}
