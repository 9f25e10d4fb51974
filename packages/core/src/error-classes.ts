/**
 * Eightfold Error Classes
 * Structured error types with registry-based error codes
 */

import type { SourceLocation } from './source-location.js';
import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
} from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface EightfoldErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

/**
 * Render the registry message for an error ID, checking that the ID exists
 * and belongs to the expected category.
 *
 * @throws TypeError if errorId is unknown or from another category
 */
export function messageFor(
  errorId: string,
  category: ErrorCategory,
  context: Record<string, unknown>
): string {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
  return renderMessage(definition.messageTemplate, context);
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all Eightfold errors.
 * Provides structured data for host applications to format as needed.
 */
export class EightfoldError extends Error {
  readonly errorId: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: EightfoldErrorData) {
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'EightfoldError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): EightfoldErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at \d+:\d+$/, ''),
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: EightfoldErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// CATEGORY ERROR CLASSES
// ============================================================

/** Errors raised while loading a program, before anything executes */
export class LoadError extends EightfoldError {
  /** Instruction index of the offending symbol */
  readonly position: number;

  constructor(
    errorId: string,
    position: number,
    location?: SourceLocation,
    context: Record<string, unknown> = {}
  ) {
    const fullContext = { position, ...context };
    super({
      errorId,
      message: messageFor(errorId, 'load', fullContext),
      location,
      context: fullContext,
    });
    this.name = 'LoadError';
    this.position = position;
  }
}

/** Errors that abort a running program */
export class RuntimeError extends EightfoldError {
  /** Instruction pointer when execution stopped */
  readonly position: number;

  constructor(
    errorId: string,
    position: number,
    location?: SourceLocation,
    context: Record<string, unknown> = {}
  ) {
    const fullContext = { position, ...context };
    super({
      errorId,
      message: messageFor(errorId, 'runtime', fullContext),
      location,
      context: fullContext,
    });
    this.name = 'RuntimeError';
    this.position = position;
  }
}

/** Invalid engine options or config file contents */
export class ConfigError extends EightfoldError {
  constructor(errorId: string, context: Record<string, unknown>) {
    super({
      errorId,
      message: messageFor(errorId, 'config', context),
      context,
    });
    this.name = 'ConfigError';
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Why a loop bracket failed to match */
export type UnbalancedLoopReason = 'unmatched-end' | 'unclosed-start';

/**
 * Bracket mismatch found by the loader.
 *
 * For an unmatched loop-end, `position` is that loop-end.
 * For an unclosed loop-start, `position` is the earliest open loop-start and
 * `scanEnd` is the instruction count where the scan stopped.
 */
export class UnbalancedLoopError extends LoadError {
  readonly reason: UnbalancedLoopReason;
  readonly scanEnd: number | undefined;

  constructor(
    reason: UnbalancedLoopReason,
    position: number,
    location: SourceLocation,
    scanEnd?: number
  ) {
    super(
      reason === 'unmatched-end' ? 'EF-L001' : 'EF-L002',
      position,
      location,
      scanEnd === undefined ? {} : { scanEnd }
    );
    this.name = 'UnbalancedLoopError';
    this.reason = reason;
    this.scanEnd = scanEnd;
  }
}

/** `<` executed while the data pointer was on cell 0 */
export class PointerUnderflowError extends RuntimeError {
  constructor(position: number, location?: SourceLocation) {
    super('EF-R001', position, location);
    this.name = 'PointerUnderflowError';
  }
}

/** More instructions executed than the step limit allows */
export class ExecutionLimitExceededError extends RuntimeError {
  readonly limit: number;

  constructor(limit: number, position: number, location?: SourceLocation) {
    super('EF-R002', position, location, { limit });
    this.name = 'ExecutionLimitExceededError';
    this.limit = limit;
  }
}

/** Tape grew past the tape limit */
export class TapeLimitExceededError extends RuntimeError {
  readonly limit: number;

  constructor(limit: number, position: number, location?: SourceLocation) {
    super('EF-R003', position, location, { limit });
    this.name = 'TapeLimitExceededError';
    this.limit = limit;
  }
}

/** Abort errors (when execution is cancelled via AbortSignal) */
export class AbortError extends RuntimeError {
  constructor(position: number, location?: SourceLocation) {
    super('EF-R004', position, location);
    this.name = 'AbortError';
  }
}

// ============================================================
// TYPED RESULTS
// ============================================================

/** Success or failure of a load or run, for callers that avoid exceptions */
export type Outcome<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: EightfoldError };

/**
 * Run `fn` and capture any EightfoldError as a failed outcome.
 * Other errors (a throwing output sink, for instance) propagate.
 */
export function attempt<T>(fn: () => T): Outcome<T> {
  try {
    return { ok: true, value: fn() };
  } catch (error) {
    if (error instanceof EightfoldError) {
      return { ok: false, error };
    }
    throw error;
  }
}
