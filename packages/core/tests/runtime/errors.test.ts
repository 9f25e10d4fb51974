/**
 * Eightfold Runtime Tests: Error Taxonomy
 * Tests for error registry, template rendering, error classes and outcomes
 */

import { describe, expect, it } from 'vitest';

import {
  AbortError,
  attempt,
  CATEGORY_PREFIXES,
  ConfigError,
  EightfoldError,
  ERROR_ID_PATTERN,
  ERROR_REGISTRY,
  ExecutionLimitExceededError,
  LoadError,
  PointerUnderflowError,
  renderMessage,
  RuntimeError,
  TapeLimitExceededError,
  type SourceLocation,
} from 'eightfold';

describe('Eightfold Runtime: Error Taxonomy', () => {
  describe('Registry', () => {
    it.each([
      ['EF-L001', 'load'],
      ['EF-L002', 'load'],
      ['EF-R001', 'runtime'],
      ['EF-R002', 'runtime'],
      ['EF-R003', 'runtime'],
      ['EF-R004', 'runtime'],
      ['EF-C001', 'config'],
      ['EF-C002', 'config'],
    ])('defines %s as a %s error', (errorId, category) => {
      const definition = ERROR_REGISTRY.get(errorId);
      expect(definition?.category).toBe(category);
      expect(definition?.description).not.toBe('');
    });

    it('holds exactly the documented errors', () => {
      expect(ERROR_REGISTRY.size).toBe(8);
    });

    it('keeps every ID well-formed and prefixed by its category', () => {
      for (const [errorId, definition] of ERROR_REGISTRY.entries()) {
        expect(errorId).toMatch(ERROR_ID_PATTERN);
        expect(errorId[3]).toBe(CATEGORY_PREFIXES[definition.category]);
      }
    });

    it('returns undefined for unknown IDs', () => {
      expect(ERROR_REGISTRY.get('EF-X999')).toBeUndefined();
      expect(ERROR_REGISTRY.has('EF-X999')).toBe(false);
    });
  });

  describe('renderMessage', () => {
    it('replaces placeholders with context values', () => {
      expect(
        renderMessage('Step limit of {limit} exceeded at {position}', {
          limit: 1000,
          position: 2,
        })
      ).toBe('Step limit of 1000 exceeded at 2');
    });

    it('renders missing values as empty strings', () => {
      expect(renderMessage('Hello {name}!', {})).toBe('Hello !');
    });

    it('returns a template with an unclosed brace unchanged', () => {
      expect(renderMessage('Broken {limit', { limit: 1 })).toBe(
        'Broken {limit'
      );
    });

    it('returns text without placeholders as is', () => {
      expect(renderMessage('Execution aborted', { position: 1 })).toBe(
        'Execution aborted'
      );
    });
  });

  describe('EightfoldError', () => {
    const location: SourceLocation = { line: 2, column: 4, offset: 9 };

    it('appends the location to the message', () => {
      const error = new EightfoldError({
        errorId: 'EF-R001',
        message: 'Data pointer moved below cell 0',
        location,
      });
      expect(error.message).toBe('Data pointer moved below cell 0 at 2:4');
      expect(error.name).toBe('EightfoldError');
    });

    it('rejects unknown error IDs', () => {
      expect(
        () => new EightfoldError({ errorId: 'EF-X999', message: 'nope' })
      ).toThrow('Unknown error ID: EF-X999');
    });

    it('strips the location suffix from structured data', () => {
      const error = new EightfoldError({
        errorId: 'EF-R004',
        message: 'Execution aborted',
        location,
        context: { position: 3 },
      });
      expect(error.toData()).toEqual({
        errorId: 'EF-R004',
        message: 'Execution aborted',
        location,
        context: { position: 3 },
      });
    });

    it('formats through a host formatter', () => {
      const error = new EightfoldError({
        errorId: 'EF-R004',
        message: 'Execution aborted',
      });
      expect(error.format((data) => `[${data.errorId}] ${data.message}`)).toBe(
        '[EF-R004] Execution aborted'
      );
      expect(error.format()).toBe('Execution aborted');
    });
  });

  describe('Category classes', () => {
    it('LoadError rejects IDs from other categories', () => {
      expect(() => new LoadError('EF-R001', 0)).toThrow(
        'Expected load error ID, got: EF-R001'
      );
    });

    it('RuntimeError rejects IDs from other categories', () => {
      expect(() => new RuntimeError('EF-L001', 0)).toThrow(
        'Expected runtime error ID, got: EF-L001'
      );
    });

    it('ConfigError renders its template', () => {
      const error = new ConfigError('EF-C001', {
        option: 'stepLimit',
        reason: 'expected a positive integer, got 0',
      });
      expect(error.message).toBe(
        'Invalid engine option stepLimit: expected a positive integer, got 0'
      );
      expect(error.location).toBeUndefined();
    });
  });

  describe('Specialized classes', () => {
    it('PointerUnderflowError carries the instruction position', () => {
      const error = new PointerUnderflowError(3, {
        line: 1,
        column: 4,
        offset: 3,
      });
      expect(error).toBeInstanceOf(RuntimeError);
      expect(error).toBeInstanceOf(EightfoldError);
      expect(error.name).toBe('PointerUnderflowError');
      expect(error.errorId).toBe('EF-R001');
      expect(error.position).toBe(3);
      expect(error.message).toBe(
        'Data pointer moved below cell 0 at instruction 3 at 1:4'
      );
    });

    it('ExecutionLimitExceededError carries the limit', () => {
      const error = new ExecutionLimitExceededError(1000, 2);
      expect(error.limit).toBe(1000);
      expect(error.context).toEqual({ position: 2, limit: 1000 });
      expect(error.message).toBe(
        'Step limit of 1000 exceeded at instruction 2'
      );
    });

    it('TapeLimitExceededError carries the limit', () => {
      const error = new TapeLimitExceededError(16, 5);
      expect(error.errorId).toBe('EF-R003');
      expect(error.message).toBe(
        'Tape limit of 16 cells exceeded at instruction 5'
      );
    });

    it('AbortError uses EF-R004', () => {
      const error = new AbortError(7);
      expect(error.errorId).toBe('EF-R004');
      expect(error.message).toBe('Execution aborted at instruction 7');
    });
  });

  describe('attempt', () => {
    it('wraps a returned value', () => {
      expect(attempt(() => 42)).toEqual({ ok: true, value: 42 });
    });

    it('captures Eightfold errors', () => {
      const error = new AbortError(0);
      expect(
        attempt(() => {
          throw error;
        })
      ).toEqual({ ok: false, error });
    });

    it('rethrows other errors', () => {
      expect(() =>
        attempt(() => {
          throw new Error('sink closed');
        })
      ).toThrow('sink closed');
    });
  });
});
