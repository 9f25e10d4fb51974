/**
 * Eightfold Types
 * Shared source, instruction and error types
 */

export * from './source-location.js';
export * from './instruction-types.js';
export * from './error-registry.js';
export * from './error-classes.js';
