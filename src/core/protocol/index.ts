/**
 * Matrix Protocol Module
 *
 * Re-exports protocol types, command builders, parsers, and errors.
 */

export * from './types.js';
export * from './errors.js';
export * from './commands.js';
export * from './parser.js';
