/**
 * Core Module
 *
 * Re-exports all core components.
 */

export * from './protocol/index.js';
export * from './state/index.js';
export * from './coordinator/index.js';
