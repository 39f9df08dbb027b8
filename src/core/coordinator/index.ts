/**
 * Coordinator Module
 */

export * from './types.js';
export * from './coordinator.js';
