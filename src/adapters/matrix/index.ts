/**
 * Matrix Adapter Module
 */

export * from './types.js';
export * from './client.js';
export * from './simulator.js';
