/**
 * State Module
 */

export * from './store.js';
