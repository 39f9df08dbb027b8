/**
 * Transports Module
 */

export * from './tcp/index.js';
