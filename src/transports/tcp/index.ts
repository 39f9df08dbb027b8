/**
 * TCP Transport Module
 *
 * Re-exports the connection manager, command channel, and exchange gate.
 */

export * from './types.js';
export * from './mutex.js';
export * from './connection.js';
export * from './channel.js';
