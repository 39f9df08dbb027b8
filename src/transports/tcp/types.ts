/**
 * TCP Transport Types
 */

// -----------------------------------------------------------------------------
// Connection
// -----------------------------------------------------------------------------

export interface ConnectionConfig {
  host: string;
  port: number;
  /** Connect timeout (ms) */
  connectTimeout: number;
  /** How long a graceful close may take before the socket is destroyed (ms) */
  closeTimeout: number;
}

export const DEFAULT_CONNECTION_CONFIG: Omit<ConnectionConfig, 'host' | 'port'> = {
  connectTimeout: 5000,
  closeTimeout: 1000,
};

export type ConnectionEvent =
  | { type: 'connected'; host: string; port: number; reconnect: boolean }
  | { type: 'disconnected'; reason: string }
  | { type: 'error'; error: string };

export type ConnectionEventHandler = (event: ConnectionEvent) => void;

// -----------------------------------------------------------------------------
// Command Channel
// -----------------------------------------------------------------------------

export interface ChannelTimings {
  /** Pause between writing a command and reading its reply (ms) */
  commandDelay: number;
  /** Timeout for the first response chunk (ms) */
  responseTimeout: number;
  /** Timeout for each follow-up drain read (ms) */
  drainTimeout: number;
}

export const DEFAULT_CHANNEL_TIMINGS: ChannelTimings = {
  commandDelay: 100,
  responseTimeout: 5000,
  drainTimeout: 100,
};

/**
 * Anything that exchanges one command line for one response text.
 */
export interface CommandTransport {
  send(line: string): Promise<string>;
}
