/**
 * Matrix Adapter Types
 *
 * Configuration, events, and the control surface of a matrix switcher client.
 */

import type { PortLayout } from '../../core/protocol/commands.js';
import type { DeviceInfo, MatrixStatus, PowerState } from '../../core/protocol/types.js';
import { DEFAULT_DEVICE_PORT, DEFAULT_PORT_COUNT } from '../../core/protocol/types.js';
import type { StateDelta } from '../../core/state/store.js';
import type { ChannelTimings } from '../../transports/tcp/types.js';

// -----------------------------------------------------------------------------
// Client Configuration
// -----------------------------------------------------------------------------

export interface MatrixClientConfig {
  /** Device host address */
  host: string;
  /** Device TCP port (default: 4001) */
  port: number;
  /** Number of inputs, 1-32 */
  numInputs: number;
  /** Number of outputs, 1-32 */
  numOutputs: number;
  /** Connect timeout (ms) */
  connectTimeout: number;
  /** Exchange timings; the defaults match the device's processing latency */
  timings?: Partial<ChannelTimings>;
}

export const DEFAULT_CLIENT_CONFIG: Omit<MatrixClientConfig, 'host'> = {
  port: DEFAULT_DEVICE_PORT,
  numInputs: DEFAULT_PORT_COUNT,
  numOutputs: DEFAULT_PORT_COUNT,
  connectTimeout: 5000,
};

// -----------------------------------------------------------------------------
// Client Events
// -----------------------------------------------------------------------------

export type MatrixClientEvent =
  | { type: 'connected'; reconnect: boolean }
  | { type: 'disconnected'; reason: string }
  | { type: 'error'; error: string }
  | { type: 'state_changed'; delta: StateDelta };

export type MatrixClientEventHandler = (event: MatrixClientEvent) => void;

// -----------------------------------------------------------------------------
// Control Surface
// -----------------------------------------------------------------------------

/**
 * Everything the polling coordinator needs from a client. Implemented by
 * MatrixClient; tests substitute their own.
 */
export interface MatrixControl {
  readonly layout: PortLayout;

  isConnected(): boolean;
  getCachedStatus(): MatrixStatus;
  onEvent(handler: MatrixClientEventHandler): void;
  offEvent(handler: MatrixClientEventHandler): void;

  testConnection(): Promise<DeviceInfo>;
  disconnect(): Promise<void>;

  getModel(): Promise<string>;
  getFirmware(): Promise<string>;
  getStatus(): Promise<MatrixStatus>;
  getOutputStatus(output: number): Promise<number | null>;
  getPowerState(): Promise<PowerState>;
  getLockStatus(): Promise<boolean>;

  route(input: number, output: number): Promise<void>;
  routeToAll(input: number): Promise<void>;
  switchOffOutput(output: number): Promise<void>;
  switchOnOutput(output: number): Promise<void>;
  switchOffAll(): Promise<void>;
  allThrough(): Promise<void>;

  savePreset(preset: number): Promise<void>;
  recallPreset(preset: number): Promise<void>;
  clearPreset(preset: number): Promise<void>;

  powerOn(): Promise<void>;
  powerOff(): Promise<void>;
  standby(): Promise<void>;
  lockPanel(): Promise<void>;
  unlockPanel(): Promise<void>;
}

// -----------------------------------------------------------------------------
// Metrics
// -----------------------------------------------------------------------------

export interface MatrixClientMetrics {
  commandsSent: number;
  commandsFailed: number;
  reconnects: number;
  lastLatencyMs: number | null;
}

export const INITIAL_CLIENT_METRICS: MatrixClientMetrics = {
  commandsSent: 0,
  commandsFailed: 0,
  reconnects: 0,
  lastLatencyMs: null,
};
