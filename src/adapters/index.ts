/**
 * Adapters Module
 *
 * Re-exports all adapter components.
 */

export {
  MatrixClient,
  MatrixSimulator,
  DEFAULT_CLIENT_CONFIG,
  DEFAULT_SIMULATOR_CONFIG as DEFAULT_MATRIX_SIMULATOR_CONFIG,
  INITIAL_CLIENT_METRICS,
} from './matrix/index.js';

export type {
  MatrixClientConfig,
  MatrixClientEvent,
  MatrixClientEventHandler,
  MatrixClientMetrics,
  MatrixControl,
  SimulatorConfig as MatrixSimulatorConfig,
  SimulatorEvent as MatrixSimulatorEvent,
  SimulatorEventHandler as MatrixSimulatorEventHandler,
  StatusFormat,
} from './matrix/index.js';
