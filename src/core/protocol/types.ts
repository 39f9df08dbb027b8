/**
 * Matrix Protocol Type Definitions
 *
 * Canonical types for the matrix switcher line protocol and the device
 * state derived from it.
 */

// -----------------------------------------------------------------------------
// Limits
// -----------------------------------------------------------------------------

export const MAX_PORTS = 32;
export const MIN_PRESET = 0;
export const MAX_PRESET = 9;
export const DEFAULT_DEVICE_PORT = 4001;
export const DEFAULT_PORT_COUNT = 8;

// -----------------------------------------------------------------------------
// Power State
// -----------------------------------------------------------------------------

export const PowerState = {
  ON: 'on',
  OFF: 'off',
  STANDBY: 'standby',
} as const;

export type PowerState = (typeof PowerState)[keyof typeof PowerState];

// -----------------------------------------------------------------------------
// Endpoint
// -----------------------------------------------------------------------------

/**
 * Network address and port layout of one matrix switcher.
 * Immutable for the lifetime of a client.
 */
export interface Endpoint {
  host: string;
  port: number;
  /** Number of inputs, 1-32 */
  numInputs: number;
  /** Number of outputs, 1-32 */
  numOutputs: number;
}

// -----------------------------------------------------------------------------
// Matrix Status
// -----------------------------------------------------------------------------

/**
 * Routing table: output index -> input index, or null when the output is off
 * or its source is unknown.
 */
export type RoutingTable = Map<number, number | null>;

export interface MatrixStatus {
  outputs: RoutingTable;
  model: string;
  firmware: string;
  locked: boolean;
  powerState: PowerState;
}

export interface DeviceInfo {
  model: string;
  firmware: string;
}

/**
 * A single (output, input) pair extracted from a routing response.
 */
export interface RoutePair {
  output: number;
  input: number;
}

// -----------------------------------------------------------------------------
// Command Verbs
// -----------------------------------------------------------------------------

/**
 * Stable verb names, used for logging and metric labels.
 */
export const CommandVerb = {
  QUERY_MODEL: 'query_model',
  QUERY_FIRMWARE: 'query_firmware',
  QUERY_STATUS: 'query_status',
  QUERY_OUTPUT: 'query_output',
  QUERY_POWER: 'query_power',
  QUERY_LOCK: 'query_lock',
  ROUTE: 'route',
  ROUTE_ALL: 'route_all',
  OUTPUT_OFF: 'output_off',
  OUTPUT_ON: 'output_on',
  ALL_OFF: 'all_off',
  ALL_THROUGH: 'all_through',
  SAVE_PRESET: 'save_preset',
  RECALL_PRESET: 'recall_preset',
  CLEAR_PRESET: 'clear_preset',
  POWER_ON: 'power_on',
  POWER_OFF: 'power_off',
  STANDBY: 'standby',
  LOCK: 'lock',
  UNLOCK: 'unlock',
} as const;

export type CommandVerb = (typeof CommandVerb)[keyof typeof CommandVerb];

/**
 * An outbound protocol line together with the verb that produced it.
 */
export interface Command {
  verb: CommandVerb;
  line: string;
}
