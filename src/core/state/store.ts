/**
 * Matrix State Store
 *
 * Last-known device state: routing table, identity, lock and power.
 * Supports snapshots, change deltas, and a global version counter.
 */

import type { PortLayout } from '../protocol/commands.js';
import type { MatrixStatus, RoutingTable } from '../protocol/types.js';
import { PowerState } from '../protocol/types.js';
import { createLogger } from '../../observability/logger.js';

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

export type StateDelta =
  | { field: 'output'; output: number; previous: number | null | undefined; value: number | null; version: number }
  | { field: 'model' | 'firmware'; previous: string; value: string; version: number }
  | { field: 'locked'; previous: boolean; value: boolean; version: number }
  | { field: 'powerState'; previous: PowerState; value: PowerState; version: number };

export type StateChangeListener = (delta: StateDelta) => void;

export interface StateSnapshot {
  status: MatrixStatus;
  timestamp: number;
  version: number;
}

// -----------------------------------------------------------------------------
// State Store Implementation
// -----------------------------------------------------------------------------

export class MatrixStateStore {
  private readonly layout: PortLayout;
  private readonly logger = createLogger({ component: 'state' });

  private outputs: RoutingTable = new Map();
  private model = '';
  private firmware = '';
  private locked = false;
  private powerState: PowerState = PowerState.ON;

  private listeners: Set<StateChangeListener> = new Set();
  private globalVersion = 0;
  private lastUpdated: number | null = null;

  constructor(layout: PortLayout) {
    this.layout = { numInputs: layout.numInputs, numOutputs: layout.numOutputs };
  }

  // ---------------------------------------------------------------------------
  // Read Operations
  // ---------------------------------------------------------------------------

  /**
   * Copy of the current status. Safe to hold on to; later writes do not
   * affect it.
   */
  getStatus(): MatrixStatus {
    return {
      outputs: new Map(this.outputs),
      model: this.model,
      firmware: this.firmware,
      locked: this.locked,
      powerState: this.powerState,
    };
  }

  getSnapshot(): StateSnapshot {
    return {
      status: this.getStatus(),
      timestamp: Date.now(),
      version: this.globalVersion,
    };
  }

  /**
   * Input routed to an output; undefined when the output has never been seen.
   */
  getOutput(output: number): number | null | undefined {
    return this.outputs.get(output);
  }

  getRouting(): RoutingTable {
    return new Map(this.outputs);
  }

  get version(): number {
    return this.globalVersion;
  }

  get updatedAt(): number | null {
    return this.lastUpdated;
  }

  // ---------------------------------------------------------------------------
  // Write Operations
  // ---------------------------------------------------------------------------

  /**
   * Set the input for one output. Returns the delta, or null if unchanged.
   */
  setOutput(output: number, input: number | null): StateDelta | null {
    this.assertRoute(output, input);

    const previous = this.outputs.get(output);
    if (this.outputs.has(output) && previous === input) {
      return null;
    }

    this.outputs.set(output, input);
    return this.commit({ field: 'output', output, previous, value: input, version: 0 });
  }

  /**
   * Apply the same input (or a per-output input) to every output.
   */
  setAllOutputs(inputFor: (output: number) => number | null): StateDelta[] {
    const deltas: StateDelta[] = [];

    for (let output = 1; output <= this.layout.numOutputs; output++) {
      const delta = this.setOutput(output, inputFor(output));
      if (delta) {
        deltas.push(delta);
      }
    }

    return deltas;
  }

  /**
   * Merge a parsed routing table.
   */
  applyRouting(routing: RoutingTable): StateDelta[] {
    const deltas: StateDelta[] = [];

    for (const [output, input] of routing) {
      const delta = this.setOutput(output, input);
      if (delta) {
        deltas.push(delta);
      }
    }

    return deltas;
  }

  setModel(model: string): StateDelta | null {
    if (model === this.model) return null;
    const previous = this.model;
    this.model = model;
    return this.commit({ field: 'model', previous, value: model, version: 0 });
  }

  setFirmware(firmware: string): StateDelta | null {
    if (firmware === this.firmware) return null;
    const previous = this.firmware;
    this.firmware = firmware;
    return this.commit({ field: 'firmware', previous, value: firmware, version: 0 });
  }

  setLocked(locked: boolean): StateDelta | null {
    if (locked === this.locked) return null;
    const previous = this.locked;
    this.locked = locked;
    return this.commit({ field: 'locked', previous, value: locked, version: 0 });
  }

  setPowerState(powerState: PowerState): StateDelta | null {
    if (powerState === this.powerState) return null;
    const previous = this.powerState;
    this.powerState = powerState;
    return this.commit({ field: 'powerState', previous, value: powerState, version: 0 });
  }

  private commit(delta: StateDelta): StateDelta {
    this.globalVersion++;
    this.lastUpdated = Date.now();

    const committed: StateDelta = { ...delta, version: this.globalVersion };
    this.notifyListeners(committed);
    return committed;
  }

  private assertRoute(output: number, input: number | null): void {
    if (!Number.isInteger(output) || output < 1 || output > this.layout.numOutputs) {
      throw new StateRangeError(`output ${output}`, this.layout.numOutputs);
    }
    if (input !== null && (!Number.isInteger(input) || input < 1 || input > this.layout.numInputs)) {
      throw new StateRangeError(`input ${input}`, this.layout.numInputs);
    }
  }

  // ---------------------------------------------------------------------------
  // Change Listeners
  // ---------------------------------------------------------------------------

  addListener(listener: StateChangeListener): void {
    this.listeners.add(listener);
  }

  removeListener(listener: StateChangeListener): void {
    this.listeners.delete(listener);
  }

  private notifyListeners(delta: StateDelta): void {
    for (const listener of this.listeners) {
      try {
        listener(delta);
      } catch (error) {
        // One listener failure shouldn't affect others
        this.logger.error({ err: error, field: delta.field }, 'State listener error');
      }
    }
  }
}

// -----------------------------------------------------------------------------
// Utilities
// -----------------------------------------------------------------------------

/**
 * Plain-object view of a routing table, keyed by output index.
 */
export function routingToRecord(routing: RoutingTable): Record<number, number | null> {
  const record: Record<number, number | null> = {};
  for (const [output, input] of [...routing.entries()].sort(([a], [b]) => a - b)) {
    record[output] = input;
  }
  return record;
}

// -----------------------------------------------------------------------------
// Errors
// -----------------------------------------------------------------------------

export class StateRangeError extends Error {
  constructor(
    public readonly subject: string,
    public readonly max: number
  ) {
    super(`State ${subject} lies outside 1-${max}`);
    this.name = 'StateRangeError';
  }
}
