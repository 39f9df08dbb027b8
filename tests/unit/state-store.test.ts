/**
 * State Store Unit Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { MatrixStateStore, StateRangeError, routingToRecord } from '../../src/core/state/store.js';
import { PowerState } from '../../src/core/protocol/types.js';

describe('MatrixStateStore', () => {
  let store: MatrixStateStore;

  beforeEach(() => {
    store = new MatrixStateStore({ numInputs: 4, numOutputs: 3 });
  });

  describe('initial state', () => {
    it('should start empty and powered on', () => {
      const status = store.getStatus();

      expect(status.outputs.size).toBe(0);
      expect(status.model).toBe('');
      expect(status.firmware).toBe('');
      expect(status.locked).toBe(false);
      expect(status.powerState).toBe(PowerState.ON);
      expect(store.version).toBe(0);
      expect(store.updatedAt).toBeNull();
    });
  });

  describe('routing', () => {
    it('should set and get an output', () => {
      store.setOutput(2, 4);
      expect(store.getOutput(2)).toBe(4);
      expect(store.getOutput(1)).toBeUndefined();
    });

    it('should store null for an output that is off', () => {
      store.setOutput(1, null);
      expect(store.getOutput(1)).toBeNull();
    });

    it('should return a delta with the previous value', () => {
      store.setOutput(1, 2);
      const delta = store.setOutput(1, 3);

      expect(delta).toEqual({ field: 'output', output: 1, previous: 2, value: 3, version: 2 });
    });

    it('should not update version if value unchanged', () => {
      store.setOutput(1, 2);
      expect(store.setOutput(1, 2)).toBeNull();
      expect(store.version).toBe(1);
    });

    it('should reject indices outside the layout', () => {
      expect(() => store.setOutput(4, 1)).toThrow(StateRangeError);
      expect(() => store.setOutput(0, 1)).toThrow(StateRangeError);
      expect(() => store.setOutput(1, 5)).toThrow('State input 5 lies outside 1-4');
      expect(store.version).toBe(0);
    });

    it('should set every output', () => {
      const deltas = store.setAllOutputs((output) => (output === 2 ? null : 1));

      expect(deltas).toHaveLength(3);
      expect(routingToRecord(store.getRouting())).toEqual({ 1: 1, 2: null, 3: 1 });
    });

    it('should merge a routing table', () => {
      store.setOutput(1, 1);
      store.setOutput(2, 2);

      const deltas = store.applyRouting(new Map([[1, 1], [2, 3]]));

      expect(deltas).toHaveLength(1);
      expect(store.getOutput(2)).toBe(3);
    });
  });

  describe('snapshots', () => {
    it('should hand out copies that later writes do not affect', () => {
      store.setOutput(1, 1);
      const before = store.getStatus();

      store.setOutput(1, 2);

      expect(before.outputs.get(1)).toBe(1);
      expect(store.getStatus().outputs.get(1)).toBe(2);
    });

    it('should include the version in a snapshot', () => {
      store.setModel('MX-0808');
      const snapshot = store.getSnapshot();

      expect(snapshot.version).toBe(1);
      expect(snapshot.status.model).toBe('MX-0808');
    });
  });

  describe('device fields', () => {
    it('should track identity, lock and power', () => {
      store.setModel('MX-0808');
      store.setFirmware('V1.06');
      store.setLocked(true);
      store.setPowerState(PowerState.STANDBY);

      const status = store.getStatus();
      expect(status.model).toBe('MX-0808');
      expect(status.firmware).toBe('V1.06');
      expect(status.locked).toBe(true);
      expect(status.powerState).toBe(PowerState.STANDBY);
      expect(store.version).toBe(4);
    });

    it('should skip unchanged device fields', () => {
      expect(store.setLocked(false)).toBeNull();
      expect(store.setPowerState(PowerState.ON)).toBeNull();
      expect(store.setModel('')).toBeNull();
    });
  });

  describe('listeners', () => {
    it('should notify listeners of each change', () => {
      const listener = vi.fn();
      store.addListener(listener);

      store.setOutput(3, 2);
      store.setLocked(true);

      expect(listener).toHaveBeenCalledTimes(2);
      expect(listener).toHaveBeenNthCalledWith(2, { field: 'locked', previous: false, value: true, version: 2 });
    });

    it('should stop notifying removed listeners', () => {
      const listener = vi.fn();
      store.addListener(listener);
      store.removeListener(listener);

      store.setOutput(1, 1);

      expect(listener).not.toHaveBeenCalled();
    });

    it('should keep notifying when one listener throws', () => {
      const failing = vi.fn(() => {
        throw new Error('listener failure');
      });
      const healthy = vi.fn();
      store.addListener(failing);
      store.addListener(healthy);

      store.setOutput(1, 1);

      expect(healthy).toHaveBeenCalledTimes(1);
    });
  });
});

describe('routingToRecord', () => {
  it('should order entries by output', () => {
    const record = routingToRecord(new Map([[3, 1], [1, null]]));
    expect(Object.entries(record)).toEqual([['1', null], ['3', 1]]);
  });
});
