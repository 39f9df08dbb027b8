/**
 * Polling Coordinator Unit Tests
 *
 * Runs the coordinator against an in-memory client.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { PollingCoordinator } from '../../src/core/coordinator/coordinator.js';
import type { CoordinatorEvent } from '../../src/core/coordinator/types.js';
import type { MatrixClientEvent, MatrixClientEventHandler, MatrixControl } from '../../src/adapters/matrix/types.js';
import {
  createClearPresetCommand,
  createRecallPresetCommand,
  createRouteCommand,
  createSavePresetCommand,
} from '../../src/core/protocol/commands.js';
import { CommandError, ConnectionError } from '../../src/core/protocol/errors.js';
import { PowerState, type MatrixStatus } from '../../src/core/protocol/types.js';
import { MatrixStateStore } from '../../src/core/state/store.js';

// -----------------------------------------------------------------------------
// Fake Client
// -----------------------------------------------------------------------------

class FakeMatrixClient implements MatrixControl {
  readonly layout = { numInputs: 4, numOutputs: 4 };
  readonly store = new MatrixStateStore(this.layout);
  private handlers = new Set<MatrixClientEventHandler>();

  /** What the device "reports" on the next status query */
  statusResponse: () => Promise<Map<number, number | null>> = async () => new Map([[1, 2], [2, 2]]);
  powerResponse: () => Promise<PowerState> = async () => PowerState.ON;
  lockResponse: () => Promise<boolean> = async () => false;

  isConnected = vi.fn(() => true);
  getCachedStatus = (): MatrixStatus => this.store.getStatus();
  onEvent = (handler: MatrixClientEventHandler): void => {
    this.handlers.add(handler);
  };
  offEvent = (handler: MatrixClientEventHandler): void => {
    this.handlers.delete(handler);
  };

  testConnection = vi.fn(async () => ({ model: 'MX-0404', firmware: 'V2.00' }));
  disconnect = vi.fn(async () => undefined);

  getModel = vi.fn(async () => 'MX-0404');
  getFirmware = vi.fn(async () => 'V2.00');
  getStatus = vi.fn(async (): Promise<MatrixStatus> => {
    this.store.applyRouting(await this.statusResponse());
    return this.store.getStatus();
  });
  getOutputStatus = vi.fn(async (output: number) => this.store.getOutput(output) ?? null);
  getPowerState = vi.fn(async () => {
    const state = await this.powerResponse();
    this.store.setPowerState(state);
    return state;
  });
  getLockStatus = vi.fn(async () => {
    const locked = await this.lockResponse();
    this.store.setLocked(locked);
    return locked;
  });

  route = vi.fn(async (input: number, output: number) => {
    createRouteCommand(this.layout, input, output);
    this.store.setOutput(output, input);
  });
  routeToAll = vi.fn(async (input: number) => {
    this.store.setAllOutputs(() => input);
  });
  switchOffOutput = vi.fn(async (output: number) => {
    this.store.setOutput(output, null);
  });
  switchOnOutput = vi.fn(async (_output: number) => undefined);
  switchOffAll = vi.fn(async () => {
    this.store.setAllOutputs(() => null);
  });
  allThrough = vi.fn(async () => {
    this.store.setAllOutputs((output) => output);
  });

  savePreset = vi.fn(async (preset: number) => {
    createSavePresetCommand(preset);
  });
  recallPreset = vi.fn(async (preset: number) => {
    createRecallPresetCommand(preset);
  });
  clearPreset = vi.fn(async (preset: number) => {
    createClearPresetCommand(preset);
  });

  powerOn = vi.fn(async () => undefined);
  powerOff = vi.fn(async () => undefined);
  standby = vi.fn(async () => undefined);
  lockPanel = vi.fn(async () => undefined);
  unlockPanel = vi.fn(async () => undefined);

  emit(event: MatrixClientEvent): void {
    for (const handler of this.handlers) {
      handler(event);
    }
  }
}

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

// -----------------------------------------------------------------------------
// Tests
// -----------------------------------------------------------------------------

describe('PollingCoordinator', () => {
  let client: FakeMatrixClient;
  let coordinator: PollingCoordinator;
  let events: CoordinatorEvent[];

  beforeEach(() => {
    client = new FakeMatrixClient();
    coordinator = new PollingCoordinator(client, {
      interval: 30,
      names: { inputs: { '1': 'Camera' }, outputs: { '2': 'Projector' }, presets: { '0': 'Lecture' } },
    });
    events = [];
    coordinator.onEvent((event) => events.push(event));
  });

  afterEach(async () => {
    await coordinator.dispose();
  });

  describe('construction', () => {
    it('should reject intervals outside 5-300 seconds', () => {
      expect(() => new PollingCoordinator(client, { interval: 4 })).toThrow(
        'Poll interval must be 5-300 seconds, got 4'
      );
      expect(() => new PollingCoordinator(client, { interval: 301 })).toThrow();
    });

    it('should start with no refresh and no preset', () => {
      expect(coordinator.lastRefresh).toBeNull();
      expect(coordinator.lastUpdateSuccess).toBe(false);
      expect(coordinator.hasSucceeded()).toBe(false);
      expect(coordinator.currentPreset).toBeNull();
    });
  });

  describe('refresh', () => {
    it('should fetch status, power and lock in order', async () => {
      client.powerResponse = async () => PowerState.STANDBY;
      client.lockResponse = async () => true;

      const result = await coordinator.requestRefresh();

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.status.outputs.get(1)).toBe(2);
      expect(result.status.outputs.get(3)).toBeUndefined();
      expect(result.power).toEqual({ ok: true, value: PowerState.STANDBY });
      expect(result.lock).toEqual({ ok: true, value: true });
      expect(result.status.powerState).toBe(PowerState.STANDBY);
      expect(result.status.locked).toBe(true);

      expect(client.getStatus.mock.invocationCallOrder[0]).toBeLessThan(
        client.getPowerState.mock.invocationCallOrder[0] ?? 0
      );
      expect(client.getPowerState.mock.invocationCallOrder[0]).toBeLessThan(
        client.getLockStatus.mock.invocationCallOrder[0] ?? 0
      );

      expect(coordinator.lastUpdateSuccess).toBe(true);
      expect(coordinator.hasSucceeded()).toBe(true);
      expect(events.map((e) => e.type)).toEqual(['refreshed']);
    });

    it('should report a failed status fetch and keep the cache', async () => {
      await coordinator.requestRefresh();
      client.statusResponse = async () => {
        throw new ConnectionError('Timeout waiting for response');
      };

      const result = await coordinator.requestRefresh();

      expect(result).toMatchObject({ ok: false, error: 'Timeout waiting for response' });
      expect(result.status.outputs.get(1)).toBe(2);
      expect(client.getPowerState).toHaveBeenCalledTimes(1);
      expect(coordinator.lastUpdateSuccess).toBe(false);
      expect(coordinator.hasSucceeded()).toBe(true);
      expect(events[1]).toEqual({ type: 'refresh_failed', error: 'Timeout waiting for response' });
    });

    it('should overwrite the cache on the next successful refresh', async () => {
      client.statusResponse = async () => {
        throw new ConnectionError('Timeout waiting for response');
      };
      await coordinator.requestRefresh();

      client.statusResponse = async () => new Map([[1, 4]]);
      const result = await coordinator.requestRefresh();

      expect(result.ok).toBe(true);
      expect(coordinator.status.outputs.get(1)).toBe(4);
    });

    it('should degrade best-effort failures without failing the refresh', async () => {
      client.store.setPowerState(PowerState.OFF);
      client.powerResponse = async () => {
        throw new ConnectionError('Timeout waiting for response');
      };

      const result = await coordinator.requestRefresh();

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.power).toEqual({ ok: false, error: 'Timeout waiting for response' });
      expect(result.lock).toEqual({ ok: true, value: false });
      expect(result.status.powerState).toBe(PowerState.OFF);
      expect(client.getLockStatus).toHaveBeenCalledTimes(1);
    });
  });

  describe('coalescing', () => {
    it('should collapse requests during a refresh into one follow-up', async () => {
      const gate = deferred();
      client.statusResponse = async () => {
        await gate.promise;
        return new Map([[1, 1]]);
      };

      const first = coordinator.requestRefresh();
      const second = coordinator.requestRefresh();
      const third = coordinator.requestRefresh();

      expect(second).toBe(third);
      expect(second).not.toBe(first);
      expect(client.getStatus).toHaveBeenCalledTimes(1);
      expect(coordinator.refreshing).toBe(true);

      gate.resolve();
      await Promise.all([first, second, third]);

      expect(client.getStatus).toHaveBeenCalledTimes(2);
      expect(coordinator.refreshing).toBe(false);
    });

    it('should still run the follow-up when the refresh in flight rejects', async () => {
      const gate = deferred();
      client.statusResponse = async () => {
        await gate.promise;
        return new Map([[1, 3]]);
      };

      const cached = client.getCachedStatus;
      let calls = 0;
      client.getCachedStatus = () => {
        calls++;
        if (calls === 1) {
          throw new Error('cache unavailable');
        }
        return cached();
      };

      const first = coordinator.requestRefresh();
      const second = coordinator.requestRefresh();
      gate.resolve();

      await expect(first).rejects.toThrow('cache unavailable');
      await expect(second).resolves.toMatchObject({ ok: true });
      await expect(coordinator.requestRefresh()).resolves.toMatchObject({ ok: true });
      expect(client.getStatus).toHaveBeenCalledTimes(3);
    });

    it('should start a fresh refresh once the previous one settled', async () => {
      await coordinator.requestRefresh();
      await coordinator.requestRefresh();

      expect(client.getStatus).toHaveBeenCalledTimes(2);
    });
  });

  describe('scheduled refresh', () => {
    afterEach(() => {
      vi.useRealTimers();
    });

    it('should refresh once per interval', async () => {
      vi.useFakeTimers();
      coordinator.start();
      expect(coordinator.running).toBe(true);

      await vi.advanceTimersByTimeAsync(29_999);
      expect(client.getStatus).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(1);
      expect(client.getStatus).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(30_000);
      expect(client.getStatus).toHaveBeenCalledTimes(2);

      await coordinator.stop();
      expect(coordinator.running).toBe(false);

      await vi.advanceTimersByTimeAsync(60_000);
      expect(client.getStatus).toHaveBeenCalledTimes(2);
    });
  });

  describe('mutating operations', () => {
    it('should route then refresh', async () => {
      client.statusResponse = async () => new Map();

      const result = await coordinator.route(3, 2);

      expect(client.route).toHaveBeenCalledWith(3, 2);
      expect(client.getStatus).toHaveBeenCalledTimes(1);
      expect(result.ok).toBe(true);
      expect(coordinator.status.outputs.get(2)).toBe(3);
    });

    it('should reject invalid arguments without refreshing', async () => {
      await expect(coordinator.route(0, 1)).rejects.toThrow(CommandError);
      await expect(coordinator.route(5, 1)).rejects.toThrow(CommandError);

      expect(client.getStatus).not.toHaveBeenCalled();
    });

    it('should resolve with a failed result when only the refresh fails', async () => {
      client.statusResponse = async () => {
        throw new ConnectionError('Connection refused');
      };

      const result = await coordinator.switchOffAll();

      expect(result).toMatchObject({ ok: false, error: 'Connection refused' });
      expect(coordinator.status.outputs.get(1)).toBeNull();
    });

    it('should map panel lock and standby toggles to commands', async () => {
      await coordinator.setPanelLock(true);
      await coordinator.setPanelLock(false);
      await coordinator.setStandby(true);
      await coordinator.setStandby(false);

      expect(client.lockPanel).toHaveBeenCalledTimes(1);
      expect(client.unlockPanel).toHaveBeenCalledTimes(1);
      expect(client.standby).toHaveBeenCalledTimes(1);
      expect(client.powerOn).toHaveBeenCalledTimes(1);
      expect(client.getStatus).toHaveBeenCalledTimes(4);
    });

    it('should pass every switching operation through', async () => {
      await coordinator.routeToAll(2);
      await coordinator.switchOffOutput(1);
      await coordinator.switchOnOutput(1);
      await coordinator.allThrough();
      await coordinator.powerOff();

      expect(client.routeToAll).toHaveBeenCalledWith(2);
      expect(client.switchOffOutput).toHaveBeenCalledWith(1);
      expect(client.switchOnOutput).toHaveBeenCalledWith(1);
      expect(client.allThrough).toHaveBeenCalledTimes(1);
      expect(client.powerOff).toHaveBeenCalledTimes(1);
    });
  });

  describe('current preset', () => {
    it('should track a recalled preset', async () => {
      await coordinator.recallPreset(3);

      expect(coordinator.currentPreset).toBe(3);
      expect(events).toContainEqual({ type: 'preset_changed', preset: 3, previous: null });
    });

    it('should track a saved preset', async () => {
      await coordinator.savePreset(5);
      expect(coordinator.currentPreset).toBe(5);
    });

    it('should not change the preset when recall fails', async () => {
      await expect(coordinator.recallPreset(10)).rejects.toThrow(CommandError);
      expect(coordinator.currentPreset).toBeNull();
    });

    it('should reset when the current preset is cleared', async () => {
      await coordinator.recallPreset(3);
      await coordinator.clearPreset(4);
      expect(coordinator.currentPreset).toBe(3);

      await coordinator.clearPreset(3);
      expect(coordinator.currentPreset).toBeNull();
    });

    it('should reset on reconnect but not on the first connect', async () => {
      await coordinator.recallPreset(3);

      client.emit({ type: 'connected', reconnect: false });
      expect(coordinator.currentPreset).toBe(3);

      client.emit({ type: 'connected', reconnect: true });
      expect(coordinator.currentPreset).toBeNull();
    });

    it('should reset on request', async () => {
      await coordinator.recallPreset(1);
      coordinator.resetCurrentPreset();

      expect(coordinator.currentPreset).toBeNull();
      expect(events.filter((e) => e.type === 'preset_changed')).toHaveLength(2);
    });

    it('should not infer a preset from polls', async () => {
      await coordinator.requestRefresh();
      expect(coordinator.currentPreset).toBeNull();
    });
  });

  describe('display names', () => {
    it('should return custom names where configured', () => {
      expect(coordinator.getInputName(1)).toBe('Camera');
      expect(coordinator.getOutputName(2)).toBe('Projector');
      expect(coordinator.getPresetName(0)).toBe('Lecture');
    });

    it('should fall back to numbered names', () => {
      expect(coordinator.getInputName(2)).toBe('Input 2');
      expect(coordinator.getOutputName(1)).toBe('Output 1');
      expect(coordinator.getPresetName(7)).toBe('Preset 7');
    });
  });
});
