/**
 * Matrix Client Integration Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MatrixClient } from '../../src/adapters/matrix/client.js';
import { MatrixSimulator } from '../../src/adapters/matrix/simulator.js';
import type { MatrixClientEvent } from '../../src/adapters/matrix/types.js';
import { CommandError } from '../../src/core/protocol/errors.js';
import { PowerState } from '../../src/core/protocol/types.js';
import { routingToRecord } from '../../src/core/state/store.js';

const TIMINGS = { commandDelay: 5, responseTimeout: 300, drainTimeout: 30 };

describe('MatrixClient', () => {
  let simulator: MatrixSimulator;
  let client: MatrixClient;

  beforeEach(async () => {
    simulator = new MatrixSimulator({ numInputs: 4, numOutputs: 4 });
    await simulator.start();

    client = new MatrixClient({
      host: '127.0.0.1',
      port: simulator.port,
      numInputs: 4,
      numOutputs: 4,
      connectTimeout: 1000,
      timings: TIMINGS,
    });
  });

  afterEach(async () => {
    await client.disconnect();
    await simulator.stop();
  });

  describe('construction', () => {
    it('should reject port counts outside 1-32', () => {
      expect(() => new MatrixClient({ host: '127.0.0.1', numInputs: 0 })).toThrow(CommandError);
      expect(() => new MatrixClient({ host: '127.0.0.1', numOutputs: 33 })).toThrow(
        'Number of outputs must be 1-32, got 33'
      );
    });
  });

  describe('queries', () => {
    it('should identify the device', async () => {
      const info = await client.testConnection();

      expect(info).toEqual({ model: 'MX-0808', firmware: 'V1.06' });
      expect(client.getCachedStatus().model).toBe('MX-0808');
    });

    it.each(['short', 'long', 'bare'] as const)('should parse a %s status reply', async (format) => {
      simulator.setStatusFormat(format);
      simulator.setRoute(3, 1);
      simulator.setRoute(0, 4);

      const status = await client.getStatus();

      expect(routingToRecord(status.outputs)).toEqual({ 1: 3, 2: 2, 3: 3, 4: null });
    });

    it('should query a single output', async () => {
      simulator.setRoute(4, 2);

      await expect(client.getOutputStatus(2)).resolves.toBe(4);
      expect(client.getCachedStatus().outputs.get(2)).toBe(4);
    });

    it('should read power and lock state', async () => {
      simulator.setPowerState(PowerState.STANDBY);
      simulator.setLocked(true);

      await expect(client.getPowerState()).resolves.toBe(PowerState.STANDBY);
      await expect(client.getLockStatus()).resolves.toBe(true);

      simulator.setLocked(false);
      await expect(client.getLockStatus()).resolves.toBe(false);
    });
  });

  describe('switching', () => {
    it('should route and update the cache without a status query', async () => {
      await client.route(2, 3);

      expect(simulator.getRoute(3)).toBe(2);
      expect(client.getCachedStatus().outputs.get(3)).toBe(2);
      expect(simulator.getCommands()).toEqual(['02V03.']);
    });

    it('should reject an out-of-range route without sending anything', async () => {
      await expect(client.route(5, 1)).rejects.toBeInstanceOf(CommandError);

      expect(simulator.getCommands()).toEqual([]);
      expect(client.getMetrics().commandsSent).toBe(0);
    });

    it('should switch an output off and back on', async () => {
      simulator.setRoute(4, 1);

      await client.switchOffOutput(1);
      expect(simulator.getRoute(1)).toBe(0);
      expect(client.getCachedStatus().outputs.get(1)).toBeNull();

      await client.switchOnOutput(1);
      expect(simulator.getRoute(1)).toBe(4);
    });

    it('should apply bulk commands to every output', async () => {
      await client.routeToAll(2);
      expect(routingToRecord(client.getCachedStatus().outputs)).toEqual({ 1: 2, 2: 2, 3: 2, 4: 2 });

      await client.switchOffAll();
      expect(routingToRecord(client.getCachedStatus().outputs)).toEqual({ 1: null, 2: null, 3: null, 4: null });

      await client.allThrough();
      expect(routingToRecord(client.getCachedStatus().outputs)).toEqual({ 1: 1, 2: 2, 3: 3, 4: 4 });
      expect([...simulator.getRouting().values()]).toEqual([1, 2, 3, 4]);
    });
  });

  describe('presets', () => {
    it('should save, recall and clear a preset', async () => {
      await client.route(4, 1);
      await client.savePreset(3);
      expect(simulator.hasPreset(3)).toBe(true);

      await client.route(1, 1);
      await client.recallPreset(3);
      const status = await client.getStatus();
      expect(status.outputs.get(1)).toBe(4);

      await client.clearPreset(3);
      expect(simulator.hasPreset(3)).toBe(false);
    });

    it('should reject a preset above 9', async () => {
      await expect(client.recallPreset(10)).rejects.toBeInstanceOf(CommandError);
    });
  });

  describe('power and panel', () => {
    it('should update power and lock state', async () => {
      await client.standby();
      expect(simulator.getPowerState()).toBe(PowerState.STANDBY);
      expect(client.getCachedStatus().powerState).toBe(PowerState.STANDBY);

      await client.powerOff();
      expect(client.getCachedStatus().powerState).toBe(PowerState.OFF);

      await client.powerOn();
      expect(simulator.getPowerState()).toBe(PowerState.ON);

      await client.lockPanel();
      expect(simulator.isLocked()).toBe(true);
      expect(client.getCachedStatus().locked).toBe(true);

      await client.unlockPanel();
      expect(client.getCachedStatus().locked).toBe(false);
    });
  });

  describe('connection', () => {
    it('should report a reconnect after the device drops the link', async () => {
      const events: MatrixClientEvent[] = [];
      client.onEvent((event) => {
        if (event.type === 'connected' || event.type === 'disconnected') {
          events.push(event);
        }
      });

      await client.getModel();

      const dropped = new Promise<void>((resolve) => {
        client.onEvent((event) => {
          if (event.type === 'disconnected') resolve();
        });
      });
      simulator.dropClients();
      await dropped;

      await client.getModel();

      expect(events.map((e) => e.type)).toEqual(['connected', 'disconnected', 'connected']);
      expect(events[2]).toEqual({ type: 'connected', reconnect: true });
      expect(client.getMetrics().reconnects).toBe(1);
    });

    it('should disconnect cleanly', async () => {
      await client.getModel();
      expect(client.isConnected()).toBe(true);

      await client.disconnect();

      expect(client.isConnected()).toBe(false);
    });
  });
});
