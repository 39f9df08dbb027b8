/**
 * Health Check Unit Tests
 */

import { describe, it, expect } from 'vitest';
import {
  HealthManager,
  HealthStatus,
  createDeviceChecker,
  type DeviceHealthSource,
} from '../../src/observability/health.js';

function source(overrides: Partial<DeviceHealthSource> = {}): DeviceHealthSource {
  return {
    isConnected: () => true,
    getLastRefresh: () => ({ ok: true, completedAt: 1000 }),
    hasSucceeded: () => true,
    ...overrides,
  };
}

describe('createDeviceChecker', () => {
  it('should be unhealthy without a source', async () => {
    const result = await createDeviceChecker(() => null)();
    expect(result.status).toBe(HealthStatus.UNHEALTHY);
  });

  it('should be unhealthy before the first successful refresh', async () => {
    const checker = createDeviceChecker(() =>
      source({
        hasSucceeded: () => false,
        getLastRefresh: () => ({ ok: false, completedAt: 1000, error: 'Connection refused' }),
      })
    );

    const result = await checker();

    expect(result.status).toBe(HealthStatus.UNHEALTHY);
    expect(result.error).toBe('Connection refused');
  });

  it('should be degraded when the last refresh failed', async () => {
    const checker = createDeviceChecker(() =>
      source({ getLastRefresh: () => ({ ok: false, completedAt: 2000, error: 'Timeout waiting for response' }) })
    );

    const result = await checker();

    expect(result.status).toBe(HealthStatus.DEGRADED);
    expect(result.metadata).toEqual({ connected: true, lastRefreshAt: 2000, lastRefreshOk: false });
  });

  it('should be degraded when the socket is down', async () => {
    const result = await createDeviceChecker(() => source({ isConnected: () => false }))();

    expect(result.status).toBe(HealthStatus.DEGRADED);
    expect(result.error).toBe('Not connected');
  });

  it('should be healthy when connected and refreshed', async () => {
    const result = await createDeviceChecker(() => source())();
    expect(result.status).toBe(HealthStatus.HEALTHY);
  });
});

describe('HealthManager', () => {
  it('should report the worst dependency status', async () => {
    const manager = new HealthManager('9.9.9');
    manager.registerChecker('device', createDeviceChecker(() => source({ isConnected: () => false })));

    const report = await manager.health();

    expect(report.status).toBe(HealthStatus.DEGRADED);
    expect(report.version).toBe('9.9.9');
    expect(report.dependencies).toHaveLength(1);
  });

  it('should not be ready while a dependency is unhealthy', async () => {
    const manager = new HealthManager();
    manager.registerChecker('device', createDeviceChecker(() => null));

    const readiness = await manager.readiness();

    expect(readiness).toMatchObject({ ready: false, reason: 'Unhealthy dependencies: device' });
  });

  it('should treat a throwing checker as unhealthy', async () => {
    const manager = new HealthManager();
    manager.registerChecker('broken', async () => {
      throw new Error('check exploded');
    });

    const report = await manager.health();

    expect(report.dependencies[0]).toMatchObject({ name: 'broken', status: HealthStatus.UNHEALTHY, error: 'check exploded' });
  });

  it('should always be alive', () => {
    expect(new HealthManager().liveness().alive).toBe(true);
  });
});
