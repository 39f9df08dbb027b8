/**
 * Health Checks
 *
 * Liveness, readiness, and device health reports.
 */

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

export const HealthStatus = {
  HEALTHY: 'healthy',
  DEGRADED: 'degraded',
  UNHEALTHY: 'unhealthy',
} as const;

export type HealthStatus = (typeof HealthStatus)[keyof typeof HealthStatus];

export interface DependencyHealth {
  name: string;
  status: HealthStatus;
  latencyMs?: number;
  lastCheck: number;
  error?: string;
  metadata?: Record<string, unknown>;
}

export interface HealthReport {
  status: HealthStatus;
  timestamp: number;
  uptime: number;
  version: string;
  dependencies: DependencyHealth[];
}

export interface LivenessReport {
  alive: boolean;
  timestamp: number;
}

export interface ReadinessReport {
  ready: boolean;
  timestamp: number;
  reason?: string;
}

export type HealthChecker = () => Promise<DependencyHealth>;

/**
 * What the device checker needs to know about the polling side.
 */
export interface DeviceHealthSource {
  isConnected(): boolean;
  getLastRefresh(): { ok: boolean; completedAt: number; error?: string } | null;
  hasSucceeded(): boolean;
}

const CHECK_TIMEOUT_MS = 5000;

// -----------------------------------------------------------------------------
// Health Manager
// -----------------------------------------------------------------------------

export class HealthManager {
  private readonly startTime: number;
  private readonly version: string;
  private checkers: Map<string, HealthChecker> = new Map();
  private lastCheckResults: Map<string, DependencyHealth> = new Map();
  private checkInterval: ReturnType<typeof setInterval> | null = null;

  constructor(version = '0.1.0') {
    this.startTime = Date.now();
    this.version = version;
  }

  // ---------------------------------------------------------------------------
  // Checker Registration
  // ---------------------------------------------------------------------------

  registerChecker(name: string, checker: HealthChecker): void {
    this.checkers.set(name, checker);
  }

  unregisterChecker(name: string): void {
    this.checkers.delete(name);
    this.lastCheckResults.delete(name);
  }

  // ---------------------------------------------------------------------------
  // Health Checks
  // ---------------------------------------------------------------------------

  /**
   * Is the process alive and responsive.
   */
  liveness(): LivenessReport {
    return {
      alive: true,
      timestamp: Date.now(),
    };
  }

  /**
   * Ready once no dependency reports unhealthy.
   */
  async readiness(): Promise<ReadinessReport> {
    const results = await this.runAllChecks();
    const unhealthy = results.filter((r) => r.status === HealthStatus.UNHEALTHY);

    if (unhealthy.length > 0) {
      return {
        ready: false,
        timestamp: Date.now(),
        reason: `Unhealthy dependencies: ${unhealthy.map((d) => d.name).join(', ')}`,
      };
    }

    return {
      ready: true,
      timestamp: Date.now(),
    };
  }

  async health(): Promise<HealthReport> {
    const dependencies = await this.runAllChecks();

    let status: HealthStatus = HealthStatus.HEALTHY;
    if (dependencies.some((d) => d.status === HealthStatus.UNHEALTHY)) {
      status = HealthStatus.UNHEALTHY;
    } else if (dependencies.some((d) => d.status === HealthStatus.DEGRADED)) {
      status = HealthStatus.DEGRADED;
    }

    return {
      status,
      timestamp: Date.now(),
      uptime: this.getUptime(),
      version: this.version,
      dependencies,
    };
  }

  private async runAllChecks(): Promise<DependencyHealth[]> {
    const results: DependencyHealth[] = [];

    for (const [name, checker] of this.checkers) {
      const startTime = Date.now();
      let result: DependencyHealth;

      try {
        result = await withTimeout(checker(), CHECK_TIMEOUT_MS, name);
        result.latencyMs = Date.now() - startTime;
      } catch (error) {
        result = {
          name,
          status: HealthStatus.UNHEALTHY,
          lastCheck: Date.now(),
          error: error instanceof Error ? error.message : 'Check failed',
        };
      }

      results.push(result);
      this.lastCheckResults.set(name, result);
    }

    return results;
  }

  // ---------------------------------------------------------------------------
  // Background Checks
  // ---------------------------------------------------------------------------

  startBackgroundChecks(intervalMs = 30000): void {
    if (this.checkInterval) {
      return;
    }

    this.checkInterval = setInterval(() => {
      void this.runAllChecks();
    }, intervalMs);

    void this.runAllChecks();
  }

  stopBackgroundChecks(): void {
    if (this.checkInterval) {
      clearInterval(this.checkInterval);
      this.checkInterval = null;
    }
  }

  /**
   * Cached results from the last check.
   */
  getLastResults(): DependencyHealth[] {
    return Array.from(this.lastCheckResults.values());
  }

  getUptime(): number {
    return Date.now() - this.startTime;
  }
}

function withTimeout<T>(promise: Promise<T>, ms: number, name: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new Error(`Health check timeout for ${name}`));
    }, ms);

    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}

// -----------------------------------------------------------------------------
// Built-in Health Checkers
// -----------------------------------------------------------------------------

/**
 * Device health from the polling side.
 *
 * - unhealthy: no refresh has ever succeeded
 * - degraded: socket down or the last refresh failed
 * - healthy: otherwise
 */
export function createDeviceChecker(getSource: () => DeviceHealthSource | null): HealthChecker {
  return async () => {
    const source = getSource();

    if (!source) {
      return {
        name: 'device',
        status: HealthStatus.UNHEALTHY,
        lastCheck: Date.now(),
        error: 'Coordinator not initialised',
      };
    }

    const connected = source.isConnected();
    const last = source.getLastRefresh();
    const metadata = {
      connected,
      lastRefreshAt: last?.completedAt ?? null,
      lastRefreshOk: last?.ok ?? null,
    };

    if (!source.hasSucceeded()) {
      return {
        name: 'device',
        status: HealthStatus.UNHEALTHY,
        lastCheck: Date.now(),
        error: last?.error ?? 'No successful refresh yet',
        metadata,
      };
    }

    if (!connected || (last !== null && !last.ok)) {
      return {
        name: 'device',
        status: HealthStatus.DEGRADED,
        lastCheck: Date.now(),
        error: last?.error ?? 'Not connected',
        metadata,
      };
    }

    return {
      name: 'device',
      status: HealthStatus.HEALTHY,
      lastCheck: Date.now(),
      metadata,
    };
  };
}
