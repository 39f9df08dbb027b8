/**
 * Prometheus Metrics
 *
 * Metrics collection and export for monitoring.
 */

import {
  Registry,
  Counter,
  Gauge,
  Histogram,
  collectDefaultMetrics,
} from 'prom-client';

// -----------------------------------------------------------------------------
// Registry
// -----------------------------------------------------------------------------

const registry = new Registry();

// Collect default Node.js metrics (memory, CPU, etc.)
collectDefaultMetrics({ register: registry });

// -----------------------------------------------------------------------------
// Connection Metrics
// -----------------------------------------------------------------------------

export const connectionGauge = new Gauge({
  name: 'matrix_switcher_connected',
  help: 'Device connection state (1 = connected, 0 = disconnected)',
  registers: [registry],
});

export const connectionTotal = new Counter({
  name: 'matrix_switcher_connections_total',
  help: 'Total number of established device connections by kind',
  labelNames: ['kind'] as const,
  registers: [registry],
});

export const disconnectionTotal = new Counter({
  name: 'matrix_switcher_disconnections_total',
  help: 'Total number of device disconnections by reason',
  labelNames: ['reason'] as const,
  registers: [registry],
});

// -----------------------------------------------------------------------------
// Command Metrics
// -----------------------------------------------------------------------------

export const commandsTotal = new Counter({
  name: 'matrix_switcher_commands_total',
  help: 'Total commands exchanged by verb and status',
  labelNames: ['verb', 'status'] as const,
  registers: [registry],
});

export const commandDuration = new Histogram({
  name: 'matrix_switcher_command_duration_seconds',
  help: 'Command round-trip duration in seconds',
  labelNames: ['verb'] as const,
  buckets: [0.05, 0.1, 0.15, 0.2, 0.3, 0.5, 1, 2.5, 5, 10],
  registers: [registry],
});

// -----------------------------------------------------------------------------
// Refresh Metrics
// -----------------------------------------------------------------------------

export const refreshTotal = new Counter({
  name: 'matrix_switcher_refreshes_total',
  help: 'Total status refreshes by outcome',
  labelNames: ['outcome'] as const,
  registers: [registry],
});

export const refreshCoalescedTotal = new Counter({
  name: 'matrix_switcher_refresh_requests_coalesced_total',
  help: 'Refresh requests folded into a pending follow-up refresh',
  registers: [registry],
});

export const bestEffortFailures = new Counter({
  name: 'matrix_switcher_best_effort_failures_total',
  help: 'Failed best-effort status fetches by field',
  labelNames: ['field'] as const,
  registers: [registry],
});

// -----------------------------------------------------------------------------
// Export Functions
// -----------------------------------------------------------------------------

/**
 * Get metrics in Prometheus format.
 */
export async function getMetrics(): Promise<string> {
  return registry.metrics();
}

/**
 * Get content type for Prometheus endpoint.
 */
export function getContentType(): string {
  return registry.contentType;
}

// -----------------------------------------------------------------------------
// Convenience Functions
// -----------------------------------------------------------------------------

/**
 * Record an established connection.
 */
export function recordConnection(reconnect: boolean): void {
  connectionGauge.set(1);
  connectionTotal.labels(reconnect ? 'reconnect' : 'initial').inc();
}

/**
 * Record a disconnection event.
 */
export function recordDisconnection(reason = 'normal'): void {
  connectionGauge.set(0);
  disconnectionTotal.labels(reason).inc();
}

/**
 * Record a command exchange.
 */
export function recordCommand(verb: string, status: 'success' | 'failure'): void {
  commandsTotal.labels(verb, status).inc();
}

/**
 * Time a command exchange.
 */
export function timeCommand(verb: string): () => void {
  const end = commandDuration.labels(verb).startTimer();
  return () => {
    end();
  };
}

/**
 * Record a completed refresh.
 */
export function recordRefresh(outcome: 'success' | 'failure'): void {
  refreshTotal.labels(outcome).inc();
}

/**
 * Record a refresh request that joined a pending follow-up.
 */
export function recordCoalescedRefresh(): void {
  refreshCoalescedTotal.inc();
}

/**
 * Record a failed best-effort fetch.
 */
export function recordBestEffortFailure(field: 'power' | 'lock'): void {
  bestEffortFailures.labels(field).inc();
}
