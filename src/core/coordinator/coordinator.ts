/**
 * Polling Coordinator
 *
 * Keeps the client's cached state fresh. Scheduled and on-demand refreshes
 * share one pipeline: while a refresh runs, any number of further requests
 * collapse into a single follow-up refresh. Mutating operations go through
 * here so that each is followed by a refresh.
 */

import type { MatrixControl, MatrixClientEvent } from '../../adapters/matrix/types.js';
import { describeError } from '../protocol/errors.js';
import type { MatrixStatus } from '../protocol/types.js';
import { coordinatorLogger, withCorrelation } from '../../observability/logger.js';
import {
  recordBestEffortFailure,
  recordCoalescedRefresh,
  recordRefresh,
} from '../../observability/metrics.js';
import type {
  CoordinatorEvent,
  CoordinatorEventHandler,
  CoordinatorOptions,
  FetchOutcome,
  RefreshResult,
} from './types.js';
import {
  DEFAULT_COORDINATOR_OPTIONS,
  MAX_POLL_INTERVAL,
  MIN_POLL_INTERVAL,
} from './types.js';

// -----------------------------------------------------------------------------
// Polling Coordinator
// -----------------------------------------------------------------------------

export class PollingCoordinator {
  private readonly client: MatrixControl;
  private readonly options: CoordinatorOptions;
  private readonly logger = coordinatorLogger();

  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<RefreshResult> | null = null;
  private followUp: Promise<RefreshResult> | null = null;

  private lastResult: RefreshResult | null = null;
  private succeeded = false;
  private preset: number | null = null;

  private eventHandlers: Set<CoordinatorEventHandler> = new Set();
  private readonly clientHandler = (event: MatrixClientEvent): void => this.handleClientEvent(event);

  constructor(client: MatrixControl, options: Partial<CoordinatorOptions> = {}) {
    this.client = client;
    this.options = { ...DEFAULT_COORDINATOR_OPTIONS, ...options };

    const { interval } = this.options;
    if (!Number.isFinite(interval) || interval < MIN_POLL_INTERVAL || interval > MAX_POLL_INTERVAL) {
      throw new Error(`Poll interval must be ${MIN_POLL_INTERVAL}-${MAX_POLL_INTERVAL} seconds, got ${interval}`);
    }

    this.client.onEvent(this.clientHandler);
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Start the periodic refresh timer. The first scheduled refresh fires one
   * interval from now.
   */
  start(): void {
    if (this.timer) {
      return;
    }

    this.timer = setInterval(() => {
      this.requestRefresh().catch((error: unknown) => {
        this.logger.error({ err: error }, 'Scheduled refresh error');
      });
    }, this.options.interval * 1000);

    this.logger.debug({ interval: this.options.interval }, 'Polling started');
  }

  /**
   * Stop the timer and wait for any pending refresh to settle.
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      this.logger.debug('Polling stopped');
    }

    await (this.followUp ?? this.inFlight);
  }

  /**
   * Stop polling and stop listening to the client.
   */
  async dispose(): Promise<void> {
    await this.stop();
    this.client.offEvent(this.clientHandler);
    this.eventHandlers.clear();
  }

  get running(): boolean {
    return this.timer !== null;
  }

  // ---------------------------------------------------------------------------
  // Refresh
  // ---------------------------------------------------------------------------

  /**
   * Refresh now, or join the refresh that will run next.
   *
   * With no refresh running, one starts immediately. While one runs, the
   * first request schedules a follow-up and later requests share it, so a
   * burst of requests costs at most one extra round trip. Never rejects.
   */
  requestRefresh(): Promise<RefreshResult> {
    if (this.followUp) {
      recordCoalescedRefresh();
      return this.followUp;
    }

    const current = this.inFlight;
    if (!current) {
      return this.startRefresh();
    }

    const next = (): Promise<RefreshResult> => {
      this.followUp = null;
      return this.startRefresh();
    };

    this.followUp = current.then(next, next);

    return this.followUp;
  }

  get refreshing(): boolean {
    return this.inFlight !== null;
  }

  private startRefresh(): Promise<RefreshResult> {
    const run: Promise<RefreshResult> = this.runRefresh().finally(() => {
      if (this.inFlight === run) {
        this.inFlight = null;
      }
    });

    this.inFlight = run;
    return run;
  }

  private runRefresh(): Promise<RefreshResult> {
    return withCorrelation('refresh', async () => {
      try {
        await this.client.getStatus();
      } catch (error) {
        const message = describeError(error);
        this.logger.warn({ err: error }, 'Status refresh failed');
        recordRefresh('failure');

        const failed: RefreshResult = {
          ok: false,
          error: message,
          status: this.client.getCachedStatus(),
          completedAt: Date.now(),
        };
        this.lastResult = failed;
        this.emitEvent({ type: 'refresh_failed', error: message });
        return failed;
      }

      const power = await this.fetchBestEffort('power', () => this.client.getPowerState());
      const lock = await this.fetchBestEffort('lock', () => this.client.getLockStatus());

      recordRefresh('success');

      const result: Extract<RefreshResult, { ok: true }> = {
        ok: true,
        status: this.client.getCachedStatus(),
        power,
        lock,
        completedAt: Date.now(),
      };

      this.lastResult = result;
      this.succeeded = true;
      this.logger.debug('Refresh complete');
      this.emitEvent({ type: 'refreshed', result });
      return result;
    });
  }

  private async fetchBestEffort<T>(field: 'power' | 'lock', fetch: () => Promise<T>): Promise<FetchOutcome<T>> {
    try {
      return { ok: true, value: await fetch() };
    } catch (error) {
      this.logger.debug({ err: error, field }, 'Best-effort fetch failed');
      recordBestEffortFailure(field);
      return { ok: false, error: describeError(error) };
    }
  }

  // ---------------------------------------------------------------------------
  // Switching
  // ---------------------------------------------------------------------------

  route(input: number, output: number): Promise<RefreshResult> {
    return this.mutate(() => this.client.route(input, output));
  }

  routeToAll(input: number): Promise<RefreshResult> {
    return this.mutate(() => this.client.routeToAll(input));
  }

  switchOffOutput(output: number): Promise<RefreshResult> {
    return this.mutate(() => this.client.switchOffOutput(output));
  }

  switchOnOutput(output: number): Promise<RefreshResult> {
    return this.mutate(() => this.client.switchOnOutput(output));
  }

  switchOffAll(): Promise<RefreshResult> {
    return this.mutate(() => this.client.switchOffAll());
  }

  allThrough(): Promise<RefreshResult> {
    return this.mutate(() => this.client.allThrough());
  }

  // ---------------------------------------------------------------------------
  // Presets
  // ---------------------------------------------------------------------------

  /**
   * Recall a preset. The refresh that follows picks up whatever routing the
   * preset held.
   */
  recallPreset(preset: number): Promise<RefreshResult> {
    return this.mutate(async () => {
      await this.client.recallPreset(preset);
      this.setCurrentPreset(preset);
    });
  }

  savePreset(preset: number): Promise<RefreshResult> {
    return this.mutate(async () => {
      await this.client.savePreset(preset);
      this.setCurrentPreset(preset);
    });
  }

  clearPreset(preset: number): Promise<RefreshResult> {
    return this.mutate(async () => {
      await this.client.clearPreset(preset);
      if (this.preset === preset) {
        this.setCurrentPreset(null);
      }
    });
  }

  /**
   * Last preset recalled or saved through this coordinator, if still valid.
   */
  get currentPreset(): number | null {
    return this.preset;
  }

  resetCurrentPreset(): void {
    this.setCurrentPreset(null);
  }

  private setCurrentPreset(preset: number | null): void {
    const previous = this.preset;
    if (previous === preset) {
      return;
    }

    this.preset = preset;
    this.emitEvent({ type: 'preset_changed', preset, previous });
  }

  // ---------------------------------------------------------------------------
  // Power & Panel
  // ---------------------------------------------------------------------------

  powerOn(): Promise<RefreshResult> {
    return this.mutate(() => this.client.powerOn());
  }

  powerOff(): Promise<RefreshResult> {
    return this.mutate(() => this.client.powerOff());
  }

  standby(): Promise<RefreshResult> {
    return this.mutate(() => this.client.standby());
  }

  /**
   * Enter standby, or power back on.
   */
  setStandby(standby: boolean): Promise<RefreshResult> {
    return standby ? this.standby() : this.powerOn();
  }

  lockPanel(): Promise<RefreshResult> {
    return this.mutate(() => this.client.lockPanel());
  }

  unlockPanel(): Promise<RefreshResult> {
    return this.mutate(() => this.client.unlockPanel());
  }

  setPanelLock(locked: boolean): Promise<RefreshResult> {
    return locked ? this.lockPanel() : this.unlockPanel();
  }

  /**
   * Run one command, then refresh. A failed command rejects without
   * refreshing; a failed refresh is reported in the result.
   */
  private async mutate(command: () => Promise<void>): Promise<RefreshResult> {
    await command();
    return this.requestRefresh();
  }

  // ---------------------------------------------------------------------------
  // Display Names
  // ---------------------------------------------------------------------------

  getInputName(input: number): string {
    return this.options.names.inputs[String(input)] ?? `Input ${input}`;
  }

  getOutputName(output: number): string {
    return this.options.names.outputs[String(output)] ?? `Output ${output}`;
  }

  getPresetName(preset: number): string {
    return this.options.names.presets[String(preset)] ?? `Preset ${preset}`;
  }

  // ---------------------------------------------------------------------------
  // Client Events
  // ---------------------------------------------------------------------------

  private handleClientEvent(event: MatrixClientEvent): void {
    if (event.type === 'connected' && event.reconnect && this.preset !== null) {
      this.logger.debug({ preset: this.preset }, 'Reconnected, current preset no longer known');
      this.setCurrentPreset(null);
    }
  }

  // ---------------------------------------------------------------------------
  // Event Emission
  // ---------------------------------------------------------------------------

  private emitEvent(event: CoordinatorEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (error) {
        this.logger.error({ err: error }, 'Coordinator event handler error');
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Public API
  // ---------------------------------------------------------------------------

  onEvent(handler: CoordinatorEventHandler): void {
    this.eventHandlers.add(handler);
  }

  offEvent(handler: CoordinatorEventHandler): void {
    this.eventHandlers.delete(handler);
  }

  /**
   * Cached status. No I/O.
   */
  get status(): MatrixStatus {
    return this.client.getCachedStatus();
  }

  get lastRefresh(): RefreshResult | null {
    return this.lastResult;
  }

  getLastRefresh(): RefreshResult | null {
    return this.lastResult;
  }

  /**
   * Whether the most recent refresh succeeded.
   */
  get lastUpdateSuccess(): boolean {
    return this.lastResult?.ok ?? false;
  }

  /**
   * Whether any refresh has succeeded yet.
   */
  hasSucceeded(): boolean {
    return this.succeeded;
  }

  isConnected(): boolean {
    return this.client.isConnected();
  }

  getOptions(): Readonly<CoordinatorOptions> {
    return { ...this.options };
  }
}
