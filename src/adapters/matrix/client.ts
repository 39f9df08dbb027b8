/**
 * Matrix Client
 *
 * Protocol client for a matrix switcher: one command per operation, sent
 * through the serialized command channel, with the local state store updated
 * from replies and, for switching commands, optimistically.
 */

import type { PortLayout } from '../../core/protocol/commands.js';
import {
  createAllOffCommand,
  createAllThroughCommand,
  createClearPresetCommand,
  createFirmwareQuery,
  createLockCommand,
  createLockQuery,
  createModelQuery,
  createOutputOffCommand,
  createOutputOnCommand,
  createOutputQuery,
  createPowerOffCommand,
  createPowerOnCommand,
  createPowerQuery,
  createRecallPresetCommand,
  createRouteAllCommand,
  createRouteCommand,
  createSavePresetCommand,
  createStandbyCommand,
  createStatusQuery,
  createUnlockCommand,
} from '../../core/protocol/commands.js';
import { CommandError } from '../../core/protocol/errors.js';
import {
  parseLockResponse,
  parseOutputResponse,
  parsePowerResponse,
  parseStatusResponse,
} from '../../core/protocol/parser.js';
import type { Command, DeviceInfo, MatrixStatus } from '../../core/protocol/types.js';
import { MAX_PORTS, PowerState } from '../../core/protocol/types.js';
import { MatrixStateStore, routingToRecord } from '../../core/state/store.js';
import { clientLogger } from '../../observability/logger.js';
import {
  recordCommand,
  recordConnection,
  recordDisconnection,
  timeCommand,
} from '../../observability/metrics.js';
import { CommandChannel } from '../../transports/tcp/channel.js';
import { MatrixConnection } from '../../transports/tcp/connection.js';
import type { ConnectionEvent } from '../../transports/tcp/types.js';
import type {
  MatrixClientConfig,
  MatrixClientEvent,
  MatrixClientEventHandler,
  MatrixClientMetrics,
  MatrixControl,
} from './types.js';
import { DEFAULT_CLIENT_CONFIG, INITIAL_CLIENT_METRICS } from './types.js';

// -----------------------------------------------------------------------------
// Matrix Client
// -----------------------------------------------------------------------------

export class MatrixClient implements MatrixControl {
  readonly layout: PortLayout;

  private readonly config: MatrixClientConfig;
  private readonly connection: MatrixConnection;
  private readonly channel: CommandChannel;
  private readonly store: MatrixStateStore;
  private readonly logger = clientLogger();

  private metrics: MatrixClientMetrics;
  private eventHandlers: Set<MatrixClientEventHandler> = new Set();

  constructor(config: Pick<MatrixClientConfig, 'host'> & Partial<MatrixClientConfig>) {
    this.config = { ...DEFAULT_CLIENT_CONFIG, ...config };

    assertPortCount('inputs', this.config.numInputs);
    assertPortCount('outputs', this.config.numOutputs);

    this.layout = { numInputs: this.config.numInputs, numOutputs: this.config.numOutputs };
    this.metrics = { ...INITIAL_CLIENT_METRICS };

    this.connection = new MatrixConnection({
      host: this.config.host,
      port: this.config.port,
      connectTimeout: this.config.connectTimeout,
    });
    this.channel = new CommandChannel(this.connection, this.config.timings);
    this.store = new MatrixStateStore(this.layout);

    this.connection.onEvent((event) => this.handleConnectionEvent(event));
    this.store.addListener((delta) => this.emitEvent({ type: 'state_changed', delta }));
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Verify the device answers and return its identity.
   */
  async testConnection(): Promise<DeviceInfo> {
    const model = await this.getModel();
    const firmware = await this.getFirmware();
    return { model, firmware };
  }

  /**
   * Close the connection after any exchange in flight.
   */
  async disconnect(): Promise<void> {
    await this.channel.close('Client disconnect');
  }

  isConnected(): boolean {
    return this.connection.connected;
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  async getModel(): Promise<string> {
    const response = await this.execute(createModelQuery());
    this.store.setModel(response);
    return response;
  }

  async getFirmware(): Promise<string> {
    const response = await this.execute(createFirmwareQuery());
    this.store.setFirmware(response);
    return response;
  }

  /**
   * Query the full routing table and merge it into the cache.
   */
  async getStatus(): Promise<MatrixStatus> {
    const response = await this.execute(createStatusQuery());
    const parsed = parseStatusResponse(response, this.layout, this.store.getRouting());

    if (parsed.strategy === null) {
      this.logger.debug({ response }, 'Status response matched no routing pattern');
    } else if (parsed.rejected.length > 0) {
      this.logger.debug({ rejected: parsed.rejected }, 'Ignored out-of-range routing pairs');
    }

    this.store.applyRouting(parsed.outputs);
    this.logger.debug(
      { strategy: parsed.strategy, outputs: routingToRecord(this.store.getRouting()) },
      'Parsed status'
    );

    return this.store.getStatus();
  }

  /**
   * Query one output. An unparseable reply returns the cached value.
   */
  async getOutputStatus(output: number): Promise<number | null> {
    const response = await this.execute(createOutputQuery(this.layout, output));
    const parsed = parseOutputResponse(response, this.layout, this.store.getOutput(output) ?? null);

    if (parsed.source !== 'cached') {
      this.store.setOutput(output, parsed.input);
    }

    return parsed.input;
  }

  async getPowerState(): Promise<PowerState> {
    const response = await this.execute(createPowerQuery());
    const powerState = parsePowerResponse(response);
    this.store.setPowerState(powerState);
    return powerState;
  }

  async getLockStatus(): Promise<boolean> {
    const response = await this.execute(createLockQuery());
    const locked = parseLockResponse(response);
    this.store.setLocked(locked);
    return locked;
  }

  // ---------------------------------------------------------------------------
  // Switching
  // ---------------------------------------------------------------------------

  async route(input: number, output: number): Promise<void> {
    await this.execute(createRouteCommand(this.layout, input, output));
    this.store.setOutput(output, input);
  }

  async routeToAll(input: number): Promise<void> {
    await this.execute(createRouteAllCommand(this.layout, input));
    this.store.setAllOutputs(() => input);
  }

  async switchOffOutput(output: number): Promise<void> {
    await this.execute(createOutputOffCommand(this.layout, output));
    this.store.setOutput(output, null);
  }

  /**
   * Re-open an output. The source it resumes is unknown until the next poll.
   */
  async switchOnOutput(output: number): Promise<void> {
    await this.execute(createOutputOnCommand(this.layout, output));
  }

  async switchOffAll(): Promise<void> {
    await this.execute(createAllOffCommand());
    this.store.setAllOutputs(() => null);
  }

  /**
   * Route input n to output n. Outputs without a matching input are left as
   * they are.
   */
  async allThrough(): Promise<void> {
    await this.execute(createAllThroughCommand());
    for (let output = 1; output <= this.layout.numOutputs; output++) {
      if (output <= this.layout.numInputs) {
        this.store.setOutput(output, output);
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Presets
  // ---------------------------------------------------------------------------

  async savePreset(preset: number): Promise<void> {
    await this.execute(createSavePresetCommand(preset));
  }

  /**
   * Recall changes routing in ways the reply does not describe; callers are
   * expected to refresh the full status afterwards.
   */
  async recallPreset(preset: number): Promise<void> {
    await this.execute(createRecallPresetCommand(preset));
  }

  async clearPreset(preset: number): Promise<void> {
    await this.execute(createClearPresetCommand(preset));
  }

  // ---------------------------------------------------------------------------
  // Power & Panel
  // ---------------------------------------------------------------------------

  async powerOn(): Promise<void> {
    await this.execute(createPowerOnCommand());
    this.store.setPowerState(PowerState.ON);
  }

  /**
   * Standby that also cuts power to attached receivers.
   */
  async powerOff(): Promise<void> {
    await this.execute(createPowerOffCommand());
    this.store.setPowerState(PowerState.OFF);
  }

  async standby(): Promise<void> {
    await this.execute(createStandbyCommand());
    this.store.setPowerState(PowerState.STANDBY);
  }

  async lockPanel(): Promise<void> {
    await this.execute(createLockCommand());
    this.store.setLocked(true);
  }

  async unlockPanel(): Promise<void> {
    await this.execute(createUnlockCommand());
    this.store.setLocked(false);
  }

  // ---------------------------------------------------------------------------
  // Exchange
  // ---------------------------------------------------------------------------

  private async execute(command: Command): Promise<string> {
    const startedAt = Date.now();
    const endTimer = timeCommand(command.verb);

    try {
      const response = await this.channel.send(command.line);
      this.metrics.commandsSent++;
      this.metrics.lastLatencyMs = Date.now() - startedAt;
      recordCommand(command.verb, 'success');
      return response;
    } catch (error) {
      this.metrics.commandsFailed++;
      recordCommand(command.verb, 'failure');
      throw error;
    } finally {
      endTimer();
    }
  }

  private handleConnectionEvent(event: ConnectionEvent): void {
    switch (event.type) {
      case 'connected':
        if (event.reconnect) {
          this.metrics.reconnects++;
        }
        recordConnection(event.reconnect);
        this.emitEvent({ type: 'connected', reconnect: event.reconnect });
        break;

      case 'disconnected':
        recordDisconnection(event.reason.startsWith('Exchange failed') ? 'fault' : 'normal');
        this.emitEvent({ type: 'disconnected', reason: event.reason });
        break;

      case 'error':
        this.emitEvent({ type: 'error', error: event.error });
        break;
    }
  }

  // ---------------------------------------------------------------------------
  // Event Emission
  // ---------------------------------------------------------------------------

  private emitEvent(event: MatrixClientEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (error) {
        this.logger.error({ err: error }, 'Event handler error');
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Public API
  // ---------------------------------------------------------------------------

  onEvent(handler: MatrixClientEventHandler): void {
    this.eventHandlers.add(handler);
  }

  offEvent(handler: MatrixClientEventHandler): void {
    this.eventHandlers.delete(handler);
  }

  /**
   * Snapshot of the cached status. No I/O.
   */
  getCachedStatus(): MatrixStatus {
    return this.store.getStatus();
  }

  getMetrics(): Readonly<MatrixClientMetrics> {
    return { ...this.metrics };
  }

  getConfig(): Readonly<MatrixClientConfig> {
    return { ...this.config };
  }
}

function assertPortCount(kind: 'inputs' | 'outputs', count: number): void {
  if (!Number.isInteger(count) || count < 1 || count > MAX_PORTS) {
    throw new CommandError(`Number of ${kind} must be 1-${MAX_PORTS}, got ${count}`);
  }
}
