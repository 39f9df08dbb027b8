/**
 * Matrix Simulator
 *
 * In-process TCP stand-in for a matrix switcher. Speaks the device's ASCII
 * command set, keeps routing, preset, power and lock state, and can be told
 * to answer slowly, in pieces, or not at all.
 */

import { createServer, type Server, type Socket } from 'net';
import { pad2 } from '../../core/protocol/commands.js';
import { DEFAULT_PORT_COUNT, MAX_PRESET, PowerState } from '../../core/protocol/types.js';
import { simulatorLogger } from '../../observability/logger.js';

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

/**
 * Shape of the full status reply.
 * - short: `O01:I02 O02:I00`
 * - long: `Output01:Input02 Output02:Input00`
 * - bare: `01:02 02:00`
 */
export type StatusFormat = 'short' | 'long' | 'bare';

export interface SimulatorConfig {
  /** Port to listen on; 0 picks a free one */
  port: number;
  host: string;
  numInputs: number;
  numOutputs: number;
  model: string;
  firmware: string;
  statusFormat: StatusFormat;
  /** Delay before replying (ms) */
  responseDelay: number;
  /** Split replies into pieces of this many bytes; 0 sends them whole */
  chunkSize: number;
  /** Pause between reply pieces (ms) */
  chunkGap: number;
  /** Accept commands but never reply */
  silent: boolean;
}

export const DEFAULT_SIMULATOR_CONFIG: SimulatorConfig = {
  port: 0,
  host: '127.0.0.1',
  numInputs: DEFAULT_PORT_COUNT,
  numOutputs: DEFAULT_PORT_COUNT,
  model: 'MX-0808',
  firmware: 'V1.06',
  statusFormat: 'short',
  responseDelay: 0,
  chunkSize: 0,
  chunkGap: 10,
  silent: false,
};

export interface SimulatorEvent {
  type: 'client_connected' | 'client_disconnected' | 'command_received' | 'reply_sent';
  clientId: string;
  data?: string;
  timestamp: number;
}

export type SimulatorEventHandler = (event: SimulatorEvent) => void;

interface SimulatorClient {
  id: string;
  socket: Socket;
  buffer: string;
}

const COMMAND_PATTERN = /[^.;]*[.;]/g;

// -----------------------------------------------------------------------------
// Matrix Simulator
// -----------------------------------------------------------------------------

export class MatrixSimulator {
  private readonly config: SimulatorConfig;
  private readonly logger = simulatorLogger();

  private server: Server | null = null;
  private clients: Map<string, SimulatorClient> = new Map();
  private eventHandlers: Set<SimulatorEventHandler> = new Set();
  private eventLog: SimulatorEvent[] = [];
  private clientIdCounter = 0;

  /** Output -> input; 0 when the output is switched off */
  private routing: Map<number, number> = new Map();
  /** Input an output had before it was switched off */
  private parked: Map<number, number> = new Map();
  private presets: Map<number, Map<number, number>> = new Map();
  private powerState: PowerState = PowerState.ON;
  private locked = false;

  constructor(config: Partial<SimulatorConfig> = {}) {
    this.config = { ...DEFAULT_SIMULATOR_CONFIG, ...config };

    for (let output = 1; output <= this.config.numOutputs; output++) {
      this.routing.set(output, Math.min(output, this.config.numInputs));
    }
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  async start(): Promise<void> {
    const server = createServer((socket) => this.handleConnection(socket));

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.config.port, this.config.host, () => {
        server.removeListener('error', reject);
        resolve();
      });
    });

    this.server = server;
    this.logger.debug({ port: this.port }, 'Matrix simulator listening');
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }

    this.dropClients();
    this.server = null;

    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }

  /**
   * Bound port. Only valid after start().
   */
  get port(): number {
    const address = this.server?.address();
    if (!address || typeof address === 'string') {
      throw new Error('Simulator is not listening');
    }
    return address.port;
  }

  isRunning(): boolean {
    return this.server !== null;
  }

  // ---------------------------------------------------------------------------
  // Connection Handling
  // ---------------------------------------------------------------------------

  private handleConnection(socket: Socket): void {
    const client: SimulatorClient = {
      id: `client-${++this.clientIdCounter}`,
      socket,
      buffer: '',
    };

    this.clients.set(client.id, client);

    socket.setEncoding('ascii');
    socket.on('data', (data: string) => this.handleData(client, data));
    socket.on('close', () => {
      this.clients.delete(client.id);
      this.emitEvent({ type: 'client_disconnected', clientId: client.id, timestamp: Date.now() });
    });
    socket.on('error', (error) => this.logger.debug({ err: error, clientId: client.id }, 'Client error'));

    this.emitEvent({ type: 'client_connected', clientId: client.id, timestamp: Date.now() });
  }

  private handleData(client: SimulatorClient, data: string): void {
    client.buffer += data;

    let consumed = 0;
    for (const match of client.buffer.matchAll(COMMAND_PATTERN)) {
      consumed = (match.index ?? 0) + match[0].length;
      const command = match[0].trim();

      this.emitEvent({
        type: 'command_received',
        clientId: client.id,
        data: command,
        timestamp: Date.now(),
      });

      const reply = this.processCommand(command);
      if (!this.config.silent) {
        this.scheduleReply(client, reply);
      }
    }

    client.buffer = client.buffer.slice(consumed);
  }

  private scheduleReply(client: SimulatorClient, reply: string): void {
    const send = (): void => this.sendReply(client, reply);

    if (this.config.responseDelay > 0) {
      setTimeout(send, this.config.responseDelay);
    } else {
      send();
    }
  }

  private sendReply(client: SimulatorClient, reply: string): void {
    const { chunkSize, chunkGap } = this.config;

    if (chunkSize <= 0 || reply.length <= chunkSize) {
      this.write(client, reply);
    } else {
      for (let offset = 0, piece = 0; offset < reply.length; offset += chunkSize, piece++) {
        const chunk = reply.slice(offset, offset + chunkSize);
        setTimeout(() => this.write(client, chunk), piece * chunkGap);
      }
    }

    this.emitEvent({ type: 'reply_sent', clientId: client.id, data: reply, timestamp: Date.now() });
  }

  private write(client: SimulatorClient, text: string): void {
    if (!client.socket.destroyed && client.socket.writable) {
      client.socket.write(text, 'ascii');
    }
  }

  // ---------------------------------------------------------------------------
  // Command Processing
  // ---------------------------------------------------------------------------

  private processCommand(command: string): string {
    switch (command) {
      case '/*Type;':
        return this.config.model;
      case '/^Version;':
        return this.config.firmware;
      case 'Status.':
        return this.formatStatus();
      case '%9962.':
        return this.formatPower();
      case '%9961.':
        return this.locked ? 'System Locked' : 'System Free';
      case 'All$.':
        for (const output of this.routing.keys()) this.switchOff(output);
        return 'All Closed';
      case 'All#.':
        for (const output of this.routing.keys()) {
          if (output <= this.config.numInputs) this.routing.set(output, output);
        }
        return 'All Through';
      case 'PWON.':
        this.powerState = PowerState.ON;
        return 'PWON';
      case 'PWOFF.':
        this.powerState = PowerState.OFF;
        return 'PWOFF';
      case 'STANDBY.':
        this.powerState = PowerState.STANDBY;
        return 'STANDBY';
      case '/%Lock;':
        this.locked = true;
        return 'System Locked';
      case '/%Unlock;':
        this.locked = false;
        return 'System Unlock';
    }

    return this.processIndexedCommand(command) ?? 'Command Error';
  }

  private processIndexedCommand(command: string): string | null {
    let match = /^Status(\d+)\.$/.exec(command);
    if (match?.[1] !== undefined) {
      return this.formatOutput(parseInt(match[1], 10));
    }

    match = /^(\d+)V(\d+)\.$/.exec(command);
    if (match?.[1] !== undefined && match[2] !== undefined) {
      const input = parseInt(match[1], 10);
      const output = parseInt(match[2], 10);
      if (!this.isInput(input) || !this.routing.has(output)) return null;
      this.routing.set(output, input);
      return `Out${pad2(output)} In${pad2(input)}`;
    }

    match = /^(\d+)All\.$/.exec(command);
    if (match?.[1] !== undefined) {
      const input = parseInt(match[1], 10);
      if (!this.isInput(input)) return null;
      for (const output of this.routing.keys()) this.routing.set(output, input);
      return `In${pad2(input)} All`;
    }

    match = /^(\d+)([$@])\.$/.exec(command);
    if (match?.[1] !== undefined) {
      const output = parseInt(match[1], 10);
      if (!this.routing.has(output)) return null;
      if (match[2] === '$') {
        this.switchOff(output);
        return `Out${pad2(output)} Closed`;
      }
      this.switchOn(output);
      return `Out${pad2(output)} Open`;
    }

    match = /^(Save|Recall|Clear)(\d+)\.$/.exec(command);
    if (match?.[1] !== undefined && match[2] !== undefined) {
      const preset = parseInt(match[2], 10);
      if (preset > MAX_PRESET) return null;
      return this.processPreset(match[1], preset);
    }

    return null;
  }

  private processPreset(action: string, preset: number): string | null {
    switch (action) {
      case 'Save':
        this.presets.set(preset, new Map(this.routing));
        return `Save To F${preset}`;
      case 'Recall': {
        const saved = this.presets.get(preset);
        if (!saved) return `F${preset} Empty`;
        this.routing = new Map(saved);
        return `Recall From F${preset}`;
      }
      case 'Clear':
        this.presets.delete(preset);
        return `Clear F${preset}`;
      default:
        return null;
    }
  }

  private switchOff(output: number): void {
    const input = this.routing.get(output) ?? 0;
    if (input > 0) {
      this.parked.set(output, input);
    }
    this.routing.set(output, 0);
  }

  private switchOn(output: number): void {
    if (this.routing.get(output) === 0) {
      this.routing.set(output, this.parked.get(output) ?? Math.min(output, this.config.numInputs));
    }
  }

  private isInput(input: number): boolean {
    return input >= 1 && input <= this.config.numInputs;
  }

  // ---------------------------------------------------------------------------
  // Reply Formatting
  // ---------------------------------------------------------------------------

  private formatStatus(): string {
    const entries = [...this.routing.entries()].sort(([a], [b]) => a - b);

    return entries
      .map(([output, input]) => {
        switch (this.config.statusFormat) {
          case 'short':
            return `O${pad2(output)}:I${pad2(input)}`;
          case 'long':
            return `Output${pad2(output)}:Input${pad2(input)}`;
          case 'bare':
            return `${pad2(output)}:${pad2(input)}`;
        }
      })
      .join(' ');
  }

  private formatOutput(output: number): string {
    const input = this.routing.get(output);
    if (input === undefined) {
      return 'Command Error';
    }
    return input === 0 ? `Out${pad2(output)} Closed` : `Out${pad2(output)} In${pad2(input)}`;
  }

  private formatPower(): string {
    switch (this.powerState) {
      case PowerState.ON:
        return 'PWON';
      case PowerState.OFF:
        return 'PWOFF';
      case PowerState.STANDBY:
        return 'STANDBY';
    }
  }

  // ---------------------------------------------------------------------------
  // Public Simulation API
  // ---------------------------------------------------------------------------

  /**
   * Route as if from the front panel.
   */
  setRoute(input: number, output: number): void {
    this.routing.set(output, input);
  }

  getRoute(output: number): number | undefined {
    return this.routing.get(output);
  }

  getRouting(): Map<number, number> {
    return new Map(this.routing);
  }

  setPowerState(powerState: PowerState): void {
    this.powerState = powerState;
  }

  getPowerState(): PowerState {
    return this.powerState;
  }

  setLocked(locked: boolean): void {
    this.locked = locked;
  }

  isLocked(): boolean {
    return this.locked;
  }

  hasPreset(preset: number): boolean {
    return this.presets.has(preset);
  }

  setSilent(silent: boolean): void {
    this.config.silent = silent;
  }

  setResponseDelay(ms: number): void {
    this.config.responseDelay = ms;
  }

  setStatusFormat(format: StatusFormat): void {
    this.config.statusFormat = format;
  }

  setChunking(chunkSize: number, chunkGap = this.config.chunkGap): void {
    this.config.chunkSize = chunkSize;
    this.config.chunkGap = chunkGap;
  }

  /**
   * Send bytes nobody asked for to every client.
   */
  push(text: string): void {
    for (const client of this.clients.values()) {
      this.write(client, text);
    }
  }

  /**
   * Reset every client connection.
   */
  dropClients(): void {
    for (const client of this.clients.values()) {
      client.socket.destroy();
    }
    this.clients.clear();
  }

  getClientCount(): number {
    return this.clients.size;
  }

  /**
   * Commands received, in order.
   */
  getCommands(): string[] {
    return this.eventLog
      .filter((event) => event.type === 'command_received')
      .map((event) => event.data ?? '');
  }

  // ---------------------------------------------------------------------------
  // Event Handling
  // ---------------------------------------------------------------------------

  onEvent(handler: SimulatorEventHandler): void {
    this.eventHandlers.add(handler);
  }

  offEvent(handler: SimulatorEventHandler): void {
    this.eventHandlers.delete(handler);
  }

  private emitEvent(event: SimulatorEvent): void {
    this.eventLog.push(event);

    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (error) {
        this.logger.error({ err: error }, 'Simulator event handler error');
      }
    }
  }

  getEventLog(): SimulatorEvent[] {
    return [...this.eventLog];
  }

  clearEventLog(): void {
    this.eventLog = [];
  }

  /**
   * Wait for a specific event type.
   */
  async waitForEvent(type: SimulatorEvent['type'], timeout = 5000): Promise<SimulatorEvent> {
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.offEvent(handler);
        reject(new Error(`Timeout waiting for event: ${type}`));
      }, timeout);

      const handler: SimulatorEventHandler = (event) => {
        if (event.type === type) {
          clearTimeout(timer);
          this.offEvent(handler);
          resolve(event);
        }
      };

      this.onEvent(handler);
    });
  }
}
