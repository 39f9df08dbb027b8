/**
 * Matrix Connection
 *
 * Owns the single TCP socket to the device. Incoming bytes are queued as
 * chunks and handed out by `read()`, which lets the command channel read
 * with per-call timeouts.
 */

import { createConnection, type Socket } from 'net';
import { ConnectionError, describeError } from '../../core/protocol/errors.js';
import { connectionLogger } from '../../observability/logger.js';
import type {
  ConnectionConfig,
  ConnectionEvent,
  ConnectionEventHandler,
} from './types.js';
import { DEFAULT_CONNECTION_CONFIG } from './types.js';

// -----------------------------------------------------------------------------
// Errors
// -----------------------------------------------------------------------------

/**
 * No bytes arrived within the read timeout. The channel decides whether this
 * ends a drain or breaks the connection.
 */
export class ReadTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`No data received within ${timeoutMs}ms`);
    this.name = 'ReadTimeoutError';
  }
}

interface PendingRead {
  resolve: (chunk: Buffer) => void;
  reject: (error: Error) => void;
}

const EMPTY = Buffer.alloc(0);

// -----------------------------------------------------------------------------
// Matrix Connection
// -----------------------------------------------------------------------------

export class MatrixConnection {
  private readonly config: ConnectionConfig;
  private readonly logger = connectionLogger();

  private socket: Socket | null = null;
  private chunks: Buffer[] = [];
  private ended = false;
  private failure: Error | null = null;
  private pendingRead: PendingRead | null = null;
  private connectCount = 0;
  private eventHandlers: Set<ConnectionEventHandler> = new Set();

  constructor(config: Pick<ConnectionConfig, 'host' | 'port'> & Partial<ConnectionConfig>) {
    this.config = { ...DEFAULT_CONNECTION_CONFIG, ...config };
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * True while a socket exists and is neither closing nor half-closed.
   */
  get connected(): boolean {
    return this.socket !== null && !this.socket.destroyed && this.socket.readyState === 'open';
  }

  /**
   * Open the connection. No-op when already connected.
   */
  async connect(): Promise<void> {
    if (this.connected) {
      return;
    }

    // A half-closed socket left behind by the peer
    if (this.socket) {
      this.dropSocket();
    }

    const { host, port, connectTimeout } = this.config;
    const socket = await openSocket(host, port, connectTimeout);

    this.attach(socket);
    this.connectCount++;

    const reconnect = this.connectCount > 1;
    this.logger.debug({ host, port, reconnect }, 'Connected to matrix');
    this.emitEvent({ type: 'connected', host, port, reconnect });
  }

  /**
   * Close the connection gracefully. Handles are cleared even if the close
   * fails. Safe to call when already disconnected.
   */
  async disconnect(reason = 'Manual disconnect'): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      return;
    }

    this.socket = null;
    this.chunks = [];
    this.ended = true;
    this.rejectPendingRead(new ConnectionError('Connection closed'));

    try {
      await closeSocket(socket, this.config.closeTimeout);
    } finally {
      socket.destroy();
    }

    this.logger.debug({ reason }, 'Disconnected from matrix');
    this.emitEvent({ type: 'disconnected', reason });
  }

  // ---------------------------------------------------------------------------
  // I/O
  // ---------------------------------------------------------------------------

  /**
   * Write raw ASCII bytes and wait until they are flushed to the kernel.
   */
  async write(data: string): Promise<void> {
    const socket = this.socket;
    if (!socket || !this.connected) {
      throw new ConnectionError('Not connected');
    }

    await new Promise<void>((resolve, reject) => {
      socket.write(Buffer.from(data, 'ascii'), (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Next received chunk. Resolves with an empty buffer at end of stream and
   * rejects with ReadTimeoutError when nothing arrives in time.
   */
  read(timeoutMs: number): Promise<Buffer> {
    const chunk = this.chunks.shift();
    if (chunk) {
      return Promise.resolve(chunk);
    }

    if (this.failure) {
      return Promise.reject(this.failure);
    }

    if (this.ended || !this.socket) {
      return Promise.resolve(EMPTY);
    }

    return new Promise<Buffer>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pendingRead = null;
        reject(new ReadTimeoutError(timeoutMs));
      }, timeoutMs);

      this.pendingRead = {
        resolve: (received) => {
          clearTimeout(timer);
          this.pendingRead = null;
          resolve(received);
        },
        reject: (error) => {
          clearTimeout(timer);
          this.pendingRead = null;
          reject(error);
        },
      };
    });
  }

  /**
   * Drop bytes received outside of an exchange. Returns the number of bytes
   * discarded.
   */
  discardPending(): number {
    const discarded = this.chunks.reduce((total, chunk) => total + chunk.length, 0);
    this.chunks = [];
    return discarded;
  }

  // ---------------------------------------------------------------------------
  // Socket Handling
  // ---------------------------------------------------------------------------

  private attach(socket: Socket): void {
    this.socket = socket;
    this.chunks = [];
    this.ended = false;
    this.failure = null;

    socket.setNoDelay(true);

    socket.on('data', (chunk: Buffer) => {
      if (this.socket !== socket) return;

      if (this.pendingRead) {
        this.pendingRead.resolve(chunk);
      } else {
        this.chunks.push(chunk);
      }
    });

    socket.on('end', () => {
      if (this.socket !== socket) return;
      this.ended = true;
      this.pendingRead?.resolve(EMPTY);
    });

    socket.on('error', (error) => {
      this.logger.debug({ err: error }, 'Socket error');
      if (this.socket !== socket) return;

      this.failure = error;
      this.pendingRead?.reject(error);
      this.emitEvent({ type: 'error', error: error.message });
    });

    socket.on('close', () => {
      if (this.socket !== socket) return;

      this.socket = null;
      this.ended = true;
      this.pendingRead?.resolve(EMPTY);
      this.emitEvent({ type: 'disconnected', reason: this.failure?.message ?? 'Closed by peer' });
    });
  }

  private dropSocket(): void {
    const socket = this.socket;
    this.socket = null;
    this.chunks = [];
    socket?.destroy();
  }

  private rejectPendingRead(error: Error): void {
    this.pendingRead?.reject(error);
  }

  // ---------------------------------------------------------------------------
  // Event Emission
  // ---------------------------------------------------------------------------

  private emitEvent(event: ConnectionEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (error) {
        this.logger.error({ err: error }, 'Connection event handler error');
      }
    }
  }

  onEvent(handler: ConnectionEventHandler): void {
    this.eventHandlers.add(handler);
  }

  offEvent(handler: ConnectionEventHandler): void {
    this.eventHandlers.delete(handler);
  }

  /**
   * Number of successful connects over the lifetime of this instance.
   */
  getConnectCount(): number {
    return this.connectCount;
  }

  getConfig(): Readonly<ConnectionConfig> {
    return { ...this.config };
  }
}

// -----------------------------------------------------------------------------
// Socket Helpers
// -----------------------------------------------------------------------------

function openSocket(host: string, port: number, timeoutMs: number): Promise<Socket> {
  return new Promise<Socket>((resolve, reject) => {
    const socket = createConnection({ host, port });

    const timer = setTimeout(() => {
      socket.removeListener('error', onError);
      socket.destroy();
      reject(new ConnectionError(`Timeout connecting to ${host}:${port}`));
    }, timeoutMs);

    const onError = (error: Error): void => {
      clearTimeout(timer);
      socket.destroy();
      reject(new ConnectionError(`Cannot connect to ${host}:${port}: ${describeError(error)}`, { cause: error }));
    };

    socket.once('error', onError);
    socket.once('connect', () => {
      clearTimeout(timer);
      socket.removeListener('error', onError);
      resolve(socket);
    });
  });
}

function closeSocket(socket: Socket, timeoutMs: number): Promise<void> {
  return new Promise<void>((resolve) => {
    if (socket.destroyed) {
      resolve();
      return;
    }

    const timer = setTimeout(resolve, timeoutMs);
    socket.once('close', () => {
      clearTimeout(timer);
      resolve();
    });
    socket.end();
  });
}
