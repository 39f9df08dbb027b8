/**
 * Command Channel
 *
 * The single path for wire traffic. The protocol carries no request IDs, so
 * each exchange holds the gate from write to the end of the drain.
 */

import { ConnectionError, describeError } from '../../core/protocol/errors.js';
import { decodeAscii } from '../../core/protocol/parser.js';
import { channelLogger } from '../../observability/logger.js';
import { type MatrixConnection, ReadTimeoutError } from './connection.js';
import { Mutex } from './mutex.js';
import type { ChannelTimings, CommandTransport } from './types.js';
import { DEFAULT_CHANNEL_TIMINGS } from './types.js';

export class CommandChannel implements CommandTransport {
  private readonly connection: MatrixConnection;
  private readonly timings: ChannelTimings;
  private readonly gate = new Mutex();
  private readonly logger = channelLogger();

  constructor(connection: MatrixConnection, timings: Partial<ChannelTimings> = {}) {
    this.connection = connection;
    this.timings = { ...DEFAULT_CHANNEL_TIMINGS, ...timings };
  }

  /**
   * Send one command line and return the trimmed response text.
   *
   * Waits its turn behind earlier callers. Any timeout or I/O failure closes
   * the connection and rejects with ConnectionError; the next call reconnects.
   */
  send(line: string): Promise<string> {
    return this.gate.runExclusive(() => this.exchange(line));
  }

  /**
   * Close the connection once the exchange in progress (and any queued
   * before this call) has finished.
   */
  close(reason = 'Channel closed'): Promise<void> {
    return this.gate.runExclusive(() => this.connection.disconnect(reason));
  }

  private async exchange(line: string): Promise<string> {
    try {
      await this.connection.connect();

      const stale = this.connection.discardPending();
      if (stale > 0) {
        this.logger.debug({ bytes: stale }, 'Discarded unsolicited bytes');
      }

      this.logger.debug({ command: line }, 'Sending command');
      await this.connection.write(line);

      await sleep(this.timings.commandDelay);

      const chunks: Buffer[] = [await this.connection.read(this.timings.responseTimeout)];
      for (;;) {
        const more = await this.drainRead();
        if (more === null || more.length === 0) {
          break;
        }
        chunks.push(more);
      }

      const response = decodeAscii(Buffer.concat(chunks)).trim();
      this.logger.debug({ command: line, response }, 'Received response');
      return response;
    } catch (error) {
      await this.connection.disconnect(`Exchange failed: ${describeError(error)}`);
      throw toConnectionError(error);
    }
  }

  /**
   * One drain read; null when the drain window closed without data.
   */
  private async drainRead(): Promise<Buffer | null> {
    try {
      return await this.connection.read(this.timings.drainTimeout);
    } catch (error) {
      if (error instanceof ReadTimeoutError) {
        return null;
      }
      throw error;
    }
  }
}

function toConnectionError(error: unknown): ConnectionError {
  if (error instanceof ConnectionError) {
    return error;
  }
  if (error instanceof ReadTimeoutError) {
    return new ConnectionError('Timeout waiting for response', { cause: error });
  }
  return new ConnectionError(`Communication error: ${describeError(error)}`, { cause: error });
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
