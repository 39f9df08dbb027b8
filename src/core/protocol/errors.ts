/**
 * Matrix Errors
 */

export const MatrixErrorCode = {
  CONNECTION_ERROR: 'CONNECTION_ERROR',
  COMMAND_ERROR: 'COMMAND_ERROR',
} as const;

export type MatrixErrorCode = (typeof MatrixErrorCode)[keyof typeof MatrixErrorCode];

export class MatrixError extends Error {
  constructor(
    public readonly code: MatrixErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'MatrixError';
  }
}

/**
 * Timeout, refused or reset connection, or any I/O failure on the wire.
 * The connection has already been closed when this is thrown.
 */
export class ConnectionError extends MatrixError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(MatrixErrorCode.CONNECTION_ERROR, message, options);
    this.name = 'ConnectionError';
  }
}

/**
 * Local precondition violation. Nothing was sent.
 */
export class CommandError extends MatrixError {
  constructor(message: string) {
    super(MatrixErrorCode.COMMAND_ERROR, message);
    this.name = 'CommandError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
