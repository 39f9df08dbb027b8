/**
 * Structured Logger
 *
 * JSON-formatted logging with correlation ID propagation, built on pino.
 */

import { AsyncLocalStorage } from 'async_hooks';
import { randomUUID } from 'crypto';
import pino from 'pino';

// -----------------------------------------------------------------------------
// Logger Configuration
// -----------------------------------------------------------------------------

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerConfig {
  /** Log level */
  level: LogLevel;
  /** Pretty print for development */
  pretty: boolean;
  /** Base context to include in all logs */
  base?: Record<string, unknown>;
  /** Custom serializers */
  serializers?: Record<string, (value: unknown) => unknown>;
}

function levelFromEnv(): LogLevel {
  const value = process.env['LOG_LEVEL'];
  return LOG_LEVELS.find((level) => level === value) ?? 'info';
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: levelFromEnv(),
  pretty: false,
};

// -----------------------------------------------------------------------------
// Correlation Context
// -----------------------------------------------------------------------------

export interface LogContext {
  correlationId?: string;
  source?: string;
  [key: string]: unknown;
}

const logContext = new AsyncLocalStorage<LogContext>();

/**
 * Run a function with a specific logging context.
 */
export function withLogContext<T>(context: LogContext, fn: () => T): T {
  return logContext.run(context, fn);
}

/**
 * Get the current logging context.
 */
export function getLogContext(): LogContext | undefined {
  return logContext.getStore();
}

/**
 * Run a function under a fresh correlation ID.
 */
export function withCorrelation<T>(source: string, fn: () => T): T {
  return withLogContext({ correlationId: randomUUID(), source }, fn);
}

// -----------------------------------------------------------------------------
// Logger Factory
// -----------------------------------------------------------------------------

let rootLogger: pino.Logger | null = null;

/**
 * Initialise the root logger.
 */
export function initLogger(config: Partial<LoggerConfig> = {}): pino.Logger {
  const finalConfig = { ...DEFAULT_LOGGER_CONFIG, ...config };

  const options: pino.LoggerOptions = {
    level: finalConfig.level,
    base: {
      service: 'matrix-switcher',
      ...finalConfig.base,
    },
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
      ...finalConfig.serializers,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    // Add correlation ID from context
    mixin() {
      const ctx = getLogContext();
      if (ctx) {
        return {
          correlationId: ctx.correlationId,
          source: ctx.source,
        };
      }
      return {};
    },
  };

  if (finalConfig.pretty) {
    rootLogger = pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
        },
      },
    });
  } else {
    rootLogger = pino(options);
  }

  return rootLogger;
}

/**
 * Get the root logger instance.
 */
export function getLogger(): pino.Logger {
  if (!rootLogger) {
    rootLogger = initLogger();
  }
  return rootLogger;
}

/**
 * Create a child logger with additional context.
 */
export function createLogger(bindings: pino.Bindings): pino.Logger {
  return getLogger().child(bindings);
}

// -----------------------------------------------------------------------------
// Scoped Loggers
// -----------------------------------------------------------------------------

/**
 * Logger for the TCP connection.
 */
export const connectionLogger = () => createLogger({ component: 'connection' });

/**
 * Logger for the command channel.
 */
export const channelLogger = () => createLogger({ component: 'channel' });

/**
 * Logger for the matrix client.
 */
export const clientLogger = () => createLogger({ component: 'client' });

/**
 * Logger for the polling coordinator.
 */
export const coordinatorLogger = () => createLogger({ component: 'coordinator' });

/**
 * Logger for the controller.
 */
export const controllerLogger = () => createLogger({ component: 'controller' });

/**
 * Logger for the device simulator.
 */
export const simulatorLogger = () => createLogger({ component: 'simulator' });
