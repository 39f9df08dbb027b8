/**
 * Configuration Schema
 *
 * Zod schema definitions for configuration validation.
 */

import { z } from 'zod';
import { MAX_POLL_INTERVAL, MIN_POLL_INTERVAL, DEFAULT_POLL_INTERVAL } from '../core/coordinator/types.js';
import { DEFAULT_DEVICE_PORT, DEFAULT_PORT_COUNT, MAX_PORTS, MAX_PRESET, MIN_PRESET } from '../core/protocol/types.js';
import { LOG_LEVELS } from '../observability/logger.js';

// -----------------------------------------------------------------------------
// Device Config Schema
// -----------------------------------------------------------------------------

export const DeviceConfigSchema = z.object({
  host: z.string().min(1, 'Device host is required'),
  port: z.number().int().min(1).max(65535).default(DEFAULT_DEVICE_PORT),
  numInputs: z.number().int().min(1).max(MAX_PORTS).default(DEFAULT_PORT_COUNT),
  numOutputs: z.number().int().min(1).max(MAX_PORTS).default(DEFAULT_PORT_COUNT),
  connectTimeout: z.number().int().min(100).max(60000).default(5000),
  commandDelay: z.number().int().min(0).max(5000).default(100),
  responseTimeout: z.number().int().min(100).max(60000).default(5000),
  drainTimeout: z.number().int().min(10).max(5000).default(100),
});

// -----------------------------------------------------------------------------
// Polling Config Schema
// -----------------------------------------------------------------------------

export const PollingConfigSchema = z.object({
  enabled: z.boolean().default(true),
  /** Seconds */
  interval: z.number().int().min(MIN_POLL_INTERVAL).max(MAX_POLL_INTERVAL).default(DEFAULT_POLL_INTERVAL),
});

// -----------------------------------------------------------------------------
// Names Config Schema
// -----------------------------------------------------------------------------

const IndexKeySchema = z.string().regex(/^\d+$/, 'Name keys must be numeric indices');
const DisplayNameSchema = z.string().trim().min(1).max(50);

export const NamesConfigSchema = z.object({
  inputs: z.record(IndexKeySchema, DisplayNameSchema).default({}),
  outputs: z.record(IndexKeySchema, DisplayNameSchema).default({}),
  presets: z.record(IndexKeySchema, DisplayNameSchema).default({}),
});

// -----------------------------------------------------------------------------
// Logging Config Schema
// -----------------------------------------------------------------------------

export const LoggingConfigSchema = z.object({
  level: z.enum(LOG_LEVELS).default('info'),
  pretty: z.boolean().default(false),
});

// -----------------------------------------------------------------------------
// Metrics Config Schema
// -----------------------------------------------------------------------------

export const MetricsConfigSchema = z.object({
  enabled: z.boolean().default(true),
  port: z.number().int().min(1).max(65535).default(9090),
  path: z.string().default('/metrics'),
});

// -----------------------------------------------------------------------------
// Health Config Schema
// -----------------------------------------------------------------------------

export const HealthConfigSchema = z.object({
  enabled: z.boolean().default(true),
  port: z.number().int().min(1).max(65535).default(9091),
  checkInterval: z.number().int().min(5000).max(300000).default(30000),
});

// -----------------------------------------------------------------------------
// Full Configuration Schema
// -----------------------------------------------------------------------------

export const MatrixConfigSchema = z
  .object({
    // General
    name: z.string().min(1).default('matrix-switcher'),
    environment: z.enum(['development', 'production', 'test']).default('development'),

    // Device
    device: DeviceConfigSchema,
    polling: PollingConfigSchema.default({}),
    names: NamesConfigSchema.default({}),

    // Observability
    logging: LoggingConfigSchema.default({}),
    metrics: MetricsConfigSchema.default({}),
    health: HealthConfigSchema.default({}),
  })
  .superRefine((config, ctx) => {
    const limits = {
      inputs: [1, config.device.numInputs],
      outputs: [1, config.device.numOutputs],
      presets: [MIN_PRESET, MAX_PRESET],
    } as const;

    for (const group of ['inputs', 'outputs', 'presets'] as const) {
      const [min, max] = limits[group];
      for (const key of Object.keys(config.names[group])) {
        const index = parseInt(key, 10);
        if (index < min || index > max) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['names', group, key],
            message: `Index must be ${min}-${max}`,
          });
        }
      }
    }
  });

// -----------------------------------------------------------------------------
// Type Exports
// -----------------------------------------------------------------------------

export type DeviceConfig = z.infer<typeof DeviceConfigSchema>;
export type PollingConfig = z.infer<typeof PollingConfigSchema>;
export type NamesConfig = z.infer<typeof NamesConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type MetricsConfig = z.infer<typeof MetricsConfigSchema>;
export type HealthConfig = z.infer<typeof HealthConfigSchema>;
export type MatrixConfig = z.infer<typeof MatrixConfigSchema>;

/**
 * Config as accepted before defaults are applied.
 */
export type MatrixConfigInput = z.input<typeof MatrixConfigSchema>;
