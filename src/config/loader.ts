/**
 * Configuration Loader
 *
 * Loads and validates configuration from files and environment variables.
 */

import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import type { MatrixConfig, MatrixConfigInput } from './schema.js';
import { MatrixConfigSchema } from './schema.js';

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends Record<string, unknown> ? DeepPartial<T[K]> : T[K];
};

export type ConfigOverrides = DeepPartial<MatrixConfigInput>;

export interface LoadConfigOptions {
  /** Path to config file */
  configPath?: string;
  /** Override values (highest priority) */
  overrides?: ConfigOverrides;
  /** Whether to apply environment variable overrides */
  applyEnv?: boolean;
  /** Environment to read; defaults to process.env */
  env?: NodeJS.ProcessEnv;
}

export interface ConfigValidationResult {
  valid: boolean;
  config?: MatrixConfig;
  errors?: string[];
}

// -----------------------------------------------------------------------------
// Default Paths
// -----------------------------------------------------------------------------

const DEFAULT_CONFIG_PATHS = [
  'matrix.config.json',
  'config/matrix.json',
  'config.json',
];

const DEFAULT_CONFIG_ENV_VAR = 'MATRIX_CONFIG_PATH';
const ENV_PREFIX = 'MATRIX_';

// -----------------------------------------------------------------------------
// Loader
// -----------------------------------------------------------------------------

/**
 * Load configuration from file and/or environment.
 */
export function loadConfig(options: LoadConfigOptions = {}): MatrixConfig {
  const {
    configPath,
    overrides = {},
    applyEnv = true,
    env = process.env,
  } = options;

  let fileConfig: Record<string, unknown> = {};

  const resolvedPath = findConfigFile(configPath, env);

  if (resolvedPath) {
    fileConfig = loadConfigFile(resolvedPath);
  } else if (configPath) {
    throw new ConfigParseError(resolve(configPath), 'File not found');
  }

  let envConfig: Record<string, unknown> = {};
  if (applyEnv) {
    envConfig = loadEnvConfig(env);
  }

  // Merge configs: defaults < file < env < overrides
  const merged = deepMerge({}, fileConfig, envConfig, overrides);

  const result = MatrixConfigSchema.safeParse(merged);

  if (!result.success) {
    const errors = result.error.errors.map(
      (e) => `${e.path.join('.')}: ${e.message}`
    );
    throw new ConfigValidationError(errors);
  }

  return result.data;
}

/**
 * Validate a configuration object.
 */
export function validateConfig(config: unknown): ConfigValidationResult {
  const result = MatrixConfigSchema.safeParse(config);

  if (result.success) {
    return { valid: true, config: result.data };
  }

  return {
    valid: false,
    errors: result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
  };
}

// -----------------------------------------------------------------------------
// File Loading
// -----------------------------------------------------------------------------

/**
 * Find the configuration file.
 */
export function findConfigFile(explicitPath?: string, env: NodeJS.ProcessEnv = process.env): string | null {
  // Check explicit path
  if (explicitPath) {
    const resolved = resolve(explicitPath);
    if (existsSync(resolved)) {
      return resolved;
    }
    return null;
  }

  // Check environment variable
  const envPath = env[DEFAULT_CONFIG_ENV_VAR];
  if (envPath) {
    const resolved = resolve(envPath);
    if (existsSync(resolved)) {
      return resolved;
    }
  }

  // Check default paths
  for (const defaultPath of DEFAULT_CONFIG_PATHS) {
    const resolved = resolve(defaultPath);
    if (existsSync(resolved)) {
      return resolved;
    }
  }

  return null;
}

/**
 * Load configuration from a JSON file.
 */
function loadConfigFile(path: string): Record<string, unknown> {
  let parsed: unknown;

  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigParseError(path, error.message);
    }
    throw error;
  }

  if (!isRecord(parsed)) {
    throw new ConfigParseError(path, 'Top-level value must be an object');
  }

  return parsed;
}

// -----------------------------------------------------------------------------
// Environment Loading
// -----------------------------------------------------------------------------

/**
 * Load configuration from environment variables.
 *
 * Format: MATRIX_<SECTION>_<KEY>=value, KEY in SNAKE_CASE
 * Examples:
 *   MATRIX_DEVICE_HOST=192.168.1.100
 *   MATRIX_DEVICE_NUM_INPUTS=4
 *   MATRIX_POLLING_INTERVAL=60
 *   MATRIX_NAMES_INPUTS_1=Camera
 *   MATRIX_ENVIRONMENT=production
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || key === DEFAULT_CONFIG_ENV_VAR || !value) {
      continue;
    }

    const parts = key.substring(ENV_PREFIX.length).toLowerCase().split('_');
    const [section, ...rest] = parts;
    if (!section) {
      continue;
    }

    if (rest.length === 0) {
      config[section] = parseEnvValue(value);
    } else if (section === 'names') {
      // Display names stay strings: MATRIX_NAMES_<GROUP>_<INDEX>
      const [group, index] = rest;
      if (group && index && rest.length === 2) {
        setNestedValue(config, ['names', group, index], value);
      }
    } else {
      setNestedValue(config, [section, convertToCamelCase(rest)], parseEnvValue(value));
    }
  }

  return config;
}

/**
 * Parse an environment variable value to the appropriate type.
 */
function parseEnvValue(value: string): unknown {
  // Boolean
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  // Number
  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  // String
  return value;
}

/**
 * Set a nested value in an object using a path array.
 */
function setNestedValue(obj: Record<string, unknown>, path: string[], value: unknown): void {
  let current = obj;

  for (const key of path.slice(0, -1)) {
    const next = current[key];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[key] = created;
      current = created;
    }
  }

  const finalKey = path[path.length - 1];
  if (finalKey !== undefined) {
    current[finalKey] = value;
  }
}

/**
 * ['num', 'inputs'] -> 'numInputs'
 */
function convertToCamelCase(words: string[]): string {
  return words
    .map((word, i) => (i === 0 ? word : word.charAt(0).toUpperCase() + word.slice(1)))
    .join('');
}

// -----------------------------------------------------------------------------
// Deep Merge
// -----------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge objects (later objects override earlier).
 */
export function deepMerge(...objects: object[]): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const obj of objects) {
    for (const [key, value] of Object.entries(obj)) {
      const existing = result[key];

      if (isRecord(value) && isRecord(existing)) {
        result[key] = deepMerge(existing, value);
      } else if (value !== undefined) {
        result[key] = value;
      }
    }
  }

  return result;
}

// -----------------------------------------------------------------------------
// Errors
// -----------------------------------------------------------------------------

export class ConfigValidationError extends Error {
  constructor(public readonly errors: string[]) {
    super(`Configuration validation failed:\n  ${errors.join('\n  ')}`);
    this.name = 'ConfigValidationError';
  }
}

export class ConfigParseError extends Error {
  constructor(
    public readonly path: string,
    public readonly parseError: string
  ) {
    super(`Failed to parse config file '${path}': ${parseError}`);
    this.name = 'ConfigParseError';
  }
}
