/**
 * Matrix Switcher Control
 *
 * TCP control, state polling and preset tracking for HDMI matrix switchers.
 *
 * @packageDocumentation
 */

// Core components
export * from './core/index.js';

// Adapters
export * from './adapters/index.js';

// Transports
export * from './transports/index.js';

// Observability
export * from './observability/index.js';

// Configuration
export * from './config/index.js';

// Orchestration
export { MatrixController, DEFAULT_DEVICE_INFO } from './controller.js';
export type { ControllerOptions } from './controller.js';

export { VERSION } from './version.js';
