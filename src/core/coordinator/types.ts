/**
 * Coordinator Types
 */

import type { MatrixStatus, PowerState } from '../protocol/types.js';

// -----------------------------------------------------------------------------
// Options
// -----------------------------------------------------------------------------

export const MIN_POLL_INTERVAL = 5;
export const MAX_POLL_INTERVAL = 300;
export const DEFAULT_POLL_INTERVAL = 30;

export interface DisplayNames {
  inputs: Record<string, string>;
  outputs: Record<string, string>;
  presets: Record<string, string>;
}

export interface CoordinatorOptions {
  /** Seconds between scheduled refreshes, 5-300 */
  interval: number;
  /** Custom display names keyed by index */
  names: DisplayNames;
}

export const DEFAULT_COORDINATOR_OPTIONS: CoordinatorOptions = {
  interval: DEFAULT_POLL_INTERVAL,
  names: { inputs: {}, outputs: {}, presets: {} },
};

// -----------------------------------------------------------------------------
// Refresh Results
// -----------------------------------------------------------------------------

/**
 * Outcome of a best-effort fetch. A failure keeps the cached field.
 */
export type FetchOutcome<T> = { ok: true; value: T } | { ok: false; error: string };

export type RefreshResult =
  | {
      ok: true;
      status: MatrixStatus;
      power: FetchOutcome<PowerState>;
      lock: FetchOutcome<boolean>;
      completedAt: number;
    }
  | {
      ok: false;
      /** Why the mandatory status fetch failed */
      error: string;
      /** Last good status, unchanged by the failed refresh */
      status: MatrixStatus;
      completedAt: number;
    };

// -----------------------------------------------------------------------------
// Events
// -----------------------------------------------------------------------------

export type CoordinatorEvent =
  | { type: 'refreshed'; result: Extract<RefreshResult, { ok: true }> }
  | { type: 'refresh_failed'; error: string }
  | { type: 'preset_changed'; preset: number | null; previous: number | null };

export type CoordinatorEventHandler = (event: CoordinatorEvent) => void;
