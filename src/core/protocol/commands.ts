/**
 * Command Factory
 *
 * Builds outbound protocol lines. Index arguments are validated against the
 * port layout before anything is built, so a rejected command never reaches
 * the wire.
 */

import type { Command, Endpoint } from './types.js';
import { CommandVerb, MAX_PRESET, MIN_PRESET } from './types.js';
import { CommandError } from './errors.js';

export type PortLayout = Pick<Endpoint, 'numInputs' | 'numOutputs'>;

// -----------------------------------------------------------------------------
// Validation
// -----------------------------------------------------------------------------

function isIndexInRange(value: number, min: number, max: number): boolean {
  return Number.isInteger(value) && value >= min && value <= max;
}

export function assertInput(layout: PortLayout, input: number): void {
  if (!isIndexInRange(input, 1, layout.numInputs)) {
    throw new CommandError(`Input must be 1-${layout.numInputs}, got ${input}`);
  }
}

export function assertOutput(layout: PortLayout, output: number): void {
  if (!isIndexInRange(output, 1, layout.numOutputs)) {
    throw new CommandError(`Output must be 1-${layout.numOutputs}, got ${output}`);
  }
}

export function assertPreset(preset: number): void {
  if (!isIndexInRange(preset, MIN_PRESET, MAX_PRESET)) {
    throw new CommandError(`Preset must be ${MIN_PRESET}-${MAX_PRESET}, got ${preset}`);
  }
}

/**
 * Zero-pad an index to two digits.
 */
export function pad2(value: number): string {
  return value.toString().padStart(2, '0');
}

// -----------------------------------------------------------------------------
// Queries
// -----------------------------------------------------------------------------

export function createModelQuery(): Command {
  return { verb: CommandVerb.QUERY_MODEL, line: '/*Type;' };
}

export function createFirmwareQuery(): Command {
  return { verb: CommandVerb.QUERY_FIRMWARE, line: '/^Version;' };
}

export function createStatusQuery(): Command {
  return { verb: CommandVerb.QUERY_STATUS, line: 'Status.' };
}

export function createOutputQuery(layout: PortLayout, output: number): Command {
  assertOutput(layout, output);
  return { verb: CommandVerb.QUERY_OUTPUT, line: `Status${pad2(output)}.` };
}

export function createPowerQuery(): Command {
  return { verb: CommandVerb.QUERY_POWER, line: '%9962.' };
}

export function createLockQuery(): Command {
  return { verb: CommandVerb.QUERY_LOCK, line: '%9961.' };
}

// -----------------------------------------------------------------------------
// Switching
// -----------------------------------------------------------------------------

export function createRouteCommand(layout: PortLayout, input: number, output: number): Command {
  assertInput(layout, input);
  assertOutput(layout, output);
  return { verb: CommandVerb.ROUTE, line: `${pad2(input)}V${pad2(output)}.` };
}

export function createRouteAllCommand(layout: PortLayout, input: number): Command {
  assertInput(layout, input);
  return { verb: CommandVerb.ROUTE_ALL, line: `${pad2(input)}All.` };
}

export function createOutputOffCommand(layout: PortLayout, output: number): Command {
  assertOutput(layout, output);
  return { verb: CommandVerb.OUTPUT_OFF, line: `${pad2(output)}$.` };
}

export function createOutputOnCommand(layout: PortLayout, output: number): Command {
  assertOutput(layout, output);
  return { verb: CommandVerb.OUTPUT_ON, line: `${pad2(output)}@.` };
}

export function createAllOffCommand(): Command {
  return { verb: CommandVerb.ALL_OFF, line: 'All$.' };
}

export function createAllThroughCommand(): Command {
  return { verb: CommandVerb.ALL_THROUGH, line: 'All#.' };
}

// -----------------------------------------------------------------------------
// Presets
// -----------------------------------------------------------------------------

export function createSavePresetCommand(preset: number): Command {
  assertPreset(preset);
  return { verb: CommandVerb.SAVE_PRESET, line: `Save${preset}.` };
}

export function createRecallPresetCommand(preset: number): Command {
  assertPreset(preset);
  return { verb: CommandVerb.RECALL_PRESET, line: `Recall${preset}.` };
}

export function createClearPresetCommand(preset: number): Command {
  assertPreset(preset);
  return { verb: CommandVerb.CLEAR_PRESET, line: `Clear${preset}.` };
}

// -----------------------------------------------------------------------------
// Power & Panel
// -----------------------------------------------------------------------------

export function createPowerOnCommand(): Command {
  return { verb: CommandVerb.POWER_ON, line: 'PWON.' };
}

export function createPowerOffCommand(): Command {
  return { verb: CommandVerb.POWER_OFF, line: 'PWOFF.' };
}

export function createStandbyCommand(): Command {
  return { verb: CommandVerb.STANDBY, line: 'STANDBY.' };
}

export function createLockCommand(): Command {
  return { verb: CommandVerb.LOCK, line: '/%Lock;' };
}

export function createUnlockCommand(): Command {
  return { verb: CommandVerb.UNLOCK, line: '/%Unlock;' };
}
