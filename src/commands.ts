/**
 * CLI Commands
 *
 * One-shot commands that mutate the device through the coordinator.
 */

import type { PollingCoordinator } from './core/coordinator/coordinator.js';
import type { RefreshResult } from './core/coordinator/types.js';

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export type CommandHandler = (coordinator: PollingCoordinator, params: string[]) => Promise<RefreshResult>;

export function parseNumber(value: string | undefined, what: string): number {
  if (value === undefined || !/^\d+$/.test(value)) {
    throw new UsageError(`Expected ${what} number, got '${value ?? ''}'`);
  }
  return parseInt(value, 10);
}

const COMMANDS = new Map<string, CommandHandler>([
  ['route', (c, [input, output]) => c.route(parseNumber(input, 'input'), parseNumber(output, 'output'))],
  ['route-all', (c, [input]) => c.routeToAll(parseNumber(input, 'input'))],
  ['off', (c, [output]) => c.switchOffOutput(parseNumber(output, 'output'))],
  ['on', (c, [output]) => c.switchOnOutput(parseNumber(output, 'output'))],
  ['all-off', (c) => c.switchOffAll()],
  ['all-through', (c) => c.allThrough()],
  ['recall', (c, [preset]) => c.recallPreset(parseNumber(preset, 'preset'))],
  ['save', (c, [preset]) => c.savePreset(parseNumber(preset, 'preset'))],
  ['clear', (c, [preset]) => c.clearPreset(parseNumber(preset, 'preset'))],
  ['lock', (c) => c.lockPanel()],
  ['unlock', (c) => c.unlockPanel()],
  [
    'power',
    (c, [state]) => {
      switch (state) {
        case 'on':
          return c.powerOn();
        case 'off':
          return c.powerOff();
        case 'standby':
          return c.standby();
        default:
          throw new UsageError(`Expected on, off or standby, got '${state ?? ''}'`);
      }
    },
  ],
]);

/**
 * Handler for a command name; UsageError for anything unknown.
 */
export function findCommand(name: string): CommandHandler {
  const handler = COMMANDS.get(name);
  if (!handler) {
    throw new UsageError(`Unknown command: ${name}`);
  }
  return handler;
}
