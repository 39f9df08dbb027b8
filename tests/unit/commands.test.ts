/**
 * CLI Command Unit Tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import { findCommand, parseNumber, UsageError } from '../../src/commands.js';
import { MatrixClient } from '../../src/adapters/matrix/client.js';
import { PollingCoordinator } from '../../src/core/coordinator/coordinator.js';

describe('findCommand', () => {
  const coordinator = new PollingCoordinator(new MatrixClient({ host: '127.0.0.1' }));

  afterEach(async () => {
    await coordinator.stop();
  });

  it('should find every documented command', () => {
    for (const name of ['route', 'route-all', 'off', 'on', 'all-off', 'all-through', 'recall', 'save', 'clear', 'lock', 'unlock', 'power']) {
      expect(typeof findCommand(name)).toBe('function');
    }
  });

  it('should reject names inherited from Object.prototype', () => {
    for (const name of ['toString', 'constructor', 'hasOwnProperty', '__proto__']) {
      expect(() => findCommand(name)).toThrow(UsageError);
    }
    expect(() => findCommand('toString')).toThrow('Unknown command: toString');
  });

  it('should validate arguments before sending anything', () => {
    expect(() => findCommand('route')(coordinator, ['two', '1'])).toThrow("Expected input number, got 'two'");
    expect(() => findCommand('power')(coordinator, ['sideways'])).toThrow(
      "Expected on, off or standby, got 'sideways'"
    );
  });
});

describe('parseNumber', () => {
  it('should accept plain digits only', () => {
    expect(parseNumber('07', 'output')).toBe(7);
    expect(() => parseNumber('-1', 'output')).toThrow(UsageError);
    expect(() => parseNumber(undefined, 'preset')).toThrow("Expected preset number, got ''");
  });
});
