#!/usr/bin/env node

/**
 * Matrix Switcher CLI
 *
 * Runs the polling controller, or sends a single command and exits.
 */

import { MatrixController } from './controller.js';
import { loadConfig, validateConfig } from './config/loader.js';
import { findCommand } from './commands.js';
import { routingToRecord } from './core/state/store.js';
import { describeError } from './core/protocol/errors.js';
import { getLogger } from './observability/logger.js';
import { VERSION } from './version.js';

// -----------------------------------------------------------------------------
// CLI Arguments
// -----------------------------------------------------------------------------

interface CliArgs {
  configPath?: string;
  validate?: boolean;
  help?: boolean;
  version?: boolean;
  command: string;
  params: string[];
}

function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = { command: 'run', params: [] };
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '-c':
      case '--config':
        result.configPath = args[++i];
        break;

      case '--validate':
        result.validate = true;
        break;

      case '-h':
      case '--help':
        result.help = true;
        break;

      case '-v':
      case '--version':
        result.version = true;
        break;

      default:
        if (arg !== undefined) {
          positional.push(arg);
        }
    }
  }

  const [command, ...params] = positional;
  if (command) {
    result.command = command;
    result.params = params;
  }

  return result;
}

// -----------------------------------------------------------------------------
// Help & Version
// -----------------------------------------------------------------------------

function printHelp(): void {
  console.log(`
Matrix Switcher Control

Usage: matrix-switcher [options] [command]

Options:
  -c, --config <path>   Path to configuration file
  --validate            Validate configuration and exit
  -h, --help            Show this help message
  -v, --version         Show version number

Commands:
  run                   Poll the device and serve metrics/health (default)
  info                  Show model and firmware
  status                Show routing, power and panel lock
  route <in> <out>      Route an input to an output
  route-all <in>        Route an input to every output
  off <out>             Switch an output off
  on <out>              Switch an output back on
  all-off               Switch every output off
  all-through           Route input N to output N
  recall <preset>       Recall a preset (0-9)
  save <preset>         Save current routing to a preset
  clear <preset>        Clear a preset
  lock | unlock         Lock or unlock the front panel
  power <on|off|standby>

Environment Variables:
  MATRIX_CONFIG_PATH    Path to configuration file
  MATRIX_*              Configuration overrides, e.g. MATRIX_DEVICE_HOST

Examples:
  matrix-switcher -c ./matrix.json              Start polling
  matrix-switcher route 2 5                     Send input 2 to output 5
  MATRIX_DEVICE_HOST=10.0.0.20 matrix-switcher status
`);
}

function printVersion(): void {
  console.log(VERSION);
}

// -----------------------------------------------------------------------------
// Validation Mode
// -----------------------------------------------------------------------------

function runValidation(configPath?: string): void {
  try {
    const config = loadConfig({ configPath });
    const result = validateConfig(config);

    if (result.valid) {
      console.log('✓ Configuration is valid');
      console.log('\nLoaded configuration:');
      console.log(JSON.stringify(config, null, 2));
      process.exit(0);
    } else {
      console.error('✗ Configuration is invalid:');
      for (const error of result.errors ?? []) {
        console.error(`  - ${error}`);
      }
      process.exit(1);
    }
  } catch (error) {
    console.error('✗ Failed to load configuration:');
    console.error(`  ${describeError(error)}`);
    process.exit(1);
  }
}

// -----------------------------------------------------------------------------
// One-shot Commands
// -----------------------------------------------------------------------------

function printStatus(controller: MatrixController): void {
  const coordinator = controller.getCoordinator();
  const { model, firmware } = controller.getDeviceInfo();
  const status = coordinator.status;

  console.log(`Model:     ${model}`);
  console.log(`Firmware:  ${firmware}`);
  console.log(`Power:     ${status.powerState}`);
  console.log(`Panel:     ${status.locked ? 'locked' : 'unlocked'}`);

  const preset = coordinator.currentPreset;
  console.log(`Preset:    ${preset === null ? '-' : coordinator.getPresetName(preset)}`);
  console.log('');

  for (const [output, input] of Object.entries(routingToRecord(status.outputs))) {
    const source = input === null ? 'off' : coordinator.getInputName(input);
    console.log(`  ${coordinator.getOutputName(Number(output)).padEnd(20)} <- ${source}`);
  }
}

async function runCommand(controller: MatrixController, command: string, params: string[]): Promise<void> {
  if (command === 'info') {
    const { model, firmware } = controller.getDeviceInfo();
    const { numInputs, numOutputs } = controller.getClient().layout;
    console.log(`${model} (firmware ${firmware}), ${numInputs}x${numOutputs}`);
    return;
  }

  if (command === 'status') {
    printStatus(controller);
    return;
  }

  const result = await findCommand(command)(controller.getCoordinator(), params);
  if (!result.ok) {
    console.error(`Command sent, but the follow-up refresh failed: ${result.error}`);
  }
  printStatus(controller);
}

async function runOnce(configPath: string | undefined, command: string, params: string[]): Promise<void> {
  const config = loadConfig({ configPath, overrides: { environment: 'production' } });
  const controller = new MatrixController(config, { serve: false, poll: false });

  try {
    await controller.start();
    await runCommand(controller, command, params);
  } finally {
    await controller.stop();
  }
}

// -----------------------------------------------------------------------------
// Long-running Mode
// -----------------------------------------------------------------------------

async function runController(configPath?: string): Promise<void> {
  const controller = new MatrixController(loadConfig({ configPath }));

  // Handle shutdown signals
  const shutdown = async (signal: string) => {
    getLogger().info({ signal }, 'Received shutdown signal');
    await controller.stop();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  // Handle uncaught errors
  process.on('uncaughtException', (error) => {
    getLogger().fatal({ err: error }, 'Uncaught exception');
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    getLogger().fatal({ reason }, 'Unhandled rejection');
    process.exit(1);
  });

  await controller.start();

  const config = controller.getConfig();
  const { model, firmware } = controller.getDeviceInfo();
  console.log(`
Matrix Switcher Control v${VERSION}
  Device:    ${config.device.host}:${config.device.port} (${model}, ${firmware})
  Layout:    ${config.device.numInputs} inputs x ${config.device.numOutputs} outputs
  Polling:   ${config.polling.enabled ? `every ${config.polling.interval}s` : 'disabled'}
  Metrics:   ${config.metrics.enabled ? `http://localhost:${config.metrics.port}${config.metrics.path}` : 'disabled'}
  Health:    ${config.health.enabled ? `http://localhost:${config.health.port}/health` : 'disabled'}
`);
}

// -----------------------------------------------------------------------------
// Main
// -----------------------------------------------------------------------------

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    printHelp();
    process.exit(0);
  }

  if (args.version) {
    printVersion();
    process.exit(0);
  }

  if (args.validate) {
    runValidation(args.configPath);
    return;
  }

  if (args.command === 'run') {
    await runController(args.configPath);
  } else {
    await runOnce(args.configPath, args.command, args.params);
  }
}

main().catch((error: unknown) => {
  console.error(`Error: ${describeError(error)}`);
  process.exit(1);
});
