/**
 * Command-line surface of the bridge
 */

import { Command, InvalidArgumentError } from 'commander';
import { BridgeConfigInput, DEFAULT_BRIDGE_CONFIG } from '../bridge/BridgeConfig';
import { PUBLISH_MODES } from '../shared/TelemetryTypes';

export interface CliOptions {
  deviceHost?: string;
  devicePort?: number;
  bind?: string;
  cycle?: number;
  timeout?: number;
  mode?: string;
  verbose?: boolean;
  synthetic?: boolean;
  injectZero?: boolean;
  reader?: string;
  logFile?: string;
}

export type CliHandler = (options: CliOptions) => Promise<void>;

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

function parsePort(value: string): number {
  const parsed = parseNumber(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

export function buildProgram(handler: CliHandler): Command {
  const defaults = DEFAULT_BRIDGE_CONFIG;
  const program = new Command();

  program
    .name('distance-bridge')
    .description('Publish distance sensor readings as 16-byte telemetry frames')
    .version('1.0.0')
    .option('--device-host <host>', `sensor IP address (default: ${defaults.deviceHost})`)
    .option('--device-port <port>', `sensor EtherNet/IP port (default: ${defaults.devicePort})`, parsePort)
    .option('--bind <address>', `publish address (default: ${defaults.bindAddress})`)
    .option('--cycle <seconds>', `poll/publish cycle in seconds (default: ${defaults.cycleSeconds.toFixed(4)})`, parseNumber)
    .option('--timeout <seconds>', `per-read timeout in seconds (default: ${defaults.timeoutSeconds})`, parseNumber)
    .option('--mode <mode>', `${PUBLISH_MODES.join(' | ')}: one frame per reading or per distance/velocity pair (default: ${defaults.mode})`)
    .option('--verbose', 'print a status line for every published frame (default)')
    .option('--no-verbose', 'do not print status lines')
    .option('--synthetic', 'publish generated data instead of polling the sensor')
    .option('--inject-zero', 'with --synthetic, publish zero distance')
    .option('--reader <module>', 'module exporting createReader(address) for the sensor protocol')
    .option('--log-file <path>', 'also write logs to this file')
    .action(async (options: CliOptions) => {
      await handler(options);
    });

  return program;
}

export function toConfigInput(options: CliOptions): BridgeConfigInput {
  return {
    deviceHost: options.deviceHost,
    devicePort: options.devicePort,
    bindAddress: options.bind,
    cycleSeconds: options.cycle,
    timeoutSeconds: options.timeout,
    mode: options.mode,
    verbose: options.verbose,
    synthetic: options.synthetic,
    injectZero: options.injectZero,
  };
}
