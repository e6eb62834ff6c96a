/**
 * Bridge Configuration
 * Defaults and validation for the bridge, its device connection and publish channel
 */

import { PublishMode, PUBLISH_MODES, isPublishMode } from '../shared/TelemetryTypes';
import { BridgeError, BRIDGE_ERROR_CODES } from '../shared/BridgeErrors';
import { parseBindAddress } from '../publish-channel/PublishChannel';

export interface BridgeConfig {
  deviceHost: string;
  devicePort: number;
  bindAddress: string;
  cycleSeconds: number;
  timeoutSeconds: number;
  mode: PublishMode;
  verbose: boolean;
  synthetic: boolean;
  injectZero: boolean;
}

// Raw input, e.g. from the command line; mode is checked before it is trusted
export type BridgeConfigInput = Partial<Omit<BridgeConfig, 'mode'>> & { mode?: string };

export const DEFAULT_BRIDGE_CONFIG: BridgeConfig = {
  deviceHost: '192.168.101.217',
  devicePort: 44818, // EtherNet/IP
  bindAddress: 'tcp://*:5559',
  cycleSeconds: 1 / 30,
  timeoutSeconds: 0.5,
  mode: 'multi',
  verbose: true,
  synthetic: false,
  injectZero: false,
} as const;

export function validateMode(mode: string): PublishMode {
  if (!isPublishMode(mode)) {
    throw new BridgeError(
      BRIDGE_ERROR_CODES.INVALID_MODE,
      `Unsupported publish mode: ${mode} (expected one of: ${PUBLISH_MODES.join(', ')})`,
      { mode }
    );
  }
  return mode;
}

/**
 * Merge input over the defaults and validate the result.
 * Throws INVALID_MODE for an unknown mode and INVALID_CONFIG for anything else.
 */
export function resolveBridgeConfig(input: BridgeConfigInput = {}): BridgeConfig {
  const defaults = DEFAULT_BRIDGE_CONFIG;
  const config: BridgeConfig = {
    deviceHost: input.deviceHost ?? defaults.deviceHost,
    devicePort: input.devicePort ?? defaults.devicePort,
    bindAddress: input.bindAddress ?? defaults.bindAddress,
    cycleSeconds: input.cycleSeconds ?? defaults.cycleSeconds,
    timeoutSeconds: input.timeoutSeconds ?? defaults.timeoutSeconds,
    mode: validateMode(input.mode ?? defaults.mode),
    verbose: input.verbose ?? defaults.verbose,
    synthetic: input.synthetic ?? defaults.synthetic,
    injectZero: input.injectZero ?? defaults.injectZero,
  };

  requirePositive('cycleSeconds', config.cycleSeconds);
  requirePositive('timeoutSeconds', config.timeoutSeconds);

  if (!config.deviceHost.trim()) {
    throw invalid('deviceHost must not be empty', { deviceHost: config.deviceHost });
  }

  if (!Number.isInteger(config.devicePort) || config.devicePort < 1 || config.devicePort > 65535) {
    throw invalid(`devicePort must be an integer in 1-65535, got ${config.devicePort}`, { devicePort: config.devicePort });
  }

  // Throws INVALID_CONFIG itself
  parseBindAddress(config.bindAddress);

  return config;
}

function requirePositive(name: keyof BridgeConfig, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw invalid(`${name} must be a positive number of seconds, got ${value}`, { [name]: value });
  }
}

function invalid(message: string, details: Record<string, unknown>): BridgeError {
  return new BridgeError(BRIDGE_ERROR_CODES.INVALID_CONFIG, message, details);
}
