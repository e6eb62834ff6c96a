/**
 * Synthetic Source
 * Generates distance/velocity records for running the bridge without a sensor
 */

import { TelemetryRecord, TimestampMs, toInt32 } from '../shared/TelemetryTypes';
import { BridgeError, BRIDGE_ERROR_CODES } from '../shared/BridgeErrors';

export const SYNTHETIC_DEFAULTS = {
  BASE_DISTANCE: 2500,
  JITTER: 500,
} as const;

export interface SyntheticSourceOptions {
  baseDistance: number;
  jitter: number;
  // Uniform in [0, 1)
  random: () => number;
  now: () => TimestampMs;
}

export interface SyntheticTick {
  record: TelemetryRecord;
  prevDistance: number;
}

const DEFAULT_OPTIONS: SyntheticSourceOptions = {
  baseDistance: SYNTHETIC_DEFAULTS.BASE_DISTANCE,
  jitter: SYNTHETIC_DEFAULTS.JITTER,
  random: Math.random,
  now: Date.now,
};

export class SyntheticSource {
  private options: SyntheticSourceOptions;

  constructor(options: Partial<SyntheticSourceOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  get baseDistance(): number {
    return this.options.baseDistance;
  }

  /**
   * Produce one record. Velocity is the first difference against prevDistance
   * divided by the cycle length, rounded to an integer; it approximates the
   * sensor's own velocity channel rather than a true derivative.
   */
  tick(prevDistance: number, cycleSeconds: number, injectZero: boolean): SyntheticTick {
    if (!(cycleSeconds > 0)) {
      throw new BridgeError(
        BRIDGE_ERROR_CODES.INVALID_CONFIG,
        `Synthetic cycle must be positive, got ${cycleSeconds}`,
        { cycleSeconds }
      );
    }

    const distance = injectZero ? 0 : this.options.baseDistance + this.nextJitter();
    const velocity = toInt32(Math.round((distance - prevDistance) / cycleSeconds));

    return {
      record: { ts: this.options.now(), distance, velocity },
      prevDistance: distance,
    };
  }

  // Uniform integer in [-jitter, +jitter]
  private nextJitter(): number {
    const { jitter, random } = this.options;
    return Math.floor(random() * (2 * jitter + 1)) - jitter;
  }
}
