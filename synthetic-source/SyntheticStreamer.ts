/**
 * Synthetic Streamer
 * Paced worker that drives SyntheticSource at a fixed cadence
 */

import { SyntheticSource } from './SyntheticSource';
import { TelemetryRecord } from '../shared/TelemetryTypes';
import { BridgeError, BRIDGE_ERROR_CODES, errorMessage } from '../shared/BridgeErrors';
import { Logger, createLogger } from '../shared/Logger';

export interface SyntheticStreamerConfig {
  cycleSeconds: number;
  injectZero: boolean;
  // Distance the first velocity is computed against; defaults to the source's base distance
  initialDistance?: number;
}

export interface SyntheticStreamerStats {
  ticks: number;
  overruns: number;
  errors: number;
}

export type SyntheticRecordHandler = (record: TelemetryRecord) => void;

export class SyntheticStreamer {
  private config: SyntheticStreamerConfig;
  private source: SyntheticSource;
  private onRecord: SyntheticRecordHandler;
  private logger: Logger;
  private clock: () => number;

  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private prevDistance: number;
  private stats: SyntheticStreamerStats = { ticks: 0, overruns: 0, errors: 0 };

  constructor(
    config: SyntheticStreamerConfig,
    onRecord: SyntheticRecordHandler,
    deps: { source?: SyntheticSource; logger?: Logger; clock?: () => number } = {}
  ) {
    if (!(config.cycleSeconds > 0)) {
      throw new BridgeError(
        BRIDGE_ERROR_CODES.INVALID_CONFIG,
        `Synthetic cycle must be positive, got ${config.cycleSeconds}`,
        { cycleSeconds: config.cycleSeconds }
      );
    }

    this.config = { ...config };
    this.onRecord = onRecord;
    this.source = deps.source ?? new SyntheticSource();
    this.logger = deps.logger ?? createLogger('Synthetic');
    this.clock = deps.clock ?? Date.now;
    this.prevDistance = config.initialDistance ?? this.source.baseDistance;
  }

  start(): void {
    if (this.running) {
      this.logger.debug('Already running');
      return;
    }

    this.running = true;
    this.logger.info(
      `Streaming synthetic records every ${(this.config.cycleSeconds * 1000).toFixed(1)}ms` +
      (this.config.injectZero ? ' (zero injection)' : '')
    );
    this.scheduleNext(0);
  }

  stop(): void {
    if (!this.running) return;

    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.logger.info(`Stopped after ${this.stats.ticks} ticks`);
  }

  isRunning(): boolean {
    return this.running;
  }

  getStats(): SyntheticStreamerStats {
    return { ...this.stats };
  }

  private scheduleNext(delayMs: number): void {
    this.timer = setTimeout(() => this.runCycle(), delayMs);
  }

  private runCycle(): void {
    this.timer = null;
    if (!this.running) return;

    const cycleMs = this.config.cycleSeconds * 1000;
    const startedAt = this.clock();

    try {
      const { record, prevDistance } = this.source.tick(
        this.prevDistance,
        this.config.cycleSeconds,
        this.config.injectZero
      );
      this.prevDistance = prevDistance;
      this.stats.ticks++;
      this.onRecord(record);
    } catch (error) {
      this.stats.errors++;
      this.logger.error(`Synthetic tick failed: ${errorMessage(error)}`);
    }

    // onRecord may have stopped the streamer
    if (!this.running) return;

    // Sleep the rest of the cycle; an overrun fires the next tick right away, once
    const remaining = cycleMs - (this.clock() - startedAt);
    if (remaining <= 0) {
      this.stats.overruns++;
    }
    this.scheduleNext(Math.max(0, remaining));
  }
}
