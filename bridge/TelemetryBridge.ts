/**
 * Telemetry Bridge
 * Routes polled readings (or synthetic records) through aggregation, encoding and the
 * activation gate to the publish channel
 */

import { AggregationBuffer } from '../aggregation/AggregationBuffer';
import { ActivationGate } from '../aggregation/ActivationGate';
import { TelemetryFrameProtocol } from '../frame-protocol/TelemetryFrameProtocol';
import { SyntheticStreamer } from '../synthetic-source/SyntheticStreamer';
import { SyntheticSource } from '../synthetic-source/SyntheticSource';
import { PollingEngine, PollSubscription, DeviceAddress } from '../device-polling/PollingEngine';
import { DeviceAttribute, POLLED_ATTRIBUTES, attributeName, formatAttribute } from '../device-polling/DeviceAttributes';
import { PublishChannel } from '../publish-channel/PublishChannel';
import {
  TelemetryRecord,
  SingleRecord,
  PublishMode,
  CHANNEL_KINDS,
  isChannelName,
  toInt32,
} from '../shared/TelemetryTypes';
import { BridgeError, BRIDGE_ERROR_CODES, errorMessage } from '../shared/BridgeErrors';
import { StatusWriter, formatRecordLine, formatSingleRecordLine, stdoutStatusWriter } from '../shared/display';
import { Logger, createLogger } from '../shared/Logger';
import { validateMode } from './BridgeConfig';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface TelemetryBridgeConfig {
  mode: string;
  device: DeviceAddress;
  bindAddress: string;
  cycleSeconds: number;
  timeoutSeconds: number;
  verbose: boolean;
}

export interface TelemetryBridgeDeps {
  channel: PublishChannel;
  // Only needed for start()
  pollingEngine?: PollingEngine;
  logger?: Logger;
  statusWriter?: StatusWriter;
  clock?: () => number;
}

export interface SyntheticOptions {
  injectZero: boolean;
  source?: SyntheticSource;
}

export interface BridgeStats {
  readingsObserved: number;
  recordsCompleted: number;
  framesSent: number;
  framesSuppressed: number;
  unknownAttributes: number;
  emptyReadings: number;
  pollTimeouts: number;
  sendErrors: number;
}

type Worker =
  | { kind: 'poll'; subscription: PollSubscription }
  | { kind: 'synthetic'; streamer: SyntheticStreamer };

const DEFAULT_CONFIG: Omit<TelemetryBridgeConfig, 'device' | 'bindAddress'> = {
  mode: 'multi',
  cycleSeconds: 1 / 30,
  timeoutSeconds: 0.5,
  verbose: false,
} as const;

// ─────────────────────────────────────────────────────────────────────────────
// Bridge
// ─────────────────────────────────────────────────────────────────────────────

export class TelemetryBridge {
  private config: TelemetryBridgeConfig;
  private readonly mode: PublishMode;
  private readonly buffer = new AggregationBuffer();
  private readonly gate = new ActivationGate();

  private channel: PublishChannel;
  private pollingEngine: PollingEngine | null;
  private logger: Logger;
  private statusWriter: StatusWriter;
  private clock: () => number;

  private worker: Worker | null = null;
  private starting = false;
  private bound = false;
  private stopPromise: Promise<void> | null = null;

  private stats: BridgeStats = {
    readingsObserved: 0,
    recordsCompleted: 0,
    framesSent: 0,
    framesSuppressed: 0,
    unknownAttributes: 0,
    emptyReadings: 0,
    pollTimeouts: 0,
    sendErrors: 0,
  };

  constructor(
    config: Partial<TelemetryBridgeConfig> & Pick<TelemetryBridgeConfig, 'device' | 'bindAddress'>,
    deps: TelemetryBridgeDeps
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.mode = validateMode(this.config.mode);

    this.channel = deps.channel;
    this.pollingEngine = deps.pollingEngine ?? null;
    this.logger = deps.logger ?? createLogger('Bridge');
    this.statusWriter = deps.statusWriter ?? stdoutStatusWriter;
    this.clock = deps.clock ?? Date.now;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Bind the channel and subscribe to the polling engine for distance and velocity.
   */
  async start(): Promise<void> {
    this.claimWorkerSlot();

    try {
      const engine = this.pollingEngine;
      if (!engine) {
        throw new BridgeError(BRIDGE_ERROR_CODES.INVALID_CONFIG, 'No polling engine configured');
      }

      if (!(await this.bindChannel())) return;

      const subscription = engine.subscribe({
        address: this.config.device,
        attributes: POLLED_ATTRIBUTES,
        cycleMs: this.config.cycleSeconds * 1000,
        timeoutMs: this.config.timeoutSeconds * 1000,
        callback: (attribute, values) => this.observe(attribute, values),
        onTimeout: () => {
          this.stats.pollTimeouts++;
        },
      });
      this.worker = { kind: 'poll', subscription };

      this.logger.info(`Bridge started in ${this.mode} mode`);
    } finally {
      this.starting = false;
    }
  }

  /**
   * Bind the channel and publish generated records instead of polling the device.
   */
  async startSynthetic(options: SyntheticOptions): Promise<void> {
    this.claimWorkerSlot();

    try {
      const streamer = new SyntheticStreamer(
        { cycleSeconds: this.config.cycleSeconds, injectZero: options.injectZero },
        (record) => this.publishRecord(record),
        { source: options.source, logger: this.logger }
      );

      if (!(await this.bindChannel())) return;

      streamer.start();
      this.worker = { kind: 'synthetic', streamer };
    } finally {
      this.starting = false;
    }
  }

  /**
   * Stop the worker and close the channel. Repeated calls share one shutdown.
   */
  stop(): Promise<void> {
    if (!this.stopPromise) {
      this.stopPromise = this.shutdown();
    }
    return this.stopPromise;
  }

  private async shutdown(): Promise<void> {
    const worker = this.worker;
    this.worker = null;

    if (worker?.kind === 'poll') {
      await worker.subscription.stop();
    } else if (worker?.kind === 'synthetic') {
      worker.streamer.stop();
    }

    await this.channel.close();
    this.logger.info(
      `Bridge stopped: ${this.stats.framesSent} frames sent, ${this.stats.framesSuppressed} suppressed`
    );
  }

  private claimWorkerSlot(): void {
    if (this.stopPromise) {
      throw new BridgeError(BRIDGE_ERROR_CODES.WORKER_RUNNING, 'Bridge has been stopped');
    }
    if (this.worker || this.starting) {
      const running = this.worker?.kind ?? 'pending';
      throw new BridgeError(
        BRIDGE_ERROR_CODES.WORKER_RUNNING,
        `A ${running} worker is already running`,
        { worker: running }
      );
    }
    this.starting = true;
  }

  /**
   * Resolves false when stop() was requested while the channel was binding;
   * the channel's close() then owns releasing the socket.
   */
  private async bindChannel(): Promise<boolean> {
    if (!this.bound) {
      try {
        await this.channel.bind(this.config.bindAddress);
      } catch (error) {
        if (!this.stopPromise) throw error;
        this.logger.debug(`Bind abandoned by stop: ${errorMessage(error)}`);
        return false;
      }
      this.bound = true;
    }
    return !this.stopPromise;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Readings
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Polling callback. Never throws; bad readings are logged and dropped.
   */
  observe(attribute: DeviceAttribute, values: number[]): void {
    try {
      this.stats.readingsObserved++;

      if (values.length === 0) {
        this.stats.emptyReadings++;
        this.logger.warn(`Empty reading for ${formatAttribute(attribute)}`);
        return;
      }

      const timestamp = this.clock();
      const name = attributeName(attribute);

      if (this.mode === 'single') {
        this.observeSingle(name, values[0], timestamp);
        return;
      }

      const result = this.buffer.observe(name, values[0], timestamp);
      if (!result.success) {
        this.reportUnknown(result.error);
        return;
      }

      const record = this.buffer.tryComplete();
      if (record) {
        this.stats.recordsCompleted++;
        this.publishRecord(record);
      }
    } catch (error) {
      this.logger.error(`Failed to handle reading of ${formatAttribute(attribute)}: ${errorMessage(error)}`);
    }
  }

  private observeSingle(name: string, value: number, timestamp: number): void {
    if (!isChannelName(name)) {
      this.reportUnknown(new BridgeError(
        BRIDGE_ERROR_CODES.UNKNOWN_ATTRIBUTE,
        `Unknown attribute received: ${name}`,
        { name }
      ));
      return;
    }

    const record: SingleRecord = { ts: timestamp, kind: CHANNEL_KINDS[name], value: toInt32(value) };
    this.publish(TelemetryFrameProtocol.encodeSingle(record), () => formatSingleRecordLine(record));
  }

  private reportUnknown(error: BridgeError): void {
    this.stats.unknownAttributes++;
    this.logger.warn(error.message);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Publishing
  // ───────────────────────────────────────────────────────────────────────────

  private publishRecord(record: TelemetryRecord): void {
    this.publish(TelemetryFrameProtocol.encode(record), () => formatRecordLine(record));
  }

  private publish(frame: Buffer, statusLine: () => string): void {
    // Inactive: drop, never queue
    if (!this.gate.isActive()) {
      this.stats.framesSuppressed++;
      return;
    }

    try {
      this.channel.send(frame);
      this.stats.framesSent++;
    } catch (error) {
      this.stats.sendErrors++;
      this.logger.error(`Send failed: ${errorMessage(error)}`);
      return;
    }

    if (this.config.verbose) {
      this.statusWriter(statusLine());
    }
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Control
  // ───────────────────────────────────────────────────────────────────────────

  toggleActive(): boolean {
    const active = this.gate.toggle();
    this.logger.info(`Publishing ${active ? 'resumed' : 'paused'}`);
    return active;
  }

  isActive(): boolean {
    return this.gate.isActive();
  }

  getMode(): PublishMode {
    return this.mode;
  }

  getStats(): BridgeStats {
    return { ...this.stats };
  }
}
