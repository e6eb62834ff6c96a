/**
 * Interval Polling Engine
 * Reads every subscribed attribute once per cycle through an AttributeReader
 */

import {
  PollingEngine,
  PollSubscription,
  PollSubscriptionRequest,
  AttributeReader,
  AttributeReaderFactory,
} from './PollingEngine';
import { DeviceAttribute, formatAttribute } from './DeviceAttributes';
import { errorMessage } from '../shared/BridgeErrors';
import { Logger, createLogger } from '../shared/Logger';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface IntervalPollingConfig {
  // Minimum spacing between timeout log lines
  timeoutLogIntervalMs: number;
}

export interface PollStats {
  cycles: number;
  reads: number;
  timeouts: number;
  readErrors: number;
  callbackErrors: number;
}

type Settled<T> =
  | { status: 'ok'; value: T }
  | { status: 'timeout' }
  | { status: 'error'; error: unknown }
  | { status: 'aborted' };

const DEFAULT_CONFIG: IntervalPollingConfig = {
  timeoutLogIntervalMs: 10000,
} as const;

// ─────────────────────────────────────────────────────────────────────────────
// Subscription
// ─────────────────────────────────────────────────────────────────────────────

class IntervalSubscription implements PollSubscription {
  private timer: NodeJS.Timeout | null = null;
  private currentCycle: Promise<void> | null = null;
  private stopPromise: Promise<void> | null = null;
  private stopped = false;
  private connected = false;
  private connectAttempted = false;
  private connectFailureReported = false;
  // Settles the device call currently awaited, so stop() need not wait for it
  private abortPending: (() => void) | null = null;

  private lastTimeoutLogAt = Number.NEGATIVE_INFINITY;
  private suppressedTimeouts = 0;

  readonly stats: PollStats = { cycles: 0, reads: 0, timeouts: 0, readErrors: 0, callbackErrors: 0 };

  constructor(
    private readonly request: PollSubscriptionRequest,
    private readonly reader: AttributeReader,
    private readonly config: IntervalPollingConfig,
    private readonly logger: Logger
  ) {}

  start(): void {
    this.logger.info(
      `Polling ${this.request.attributes.length} attributes on ${this.request.address.host}:${this.request.address.port} ` +
      `every ${this.request.cycleMs.toFixed(1)}ms (timeout ${this.request.timeoutMs}ms)`
    );
    this.scheduleNext(0);
  }

  stop(): Promise<void> {
    if (!this.stopPromise) {
      this.stopPromise = this.shutdown();
    }
    return this.stopPromise;
  }

  private async shutdown(): Promise<void> {
    this.stopped = true;

    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }

    this.abortPending?.();

    if (this.currentCycle) {
      await this.currentCycle;
    }

    // A connect abandoned by stop() may still complete; close() tears it down too
    if ((this.connected || this.connectAttempted) && this.reader.close) {
      try {
        await this.reader.close();
      } catch (error) {
        this.logger.warn(`Reader close failed: ${errorMessage(error)}`);
      }
    }
    this.connected = false;

    this.logger.info(`Polling stopped after ${this.stats.cycles} cycles`);
  }

  private scheduleNext(delayMs: number): void {
    if (this.stopped) return;

    this.timer = setTimeout(() => {
      this.timer = null;
      this.currentCycle = this.runCycle()
        .catch((error) => {
          this.logger.error(`Poll cycle failed: ${errorMessage(error)}`);
        })
        .finally(() => {
          this.currentCycle = null;
        });
    }, delayMs);
  }

  private async runCycle(): Promise<void> {
    const startedAt = Date.now();

    try {
      if (!(await this.ensureConnected())) return;

      this.stats.cycles++;

      for (const attribute of this.request.attributes) {
        if (this.stopped) return;

        const outcome = await this.readWithTimeout(attribute);
        if (this.stopped) return;

        this.handleOutcome(attribute, outcome);
      }
    } finally {
      // Cycles never overlap; an overrun starts the next one immediately
      const elapsed = Date.now() - startedAt;
      this.scheduleNext(Math.max(0, this.request.cycleMs - elapsed));
    }
  }

  private async ensureConnected(): Promise<boolean> {
    if (this.connected) return true;
    if (!this.reader.connect) {
      this.connected = true;
      return true;
    }

    this.connectAttempted = true;
    const outcome = await this.settle(this.reader.connect(this.request.address), null);
    if (outcome.status === 'ok') {
      this.connected = true;
      this.connectFailureReported = false;
      this.logger.info(`Connected to ${this.request.address.host}:${this.request.address.port}`);
      return true;
    }
    if (outcome.status !== 'error') return false;

    const message = `Connection to ${this.request.address.host}:${this.request.address.port} failed: ${errorMessage(outcome.error)}`;
    // Retried every cycle; only the first failure of a streak is a warning
    if (this.connectFailureReported) {
      this.logger.debug(message);
    } else {
      this.logger.warn(message);
      this.connectFailureReported = true;
    }
    return false;
  }

  private readWithTimeout(attribute: DeviceAttribute): Promise<Settled<number[]>> {
    return this.settle(this.reader.read(attribute, this.request.timeoutMs), this.request.timeoutMs);
  }

  /**
   * Race a device call against an optional timeout and stop().
   * Only the first outcome counts; a late result of an abandoned call is ignored.
   */
  private settle<T>(work: Promise<T>, timeoutMs: number | null): Promise<Settled<T>> {
    return new Promise<Settled<T>>((resolve) => {
      let done = false;
      let timeoutTimer: NodeJS.Timeout | null = null;

      const finish = (outcome: Settled<T>): void => {
        if (done) return;
        done = true;
        if (timeoutTimer) clearTimeout(timeoutTimer);
        this.abortPending = null;
        resolve(outcome);
      };

      if (timeoutMs !== null) {
        timeoutTimer = setTimeout(() => finish({ status: 'timeout' }), timeoutMs);
      }
      this.abortPending = () => finish({ status: 'aborted' });

      work.then(
        (value) => finish({ status: 'ok', value }),
        (error: unknown) => finish({ status: 'error', error })
      );
    });
  }

  private handleOutcome(attribute: DeviceAttribute, outcome: Settled<number[]>): void {
    switch (outcome.status) {
      case 'ok':
        this.stats.reads++;
        try {
          this.request.callback(attribute, outcome.value);
        } catch (error) {
          this.stats.callbackErrors++;
          this.logger.error(`Callback failed for ${formatAttribute(attribute)}: ${errorMessage(error)}`);
        }
        break;

      case 'timeout':
        this.stats.timeouts++;
        this.request.onTimeout?.(attribute);
        this.logTimeout(attribute);
        break;

      case 'error':
        this.stats.readErrors++;
        this.logger.warn(`Read of ${formatAttribute(attribute)} failed: ${errorMessage(outcome.error)}`);
        break;

      case 'aborted':
        break;
    }
  }

  // Timeouts are expected while the device is unreachable; keep the log readable
  private logTimeout(attribute: DeviceAttribute): void {
    const now = Date.now();
    if (now - this.lastTimeoutLogAt < this.config.timeoutLogIntervalMs) {
      this.suppressedTimeouts++;
      return;
    }

    const suppressed = this.suppressedTimeouts > 0 ? ` (${this.suppressedTimeouts} more since last report)` : '';
    this.logger.debug(`Read of ${formatAttribute(attribute)} timed out after ${this.request.timeoutMs}ms${suppressed}`);
    this.lastTimeoutLogAt = now;
    this.suppressedTimeouts = 0;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Engine
// ─────────────────────────────────────────────────────────────────────────────

export class IntervalPollingEngine implements PollingEngine {
  private config: IntervalPollingConfig;
  private createReader: AttributeReaderFactory;
  private logger: Logger;

  constructor(
    createReader: AttributeReaderFactory,
    config: Partial<IntervalPollingConfig> = {},
    logger: Logger = createLogger('Polling')
  ) {
    this.createReader = createReader;
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.logger = logger;
  }

  subscribe(request: PollSubscriptionRequest): PollSubscription & { readonly stats: PollStats } {
    const subscription = new IntervalSubscription(
      request,
      this.createReader(request.address),
      this.config,
      this.logger
    );
    subscription.start();
    return subscription;
  }
}
