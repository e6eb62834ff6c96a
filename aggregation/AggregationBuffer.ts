/**
 * Aggregation Buffer
 * Merges independently polled distance/velocity readings into combined records
 */

import {
  Reading,
  TelemetryRecord,
  ChannelName,
  TimestampMs,
  CHANNELS,
  isChannelName,
  toInt32,
} from '../shared/TelemetryTypes';
import { BridgeError, BridgeResult, BRIDGE_ERROR_CODES, ok, fail } from '../shared/BridgeErrors';

// ─────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────

export interface PartialStateSnapshot {
  distance: Reading | null;
  velocity: Reading | null;
  arrivalOrder: ChannelName[];
}

const COMPLETION_ORDER: readonly ChannelName[] = [CHANNELS.DISTANCE, CHANNELS.VELOCITY];

// ─────────────────────────────────────────────────────────────────
// Aggregation Buffer Implementation
// ─────────────────────────────────────────────────────────────────

/**
 * Holds the readings accumulated since the last completed record.
 *
 * Completion is order-sensitive: a record is ready only when the arrival order is
 * exactly [distance, velocity]. Observing a channel again overwrites its reading and
 * moves it to the end of the arrival order, so velocity → distance is not ready, but a
 * further velocity makes it [distance, velocity] and completes.
 *
 * observe() and tryComplete() are synchronous; a caller that runs them back to back
 * without awaiting in between gets them as one step.
 */
export class AggregationBuffer {
  private distance: Reading | null = null;
  private velocity: Reading | null = null;
  private arrivalOrder: ChannelName[] = [];

  observe(name: string, value: number, timestamp: TimestampMs): BridgeResult<Reading> {
    if (!isChannelName(name)) {
      return fail(new BridgeError(
        BRIDGE_ERROR_CODES.UNKNOWN_ATTRIBUTE,
        `Unknown attribute received: ${name}`,
        { name }
      ));
    }

    const reading: Reading = { name, value: toInt32(value), timestamp };

    if (name === CHANNELS.DISTANCE) {
      this.distance = reading;
    } else {
      this.velocity = reading;
    }

    this.arrivalOrder = this.arrivalOrder.filter((channel) => channel !== name);
    this.arrivalOrder.push(name);

    return ok(reading);
  }

  /**
   * Returns the combined record and clears the buffer, or null when not ready.
   */
  tryComplete(): TelemetryRecord | null {
    if (!this.isComplete() || !this.distance || !this.velocity) {
      return null;
    }

    const record: TelemetryRecord = {
      ts: this.distance.timestamp,
      distance: this.distance.value,
      velocity: this.velocity.value,
    };

    this.reset();
    return record;
  }

  isComplete(): boolean {
    return this.arrivalOrder.length === COMPLETION_ORDER.length
      && this.arrivalOrder.every((channel, index) => channel === COMPLETION_ORDER[index]);
  }

  snapshot(): PartialStateSnapshot {
    return {
      distance: this.distance ? { ...this.distance } : null,
      velocity: this.velocity ? { ...this.velocity } : null,
      arrivalOrder: [...this.arrivalOrder],
    };
  }

  reset(): void {
    this.distance = null;
    this.velocity = null;
    this.arrivalOrder = [];
  }
}
