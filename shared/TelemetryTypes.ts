/**
 * Telemetry Types
 * Shared data model for readings, aggregated records and single-channel records
 */

// ─────────────────────────────────────────────────────────────────
// Logical channels
// ─────────────────────────────────────────────────────────────────

export const CHANNELS = {
  DISTANCE: 'distance',
  VELOCITY: 'velocity',
} as const;

export type ChannelName = typeof CHANNELS[keyof typeof CHANNELS];

export const ALL_CHANNELS: readonly ChannelName[] = [CHANNELS.DISTANCE, CHANNELS.VELOCITY];

// Channel kind as carried in field1 of a single-mode frame
export const CHANNEL_KINDS = {
  distance: 1,
  velocity: 2,
} as const satisfies Record<ChannelName, number>;

export type ChannelKind = typeof CHANNEL_KINDS[ChannelName];

export function isChannelName(name: string): name is ChannelName {
  return name === CHANNELS.DISTANCE || name === CHANNELS.VELOCITY;
}

export function channelForKind(kind: number): ChannelName | null {
  if (kind === CHANNEL_KINDS.distance) return CHANNELS.DISTANCE;
  if (kind === CHANNEL_KINDS.velocity) return CHANNELS.VELOCITY;
  return null;
}

// ─────────────────────────────────────────────────────────────────
// Data model
// ─────────────────────────────────────────────────────────────────

// Milliseconds since Unix epoch
export type TimestampMs = number;

export interface Reading {
  name: ChannelName;
  value: number;          // int32
  timestamp: TimestampMs; // uint64
}

/** Aggregated multi-mode sample; ts is taken from the distance reading. */
export interface TelemetryRecord {
  ts: TimestampMs;
  distance: number;
  velocity: number;
}

/** Per-reading sample emitted in single mode. */
export interface SingleRecord {
  ts: TimestampMs;
  kind: ChannelKind;
  value: number;
}

export type PublishMode = 'single' | 'multi';

export const PUBLISH_MODES: readonly PublishMode[] = ['single', 'multi'];

export function isPublishMode(mode: string): mode is PublishMode {
  return mode === 'single' || mode === 'multi';
}

// ─────────────────────────────────────────────────────────────────
// Integer helpers
// ─────────────────────────────────────────────────────────────────

/**
 * Two's-complement wrap to int32 (e.g. 2^31 becomes -2^31).
 * Non-integers are truncated toward zero first.
 */
export function toInt32(value: number): number {
  return Math.trunc(value) | 0;
}
