/**
 * Display Helpers
 * Status-line rendering for verbose mode
 */

import { TelemetryRecord, SingleRecord, TimestampMs } from './TelemetryTypes';

const STATUS_LINE_WIDTH = 80;

/**
 * Format one published sample, e.g.
 * "2024-03-01T12:00:00.250 - 1709294400.250000,     2512,       360.00"
 * padded with spaces to 80 columns so a shorter line fully overwrites a longer one.
 */
export function formatStatusLine(ts: TimestampMs, field1: number, field2: number): string {
  const iso = new Date(ts).toISOString().replace(/Z$/, '');
  const seconds = (ts / 1000).toFixed(6);
  const line = `${iso} - ${seconds}, ${field1.toFixed(0).padStart(8)}, ${field2.toFixed(2).padStart(12)}`;
  return line.padEnd(STATUS_LINE_WIDTH);
}

export function formatRecordLine(record: TelemetryRecord): string {
  return formatStatusLine(record.ts, record.distance, record.velocity);
}

export function formatSingleRecordLine(record: SingleRecord): string {
  return formatStatusLine(record.ts, record.kind, record.value);
}

export type StatusWriter = (line: string) => void;

// Rewrites the current terminal line in place
export const stdoutStatusWriter: StatusWriter = (line) => {
  process.stdout.write(`\r${line}`);
};
