/**
 * Telemetry Frame Protocol
 *
 * Fixed 16-byte little-endian frame shared by both publish modes:
 * - [0:8)   uint64 timestamp (ms since Unix epoch)
 * - [8:12)  int32 field1 (multi: distance, single: channel kind)
 * - [12:16) int32 field2 (multi: velocity, single: value)
 *
 * int32 fields wrap by two's complement; the timestamp is truncated to an
 * integer and wrapped modulo 2^64.
 */

import {
  TelemetryRecord,
  SingleRecord,
  CHANNEL_KINDS,
  channelForKind,
  toInt32,
} from '../shared/TelemetryTypes';
import { BridgeError, BridgeResult, BRIDGE_ERROR_CODES, ok, fail } from '../shared/BridgeErrors';

export const FRAME_PROTOCOL = {
  VERSION: 1,
  FRAME_SIZE: 16,
  OFFSETS: {
    TIMESTAMP: 0,
    FIELD1: 8,
    FIELD2: 12,
  },
} as const;

type FrameInput = ArrayBuffer | Uint8Array;

export class TelemetryFrameProtocol {
  // Serialize an aggregated record (field1 = distance, field2 = velocity)
  static encode(record: TelemetryRecord): Buffer {
    return this.writeFrame(record.ts, record.distance, record.velocity);
  }

  // Serialize a single-channel record (field1 = kind, field2 = value)
  static encodeSingle(record: SingleRecord): Buffer {
    return this.writeFrame(record.ts, record.kind, record.value);
  }

  static decode(frame: FrameInput): BridgeResult<TelemetryRecord> {
    const fields = this.readFrame(frame);
    if (!fields.success) return fields;

    const [ts, distance, velocity] = fields.value;
    return ok({ ts, distance, velocity });
  }

  static decodeSingle(frame: FrameInput): BridgeResult<SingleRecord> {
    const fields = this.readFrame(frame);
    if (!fields.success) return fields;

    const [ts, kindValue, value] = fields.value;
    const channel = channelForKind(kindValue);
    if (!channel) {
      return fail(new BridgeError(
        BRIDGE_ERROR_CODES.MALFORMED_FRAME,
        `Unknown channel kind in single frame: ${kindValue}`,
        { kind: kindValue }
      ));
    }

    return ok({ ts, kind: CHANNEL_KINDS[channel], value });
  }

  private static writeFrame(ts: number, field1: number, field2: number): Buffer {
    const buffer = Buffer.alloc(FRAME_PROTOCOL.FRAME_SIZE);

    buffer.writeBigUInt64LE(BigInt.asUintN(64, BigInt(Math.trunc(ts))), FRAME_PROTOCOL.OFFSETS.TIMESTAMP);
    buffer.writeInt32LE(toInt32(field1), FRAME_PROTOCOL.OFFSETS.FIELD1);
    buffer.writeInt32LE(toInt32(field2), FRAME_PROTOCOL.OFFSETS.FIELD2);

    return buffer;
  }

  private static readFrame(frame: FrameInput): BridgeResult<[number, number, number]> {
    if (frame.byteLength !== FRAME_PROTOCOL.FRAME_SIZE) {
      return fail(new BridgeError(
        BRIDGE_ERROR_CODES.MALFORMED_FRAME,
        `Invalid frame size: ${frame.byteLength}, expected: ${FRAME_PROTOCOL.FRAME_SIZE}`,
        { size: frame.byteLength }
      ));
    }

    const view = frame instanceof ArrayBuffer
      ? new DataView(frame)
      : new DataView(frame.buffer, frame.byteOffset, frame.byteLength);

    return ok([
      Number(view.getBigUint64(FRAME_PROTOCOL.OFFSETS.TIMESTAMP, true)),
      view.getInt32(FRAME_PROTOCOL.OFFSETS.FIELD1, true),
      view.getInt32(FRAME_PROTOCOL.OFFSETS.FIELD2, true),
    ]);
  }
}
