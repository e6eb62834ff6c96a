/**
 * Aggregation Buffer Tests
 */

import { AggregationBuffer } from './AggregationBuffer';
import { BRIDGE_ERROR_CODES } from '../shared/BridgeErrors';

describe('AggregationBuffer', () => {
  let buffer: AggregationBuffer;

  beforeEach(() => {
    buffer = new AggregationBuffer();
  });

  describe('Completion', () => {
    test('should complete distance then velocity exactly once', () => {
      buffer.observe('distance', 2512, 1000);
      buffer.observe('velocity', 360, 1020);

      expect(buffer.tryComplete()).toEqual({ ts: 1000, distance: 2512, velocity: 360 });
      expect(buffer.tryComplete()).toBeNull();
    });

    test('should not complete with only one channel', () => {
      buffer.observe('distance', 2512, 1000);

      expect(buffer.tryComplete()).toBeNull();
      expect(buffer.snapshot().arrivalOrder).toEqual(['distance']);
    });

    test('should not complete velocity then distance', () => {
      buffer.observe('velocity', 360, 1000);
      buffer.observe('distance', 2512, 1020);

      expect(buffer.tryComplete()).toBeNull();
      expect(buffer.snapshot().arrivalOrder).toEqual(['velocity', 'distance']);
    });

    test('should complete once a later velocity reorders the keys', () => {
      buffer.observe('velocity', 360, 1000);
      buffer.observe('distance', 2512, 1020);
      expect(buffer.tryComplete()).toBeNull();

      buffer.observe('velocity', 390, 1040);

      expect(buffer.tryComplete()).toEqual({ ts: 1020, distance: 2512, velocity: 390 });
    });

    test('should keep a repeated velocity as a single key', () => {
      buffer.observe('velocity', 1, 1000);
      buffer.observe('velocity', 2, 1010);

      const snapshot = buffer.snapshot();
      expect(snapshot.arrivalOrder).toEqual(['velocity']);
      expect(snapshot.velocity).toEqual({ name: 'velocity', value: 2, timestamp: 1010 });
    });

    test('should use the latest distance when distance repeats before velocity', () => {
      buffer.observe('distance', 2400, 1000);
      buffer.observe('distance', 2450, 1033);
      buffer.observe('velocity', 1500, 1040);

      expect(buffer.tryComplete()).toEqual({ ts: 1033, distance: 2450, velocity: 1500 });
    });

    test('should start a fresh epoch after completion', () => {
      buffer.observe('distance', 2512, 1000);
      buffer.observe('velocity', 360, 1020);
      buffer.tryComplete();

      buffer.observe('velocity', 100, 1040);

      expect(buffer.tryComplete()).toBeNull();
      expect(buffer.snapshot()).toEqual({
        distance: null,
        velocity: { name: 'velocity', value: 100, timestamp: 1040 },
        arrivalOrder: ['velocity'],
      });
    });

    test('should leave partial state untouched when not ready', () => {
      buffer.observe('distance', 2512, 1000);
      const before = buffer.snapshot();

      buffer.tryComplete();

      expect(buffer.snapshot()).toEqual(before);
    });
  });

  describe('Unknown attributes', () => {
    test('should reject an unknown name and leave partial state unchanged', () => {
      buffer.observe('distance', 2512, 1000);
      const before = buffer.snapshot();

      const result = buffer.observe('unknown', 5, 1010);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(BRIDGE_ERROR_CODES.UNKNOWN_ATTRIBUTE);
        expect(result.error.message).toBe('Unknown attribute received: unknown');
      }
      expect(buffer.snapshot()).toEqual(before);
    });
  });

  describe('Values', () => {
    test('should wrap out-of-range values to int32', () => {
      const result = buffer.observe('distance', 2 ** 32 + 5, 1000);

      expect(result).toEqual({ success: true, value: { name: 'distance', value: 5, timestamp: 1000 } });
    });
  });

  describe('reset', () => {
    test('should clear all pending readings', () => {
      buffer.observe('distance', 2512, 1000);
      buffer.reset();
      buffer.observe('velocity', 360, 1020);

      expect(buffer.tryComplete()).toBeNull();
      expect(buffer.snapshot().distance).toBeNull();
    });
  });
});
