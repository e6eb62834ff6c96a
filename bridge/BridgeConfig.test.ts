import { BridgeConfigInput, DEFAULT_BRIDGE_CONFIG, resolveBridgeConfig, validateMode } from './BridgeConfig';
import { BRIDGE_ERROR_CODES, BridgeErrorCode, isBridgeError } from '../shared/BridgeErrors';

function errorCodeOf(action: () => unknown): BridgeErrorCode | null {
  try {
    action();
  } catch (error) {
    return isBridgeError(error) ? error.code : null;
  }
  return null;
}

describe('BridgeConfig', () => {
  test('should return the defaults for empty input', () => {
    expect(resolveBridgeConfig()).toEqual(DEFAULT_BRIDGE_CONFIG);
    expect(DEFAULT_BRIDGE_CONFIG).toMatchObject({
      deviceHost: '192.168.101.217',
      devicePort: 44818,
      bindAddress: 'tcp://*:5559',
      timeoutSeconds: 0.5,
      mode: 'multi',
      verbose: true,
    });
  });

  test('should keep defaults for fields given as undefined', () => {
    const config = resolveBridgeConfig({ deviceHost: undefined, mode: 'single', cycleSeconds: 0.05 });

    expect(config.deviceHost).toBe('192.168.101.217');
    expect(config.mode).toBe('single');
    expect(config.cycleSeconds).toBe(0.05);
  });

  test('should reject an unknown mode with INVALID_MODE', () => {
    expect(errorCodeOf(() => resolveBridgeConfig({ mode: 'batch' }))).toBe(BRIDGE_ERROR_CODES.INVALID_MODE);
    expect(() => validateMode('batch')).toThrow('Unsupported publish mode: batch (expected one of: single, multi)');
  });

  const invalidInputs: Array<[string, BridgeConfigInput]> = [
    ['zero cycle', { cycleSeconds: 0 }],
    ['NaN timeout', { timeoutSeconds: Number.NaN }],
    ['empty host', { deviceHost: ' ' }],
    ['port out of range', { devicePort: 70000 }],
    ['fractional port', { devicePort: 44818.5 }],
    ['bad bind address', { bindAddress: 'tcp://*' }],
  ];

  test.each(invalidInputs)('should reject %s with INVALID_CONFIG', (_label, input) => {
    expect(errorCodeOf(() => resolveBridgeConfig(input))).toBe(BRIDGE_ERROR_CODES.INVALID_CONFIG);
  });
});
