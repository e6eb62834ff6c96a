import { parseBindAddress } from './PublishChannel';
import { BRIDGE_ERROR_CODES, isBridgeError } from '../shared/BridgeErrors';

describe('parseBindAddress', () => {
  test.each([
    ['tcp://*:5559', { host: '0.0.0.0', port: 5559 }],
    ['*:5559', { host: '0.0.0.0', port: 5559 }],
    ['5559', { host: '0.0.0.0', port: 5559 }],
    ['127.0.0.1:6000', { host: '127.0.0.1', port: 6000 }],
    ['ws://localhost:8080/', { host: 'localhost', port: 8080 }],
    ['[::1]:5559', { host: '::1', port: 5559 }],
  ])('should parse %s', (address, expected) => {
    expect(parseBindAddress(address)).toEqual(expected);
  });

  test.each(['tcp://*', 'localhost', 'tcp://*:abc', '70000', ''])('should reject %p as invalid config', (address) => {
    let caught: unknown;
    try {
      parseBindAddress(address);
    } catch (error) {
      caught = error;
    }

    expect(isBridgeError(caught, BRIDGE_ERROR_CODES.INVALID_CONFIG)).toBe(true);
  });
});
