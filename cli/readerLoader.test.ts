import path from 'path';
import { isAttributeReader, loadReaderFactory } from './readerLoader';
import { SENSOR_ATTRIBUTES } from '../device-polling/DeviceAttributes';
import { BRIDGE_ERROR_CODES } from '../shared/BridgeErrors';

const FIXTURES = path.join(__dirname, '__fixtures__');

describe('loadReaderFactory', () => {
  test('should load createReader from a module path', async () => {
    const createReader = await loadReaderFactory(path.join(FIXTURES, 'fakeReader'));
    const reader = createReader({ host: '10.0.0.5', port: 1234 });

    await expect(reader.read(SENSOR_ATTRIBUTES.distance, 100)).resolves.toEqual([1234]);
    await expect(reader.read(SENSOR_ATTRIBUTES.velocity, 100)).resolves.toEqual([7]);
  });

  test('should reject a module without a createReader function', async () => {
    const modulePath = path.join(FIXTURES, 'notAReader');

    await expect(loadReaderFactory(modulePath)).rejects.toMatchObject({
      code: BRIDGE_ERROR_CODES.INVALID_CONFIG,
      message: `Reader module ${modulePath} must export a createReader function`,
    });
  });

  test('should reject a module that cannot be loaded', async () => {
    await expect(loadReaderFactory(path.join(FIXTURES, 'missingReader'))).rejects.toMatchObject({
      code: BRIDGE_ERROR_CODES.INVALID_CONFIG,
    });
  });
});

describe('isAttributeReader', () => {
  test('should require a read function', () => {
    expect(isAttributeReader({ read: async () => [1] })).toBe(true);
    expect(isAttributeReader({ read: 1 })).toBe(false);
    expect(isAttributeReader(null)).toBe(false);
  });
});
