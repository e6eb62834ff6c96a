import { isAuthorized, loadChannelCredentials } from './ChannelAuth';
import { BRIDGE_ERROR_CODES, isBridgeError } from '../shared/BridgeErrors';

const CREDENTIALS = { username: 'subscriber', password: 'test-secret' };

function basic(value: string): string {
  return `Basic ${Buffer.from(value, 'utf8').toString('base64')}`;
}

describe('ChannelAuth', () => {
  describe('loadChannelCredentials', () => {
    test('should return null when neither variable is set', () => {
      expect(loadChannelCredentials({})).toBeNull();
    });

    test('should read both variables', () => {
      const env = { PUBLISHER_USERNAME: 'subscriber', PUBLISHER_PASSWORD: 'test-secret' };
      expect(loadChannelCredentials(env)).toEqual(CREDENTIALS);
    });

    test('should reject a username without a password', () => {
      expect(() => loadChannelCredentials({ PUBLISHER_USERNAME: 'subscriber' })).toThrow(
        'Both PUBLISHER_USERNAME and PUBLISHER_PASSWORD must be set to protect the channel'
      );

      let caught: unknown;
      try {
        loadChannelCredentials({ PUBLISHER_PASSWORD: 'test-secret' });
      } catch (error) {
        caught = error;
      }
      expect(isBridgeError(caught, BRIDGE_ERROR_CODES.INVALID_CONFIG)).toBe(true);
    });
  });

  describe('isAuthorized', () => {
    test('should accept matching credentials', () => {
      expect(isAuthorized(basic('subscriber:test-secret'), CREDENTIALS)).toBe(true);
    });

    test('should accept a lowercase scheme', () => {
      const header = basic('subscriber:test-secret').replace('Basic', 'basic');
      expect(isAuthorized(header, CREDENTIALS)).toBe(true);
    });

    test('should keep colons inside the password', () => {
      const credentials = { username: 'subscriber', password: 'a:b' };
      expect(isAuthorized(basic('subscriber:a:b'), credentials)).toBe(true);
    });

    test.each([
      ['missing header', undefined],
      ['wrong password', basic('subscriber:wrong')],
      ['wrong username', basic('other:test-secret')],
      ['no separator', basic('subscriber')],
      ['other scheme', 'Bearer test-secret'],
    ])('should reject %s', (_label, header) => {
      expect(isAuthorized(header, CREDENTIALS)).toBe(false);
    });
  });
});
