/**
 * Channel Auth
 * Optional username/password gate checked on the subscriber's upgrade request (HTTP basic auth)
 */

import { timingSafeEqual } from 'crypto';
import { BridgeError, BRIDGE_ERROR_CODES } from '../shared/BridgeErrors';

export interface ChannelCredentials {
  username: string;
  password: string;
}

export const CREDENTIAL_ENV = {
  USERNAME: 'PUBLISHER_USERNAME',
  PASSWORD: 'PUBLISHER_PASSWORD',
} as const;

/**
 * Read credentials from the environment. Neither variable set means an open channel;
 * only one of them set is a configuration error.
 */
export function loadChannelCredentials(env: NodeJS.ProcessEnv = process.env): ChannelCredentials | null {
  const username = env[CREDENTIAL_ENV.USERNAME] ?? '';
  const password = env[CREDENTIAL_ENV.PASSWORD] ?? '';

  if (!username && !password) return null;

  if (!username || !password) {
    throw new BridgeError(
      BRIDGE_ERROR_CODES.INVALID_CONFIG,
      `Both ${CREDENTIAL_ENV.USERNAME} and ${CREDENTIAL_ENV.PASSWORD} must be set to protect the channel`
    );
  }

  return { username, password };
}

export function isAuthorized(authorizationHeader: string | undefined, credentials: ChannelCredentials): boolean {
  if (!authorizationHeader) return false;

  const match = /^Basic\s+([A-Za-z0-9+/=]+)$/i.exec(authorizationHeader.trim());
  if (!match) return false;

  const decoded = Buffer.from(match[1], 'base64').toString('utf8');
  const separator = decoded.indexOf(':');
  if (separator < 0) return false;

  const usernameMatches = safeEqual(decoded.slice(0, separator), credentials.username);
  const passwordMatches = safeEqual(decoded.slice(separator + 1), credentials.password);
  return usernameMatches && passwordMatches;
}

function safeEqual(actual: string, expected: string): boolean {
  const a = Buffer.from(actual, 'utf8');
  const b = Buffer.from(expected, 'utf8');
  return a.length === b.length && timingSafeEqual(a, b);
}
