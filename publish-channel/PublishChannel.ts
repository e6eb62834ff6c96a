/**
 * Publish channel contract and bind-address parsing
 */

import { BridgeError, BRIDGE_ERROR_CODES } from '../shared/BridgeErrors';

/**
 * Best-effort fan-out of binary frames.
 * send() never blocks; each subscriber keeps only the newest unsent frame.
 */
export interface PublishChannel {
  bind(address: string): Promise<void>;
  send(frame: Buffer): void;
  close(): Promise<void>;
}

export interface BindAddress {
  host: string;
  port: number;
}

const ANY_HOST = '0.0.0.0';
const ADDRESS_PATTERN = /^(?:[a-z]+:\/\/)?(?:(\*|\[[^\]]+\]|[^:/]+):)?(\d+)\/?$/i;

/**
 * Accepts "tcp://*:5559", "*:5559", "127.0.0.1:5559", "ws://localhost:5559" or a bare "5559".
 * "*" and a missing host bind every interface.
 */
export function parseBindAddress(address: string): BindAddress {
  const match = ADDRESS_PATTERN.exec(address.trim());
  if (!match) {
    throw new BridgeError(BRIDGE_ERROR_CODES.INVALID_CONFIG, `Invalid bind address: ${address}`, { address });
  }

  const [, rawHost, rawPort] = match;
  const port = Number(rawPort);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new BridgeError(BRIDGE_ERROR_CODES.INVALID_CONFIG, `Invalid bind port: ${rawPort}`, { address });
  }

  let host = rawHost === undefined || rawHost === '*' ? ANY_HOST : rawHost;
  if (host.startsWith('[') && host.endsWith(']')) {
    host = host.slice(1, -1);
  }

  return { host, port };
}
