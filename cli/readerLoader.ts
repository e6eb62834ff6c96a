/**
 * Reader Loader
 * Loads the AttributeReader factory of an industrial-protocol client from a module path
 */

import path from 'path';
import { AttributeReader, AttributeReaderFactory, DeviceAddress } from '../device-polling/PollingEngine';
import { BridgeError, BRIDGE_ERROR_CODES, errorMessage } from '../shared/BridgeErrors';

/**
 * The module must export `createReader(address)` (or a default function) returning an
 * object with `read(attribute, timeoutMs)`.
 */
export async function loadReaderFactory(modulePath: string): Promise<AttributeReaderFactory> {
  const specifier = modulePath.startsWith('.') || path.isAbsolute(modulePath)
    ? path.resolve(modulePath)
    : modulePath;

  let loaded: unknown;
  try {
    loaded = await import(specifier);
  } catch (error) {
    throw new BridgeError(
      BRIDGE_ERROR_CODES.INVALID_CONFIG,
      `Cannot load reader module ${modulePath}: ${errorMessage(error)}`,
      { modulePath },
      { cause: error }
    );
  }

  const createReader = pickFactory(loaded);
  if (!createReader) {
    throw new BridgeError(
      BRIDGE_ERROR_CODES.INVALID_CONFIG,
      `Reader module ${modulePath} must export a createReader function`,
      { modulePath }
    );
  }

  return (address: DeviceAddress) => {
    const reader: unknown = createReader(address);
    if (!isAttributeReader(reader)) {
      throw new BridgeError(
        BRIDGE_ERROR_CODES.INVALID_CONFIG,
        `createReader in ${modulePath} did not return an object with read()`,
        { modulePath }
      );
    }
    return reader;
  };
}

function pickFactory(loaded: unknown): ((address: DeviceAddress) => unknown) | null {
  if (typeof loaded !== 'object' || loaded === null) return null;

  if ('createReader' in loaded && typeof loaded.createReader === 'function') {
    const factory = loaded.createReader;
    return (address) => factory(address);
  }
  if ('default' in loaded && typeof loaded.default === 'function') {
    const factory = loaded.default;
    return (address) => factory(address);
  }
  return null;
}

export function isAttributeReader(value: unknown): value is AttributeReader {
  return typeof value === 'object'
    && value !== null
    && 'read' in value
    && typeof value.read === 'function';
}
