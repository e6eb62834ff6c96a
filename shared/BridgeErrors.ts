/**
 * Bridge error taxonomy.
 *
 * Data-shape problems (unknown attribute, empty reading, malformed frame) travel as
 * error values inside a {@link BridgeResult}; configuration and resource failures
 * (invalid mode, invalid config, bind failure) are thrown as {@link BridgeError}.
 */

export const BRIDGE_ERROR_CODES = {
  UNKNOWN_ATTRIBUTE: 'UNKNOWN_ATTRIBUTE',
  EMPTY_READING: 'EMPTY_READING',
  MALFORMED_FRAME: 'MALFORMED_FRAME',
  BIND_FAILURE: 'BIND_FAILURE',
  POLL_TIMEOUT: 'POLL_TIMEOUT',
  INVALID_MODE: 'INVALID_MODE',
  INVALID_CONFIG: 'INVALID_CONFIG',
  WORKER_RUNNING: 'WORKER_RUNNING',
} as const;

export type BridgeErrorCode = typeof BRIDGE_ERROR_CODES[keyof typeof BRIDGE_ERROR_CODES];

export class BridgeError extends Error {
  readonly code: BridgeErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: BridgeErrorCode, message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BridgeError';
    this.code = code;
    this.details = details;
  }
}

export function isBridgeError(error: unknown, code?: BridgeErrorCode): error is BridgeError {
  return error instanceof BridgeError && (code === undefined || error.code === code);
}

export type BridgeResult<T> =
  | { success: true; value: T }
  | { success: false; error: BridgeError };

export function ok<T>(value: T): BridgeResult<T> {
  return { success: true, value };
}

export function fail<T>(error: BridgeError): BridgeResult<T> {
  return { success: false, error };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
