/**
 * PORTFOLIO ENGINE — Result & Error Contract
 *
 * Every core operation returns an EngineResult instead of throwing.
 * Codes are surfaced to callers as-is (HTTP layer maps them to status).
 */

export type EngineErrorCode =
  | 'INSUFFICIENT_DATA'
  | 'INSUFFICIENT_HISTORY'
  | 'INVALID_WEIGHTS'
  | 'DIMENSION_MISMATCH'
  | 'INVALID_PRICE'
  | 'INVALID_SERIES';

export const ENGINE_ERROR_CODES: readonly EngineErrorCode[] = [
  'INSUFFICIENT_DATA',
  'INSUFFICIENT_HISTORY',
  'INVALID_WEIGHTS',
  'DIMENSION_MISMATCH',
  'INVALID_PRICE',
  'INVALID_SERIES',
];

export interface EngineError {
  code: EngineErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export type EngineResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: EngineError };

export function success<T>(value: T): EngineResult<T> {
  return { ok: true, value };
}

export function failure<T>(
  code: EngineErrorCode,
  message: string,
  details?: Record<string, unknown>
): EngineResult<T> {
  return details
    ? { ok: false, error: { code, message, details } }
    : { ok: false, error: { code, message } };
}
