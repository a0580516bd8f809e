import type { MarketDataError } from '../modules/market-data/market_data.contract.js';

export class AppError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly statusCode = 500,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }
}

const STATUS_BY_CODE: Record<MarketDataError['code'], number> = {
  INVALID_WEIGHTS: 400,
  DIMENSION_MISMATCH: 400,
  INVALID_SERIES: 400,
  INVALID_PRICE: 400,
  INSUFFICIENT_DATA: 422,
  INSUFFICIENT_HISTORY: 422,
  UPSTREAM_UNAVAILABLE: 502,
};

export function fromEngineError(error: MarketDataError): AppError {
  return new AppError(error.code, error.message, STATUS_BY_CODE[error.code], error.details);
}
