import { describe, it, expect } from 'vitest';
import { alignPrices } from '../services/price_aligner.service.js';
import { seriesOf } from './fixtures.js';

describe('Price Aligner', () => {

  it('keeps only dates present in every series, in chronological order', () => {
    const a = seriesOf('BTC', ['2024-01-01', '2024-01-02', '2024-01-03', '2024-01-04'], [10, 11, 12, 13]);
    const b = seriesOf('ETH', ['2024-01-02', '2024-01-04', '2024-01-05'], [20, 21, 22]);

    const result = alignPrices([a, b]);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.assets).toEqual(['BTC', 'ETH']);
    expect(result.value.dates).toEqual(['2024-01-02', '2024-01-04']);
    expect(result.value.prices).toEqual([[11, 20], [13, 21]]);
  });

  it('keeps the caller asset order', () => {
    const dates = ['2024-01-01', '2024-01-02'];
    const result = alignPrices([seriesOf('SOL', dates, [1, 2]), seriesOf('BTC', dates, [3, 4])]);

    expect(result.ok && result.value.assets).toEqual(['SOL', 'BTC']);
    expect(result.ok && result.value.prices).toEqual([[1, 3], [2, 4]]);
  });

  it('does not forward-fill a gap', () => {
    const a = seriesOf('BTC', ['2024-01-01', '2024-01-02', '2024-01-03'], [1, 2, 3]);
    const b = seriesOf('ETH', ['2024-01-01', '2024-01-03'], [5, 6]);

    const result = alignPrices([a, b]);

    expect(result.ok && result.value.dates).toEqual(['2024-01-01', '2024-01-03']);
  });

  it('rejects an empty input list', () => {
    const result = alignPrices([]);
    expect(!result.ok && result.error.code).toBe('INSUFFICIENT_DATA');
  });

  it('rejects an empty series', () => {
    const result = alignPrices([seriesOf('BTC', ['2024-01-01'], [1]), { asset: 'ETH', points: [] }]);
    expect(!result.ok && result.error.code).toBe('INSUFFICIENT_DATA');
    expect(!result.ok && result.error.details).toEqual({ asset: 'ETH' });
  });

  it('rejects series without any common date', () => {
    const result = alignPrices([
      seriesOf('BTC', ['2024-01-01', '2024-01-02'], [1, 2]),
      seriesOf('ETH', ['2024-01-03', '2024-01-04'], [1, 2]),
    ]);
    expect(!result.ok && result.error.code).toBe('INSUFFICIENT_DATA');
  });

  it('enforces minRows', () => {
    const series = [
      seriesOf('BTC', ['2024-01-01', '2024-01-02'], [1, 2]),
      seriesOf('ETH', ['2024-01-02', '2024-01-03'], [1, 2]),
    ];

    expect(alignPrices(series).ok).toBe(true);

    const strict = alignPrices(series, { minRows: 2 });
    expect(!strict.ok && strict.error.code).toBe('INSUFFICIENT_DATA');
    expect(!strict.ok && strict.error.details).toEqual({ rows: 1, minRows: 2 });
  });

  it('rejects duplicate assets', () => {
    const s = seriesOf('BTC', ['2024-01-01'], [1]);
    const result = alignPrices([s, s]);
    expect(!result.ok && result.error.code).toBe('INVALID_SERIES');
  });

  it('rejects dates that are not strictly increasing', () => {
    const result = alignPrices([seriesOf('BTC', ['2024-01-02', '2024-01-01'], [1, 2])]);
    expect(!result.ok && result.error.code).toBe('INVALID_SERIES');
  });

  it('rejects unparseable dates', () => {
    const result = alignPrices([seriesOf('BTC', ['yesterday'], [1])]);
    expect(!result.ok && result.error.code).toBe('INVALID_SERIES');
  });

  it('rejects non-positive prices', () => {
    const result = alignPrices([seriesOf('BTC', ['2024-01-01', '2024-01-02'], [1, 0])]);
    expect(!result.ok && result.error.code).toBe('INVALID_PRICE');
    expect(!result.ok && result.error.details).toEqual({ asset: 'BTC', date: '2024-01-02', price: 0 });
  });

  it('matches the same instant written as a date and as a timestamp', () => {
    const a = seriesOf('BTC', ['2024-01-01', '2024-01-02'], [10, 11]);
    const b = seriesOf('ETH', ['2024-01-01T00:00:00Z', '2024-01-02T00:00:00Z'], [20, 21]);

    const result = alignPrices([a, b]);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.dates).toEqual(['2024-01-01', '2024-01-02']);
    expect(result.value.prices).toEqual([[10, 20], [11, 21]]);
  });
});
