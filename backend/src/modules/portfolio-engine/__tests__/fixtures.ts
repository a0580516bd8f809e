import type {
  AlignedPriceTable,
  AssetPriceSeries,
} from '../contracts/portfolio.contract.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/** n consecutive YYYY-MM-DD dates starting at start */
export function dailyDates(start: string, n: number): string[] {
  const base = Date.parse(start);
  return Array.from({ length: n }, (_, i) => new Date(base + i * DAY_MS).toISOString().split('T')[0]);
}

/** Build a table from per-asset columns */
export function tableOf(
  dates: string[],
  columns: Record<string, number[]>
): AlignedPriceTable {
  const assets = Object.keys(columns);
  return {
    assets,
    dates,
    prices: dates.map((_, t) => assets.map(a => columns[a][t])),
  };
}

export function seriesOf(asset: string, dates: string[], closes: number[]): AssetPriceSeries {
  return {
    asset,
    points: dates.map((date, i) => ({ date, close: closes[i] })),
  };
}
