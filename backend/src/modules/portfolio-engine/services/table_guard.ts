/**
 * Shape checks for caller-supplied price tables.
 * Tables built by the aligner always pass; hand-built ones may not.
 */

import type { AlignedPriceTable } from '../contracts/portfolio.contract.js';
import { EngineResult, failure, success } from '../contracts/engine_result.contract.js';
import { parseDateMs } from '../utils/dates.js';

/**
 * One price row per date, one value per asset, dates parseable and strictly increasing
 */
export function checkTableShape(table: AlignedPriceTable): EngineResult<true> {
  if (table.prices.length !== table.dates.length) {
    return failure('DIMENSION_MISMATCH', `Got ${table.prices.length} price rows for ${table.dates.length} dates`, {
      rows: table.prices.length,
      dates: table.dates.length,
    });
  }

  let prevMs = -Infinity;

  for (let t = 0; t < table.dates.length; t++) {
    const date = table.dates[t];
    const row = table.prices[t];

    if (row.length !== table.assets.length) {
      return failure('DIMENSION_MISMATCH', `Price row ${date} has ${row.length} values`, {
        date,
        width: row.length,
        expected: table.assets.length,
      });
    }

    const ms = parseDateMs(date);
    if (ms === null) {
      return failure('INVALID_SERIES', `Unparseable date '${date}'`, { date });
    }
    if (ms <= prevMs) {
      return failure('INVALID_SERIES', `Dates not strictly increasing at ${date}`, { date });
    }
    prevMs = ms;
  }

  return success(true);
}
