/**
 * REBALANCE SCHEDULE
 *
 * Marks which timestamps are rebalancing boundaries.
 * Index 0 is never a boundary: the initial allocation happens there.
 */

import type { BoundaryRule, RebalancingFrequency } from '../contracts/portfolio.contract.js';
import { STRIDE_DAYS } from '../contracts/portfolio.contract.js';
import { dayKey, daysBetween, isoWeekKey, monthKey, parseDateMs } from '../utils/dates.js';

type PeriodKeyFn = (ms: number) => string;

const CALENDAR_KEYS: Record<Exclude<RebalancingFrequency, 'none'>, PeriodKeyFn> = {
  daily: dayKey,
  weekly: isoWeekKey,
  monthly: monthKey,
};

/**
 * Dates must already be validated (parseable, increasing).
 */
export function rebalanceBoundaries(
  dates: readonly string[],
  frequency: RebalancingFrequency,
  rule: BoundaryRule = 'calendar'
): boolean[] {
  const flags = new Array<boolean>(dates.length).fill(false);
  if (frequency === 'none' || dates.length < 2) return flags;

  const ms = dates.map(d => parseDateMs(d) ?? Number.NaN);

  if (rule === 'stride') {
    const stride = STRIDE_DAYS[frequency];
    let prevBucket = 0;
    for (let t = 1; t < ms.length; t++) {
      const bucket = Math.floor(daysBetween(ms[0], ms[t]) / stride);
      if (bucket !== prevBucket) {
        flags[t] = true;
        prevBucket = bucket;
      }
    }
    return flags;
  }

  const keyOf = CALENDAR_KEYS[frequency];
  let prevKey = keyOf(ms[0]);
  for (let t = 1; t < ms.length; t++) {
    const key = keyOf(ms[t]);
    if (key !== prevKey) flags[t] = true;
    prevKey = key;
  }

  return flags;
}
