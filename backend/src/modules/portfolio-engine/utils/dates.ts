/**
 * Date helpers (UTC only).
 */

const DAY_MS = 24 * 60 * 60 * 1000;

export function parseDateMs(date: string): number | null {
  const ms = Date.parse(date);
  return Number.isFinite(ms) ? ms : null;
}

export function toIsoDate(ms: number): string {
  return new Date(ms).toISOString().split('T')[0];
}

export function subtractDays(dateStr: string, days: number): string {
  const d = new Date(dateStr);
  d.setUTCDate(d.getUTCDate() - days);
  return toIsoDate(d.getTime());
}

export function dayKey(ms: number): string {
  return toIsoDate(ms);
}

/**
 * ISO-8601 week key, e.g. 2021-W01 for 2021-01-04.
 * Week belongs to the year of its Thursday.
 */
export function isoWeekKey(ms: number): string {
  const d = new Date(ms);
  const dayNum = d.getUTCDay() || 7;
  const thursday = Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate() + 4 - dayNum);
  const year = new Date(thursday).getUTCFullYear();
  const yearStart = Date.UTC(year, 0, 1);
  const week = Math.ceil(((thursday - yearStart) / DAY_MS + 1) / 7);
  return `${year}-W${String(week).padStart(2, '0')}`;
}

export function monthKey(ms: number): string {
  const d = new Date(ms);
  return `${d.getUTCFullYear()}-${String(d.getUTCMonth() + 1).padStart(2, '0')}`;
}

export function daysBetween(fromMs: number, toMs: number): number {
  return (toMs - fromMs) / DAY_MS;
}
