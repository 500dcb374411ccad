/**
 * @fileoverview Named lookback periods ("60d", "4w", "6m", "1y").
 *
 * @module @etfpulse/market-fetcher/periods
 */

const DAY_MS = 24 * 60 * 60 * 1000;

const UNIT_DAYS: Record<string, number> = {
  d: 1,
  w: 7,
  m: 30,
  y: 365,
};

const PERIOD_PATTERN = /^(\d+)([dwmy])$/;

/**
 * Number of calendar days a period covers, or null when it is malformed.
 *
 * Months count as 30 days and years as 365.
 */
export function parsePeriod(period: string): number | null {
  const match = PERIOD_PATTERN.exec(period.trim().toLowerCase());
  if (!match) {
    return null;
  }
  const count = Number(match[1]);
  const unitDays = UNIT_DAYS[match[2] ?? ''];
  if (!Number.isSafeInteger(count) || count <= 0 || unitDays === undefined) {
    return null;
  }
  return count * unitDays;
}

export interface DateRange {
  start: Date;
  end: Date;
}

/**
 * Range ending at `now` and reaching back over the period.
 */
export function periodRange(period: string, now: number): DateRange | null {
  const days = parsePeriod(period);
  if (days === null) {
    return null;
  }
  return { start: new Date(now - days * DAY_MS), end: new Date(now) };
}
