/**
 * Duration parsing utility
 *
 * Accepts a millisecond count or a compact duration such as "90s", "30m",
 * "1h", "1d" or "1w".
 */

const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
  w: 7 * 24 * 60 * 60 * 1000
};

export const HOUR_MS = UNIT_MS.h;
export const DAY_MS = UNIT_MS.d;

/** Upper bound on the windows one trend series may hold */
export const MAX_TREND_WINDOWS = 1000;

/**
 * Number of trend windows covering a range, the last one possibly shorter
 */
export function countWindows(rangeMs: number, windowMs: number): number {
  return rangeMs > 0 ? Math.ceil(rangeMs / windowMs) : 0;
}

/**
 * Parse a duration to milliseconds
 *
 * @returns Milliseconds, or null when the input is not a positive duration
 */
export function parseDuration(value: string): number | null {
  const match = /^\s*(\d+(?:\.\d+)?)\s*(ms|s|m|h|d|w)?\s*$/i.exec(value);
  if (!match) {
    return null;
  }

  const amount = parseFloat(match[1]);
  const unit = (match[2] ?? 'ms').toLowerCase();
  const ms = Math.round(amount * UNIT_MS[unit]);

  return ms > 0 ? ms : null;
}
