/**
 * Converts common numeric-like inputs into a number.
 *
 * - number => itself
 * - string => parseFloat (NaN => 0)
 * - null/undefined => 0
 * - other => Number(value) (NaN => 0)
 */
export function toNumber(value: unknown): number {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string') {
    const parsed = parseFloat(value);
    return Number.isNaN(parsed) ? 0 : parsed;
  }
  if (value === null || value === undefined) {
    return 0;
  }
  const num = Number(value);
  return Number.isNaN(num) ? 0 : num;
}

/**
 * `toFixed` with exact binary ties (0.125, 2.5) rounded half to even instead
 * of away from zero. Values that only look like ties in decimal (2.675) are
 * not ties and round as `toFixed` does.
 */
export function toFixedHalfEven(value: number, digits: number): string {
  const magnitude = Math.abs(value);
  const halfSteps = magnitude * 2 ** (digits + 1);
  if (Number.isInteger(halfSteps) && halfSteps % 2 === 1) {
    const lower = Math.floor(magnitude * 10 ** digits);
    const even = lower % 2 === 0 ? lower : lower + 1;
    return `${value < 0 ? '-' : ''}${(even / 10 ** digits).toFixed(digits)}`;
  }
  return value.toFixed(digits);
}

export function roundTo(value: number, digits: number): number {
  return parseFloat(toFixedHalfEven(value, digits));
}

/**
 * Money is presented with exactly two decimals ("12.50").
 */
export function formatMoney(value: number): string {
  return toFixedHalfEven(value, 2);
}

/**
 * Percent inputs arrive either as fractions (0.2) or as percents (20).
 * Values <= 1 are taken as fractions; anything larger is divided by 100.
 * An explicit unit bypasses the guess.
 */
export type PercentUnit = 'fraction' | 'percent';

export function normalizePercent(value: number, unit?: PercentUnit): number {
  if (unit === 'fraction') return value;
  if (unit === 'percent') return value / 100;
  if (value <= 1) return value;
  return value / 100;
}

export function formatPercent(fraction: number): string {
  return `${toFixedHalfEven(fraction * 100, 0)}%`;
}
