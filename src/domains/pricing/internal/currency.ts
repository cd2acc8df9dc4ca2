import { MissingRateError } from '../../../lib/errors';
import type { FxRates } from '../types';

export function normalizeCurrencyCode(code: string): string {
  return code.trim().toUpperCase();
}

/**
 * Converts through the shared base of `rates`: amount * rates[to] / rates[from].
 * Same currency is always identity, even with FX disabled.
 */
export function convertCurrency(amount: number, fromCurrency: string, toCurrency: string, rates: FxRates): number {
  const from = normalizeCurrencyCode(fromCurrency);
  const to = normalizeCurrencyCode(toCurrency);
  if (from === to) {
    return amount;
  }
  const fromRate = rates[from];
  const toRate = rates[to];
  if (fromRate === undefined || toRate === undefined) {
    throw new MissingRateError(from, to);
  }
  return amount * (toRate / fromRate);
}
