import type { Currency } from '../schemas/account.js';

/**
 * Format integer minor units as "1234.56 UAH". Uses integer arithmetic only.
 */
export function formatMinorUnits(amount: number, currency?: Pick<Currency, 'name'> | null): string {
  const abs = Math.abs(amount);
  const major = Math.floor(abs / 100);
  const minor = String(abs % 100).padStart(2, '0');
  const sign = amount < 0 ? '-' : '';
  const suffix = currency !== undefined && currency !== null && currency.name !== '' ? ` ${currency.name}` : '';
  return `${sign}${major}.${minor}${suffix}`;
}

export function sumMinorUnits(amounts: number[]): number {
  return amounts.reduce((sum, amt) => sum + amt, 0);
}

export function isMinorUnits(value: number): boolean {
  return Number.isSafeInteger(value);
}
