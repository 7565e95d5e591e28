import type { Currency } from '@jarsync/types';

type CurrencyInfo = Omit<Currency, 'code'>;

/** ISO 4217 numeric codes seen on accounts and jars. */
const CURRENCIES: ReadonlyMap<number, CurrencyInfo> = new Map([
  [980, { name: 'UAH', symbol: '₴', flag: '🇺🇦' }],
  [840, { name: 'USD', symbol: '$', flag: '🇺🇸' }],
  [978, { name: 'EUR', symbol: '€', flag: '🇪🇺' }],
  [826, { name: 'GBP', symbol: '£', flag: '🇬🇧' }],
  [985, { name: 'PLN', symbol: 'zł', flag: '🇵🇱' }],
  [203, { name: 'CZK', symbol: 'Kč', flag: '🇨🇿' }],
  [756, { name: 'CHF', symbol: 'Fr', flag: '🇨🇭' }],
]);

export function resolveCurrency(code: number): Currency {
  const info = CURRENCIES.get(code);
  if (info === undefined) {
    return { code, name: 'Unknown', symbol: '', flag: '' };
  }
  return { code, ...info };
}
