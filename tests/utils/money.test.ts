import { describe, it, expect } from 'vitest';
import { formatMinorUnits, isMinorUnits, sumMinorUnits } from '@jarsync/types';

const UAH = { code: 980, name: 'UAH', symbol: '₴', flag: '🇺🇦' };

describe('Money Utilities', () => {
  describe('formatMinorUnits', () => {
    it('should format positive and negative amounts', () => {
      expect(formatMinorUnits(50000, UAH)).toBe('500.00 UAH');
      expect(formatMinorUnits(-20000, UAH)).toBe('-200.00 UAH');
      expect(formatMinorUnits(5, UAH)).toBe('0.05 UAH');
      expect(formatMinorUnits(123456)).toBe('1234.56');
    });

    it('should omit the suffix for null currency or empty names', () => {
      expect(formatMinorUnits(100, null)).toBe('1.00');
      expect(formatMinorUnits(100, { name: '' })).toBe('1.00');
    });
  });

  describe('sumMinorUnits', () => {
    it('should add integers exactly', () => {
      expect(sumMinorUnits([10, 20, 30])).toBe(60);
      expect(sumMinorUnits([])).toBe(0);
    });
  });

  describe('isMinorUnits', () => {
    it('should only accept safe integers', () => {
      expect(isMinorUnits(100)).toBe(true);
      expect(isMinorUnits(1.5)).toBe(false);
      expect(isMinorUnits(Number.MAX_SAFE_INTEGER + 1)).toBe(false);
    });
  });
});
