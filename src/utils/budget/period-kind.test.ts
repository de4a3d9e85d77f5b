import { describe, it, expect } from 'vitest';
import { defaultWindow, isPeriodKind, periodKeyOf, periodsBetween, shiftBySpan } from './period-kind';

describe('Period kinds', () => {
  describe('periodKeyOf', () => {
    it('should format the year and month of the date', () => {
      expect(periodKeyOf(new Date('2024-01-31T00:00:00Z'))).toBe('202401');
      expect(periodKeyOf(new Date('2023-12-01T00:00:00Z'), 'monthly')).toBe('202312');
    });

    it('should use the UTC calendar', () => {
      expect(periodKeyOf(new Date('2024-02-29T23:59:59Z'))).toBe('202402');
    });
  });

  describe('shiftBySpan', () => {
    it('should move forward and back by one month', () => {
      expect(shiftBySpan(new Date('2024-01-15T00:00:00Z'), 'monthly', 1)).toEqual(new Date('2024-02-15T00:00:00Z'));
      expect(shiftBySpan(new Date('2024-01-15T00:00:00Z'), 'monthly', -1)).toEqual(new Date('2023-12-15T00:00:00Z'));
    });

    it('should clamp to the last day of a shorter month', () => {
      expect(shiftBySpan(new Date('2024-01-31T00:00:00Z'), 'monthly', 1)).toEqual(new Date('2024-02-29T00:00:00Z'));
    });
  });

  describe('defaultWindow', () => {
    it('should cover the calendar month containing now', () => {
      expect(defaultWindow('monthly', new Date('2024-02-10T12:00:00Z'))).toEqual({
        start: new Date('2024-02-01T00:00:00Z'),
        end: new Date('2024-02-29T00:00:00Z'),
      });
    });
  });

  describe('periodsBetween', () => {
    it('should count months across a year boundary', () => {
      expect(periodsBetween('202311', '202402', 'monthly')).toBe(3);
    });

    it('should be zero for the same period and negative for a later one', () => {
      expect(periodsBetween('202401', '202401', 'monthly')).toBe(0);
      expect(periodsBetween('202403', '202401', 'monthly')).toBe(-2);
    });

    it('should return null for a malformed key', () => {
      expect(periodsBetween('2024-01', '202401', 'monthly')).toBeNull();
    });
  });

  describe('isPeriodKind', () => {
    it('should accept only known kinds', () => {
      expect(isPeriodKind('monthly')).toBe(true);
      expect(isPeriodKind('weekly')).toBe(false);
      expect(isPeriodKind('toString')).toBe(false);
    });
  });
});
