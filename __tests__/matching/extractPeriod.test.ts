/**
 * Tests for pay period extraction
 */

import {
  extractPayPeriod,
  isInPeriod,
  parseDateString,
  parseDateValue,
} from '../../src/matching/extractPeriod';
import { utcDate } from '../helpers/workbook';

describe('parseDateString', () => {
  it('should parse ISO dates and timestamps', () => {
    expect(parseDateString('2025-03-15')).toEqual({ year: 2025, month: 3 });
    expect(parseDateString('2025-03-15T08:30:00Z')).toEqual({ year: 2025, month: 3 });
    expect(parseDateString('2025-3-5')).toEqual({ year: 2025, month: 3 });
  });

  it('should read slash dates month-first', () => {
    expect(parseDateString('03/04/2025')).toEqual({ year: 2025, month: 3 });
  });

  it('should fall back to day-first when month-first is impossible', () => {
    expect(parseDateString('15/03/2025')).toEqual({ year: 2025, month: 3 });
    expect(parseDateString('15-03-2025')).toEqual({ year: 2025, month: 3 });
  });

  it('should parse dash dates month-first', () => {
    expect(parseDateString('3-15-2025')).toEqual({ year: 2025, month: 3 });
  });

  it('should parse year-first slash dates', () => {
    expect(parseDateString('2025/11/02')).toEqual({ year: 2025, month: 11 });
  });

  it('should resolve two-digit years around 2000', () => {
    expect(parseDateString('3/15/25')).toEqual({ year: 2025, month: 3 });
    expect(parseDateString('12/31/99')).toEqual({ year: 1999, month: 12 });
  });

  it('should parse month names', () => {
    expect(parseDateString('5-Jan-2025')).toEqual({ year: 2025, month: 1 });
    expect(parseDateString('15-Mar-2025')).toEqual({ year: 2025, month: 3 });
  });

  it('should return null for text that is not a date', () => {
    expect(parseDateString('not a date')).toBeNull();
    expect(parseDateString('   ')).toBeNull();
    expect(parseDateString('13/13/2025')).toBeNull();
  });
});

describe('parseDateValue', () => {
  it('should read Date cells in UTC', () => {
    expect(parseDateValue(utcDate(2025, 3, 1))).toEqual({ year: 2025, month: 3 });
    expect(parseDateValue(utcDate(2024, 12, 31))).toEqual({ year: 2024, month: 12 });
  });

  it('should not treat numbers or booleans as dates', () => {
    expect(parseDateValue(45000)).toBeNull();
    expect(parseDateValue(true)).toBeNull();
    expect(parseDateValue(null)).toBeNull();
  });

  it('should reject invalid Date objects', () => {
    expect(parseDateValue(new Date('nonsense'))).toBeNull();
  });
});

describe('extractPayPeriod', () => {
  it('should prefer earlier candidate columns', () => {
    expect(extractPayPeriod({ 'from time': '2025-03-01', date: '2025-04-02' })).toEqual({
      year: 2025,
      month: 3,
    });
  });

  it('should move on when a column holds an unparseable value', () => {
    expect(extractPayPeriod({ 'from time': 'TBD', date: '2025-04-02' })).toEqual({
      year: 2025,
      month: 4,
    });
  });

  it('should read later columns such as "pay period start" and "period"', () => {
    expect(extractPayPeriod({ 'pay period start': utcDate(2025, 6, 1) })).toEqual({
      year: 2025,
      month: 6,
    });
    expect(extractPayPeriod({ period: '7/1/2025' })).toEqual({ year: 2025, month: 7 });
  });

  it('should return null when no column holds a date', () => {
    expect(extractPayPeriod({ 'first name': 'Jane', hours: 8 })).toBeNull();
    expect(extractPayPeriod({ 'from time': '', date: null })).toBeNull();
  });
});

describe('isInPeriod', () => {
  it('should compare year and month', () => {
    expect(isInPeriod('2025-03-01', { year: 2025, month: 3 })).toBe(true);
    expect(isInPeriod('2025-03-31', { year: 2025, month: 4 })).toBe(false);
    expect(isInPeriod('2024-03-01', { year: 2025, month: 3 })).toBe(false);
  });

  it('should be false for missing dates', () => {
    expect(isInPeriod(null, { year: 2025, month: 3 })).toBe(false);
  });
});
