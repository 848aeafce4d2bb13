import { describe, expect, it } from 'vitest';
import { formatStorageDate, isStorableDate, parseStorageDate } from './dates.js';

describe('formatStorageDate', () => {
  it('should format in UTC with milliseconds', () => {
    expect(formatStorageDate(new Date(Date.UTC(2023, 2, 15, 13, 20, 5, 7)))).toBe(
      '2023-03-15 13:20:05.007'
    );
  });

  it('should be read back by parseStorageDate', () => {
    const date = new Date(Date.UTC(1999, 11, 31, 23, 59, 59, 999));
    expect(parseStorageDate(formatStorageDate(date))?.getTime()).toBe(date.getTime());
  });

  it('should read back dates before year 100', () => {
    const date = new Date(0);
    date.setUTCFullYear(50, 5, 1);
    expect(formatStorageDate(date)).toBe('0050-06-01 00:00:00.000');
    expect(parseStorageDate('0050-06-01 00:00:00.000')?.getTime()).toBe(date.getTime());
    expect(parseStorageDate('0050-06-01T00:00:00Z')?.getTime()).toBe(date.getTime());
    expect(parseStorageDate('0050-06-01')?.getTime()).toBe(date.getTime());
  });
});

describe('isStorableDate', () => {
  it('should accept four-digit years only', () => {
    expect(isStorableDate(new Date(Date.UTC(2024, 0, 1)))).toBe(true);
    expect(isStorableDate(new Date(Date.UTC(10000, 0, 1)))).toBe(false);
    expect(isStorableDate(new Date(Date.UTC(-1, 0, 1)))).toBe(false);
  });
});

describe('parseStorageDate', () => {
  it('should read fractional epoch seconds', () => {
    expect(parseStorageDate('1.5')?.getTime()).toBe(1500);
  });

  it('should trim surrounding whitespace', () => {
    expect(parseStorageDate(' 2023-03-15 ')?.getTime()).toBe(Date.UTC(2023, 2, 15));
  });

  it('should truncate fractions beyond milliseconds', () => {
    expect(parseStorageDate('2023-03-15 13:20:00.123456')?.getUTCMilliseconds()).toBe(123);
  });

  it('should reject out-of-range components', () => {
    expect(parseStorageDate('2023-03-15 24:00:00')).toBeNull();
    expect(parseStorageDate('2023-13-01')).toBeNull();
    expect(parseStorageDate('2023-03-15T10:61:00Z')).toBeNull();
  });

  it('should apply negative zone offsets', () => {
    expect(parseStorageDate('2023-03-15T08:20:00-05:00')?.getTime()).toBe(
      Date.UTC(2023, 2, 15, 13, 20)
    );
  });
});
