import { defaultDateRange, formatPublishedAt, isIsoDate, toIsoDate } from '@/utils/time';

describe('formatPublishedAt (unit)', () => {
  it('formats a UTC timestamp as YYYY-MM-DD HH:MM', () => {
    expect(formatPublishedAt('2024-01-05T10:30:00Z')).toBe('2024-01-05 10:30');
  });

  it('accepts offsets, fractions, a space separator and bare dates', () => {
    expect(formatPublishedAt('2024-01-05T10:30:45.123+02:00')).toBe('2024-01-05 10:30');
    expect(formatPublishedAt('2024-01-05 08:15')).toBe('2024-01-05 08:15');
    expect(formatPublishedAt('2024-01-05')).toBe('2024-01-05 00:00');
  });

  /**
   * Purpose:
   * Verifies Defensive behavior:
   * - empty value -> "Unknown date"
   * - unparseable value -> shown verbatim
   */
  it('falls back instead of throwing', () => {
    expect(formatPublishedAt('')).toBe('Unknown date');
    expect(formatPublishedAt(undefined)).toBe('Unknown date');
    expect(formatPublishedAt('not-a-date')).toBe('not-a-date');
    expect(formatPublishedAt('2024-02-30T10:00:00Z')).toBe('2024-02-30T10:00:00Z');
    expect(formatPublishedAt('2024-01-05T25:00:00Z')).toBe('2024-01-05T25:00:00Z');
  });
});

describe('date range helpers (unit)', () => {
  it('defaults to the last 7 days through today', () => {
    expect(defaultDateRange(new Date(2024, 0, 5))).toEqual({
      from: '2023-12-29',
      to: '2024-01-05',
    });
  });

  it('formats local dates with zero padding', () => {
    expect(toIsoDate(new Date(2024, 2, 9))).toBe('2024-03-09');
  });

  it('recognizes well-formed calendar dates only', () => {
    expect(isIsoDate('2024-02-29')).toBe(true);
    expect(isIsoDate('2023-02-29')).toBe(false);
    expect(isIsoDate('')).toBe(false);
    expect(isIsoDate('01/05/2024')).toBe(false);
  });
});
