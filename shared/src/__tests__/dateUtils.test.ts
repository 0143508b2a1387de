import { toCalendarDate, toTimestamp } from '../../utils/dateUtils';

describe('toCalendarDate', () => {
  it('should keep ISO dates as written', () => {
    expect(toCalendarDate('2024-01-19')).toBe('2024-01-19');
    expect(toCalendarDate(' 2024-01-19 ')).toBe('2024-01-19');
  });

  it('should drop the time part of ISO datetimes without shifting the day', () => {
    expect(toCalendarDate('2024-02-16 00:00:00')).toBe('2024-02-16');
    expect(toCalendarDate('2024-01-19T23:30:00-05:00')).toBe('2024-01-19');
  });

  it('should read M/D/YYYY dates', () => {
    expect(toCalendarDate('1/19/2024')).toBe('2024-01-19');
    expect(toCalendarDate('02/16/2024 16:00')).toBe('2024-02-16');
  });

  it('should reject impossible and unparseable dates', () => {
    expect(toCalendarDate('2024-02-30')).toBeNull();
    expect(toCalendarDate('2023-13-01')).toBeNull();
    expect(toCalendarDate('2/30/2024')).toBeNull();
    expect(toCalendarDate('not a date')).toBeNull();
  });

  it('should reject values that only a lenient date parser would accept', () => {
    expect(toCalendarDate('5')).toBeNull();
    expect(toCalendarDate('Call 12')).toBeNull();
    expect(toCalendarDate('January 19, 2024')).toBeNull();
  });

  it('should return null for empty values', () => {
    expect(toCalendarDate(null)).toBeNull();
    expect(toCalendarDate('   ')).toBeNull();
  });
});

describe('toTimestamp', () => {
  it('should parse ISO timestamps', () => {
    expect(toTimestamp('2024-01-10T15:00:00Z')?.toISOString()).toBe('2024-01-10T15:00:00.000Z');
  });

  it('should return null for empty or unparseable values', () => {
    expect(toTimestamp(null)).toBeNull();
    expect(toTimestamp('')).toBeNull();
    expect(toTimestamp('soon')).toBeNull();
    expect(toTimestamp('7')).toBeNull();
  });
});
