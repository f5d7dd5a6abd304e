import { describe, it, expect } from 'vitest';
import { addDays, minutesBetween, parseTimestamp, utcDay } from '../src/core/dates.js';

describe('dates', () => {
  it('splits run days at UTC midnight', () => {
    expect(utcDay(new Date('2024-05-01T23:59:59Z'))).toBe('2024-05-01');
    expect(utcDay(new Date('2024-05-02T00:00:00Z'))).toBe('2024-05-02');
    expect(utcDay(new Date('2024-05-02T01:30:00+02:00'))).toBe('2024-05-01');
  });

  it('adds days across month and year ends', () => {
    expect(addDays('2024-02-28', 1)).toBe('2024-02-29');
    expect(addDays('2024-01-01', -1)).toBe('2023-12-31');
    expect(addDays('2024-05-01', -30)).toBe('2024-04-01');
  });

  it('measures minutes between instants', () => {
    expect(minutesBetween(new Date('2024-05-01T10:00:00Z'), new Date('2024-05-01T12:30:00Z'))).toBe(150);
  });

  it('returns null for missing or unparseable timestamps', () => {
    expect(parseTimestamp(null)).toBeNull();
    expect(parseTimestamp('')).toBeNull();
    expect(parseTimestamp('not a date')).toBeNull();
    expect(parseTimestamp('2024-05-01T09:00:00Z')?.toISOString()).toBe('2024-05-01T09:00:00.000Z');
  });
});
