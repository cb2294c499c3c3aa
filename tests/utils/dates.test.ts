import { describe, expect, it } from 'vitest';

import {
  addDays,
  daysBetween,
  isDateKey,
  localHHmm,
  toDateKey,
} from '../../src/core/utils/dates.js';

describe('utils/dates', () => {
  it('accepts only real calendar days', () => {
    expect(isDateKey('2026-02-28')).toBe(true);
    expect(isDateKey('2026-02-29')).toBe(false);
    expect(isDateKey('2028-02-29')).toBe(true);
    expect(isDateKey('2026-3-1')).toBe(false);
  });

  it('adds days across month and year ends', () => {
    expect(addDays('2026-02-28', 1)).toBe('2026-03-01');
    expect(addDays('2026-12-31', 1)).toBe('2027-01-01');
    expect(addDays('2026-03-01', -1)).toBe('2026-02-28');
  });

  it('counts whole days between keys', () => {
    expect(daysBetween('2026-03-01', '2026-03-09')).toBe(8);
    expect(daysBetween('2026-03-09', '2026-03-01')).toBe(-8);
  });

  it('rejects malformed keys in arithmetic', () => {
    expect(() => addDays('yesterday', 1)).toThrow('Invalid date: yesterday');
  });

  it('reads the calendar day and time in a given zone', () => {
    const instant = new Date('2026-03-10T23:30:00.000Z');

    expect(toDateKey(instant, 'UTC')).toBe('2026-03-10');
    expect(toDateKey(instant, 'Europe/Berlin')).toBe('2026-03-11');
    expect(toDateKey(instant, 'America/New_York')).toBe('2026-03-10');
    expect(localHHmm(instant, 'UTC')).toBe('23:30');
    expect(localHHmm(instant, 'Europe/Berlin')).toBe('00:30');
  });
});
