import { describe, expect, it } from 'vitest';
import { formatDateByDMMMYYYY } from './date';

describe('formatDateByDMMMYYYY', () => {
  it('formats a date without a leading zero on the day', () => {
    expect(formatDateByDMMMYYYY(new Date(2026, 9, 19))).toBe('19 Oct, 2026');
    expect(formatDateByDMMMYYYY(new Date(2026, 0, 5))).toBe('5 Jan, 2026');
  });

  it('accepts a local ISO string', () => {
    expect(formatDateByDMMMYYYY('2026-12-31T12:00:00')).toBe('31 Dec, 2026');
  });

  it('returns an empty string for an invalid date', () => {
    expect(formatDateByDMMMYYYY('not a date')).toBe('');
  });
});
