import { describe, expect, it } from 'vitest';
import { elapsedWholeDays, formatTimestamp, parseTimestamp, truncateToSecond } from '../../src/utils/timestamp';

describe('timestamp', () => {
  it('formats as naive local "YYYY-MM-DD HH:MM:SS"', () => {
    expect(formatTimestamp(new Date(2026, 0, 5, 9, 3, 7))).toBe('2026-01-05 09:03:07');
  });

  it('parses the stored format as local time', () => {
    expect(parseTimestamp('2026-01-05 09:03:07')?.getTime()).toBe(new Date(2026, 0, 5, 9, 3, 7).getTime());
  });

  it('accepts a bare date as midnight', () => {
    expect(parseTimestamp('2026-01-05')?.getTime()).toBe(new Date(2026, 0, 5).getTime());
  });

  it('returns null for text that is not a timestamp', () => {
    expect(parseTimestamp('yesterday')).toBeNull();
    expect(parseTimestamp('')).toBeNull();
  });

  it('drops milliseconds', () => {
    expect(truncateToSecond(new Date(2026, 2, 1, 10, 15, 30, 450)).getTime()).toBe(
      new Date(2026, 2, 1, 10, 15, 30).getTime()
    );
  });

  it('counts whole elapsed days', () => {
    expect(elapsedWholeDays(new Date(2026, 0, 11, 8), new Date(2026, 0, 1, 8))).toBe(10);
    expect(elapsedWholeDays(new Date(2026, 0, 2, 7), new Date(2026, 0, 1, 8))).toBe(0);
  });
});
