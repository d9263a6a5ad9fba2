import { describe, it, expect } from 'vitest';
import { isWithinRange, parseIsoDate } from './dates.js';

describe('parseIsoDate', () => {
  it('accepts YYYY-MM-DD', () => {
    expect(parseIsoDate('2025-06-01')).toBe('2025-06-01');
    expect(parseIsoDate(' 2025-06-01 ')).toBe('2025-06-01');
  });

  it('accepts leap days only in leap years', () => {
    expect(parseIsoDate('2024-02-29')).toBe('2024-02-29');
    expect(parseIsoDate('2025-02-29')).toBeUndefined();
  });

  it('rejects days that do not exist', () => {
    expect(parseIsoDate('2025-06-31')).toBeUndefined();
    expect(parseIsoDate('2025-13-01')).toBeUndefined();
    expect(parseIsoDate('2025-00-10')).toBeUndefined();
    expect(parseIsoDate('2025-01-00')).toBeUndefined();
  });

  it('rejects other layouts', () => {
    for (const text of ['', '2025-6-1', '01/06/2025', '2025/06/01', '2025-06-01T10:00:00', 'ontem']) {
      expect(parseIsoDate(text)).toBeUndefined();
    }
  });
});

describe('isWithinRange', () => {
  it('includes both ends', () => {
    expect(isWithinRange('2025-06-01', '2025-06-01', '2025-06-03')).toBe(true);
    expect(isWithinRange('2025-06-03', '2025-06-01', '2025-06-03')).toBe(true);
    expect(isWithinRange('2025-05-31', '2025-06-01', '2025-06-03')).toBe(false);
    expect(isWithinRange('2025-06-04', '2025-06-01', '2025-06-03')).toBe(false);
  });
});
