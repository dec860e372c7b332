import { describe, it, expect } from 'vitest';
import { isIsoDate, toIsoDate, addDays, toUtcStamp } from '../../src/domain/index.js';

describe('isIsoDate', () => {
  it('accepts real calendar days', () => {
    expect(isIsoDate('2024-05-01')).toBe(true);
    expect(isIsoDate('2024-02-29')).toBe(true);
  });

  it('rejects days that do not exist', () => {
    expect(isIsoDate('2023-02-29')).toBe(false);
    expect(isIsoDate('2024-02-30')).toBe(false);
    expect(isIsoDate('2024-13-01')).toBe(false);
  });

  it('rejects other formats', () => {
    expect(isIsoDate('2024-5-01')).toBe(false);
    expect(isIsoDate('2024-05-01T00:00:00Z')).toBe(false);
    expect(isIsoDate('20240501')).toBe(false);
    expect(isIsoDate('')).toBe(false);
  });
});

describe('toIsoDate', () => {
  it('returns the UTC calendar day', () => {
    expect(toIsoDate(new Date('2024-04-15T23:59:59Z'))).toBe('2024-04-15');
    expect(toIsoDate(new Date('2024-04-16T00:00:00Z'))).toBe('2024-04-16');
  });
});

describe('addDays', () => {
  it('shifts backwards and forwards', () => {
    expect(addDays('2024-04-15', -1)).toBe('2024-04-14');
    expect(addDays('2024-04-15', 0)).toBe('2024-04-15');
    expect(addDays('2024-04-15', 120)).toBe('2024-08-13');
  });

  it('crosses month and year boundaries', () => {
    expect(addDays('2024-12-31', 1)).toBe('2025-01-01');
    expect(addDays('2024-03-01', -1)).toBe('2024-02-29');
  });
});

describe('toUtcStamp', () => {
  it('drops milliseconds', () => {
    expect(toUtcStamp(new Date('2024-04-15T08:30:12.345Z'))).toBe('2024-04-15T08:30:12Z');
  });
});
