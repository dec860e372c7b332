import { vi } from 'vitest';
import type { Logger } from 'pino';
import type { CalendarEntry, IndexedEarnings } from '../src/domain/index.js';

/**
 * Factory for validated calendar entries with sensible defaults.
 * Override any field via the partial parameter.
 */
export function makeEntry(overrides: Partial<CalendarEntry> = {}): CalendarEntry {
  return {
    symbol: overrides.symbol ?? 'AAPL',
    date: overrides.date ?? '2024-05-01',
    metadata: overrides.metadata ?? {},
  };
}

/** Factory for an index value. */
export function makeIndexed(overrides: Partial<IndexedEarnings> = {}): IndexedEarnings {
  return {
    symbol: overrides.symbol ?? 'AAPL',
    date: overrides.date ?? '2024-05-01',
    time: overrides.time ?? 'tbd',
    sameDayCount: overrides.sameDayCount ?? 1,
    metadata: overrides.metadata ?? {},
  };
}

/** Logger whose methods are spies. */
export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  } as unknown as Logger;
}

/** Fixed run clock: reference day 2024-04-15. */
export const FIXED_NOW = new Date('2024-04-15T06:00:00Z');

export const HOUR_MS = 60 * 60 * 1000;
