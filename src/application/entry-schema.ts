import { z } from 'zod';
import { isIsoDate } from '../domain/index.js';
import type { CalendarEntry, MalformedEntry } from '../domain/index.js';

/** `YYYY-MM-DD` naming a real calendar day. */
export const isoDateSchema = z.string().refine(isIsoDate, {
  message: 'Must be a YYYY-MM-DD calendar date',
});

/**
 * Zod schema for a single provider calendar row.
 *
 * - `symbol` is trimmed and must not be empty.
 * - Every other field is kept and becomes the entry's metadata.
 */
export const calendarRowSchema = z
  .object({
    symbol: z.string().trim().min(1, 'symbol is empty'),
    date: isoDateSchema,
  })
  .passthrough();

export interface ParsedEntries {
  readonly entries: CalendarEntry[];
  readonly skipped: MalformedEntry[];
}

/**
 * Validates raw provider rows one by one.
 *
 * Invalid rows are reported in `skipped` instead of failing the batch;
 * a bulk payload may contain isolated bad records.
 */
export function parseCalendarEntries(rows: readonly unknown[]): ParsedEntries {
  const entries: CalendarEntry[] = [];
  const skipped: MalformedEntry[] = [];

  rows.forEach((row, index) => {
    const parsed = calendarRowSchema.safeParse(row);

    if (!parsed.success) {
      const reason = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || 'row'}: ${issue.message}`)
        .join('; ');
      skipped.push({ index, reason });
      return;
    }

    const { symbol, date, ...metadata } = parsed.data;
    entries.push({ symbol, date, metadata });
  });

  return { entries, skipped };
}
