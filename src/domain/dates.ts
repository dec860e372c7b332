import type { IsoDate } from './calendar.js';

const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Returns true if `value` is a `YYYY-MM-DD` string naming a real day
 * (rejects e.g. `2024-02-30`).
 */
export function isIsoDate(value: string): boolean {
  const match = ISO_DATE_RE.exec(value);
  if (match === null) return false;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const d = new Date(Date.UTC(year, month - 1, day));

  return d.getUTCFullYear() === year
    && d.getUTCMonth() === month - 1
    && d.getUTCDate() === day;
}

/** UTC calendar day of `instant`. */
export function toIsoDate(instant: Date): IsoDate {
  return instant.toISOString().slice(0, 10);
}

/** Shifts a calendar day by `days` (may be negative). */
export function addDays(date: IsoDate, days: number): IsoDate {
  const ms = Date.parse(`${date}T00:00:00Z`) + days * DAY_MS;
  return toIsoDate(new Date(ms));
}

/** `YYYY-MM-DDTHH:MM:SSZ`, without milliseconds. */
export function toUtcStamp(instant: Date): string {
  return `${instant.toISOString().slice(0, 19)}Z`;
}
