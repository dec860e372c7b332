/**
 * Core domain types for the earnings index.
 *
 * These types describe calendar data as it flows from the provider
 * boundary into the persisted index. They carry no framework dependencies.
 */

/** Calendar day in `YYYY-MM-DD` form. Compared lexicographically. */
export type IsoDate = string;

/** Provider-supplied fields the core passes through without interpreting. */
export type EntryMetadata = Record<string, unknown>;

/**
 * A single validated calendar row.
 *
 * A symbol may appear in several entries (estimate revisions,
 * overlapping windows).
 */
export interface CalendarEntry {
  readonly symbol: string;
  readonly date: IsoDate;
  readonly metadata: EntryMetadata;
}

/** Time-of-day hint: before market open, after market close, or unknown. */
export type EarningsTime = 'bmo' | 'amc' | 'tbd';

/** The next upcoming earnings event stored for one symbol. */
export interface IndexedEarnings {
  readonly symbol: string;
  readonly date: IsoDate;
  readonly time: EarningsTime;
  /** Entries for the symbol that share `date`. */
  readonly sameDayCount: number;
  readonly metadata: EntryMetadata;
}

/** Symbol → next upcoming event. Key order carries no meaning. */
export type EarningsIndex = Record<string, IndexedEarnings>;
