import type {
  CalendarEntry,
  EarningsIndex,
  EarningsTime,
  IndexedEarnings,
  IsoDate,
} from '../domain/index.js';

/** Maps the provider's `hour` hint onto bmo / amc / tbd. */
export function normalizeTimeFlag(hour: unknown): EarningsTime {
  if (typeof hour !== 'string') return 'tbd';

  const value = hour.trim().toLowerCase();
  if (value === 'bmo' || value === 'amc') return value;
  return 'tbd';
}

/**
 * Builds the symbol → next event index.
 *
 * 1. group entries by symbol (first-seen order)
 * 2. drop entries dated before `referenceDay`
 * 3. keep the earliest remaining date; on a tie the first entry wins
 *
 * Symbols with no entry on or after `referenceDay` are omitted.
 * Deterministic for a given input order, which change detection relies on.
 */
export function buildIndex(
  entries: readonly CalendarEntry[],
  referenceDay: IsoDate,
): EarningsIndex {
  const groups = new Map<string, CalendarEntry[]>();

  for (const entry of entries) {
    if (entry.date < referenceDay) continue;

    const group = groups.get(entry.symbol);
    if (group === undefined) {
      groups.set(entry.symbol, [entry]);
    } else {
      group.push(entry);
    }
  }

  const selections: [string, IndexedEarnings][] = [];

  for (const [symbol, group] of groups) {
    let selected: CalendarEntry | undefined;
    let sameDayCount = 0;

    for (const entry of group) {
      if (selected === undefined || entry.date < selected.date) {
        selected = entry;
        sameDayCount = 1;
      } else if (entry.date === selected.date) {
        sameDayCount++;
      }
    }

    if (selected === undefined) continue;

    const indexed: IndexedEarnings = {
      symbol,
      date: selected.date,
      time: normalizeTimeFlag(selected.metadata['hour']),
      sameDayCount,
      metadata: selected.metadata,
    };
    selections.push([symbol, indexed]);
  }

  // fromEntries defines own keys, so a symbol such as `__proto__` is kept.
  return Object.fromEntries(selections);
}

/**
 * Keeps entries whose symbol belongs to `universe`.
 *
 * An empty universe means it could not be loaded; entries pass through
 * unfiltered rather than producing an empty index.
 */
export function filterByUniverse(
  entries: readonly CalendarEntry[],
  universe: ReadonlySet<string>,
): CalendarEntry[] {
  if (universe.size === 0) return [...entries];
  return entries.filter((entry) => universe.has(entry.symbol));
}
