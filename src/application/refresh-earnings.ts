import type { Logger } from 'pino';
import { addDays, toIsoDate, toUtcStamp, FetchError } from '../domain/index.js';
import type { EarningsIndex, IsoDate } from '../domain/index.js';
import type { ArtifactStore, RunAnomaly, RunOutcome, RunStats } from './artifact-store.js';
import { shouldRefresh } from './freshness-gate.js';
import { parseCalendarEntries } from './entry-schema.js';
import { buildIndex, filterByUniverse } from './index-builder.js';
import { hasChanged } from './change-detection.js';

/** One bulk calendar request for an inclusive date window. */
export interface CalendarSource {
  fetchCalendar(windowStart: IsoDate, windowEnd: IsoDate): Promise<unknown[]>;
}

/** Symbols the index is restricted to; `null` means no restriction. */
export interface UniverseSource {
  load(): Promise<ReadonlySet<string> | null>;
}

export interface RefreshDeps {
  store: ArtifactStore;
  calendar: CalendarSource;
  universe?: UniverseSource | undefined;
  log: Logger;
  now: () => Date;
}

export interface RefreshOptions {
  ttlHours: number;
  daysAhead: number;
  daysBack: number;
}

export interface RunReport {
  outcome: RunOutcome;
  referenceDay: IsoDate;
  window?: { from: IsoDate; to: IsoDate };
  /** Symbols in the index the run ended with. */
  count: number;
  rowsFetched?: number;
  rowsAfterFilter?: number;
  skippedRows?: number;
  universeCount?: number;
  anomalies: RunAnomaly[];
  error?: FetchError;
}

/**
 * Use case: one scheduled refresh of the earnings index.
 *
 * Order:
 * 1) read previous artifact → freshness gate
 * 2) fetch calendar window (single request)
 * 3) validate rows → universe filter → build index
 * 4) compare → write only on change
 * 5) write run stats
 *
 * A FetchError ends the run as `failed` before anything is written.
 * Any other error (e.g. a failing write) propagates to the caller.
 *
 * The gate ages the artifact by its modification time, which only a
 * changed index moves. Once the TTL has passed, every `unchanged` run
 * leaves it due, so each scheduler tick fetches again until the content
 * changes. `stats.json` and `last_run.txt` record when the run happened.
 */
export async function runRefresh(deps: RefreshDeps, options: RefreshOptions): Promise<RunReport> {
  const { store, log } = deps;
  const now = deps.now();
  const referenceDay = toIsoDate(now);

  const stored = await store.readIndex();
  if (stored !== null && stored.index === null) {
    log.warn({ modifiedAt: stored.modifiedAt.toISOString() }, 'Stored index is unreadable, treating as missing');
  }
  const previous: EarningsIndex | null = stored?.index ?? null;
  const lastTimestamp = previous === null ? null : stored?.modifiedAt ?? null;

  const baseStats = {
    daysAhead: options.daysAhead,
    daysBack: options.daysBack,
    lastUpdatedUtc: toUtcStamp(now),
  };

  // ---- Freshness gate ----

  if (!shouldRefresh(lastTimestamp, options.ttlHours, now)) {
    const count = previous === null ? 0 : Object.keys(previous).length;
    log.info(
      { ttlHours: options.ttlHours, modifiedAt: lastTimestamp?.toISOString(), count },
      'Index is fresh, skipping fetch',
    );
    await store.writeRunStats({ ...baseStats, outcome: 'skipped', count });
    return { outcome: 'skipped', referenceDay, count, anomalies: [] };
  }

  // ---- Fetch ----

  const window = {
    from: addDays(referenceDay, -options.daysBack),
    to: addDays(referenceDay, options.daysAhead),
  };

  let rows: unknown[];
  try {
    rows = await deps.calendar.fetchCalendar(window.from, window.to);
  } catch (err: unknown) {
    if (!(err instanceof FetchError)) throw err;

    log.error({ err, window }, 'Calendar fetch failed, keeping existing index');
    return {
      outcome: 'failed',
      referenceDay,
      window,
      count: previous === null ? 0 : Object.keys(previous).length,
      anomalies: [],
      error: err,
    };
  }

  log.info({ window, rows: rows.length }, 'Calendar fetched');

  // ---- Validate + filter + build ----

  const { entries, skipped } = parseCalendarEntries(rows);
  if (skipped.length > 0) {
    log.warn(
      { skipped: skipped.length, sample: skipped.slice(0, 5) },
      'Skipped malformed calendar rows',
    );
  }

  let filtered = entries;
  let universeCount: number | undefined;

  if (deps.universe !== undefined) {
    const universe = await deps.universe.load();
    if (universe !== null) {
      universeCount = universe.size;
      if (universe.size === 0) {
        log.warn('Symbol universe is empty, index is not filtered');
      }
      filtered = filterByUniverse(entries, universe);
    }
  }

  const candidate = buildIndex(filtered, referenceDay);
  const count = Object.keys(candidate).length;

  const anomalies: RunAnomaly[] = [];
  if (count === 0 && previous !== null && Object.keys(previous).length > 0) {
    anomalies.push('empty-result');
    log.warn(
      { previousCount: Object.keys(previous).length, rowsFetched: rows.length },
      'Index became empty after a successful fetch',
    );
  }

  // ---- Compare + persist ----

  const changed = hasChanged(previous, candidate);
  const outcome: RunOutcome = changed ? 'updated' : 'unchanged';

  if (changed) {
    await store.writeIndex(candidate);
    log.info({ count }, 'Index updated');
  } else {
    log.info({ count }, 'Index unchanged, keeping existing artifact');
  }

  const stats: RunStats = {
    ...baseStats,
    outcome,
    count,
    calendarRowsFetched: rows.length,
    calendarRowsAfterFilter: filtered.length,
    skippedRows: skipped.length,
    ...(universeCount === undefined ? {} : { universeCount }),
    ...(anomalies.length === 0 ? {} : { anomalies }),
  };
  await store.writeRunStats(stats);

  return {
    outcome,
    referenceDay,
    window,
    count,
    rowsFetched: rows.length,
    rowsAfterFilter: filtered.length,
    skippedRows: skipped.length,
    ...(universeCount === undefined ? {} : { universeCount }),
    anomalies,
  };
}
