export { DEFAULT_TTL_HOURS, resolveTtlHours, shouldRefresh, artifactAgeHours } from './freshness-gate.js';
export { isoDateSchema, calendarRowSchema, parseCalendarEntries } from './entry-schema.js';
export type { ParsedEntries } from './entry-schema.js';
export { buildIndex, filterByUniverse, normalizeTimeFlag } from './index-builder.js';
export { canonicalize, serializeIndex, hasChanged } from './change-detection.js';
export { indexedEarningsSchema, earningsIndexSchema } from './artifact-store.js';
export type { ArtifactStore, StoredIndex, RunStats, RunOutcome, RunAnomaly } from './artifact-store.js';
export { IndexSnapshot } from './index-snapshot.js';
export type { Snapshot } from './index-snapshot.js';
export { runRefresh } from './refresh-earnings.js';
export type {
  CalendarSource,
  UniverseSource,
  RefreshDeps,
  RefreshOptions,
  RunReport,
} from './refresh-earnings.js';
