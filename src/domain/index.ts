export type {
  IsoDate,
  EntryMetadata,
  CalendarEntry,
  EarningsTime,
  IndexedEarnings,
  EarningsIndex,
} from './calendar.js';
export { isIsoDate, toIsoDate, addDays, toUtcStamp } from './dates.js';
export { ConfigurationError, FetchError } from './errors.js';
export type { MalformedEntry } from './errors.js';
