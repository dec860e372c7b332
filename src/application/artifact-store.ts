import { z } from 'zod';
import type { EarningsIndex } from '../domain/index.js';
import { isoDateSchema } from './entry-schema.js';

/** Zod schema for one value of the persisted index. */
export const indexedEarningsSchema = z.object({
  symbol: z.string().min(1),
  date: isoDateSchema,
  time: z.enum(['bmo', 'amc', 'tbd']),
  sameDayCount: z.number().int().min(1),
  metadata: z.record(z.string(), z.unknown()),
});

/** Zod schema for the whole `earnings.json` document. */
export const earningsIndexSchema = z.record(z.string(), indexedEarningsSchema);

/** The stored index together with its modification time. */
export interface StoredIndex {
  /** `null` when the artifact exists but could not be parsed. */
  readonly index: EarningsIndex | null;
  readonly modifiedAt: Date;
}

export type RunOutcome = 'skipped' | 'failed' | 'unchanged' | 'updated';

/** Conditions worth surfacing that did not stop the run. */
export type RunAnomaly = 'empty-result';

/** Contents of `stats.json`. */
export interface RunStats {
  readonly outcome: RunOutcome;
  readonly count: number;
  readonly daysAhead: number;
  readonly daysBack: number;
  readonly lastUpdatedUtc: string;
  readonly calendarRowsFetched?: number;
  readonly calendarRowsAfterFilter?: number;
  readonly skippedRows?: number;
  readonly universeCount?: number;
  readonly anomalies?: readonly RunAnomaly[];
}

/**
 * Persistence boundary for the index artifact.
 *
 * Business logic receives a store instead of touching files, so the
 * pipeline can run against an in-memory implementation.
 */
export interface ArtifactStore {
  /** Modification time of the artifact, `null` if it does not exist. */
  lastModified(): Promise<Date | null>;
  /** Reads the artifact, `null` if it does not exist. */
  readIndex(): Promise<StoredIndex | null>;
  /** Replaces the artifact atomically with the canonical serialization. */
  writeIndex(index: EarningsIndex): Promise<void>;
  /** Writes `stats.json` and the last-run stamp. */
  writeRunStats(stats: RunStats): Promise<void>;
}
