import type { EarningsIndex } from '../../domain/index.js';
import { earningsIndexSchema, serializeIndex } from '../../application/index.js';
import type { ArtifactStore, RunStats, StoredIndex } from '../../application/index.js';

/**
 * In-memory artifact store.
 *
 * Holds the serialized text exactly as the file store would write it,
 * so byte-level comparisons behave the same. Used by tests and local
 * dry runs.
 */
export class InMemoryArtifactStore implements ArtifactStore {
  content: string | null = null;
  modifiedAt: Date | null = null;
  readonly stats: RunStats[] = [];
  writes = 0;

  constructor(private readonly now: () => Date = () => new Date()) {}

  /** Seeds the store as if `index` had been written at `modifiedAt`. */
  seed(index: EarningsIndex, modifiedAt: Date): void {
    this.content = serializeIndex(index);
    this.modifiedAt = modifiedAt;
  }

  async lastModified(): Promise<Date | null> {
    return this.modifiedAt;
  }

  async readIndex(): Promise<StoredIndex | null> {
    if (this.content === null || this.modifiedAt === null) return null;

    let raw: unknown;
    try {
      raw = JSON.parse(this.content);
    } catch {
      return { index: null, modifiedAt: this.modifiedAt };
    }

    const parsed = earningsIndexSchema.safeParse(raw);
    return { index: parsed.success ? parsed.data : null, modifiedAt: this.modifiedAt };
  }

  async writeIndex(index: EarningsIndex): Promise<void> {
    this.content = serializeIndex(index);
    this.modifiedAt = this.now();
    this.writes++;
  }

  async writeRunStats(stats: RunStats): Promise<void> {
    this.stats.push(stats);
  }
}
