import type { EarningsIndex } from '../domain/index.js';
import type { ArtifactStore } from './artifact-store.js';

/** Index as last loaded by the query API. */
export interface Snapshot {
  readonly index: EarningsIndex;
  /** Artifact modification time; `null` while no artifact exists. */
  readonly generatedAt: Date | null;
}

const EMPTY: Snapshot = { index: {}, generatedAt: null };

/**
 * Read-through cache of the persisted index for the query API.
 *
 * `get()` checks the artifact's modification time and re-reads the file
 * only when it changed. The snapshot is swapped in one assignment, so a
 * reader always sees either the old or the new index, never a mix.
 *
 * An artifact that fails validation keeps the previous snapshot.
 */
export class IndexSnapshot {
  private snapshot: Snapshot = EMPTY;

  constructor(private readonly store: ArtifactStore) {}

  async get(): Promise<Snapshot> {
    const modifiedAt = await this.store.lastModified();

    if (modifiedAt === null) {
      this.snapshot = EMPTY;
      return this.snapshot;
    }

    if (this.snapshot.generatedAt?.getTime() === modifiedAt.getTime()) {
      return this.snapshot;
    }

    const stored = await this.store.readIndex();
    if (stored === null) {
      this.snapshot = EMPTY;
    } else if (stored.index !== null) {
      this.snapshot = { index: stored.index, generatedAt: stored.modifiedAt };
    }

    return this.snapshot;
  }
}
