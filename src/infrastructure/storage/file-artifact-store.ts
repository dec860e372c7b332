import { mkdir, readFile, rename, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { EarningsIndex } from '../../domain/index.js';
import { earningsIndexSchema, serializeIndex } from '../../application/index.js';
import type { ArtifactStore, RunStats, StoredIndex } from '../../application/index.js';

export const INDEX_FILE = 'earnings.json';
export const STATS_FILE = 'stats.json';
export const LAST_RUN_FILE = 'last_run.txt';
export const SYMBOLS_CACHE_FILE = 'symbols_cache.json';

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Writes `content` to a sibling temp file, then renames it over `path`.
 * Readers never observe a half-written file.
 */
async function writeAtomic(path: string, content: string): Promise<void> {
  const tmp = `${path}.${process.pid}.tmp`;
  await writeFile(tmp, content, 'utf-8');
  await rename(tmp, path);
}

/**
 * File-backed artifact store rooted at `dir`.
 *
 * - `earnings.json` — the canonical index
 * - `stats.json`    — statistics of the last run
 * - `last_run.txt`  — UTC stamp of the last run
 */
export class FileArtifactStore implements ArtifactStore {
  readonly indexPath: string;

  constructor(readonly dir: string) {
    this.indexPath = join(dir, INDEX_FILE);
  }

  async lastModified(): Promise<Date | null> {
    try {
      return (await stat(this.indexPath)).mtime;
    } catch (err: unknown) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }

  async readIndex(): Promise<StoredIndex | null> {
    let modifiedAt: Date;
    let content: string;
    try {
      modifiedAt = (await stat(this.indexPath)).mtime;
      content = await readFile(this.indexPath, 'utf-8');
    } catch (err: unknown) {
      if (isNotFound(err)) return null;
      throw err;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch {
      return { index: null, modifiedAt };
    }

    const parsed = earningsIndexSchema.safeParse(raw);
    return { index: parsed.success ? parsed.data : null, modifiedAt };
  }

  async writeIndex(index: EarningsIndex): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    await writeAtomic(this.indexPath, serializeIndex(index));
  }

  async writeRunStats(stats: RunStats): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    await writeAtomic(join(this.dir, STATS_FILE), `${JSON.stringify(stats, null, 2)}\n`);
    await writeAtomic(join(this.dir, LAST_RUN_FILE), stats.lastUpdatedUtc);
  }
}
