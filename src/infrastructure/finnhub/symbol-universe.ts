import { mkdir, readFile, stat, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import type { Logger } from 'pino';
import { toUtcStamp } from '../../domain/index.js';
import type { UniverseSource } from '../../application/index.js';
import type { SymbolRow } from './client.js';

export const UNIVERSE_TTL_DAYS = 7;

const DAY_MS = 24 * 60 * 60 * 1000;

const universeCacheSchema = z.object({
  meta: z.object({
    exchanges: z.array(z.string()),
    generatedUtc: z.string(),
  }),
  symbols: z.array(z.string()),
});

type UniverseCache = z.infer<typeof universeCacheSchema>;

/** The slice of FinnhubClient the universe needs. */
export interface SymbolLister {
  fetchSymbols(exchange: string): Promise<SymbolRow[]>;
}

export interface SymbolUniverseOptions {
  exchanges: readonly string[];
  cachePath: string;
  client: SymbolLister;
  log: Logger;
  now?: () => Date;
}

/** Funds and ETFs never report earnings. */
function isFundType(type: string | null | undefined): boolean {
  const value = (type ?? '').toLowerCase();
  return value.includes('etf') || value.includes('fund');
}

function sameExchanges(a: readonly string[], b: readonly string[]): boolean {
  if (a.length !== b.length) return false;
  const left = [...a].sort();
  const right = [...b].sort();
  return left.every((code, i) => code === right[i]);
}

/**
 * Set of tradable symbols listed on the configured exchanges.
 *
 * Listings change slowly, so the set is cached on disk and reused for
 * UNIVERSE_TTL_DAYS while the exchange list stays the same. A failing
 * exchange is logged and left out; it does not fail the run.
 */
export class SymbolUniverse implements UniverseSource {
  private readonly now: () => Date;

  constructor(private readonly options: SymbolUniverseOptions) {
    this.now = options.now ?? (() => new Date());
  }

  /** `null` when no exchanges are configured. */
  async load(): Promise<ReadonlySet<string> | null> {
    const { exchanges, log } = this.options;
    if (exchanges.length === 0) return null;

    const cached = await this.readCache();
    if (cached !== null) {
      log.debug({ symbols: cached.size }, 'Symbol universe loaded from cache');
      return cached;
    }

    const symbols = new Set<string>();
    for (const exchange of exchanges) {
      try {
        const rows = await this.options.client.fetchSymbols(exchange);
        for (const row of rows) {
          const symbol = (row.symbol ?? '').trim();
          if (symbol === '' || isFundType(row.type)) continue;
          symbols.add(symbol);
        }
      } catch (err: unknown) {
        log.warn({ err, exchange }, 'Symbol fetch failed for exchange');
      }
    }

    const sorted = [...symbols].sort();
    const cache: UniverseCache = {
      meta: { exchanges: [...exchanges], generatedUtc: toUtcStamp(this.now()) },
      symbols: sorted,
    };

    // An empty result is not cached so the next run tries again.
    if (sorted.length > 0) {
      await mkdir(dirname(this.options.cachePath), { recursive: true });
      await writeFile(this.options.cachePath, `${JSON.stringify(cache, null, 2)}\n`, 'utf-8');
    }

    log.info({ exchanges, symbols: sorted.length }, 'Symbol universe refreshed');
    return new Set(sorted);
  }

  private async readCache(): Promise<Set<string> | null> {
    const { cachePath, exchanges, log } = this.options;

    let modifiedAt: Date;
    let content: string;
    try {
      modifiedAt = (await stat(cachePath)).mtime;
      content = await readFile(cachePath, 'utf-8');
    } catch {
      return null;
    }

    const ageDays = (this.now().getTime() - modifiedAt.getTime()) / DAY_MS;
    if (ageDays >= UNIVERSE_TTL_DAYS) return null;

    let parsed: UniverseCache;
    try {
      parsed = universeCacheSchema.parse(JSON.parse(content));
    } catch (err: unknown) {
      log.warn({ err, cachePath }, 'Symbol cache unreadable, refetching');
      return null;
    }

    if (!sameExchanges(parsed.meta.exchanges, exchanges)) return null;
    return new Set(parsed.symbols);
  }
}
