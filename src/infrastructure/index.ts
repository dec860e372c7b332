export { loadConfig, DEFAULT_CONFIG } from './config.js';
export type { AppConfig, LoadedConfig, LogLevel } from './config.js';
export { FinnhubClient, FINNHUB_API_BASE, SymbolUniverse, UNIVERSE_TTL_DAYS } from './finnhub/index.js';
export type { FinnhubClientOptions, SymbolRow, SymbolLister, SymbolUniverseOptions } from './finnhub/index.js';
export {
  FileArtifactStore,
  InMemoryArtifactStore,
  earningsPlugin,
  INDEX_FILE,
  STATS_FILE,
  LAST_RUN_FILE,
  SYMBOLS_CACHE_FILE,
} from './storage/index.js';
export type { EarningsPluginOptions } from './storage/index.js';
