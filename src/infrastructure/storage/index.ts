export {
  FileArtifactStore,
  INDEX_FILE,
  STATS_FILE,
  LAST_RUN_FILE,
  SYMBOLS_CACHE_FILE,
} from './file-artifact-store.js';
export { InMemoryArtifactStore } from './in-memory-artifact-store.js';
export { default as earningsPlugin } from './earnings-plugin.js';
export type { EarningsPluginOptions } from './earnings-plugin.js';
