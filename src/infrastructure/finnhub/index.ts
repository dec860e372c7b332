export { FinnhubClient, FINNHUB_API_BASE } from './client.js';
export type { FinnhubClientOptions, SymbolRow } from './client.js';
export { SymbolUniverse, UNIVERSE_TTL_DAYS } from './symbol-universe.js';
export type { SymbolLister, SymbolUniverseOptions } from './symbol-universe.js';
