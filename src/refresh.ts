import { appendFile } from 'node:fs/promises';
import { join } from 'node:path';
import pino from 'pino';
import { runRefresh } from './application/index.js';
import {
  loadConfig,
  FinnhubClient,
  SymbolUniverse,
  FileArtifactStore,
  SYMBOLS_CACHE_FILE,
} from './infrastructure/index.js';

/**
 * One scheduled refresh of the earnings index.
 *
 * Meant to be triggered by an external scheduler (cron, CI schedule).
 * Overlapping runs must be prevented there; this process takes no lock.
 *
 * Exit code 0 for skipped / unchanged / updated, 1 for failed.
 * With EARNINGS_OUTCOME_FILE set, `outcome=<value>` is appended to it
 * so the surrounding automation can decide whether to publish.
 */
const { config, warnings } = loadConfig();

const log = pino({ level: config.logLevel });

async function main(): Promise<number> {
  for (const warning of warnings) {
    log.warn({ variable: warning.variable }, warning.message);
  }

  if (config.finnhubToken === null) {
    log.fatal('FINNHUB_TOKEN is not set');
    return 1;
  }

  const client = new FinnhubClient({
    token: config.finnhubToken,
    timeoutMs: config.timeoutMs,
    log,
  });

  const universe = config.exchanges.length > 0
    ? new SymbolUniverse({
      exchanges: config.exchanges,
      cachePath: join(config.outputDir, SYMBOLS_CACHE_FILE),
      client,
      log,
    })
    : undefined;

  const report = await runRefresh(
    {
      store: new FileArtifactStore(config.outputDir),
      calendar: client,
      universe,
      log,
      now: () => new Date(),
    },
    {
      ttlHours: config.ttlHours,
      daysAhead: config.daysAhead,
      daysBack: config.daysBack,
    },
  );

  const { error, ...summary } = report;
  log.info({ ...summary, outputDir: config.outputDir }, `Refresh finished: ${report.outcome}`);

  if (config.outcomeFile !== null) {
    await appendFile(config.outcomeFile, `outcome=${report.outcome}\n`, 'utf-8');
  }

  return error === undefined ? 0 : 1;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    log.fatal({ err }, 'Refresh crashed');
    process.exitCode = 1;
  },
);
