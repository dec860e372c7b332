import { resolve } from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from '../domain/index.js';
import { DEFAULT_TTL_HOURS } from '../application/index.js';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Runtime configuration read from environment variables.
 */
export interface AppConfig {
  /** `null` when FINNHUB_TOKEN is unset or blank. */
  finnhubToken: string | null;
  ttlHours: number;
  daysAhead: number;
  daysBack: number;
  /** Exchange codes for the symbol universe; empty disables the filter. */
  exchanges: string[];
  outputDir: string;
  outcomeFile: string | null;
  timeoutMs: number;
  logLevel: LogLevel;
  host: string;
  port: number;
}

/**
 * Defaults applied to any variable that is missing or invalid.
 * `outputDir` is resolved against the working directory.
 */
export const DEFAULT_CONFIG: AppConfig = {
  finnhubToken: null,
  ttlHours: DEFAULT_TTL_HOURS,
  daysAhead: 120,
  daysBack: 1,
  exchanges: [],
  outputDir: 'docs',
  outcomeFile: null,
  timeoutMs: 60_000,
  logLevel: 'info',
  host: '0.0.0.0',
  port: 3000,
};

export interface LoadedConfig {
  config: AppConfig;
  /** One entry per variable that fell back to its default. */
  warnings: ConfigurationError[];
}

type Env = Record<string, string | undefined>;

/**
 * Parses `env[name]` with `schema`.
 *
 * Missing or blank → `fallback` silently.
 * Invalid → `fallback` plus a ConfigurationError in `warnings`.
 */
function readVar<T>(
  env: Env,
  name: string,
  schema: z.ZodType<T>,
  fallback: T,
  warnings: ConfigurationError[],
): T {
  const raw = env[name]?.trim();
  if (raw === undefined || raw === '') return fallback;

  const parsed = schema.safeParse(raw);
  if (parsed.success) return parsed.data;

  const reason = parsed.error.issues[0]?.message ?? 'invalid value';
  warnings.push(
    new ConfigurationError(name, `${name}="${raw}" is invalid (${reason}), using default ${String(fallback)}`),
  );
  return fallback;
}

function optionalString(env: Env, name: string): string | null {
  const raw = env[name]?.trim();
  return raw === undefined || raw === '' ? null : raw;
}

/**
 * Loads configuration from the environment.
 *
 * Never throws: invalid values are replaced by defaults and reported in
 * `warnings` for the caller to log.
 */
export function loadConfig(env: Env = process.env): LoadedConfig {
  const warnings: ConfigurationError[] = [];

  const exchanges = (env['EARNINGS_EXCHANGES'] ?? '')
    .split(',')
    .map((code) => code.trim())
    .filter((code) => code !== '');

  const config: AppConfig = {
    finnhubToken: optionalString(env, 'FINNHUB_TOKEN'),
    ttlHours: readVar(
      env,
      'EARNINGS_TTL_HOURS',
      z.coerce.number().finite().positive(),
      DEFAULT_CONFIG.ttlHours,
      warnings,
    ),
    daysAhead: readVar(
      env,
      'EARNINGS_DAYS_AHEAD',
      z.coerce.number().int().positive(),
      DEFAULT_CONFIG.daysAhead,
      warnings,
    ),
    daysBack: readVar(
      env,
      'EARNINGS_DAYS_BACK',
      z.coerce.number().int().min(0),
      DEFAULT_CONFIG.daysBack,
      warnings,
    ),
    exchanges,
    outputDir: resolve(process.cwd(), optionalString(env, 'EARNINGS_OUTPUT_DIR') ?? DEFAULT_CONFIG.outputDir),
    outcomeFile: optionalString(env, 'EARNINGS_OUTCOME_FILE'),
    timeoutMs: readVar(
      env,
      'FINNHUB_TIMEOUT_MS',
      z.coerce.number().int().positive(),
      DEFAULT_CONFIG.timeoutMs,
      warnings,
    ),
    logLevel: readVar(env, 'LOG_LEVEL', z.enum(LOG_LEVELS), DEFAULT_CONFIG.logLevel, warnings),
    host: optionalString(env, 'HOST') ?? DEFAULT_CONFIG.host,
    port: readVar(
      env,
      'PORT',
      z.coerce.number().int().min(1).max(65535),
      DEFAULT_CONFIG.port,
      warnings,
    ),
  };

  return { config, warnings };
}
