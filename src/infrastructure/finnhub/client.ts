import { z } from 'zod';
import type { Logger } from 'pino';
import { FetchError } from '../../domain/index.js';
import type { IsoDate } from '../../domain/index.js';
import type { CalendarSource } from '../../application/index.js';

export const FINNHUB_API_BASE = 'https://finnhub.io/api/v1';

/**
 * `/calendar/earnings` envelope. Rows stay opaque here; they are
 * validated one by one by the index pipeline.
 *
 * The key is required: `null` or `[]` means no events, while a body
 * without it (rate limit, auth error) is not a calendar at all.
 */
const calendarResponseSchema = z.object({
  earningsCalendar: z.array(z.unknown()).nullable(),
});

/** Finnhub reports some failures as `{ "error": "..." }` with HTTP 200. */
const providerErrorSchema = z.object({ error: z.string() });

/** `/stock/symbol` row; only the fields the universe needs. */
const symbolRowSchema = z
  .object({
    symbol: z.string().optional(),
    type: z.string().nullable().optional(),
  })
  .passthrough();

export type SymbolRow = z.infer<typeof symbolRowSchema>;

export interface FinnhubClientOptions {
  token: string;
  timeoutMs: number;
  log: Logger;
  baseUrl?: string;
}

/**
 * Minimal Finnhub REST client.
 *
 * Network errors, timeouts, non-2xx statuses and payloads of the wrong
 * shape all surface as a FetchError. The token travels as the
 * `token` query parameter and is never logged.
 */
export class FinnhubClient implements CalendarSource {
  private readonly baseUrl: string;

  constructor(private readonly options: FinnhubClientOptions) {
    this.baseUrl = options.baseUrl ?? FINNHUB_API_BASE;
  }

  /** One bulk request for all earnings events in `[windowStart, windowEnd]`. */
  async fetchCalendar(windowStart: IsoDate, windowEnd: IsoDate): Promise<unknown[]> {
    const body = await this.getJson('/calendar/earnings', { from: windowStart, to: windowEnd });

    const parsed = calendarResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new FetchError('Malformed /calendar/earnings response', { cause: parsed.error });
    }

    return parsed.data.earningsCalendar ?? [];
  }

  /** Every symbol listed on `exchange`. */
  async fetchSymbols(exchange: string): Promise<SymbolRow[]> {
    const body = await this.getJson('/stock/symbol', { exchange });

    const parsed = z.array(symbolRowSchema).nullable().safeParse(body);
    if (!parsed.success) {
      throw new FetchError(`Malformed /stock/symbol response for ${exchange}`, { cause: parsed.error });
    }

    return parsed.data ?? [];
  }

  private async getJson(path: string, params: Record<string, string>): Promise<unknown> {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }

    this.options.log.debug({ path, params }, 'Finnhub request');

    url.searchParams.set('token', this.options.token);

    let response: Response;
    try {
      response = await fetch(url, {
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (err: unknown) {
      throw new FetchError(`Finnhub request to ${path} failed`, { cause: err });
    }

    if (!response.ok) {
      throw new FetchError(`Finnhub ${path} returned HTTP ${response.status}`, {
        status: response.status,
      });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err: unknown) {
      throw new FetchError(`Finnhub ${path} returned invalid JSON`, { cause: err });
    }

    const providerError = providerErrorSchema.safeParse(body);
    if (providerError.success) {
      throw new FetchError(`Finnhub ${path} returned an error: ${providerError.data.error}`, {
        status: response.status,
      });
    }

    return body;
  }
}
