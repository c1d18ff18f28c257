/**
 * Yahoo Finance chart provider (free, unmetered, throttled by IP).
 *
 * One chart call returns the last price, the quote currency and six months of
 * daily closes, which also feed the six-month return.
 */

import { z } from 'zod';
import { requestJson } from '../http.js';
import type { FetchLike } from '../http.js';
import { MalformedPayloadError } from '../../utils/errors.js';
import type { MarketDataProvider, ProviderQuote } from '../../market/types.js';

const BASE_URL = 'https://query1.finance.yahoo.com/v8/finance/chart';
const USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36';

const nullableNumber = z.number().nullish().transform(v => v ?? null);

const ChartResultSchema = z.object({
  meta: z.object({
    symbol: z.string(),
    currency: z.string().nullish(),
    regularMarketPrice: z.number().nullish(),
    regularMarketTime: z.number().nullish(),
    regularMarketVolume: nullableNumber,
    fiftyTwoWeekHigh: nullableNumber,
    fiftyTwoWeekLow: nullableNumber,
    longName: z.string().nullish(),
    shortName: z.string().nullish(),
  }),
  indicators: z
    .object({
      quote: z.array(z.object({ close: z.array(z.number().nullable()).nullish() })).nullish(),
    })
    .nullish(),
});

const ChartResponseSchema = z.object({
  chart: z.object({
    result: z.array(ChartResultSchema).nullish(),
    error: z.object({ code: z.string().nullish(), description: z.string().nullish() }).nullish(),
  }),
});

type ChartResult = z.infer<typeof ChartResultSchema>;

// London listings are quoted in pence ('GBp' or 'GBX').
const MINOR_UNITS: Record<string, { currency: string; divisor: number }> = {
  GBp: { currency: 'GBP', divisor: 100 },
  GBX: { currency: 'GBP', divisor: 100 },
  ZAc: { currency: 'ZAR', divisor: 100 },
  ILA: { currency: 'ILS', divisor: 100 },
};

function scale(value: number | null, divisor: number): number | null {
  return value === null ? null : value / divisor;
}

export interface YahooProviderOptions {
  baseUrl?: string;
  range?: string;
  fetchImpl?: FetchLike;
}

export class YahooProvider implements MarketDataProvider {
  readonly name = 'yahoo';
  readonly capabilities = { fundamentals: true, history: true, fx: true };
  private readonly baseUrl: string;
  private readonly range: string;
  private readonly fetchImpl?: FetchLike;

  constructor(options: YahooProviderOptions = {}) {
    this.baseUrl = options.baseUrl ?? BASE_URL;
    this.range = options.range ?? '6mo';
    this.fetchImpl = options.fetchImpl;
  }

  private async chart(symbol: string, range: string, signal: AbortSignal): Promise<ChartResult> {
    const q = new URLSearchParams({ range, interval: '1d' });
    const url = `${this.baseUrl}/${encodeURIComponent(symbol)}?${q.toString()}`;
    const body = await requestJson(url, ChartResponseSchema, {
      signal,
      headers: { 'User-Agent': USER_AGENT, Accept: 'application/json' },
      fetchImpl: this.fetchImpl,
    });

    const result = body.chart.result?.[0];
    if (!result) {
      const reason = body.chart.error?.description ?? 'empty chart';
      throw new MalformedPayloadError(`Yahoo returned no chart for ${symbol}: ${reason}`);
    }
    return result;
  }

  async fetchQuote(symbol: string, signal: AbortSignal): Promise<ProviderQuote> {
    const { meta, indicators } = await this.chart(symbol, this.range, signal);
    const closes = indicators?.quote?.[0]?.close ?? null;
    const minor = meta.currency ? MINOR_UNITS[meta.currency] : undefined;
    const divisor = minor?.divisor ?? 1;

    return {
      symbol,
      name: meta.longName ?? meta.shortName ?? null,
      price: scale(meta.regularMarketPrice ?? null, divisor),
      currency: minor?.currency ?? meta.currency ?? null,
      asOf: meta.regularMarketTime ? meta.regularMarketTime * 1000 : null,
      fundamentals: {
        pe: null,
        ps: null,
        pb: null,
        evEbitda: null,
        marketCap: null,
        fiftyTwoWeekHigh: scale(meta.fiftyTwoWeekHigh, divisor),
        fiftyTwoWeekLow: scale(meta.fiftyTwoWeekLow, divisor),
        volume: meta.regularMarketVolume,
        beta: null,
      },
      closes,
    };
  }

  async fetchFxRate(from: string, to: string, signal: AbortSignal): Promise<number> {
    const pair = `${from}${to}=X`;
    const { meta } = await this.chart(pair, '1d', signal);
    const rate = meta.regularMarketPrice;
    if (typeof rate !== 'number' || rate <= 0) {
      throw new MalformedPayloadError(`Yahoo returned no rate for ${pair}`);
    }
    return rate;
  }
}
