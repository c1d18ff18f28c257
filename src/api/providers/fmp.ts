/**
 * Financial Modeling Prep provider (premium, metered).
 *
 * Quote endpoint for price and headline fundamentals, TTM ratios for the
 * valuation multiples, the company profile for beta. The ratios and profile
 * calls are best effort: a quote without them is still a valid snapshot. A rate
 * limit on any of them fails the whole quote.
 */

import { z } from 'zod';
import { requestJson } from '../http.js';
import type { FetchLike } from '../http.js';
import { createLogger } from '../../utils/logger.js';
import {
  HttpError,
  MalformedPayloadError,
  ProviderRateLimitedError,
  RequestCancelledError,
  errorMessage,
} from '../../utils/errors.js';
import type { Fundamentals, MarketDataProvider, ProviderQuote } from '../../market/types.js';

const log = createLogger('FMP');

const BASE_URL = 'https://financialmodelingprep.com/stable';

const nullableNumber = z.number().nullish().transform(v => v ?? null);

const QuoteSchema = z.object({
  symbol: z.string(),
  name: z.string().nullish(),
  price: z.number().nullish(),
  volume: nullableNumber,
  yearHigh: nullableNumber,
  yearLow: nullableNumber,
  marketCap: nullableNumber,
  pe: nullableNumber,
  timestamp: z.number().nullish(),
});

const RatiosSchema = z.object({
  priceToEarningsRatioTTM: nullableNumber,
  priceToSalesRatioTTM: nullableNumber,
  priceToBookRatioTTM: nullableNumber,
  enterpriseValueMultipleTTM: nullableNumber,
});

const ProfileSchema = z.object({ beta: nullableNumber });

// FMP reports plan limits as a 200 with an error body.
const ErrorBodySchema = z.object({ 'Error Message': z.string() });

const QuoteResponseSchema = z.union([z.array(QuoteSchema), ErrorBodySchema]);
const RatiosResponseSchema = z.union([z.array(RatiosSchema), ErrorBodySchema]);
const ProfileResponseSchema = z.union([z.array(ProfileSchema), ErrorBodySchema]);

type FmpQuote = z.infer<typeof QuoteSchema>;
type FmpRatios = z.infer<typeof RatiosSchema>;
type FmpProfile = z.infer<typeof ProfileSchema>;

export interface FmpProviderOptions {
  apiKey: string;
  baseUrl?: string;
  fetchImpl?: FetchLike;
}

function unwrap<T>(body: T[] | { 'Error Message': string }, symbol: string): T | null {
  if (Array.isArray(body)) return body[0] ?? null;
  const message = body['Error Message'];
  if (/limit/i.test(message)) throw new ProviderRateLimitedError('fmp');
  throw new MalformedPayloadError(`FMP error for ${symbol}: ${message}`);
}

function toFundamentals(quote: FmpQuote, ratios: FmpRatios | null, profile: FmpProfile | null): Fundamentals {
  return {
    pe: ratios?.priceToEarningsRatioTTM ?? quote.pe,
    ps: ratios?.priceToSalesRatioTTM ?? null,
    pb: ratios?.priceToBookRatioTTM ?? null,
    evEbitda: ratios?.enterpriseValueMultipleTTM ?? null,
    marketCap: quote.marketCap,
    fiftyTwoWeekHigh: quote.yearHigh,
    fiftyTwoWeekLow: quote.yearLow,
    volume: quote.volume,
    beta: profile?.beta ?? null,
  };
}

export class FmpProvider implements MarketDataProvider {
  readonly name = 'fmp';
  readonly capabilities = { fundamentals: true, history: false, fx: true };
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly fetchImpl?: FetchLike;

  constructor(options: FmpProviderOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? BASE_URL;
    this.fetchImpl = options.fetchImpl;
  }

  private url(endpoint: string, symbol: string): string {
    const q = new URLSearchParams({ symbol, apikey: this.apiKey });
    return `${this.baseUrl}${endpoint}?${q.toString()}`;
  }

  async fetchQuote(symbol: string, signal: AbortSignal): Promise<ProviderQuote> {
    const body = await requestJson(this.url('/quote', symbol), QuoteResponseSchema, {
      signal,
      fetchImpl: this.fetchImpl,
    });
    const quote = unwrap(body, symbol);
    if (!quote) throw new MalformedPayloadError(`FMP returned no quote for ${symbol}`);

    const [ratios, profile] = await Promise.all([
      this.fetchSupplement('/ratios-ttm', RatiosResponseSchema, symbol, signal),
      this.fetchSupplement('/profile', ProfileResponseSchema, symbol, signal),
    ]);

    return {
      symbol,
      name: quote.name ?? null,
      price: quote.price ?? null,
      currency: null,
      asOf: quote.timestamp ? quote.timestamp * 1000 : null,
      fundamentals: toFundamentals(quote, ratios, profile),
      closes: null,
    };
  }

  private async fetchSupplement<T>(
    endpoint: string,
    schema: z.ZodType<T[] | { 'Error Message': string }, z.ZodTypeDef, unknown>,
    symbol: string,
    signal: AbortSignal
  ): Promise<T | null> {
    try {
      const body = await requestJson(this.url(endpoint, symbol), schema, { signal, fetchImpl: this.fetchImpl });
      return unwrap(body, symbol);
    } catch (error) {
      if (error instanceof RequestCancelledError || error instanceof ProviderRateLimitedError) throw error;
      if (error instanceof HttpError && error.statusCode === 429) {
        throw new ProviderRateLimitedError('fmp', error.retryAfterMs);
      }
      log.debug('Supplement unavailable, using quote only', { endpoint, symbol, msg: errorMessage(error) });
      return null;
    }
  }

  async fetchFxRate(from: string, to: string, signal: AbortSignal): Promise<number> {
    const pair = `${from}${to}`;
    const body = await requestJson(this.url('/quote', pair), QuoteResponseSchema, {
      signal,
      fetchImpl: this.fetchImpl,
    });
    const quote = unwrap(body, pair);
    if (!quote || typeof quote.price !== 'number' || quote.price <= 0) {
      throw new MalformedPayloadError(`FMP returned no rate for ${pair}`);
    }
    return quote.price;
  }
}
