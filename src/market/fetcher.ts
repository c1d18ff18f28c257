/**
 * Market Data Fetcher
 *
 * Resolves a symbol to a PriceSnapshot through a declarative provider chain:
 *
 *   cache -> providers in priority order -> synthetic snapshot
 *
 * Each provider call is bounded by a timeout and linked to the caller's
 * AbortSignal. A rate-limited provider is put into cooldown and skipped until
 * it expires. Any other failure moves on to the next provider; the same
 * provider is never retried within one lookup.
 *
 * Usage:
 *   const fetcher = new MarketDataFetcher({ providers, store, synthetic });
 *   const snap = await fetcher.snapshot('ASML', { symbol: 'ASML.AS', currency: 'EUR' });
 */

import { createLogger } from '../utils/logger.js';
import { mapWithConcurrency } from '../utils/concurrency.js';
import {
  HttpError,
  MalformedPayloadError,
  PriceUnavailableError,
  ProviderRateLimitedError,
  RequestCancelledError,
  errorMessage,
} from '../utils/errors.js';
import { sixMonthReturn } from './returns.js';
import { SyntheticMarketData } from './synthetic.js';
import type { CooldownPolicy, CooldownState, MarketDataStore } from './store.js';
import type {
  Fundamentals,
  FxQuote,
  MarketDataProvider,
  PriceSnapshot,
  ProviderDescriptor,
  ProviderName,
  ProviderQuote,
  SnapshotRequest,
} from './types.js';

const log = createLogger('FETCH');

const DEFAULT_TIMEOUT_MS = 4000;
const DEFAULT_CONCURRENCY = 4;
const DEFAULT_COOLDOWN: CooldownPolicy = { baseMs: 5000, maxMs: 300000 };

export interface FetcherOptions {
  providers: ProviderDescriptor[];
  store: MarketDataStore;
  synthetic?: SyntheticMarketData;
  timeoutMs?: number;
  concurrency?: number;
  cooldown?: CooldownPolicy;
  /** When false, an exhausted chain throws PriceUnavailableError instead */
  syntheticFallback?: boolean;
}

export interface LookupOptions {
  signal?: AbortSignal;
}

export interface SnapshotOptions extends LookupOptions {
  symbol?: string;
  /** Listing currency to assume when the provider does not report one */
  currency?: string;
}

export interface ProviderStatus {
  name: ProviderName;
  priority: number;
  coolingDown: boolean;
  cooldown: CooldownState | null;
}

interface WalkResult<T> {
  value: T;
  provider: ProviderName;
}

function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) throw new RequestCancelledError();
}

/**
 * Runs one provider call with its own deadline. The provider sees a signal
 * that aborts on either the deadline or the caller's cancellation.
 */
async function callWithDeadline<T>(
  call: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  const onParentAbort = () => controller.abort();
  parent?.addEventListener('abort', onParentAbort, { once: true });

  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new HttpError(408, `No answer within ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([call(controller.signal), deadline]);
  } catch (error) {
    if (parent?.aborted) throw new RequestCancelledError();
    if (error instanceof RequestCancelledError) throw new HttpError(408, `No answer within ${timeoutMs}ms`);
    throw error;
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
  }
}

function isRateLimit(error: unknown): error is ProviderRateLimitedError | HttpError {
  return error instanceof ProviderRateLimitedError || (error instanceof HttpError && error.statusCode === 429);
}

function hasAnyValue(f: Fundamentals | null): f is Fundamentals {
  return f !== null && Object.values(f).some(v => v !== null);
}

/** Field by field: fresh values win, gaps are filled from the longer-lived cache. */
function mergeFundamentals(fresh: Fundamentals | null, cached: Fundamentals | undefined): Fundamentals | null {
  if (!cached) return fresh;
  if (!fresh) return cached;
  return {
    pe: fresh.pe ?? cached.pe,
    ps: fresh.ps ?? cached.ps,
    pb: fresh.pb ?? cached.pb,
    evEbitda: fresh.evEbitda ?? cached.evEbitda,
    marketCap: fresh.marketCap ?? cached.marketCap,
    fiftyTwoWeekHigh: fresh.fiftyTwoWeekHigh ?? cached.fiftyTwoWeekHigh,
    fiftyTwoWeekLow: fresh.fiftyTwoWeekLow ?? cached.fiftyTwoWeekLow,
    volume: fresh.volume ?? cached.volume,
    beta: fresh.beta ?? cached.beta,
  };
}

function validPrice(value: number | null): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0;
}

export class MarketDataFetcher {
  private readonly chain: ProviderDescriptor[];
  private readonly store: MarketDataStore;
  private readonly synthetic: SyntheticMarketData;
  private readonly timeoutMs: number;
  private readonly concurrency: number;
  private readonly cooldown: CooldownPolicy;
  private readonly syntheticFallback: boolean;

  constructor(options: FetcherOptions) {
    this.chain = options.providers
      .filter(d => d.enabled)
      .sort((a, b) => a.priority - b.priority);
    this.store = options.store;
    this.synthetic = options.synthetic ?? new SyntheticMarketData();
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    this.cooldown = options.cooldown ?? DEFAULT_COOLDOWN;
    this.syntheticFallback = options.syntheticFallback ?? true;

    log.info('Provider chain ready', {
      chain: this.chain.map(d => `${d.priority}:${d.provider.name}`).join(' > ') || '(none)',
      syntheticFallback: this.syntheticFallback,
    });
  }

  // ---------------------------------------------------------------------------
  // Generic chain driver
  // ---------------------------------------------------------------------------

  private async walk<T>(
    what: string,
    eligible: (provider: MarketDataProvider) => boolean,
    call: (provider: MarketDataProvider, signal: AbortSignal) => Promise<T>,
    signal?: AbortSignal
  ): Promise<WalkResult<T> | null> {
    for (const { provider } of this.chain) {
      if (!eligible(provider)) continue;
      throwIfCancelled(signal);

      if (this.store.isCoolingDown(provider.name)) {
        log.debug('Provider cooling down, skipped', { provider: provider.name, what });
        continue;
      }

      try {
        const value = await callWithDeadline(s => call(provider, s), this.timeoutMs, signal);
        this.store.recordSuccess(provider.name);
        return { value, provider: provider.name };
      } catch (error) {
        if (error instanceof RequestCancelledError) throw error;

        if (isRateLimit(error)) {
          const state = this.store.recordRateLimit(provider.name, this.cooldown, error.retryAfterMs);
          log.warn('Provider rate limited, cooling down', {
            provider: provider.name,
            what,
            cooldownMs: state.until - this.store.now(),
            strikes: state.strikes,
          });
          continue;
        }

        log.warn('Provider failed, trying next', { provider: provider.name, what, msg: errorMessage(error) });
      }
    }
    return null;
  }

  // ---------------------------------------------------------------------------
  // Prices
  // ---------------------------------------------------------------------------

  async snapshot(ticker: string, options: SnapshotOptions = {}): Promise<PriceSnapshot> {
    const symbol = options.symbol ?? ticker;
    throwIfCancelled(options.signal);

    const cached = this.store.prices.get(symbol);
    if (cached) {
      return { ...cached, ticker, source: 'cache' };
    }

    const result = await this.walk(
      symbol,
      () => true,
      async (provider, signal) => {
        const quote = await provider.fetchQuote(symbol, signal);
        if (!validPrice(quote.price)) {
          throw new MalformedPayloadError(`${provider.name} returned no usable price for ${symbol}`);
        }
        return { ...quote, price: quote.price };
      },
      options.signal
    );

    if (result) {
      return this.remember(ticker, symbol, result.provider, result.value, options.currency);
    }

    if (!this.syntheticFallback) {
      throw new PriceUnavailableError(symbol);
    }

    const synthetic = this.synthetic.snapshot(ticker, symbol, options.currency, this.store.now());
    log.warn('All providers exhausted, using synthetic snapshot', { ticker, symbol, price: synthetic.price });
    return synthetic;
  }

  private remember(
    ticker: string,
    symbol: string,
    provider: ProviderName,
    quote: ProviderQuote & { price: number },
    currencyHint?: string
  ): PriceSnapshot {
    if (hasAnyValue(quote.fundamentals)) {
      const merged = mergeFundamentals(quote.fundamentals, this.store.fundamentals.get(symbol));
      this.store.fundamentals.set(symbol, merged ?? quote.fundamentals);
    }

    const snapshot: PriceSnapshot = {
      ticker,
      symbol,
      name: quote.name ?? ticker,
      price: quote.price,
      currency: quote.currency ?? currencyHint ?? 'USD',
      asOf: quote.asOf ?? this.store.now(),
      source: provider,
      origin: provider,
      degraded: false,
      fundamentals: this.store.fundamentals.get(symbol) ?? quote.fundamentals,
      sixMonthReturn: quote.closes ? sixMonthReturn(quote.closes) : null,
    };

    this.store.prices.set(symbol, snapshot);
    log.debug('Snapshot stored', { symbol, provider, price: snapshot.price, currency: snapshot.currency });
    return { ...snapshot };
  }

  /**
   * Resolves many requests concurrently, bounded by the worker limit.
   * Results line up with `requests`; an exhausted ticker yields null instead
   * of failing the batch. Cancellation still rejects.
   */
  async snapshots(
    requests: readonly SnapshotRequest[],
    options: LookupOptions = {}
  ): Promise<Array<PriceSnapshot | null>> {
    return mapWithConcurrency(requests, this.concurrency, async req => {
      try {
        return await this.snapshot(req.ticker, { symbol: req.symbol, currency: req.currency, signal: options.signal });
      } catch (error) {
        if (error instanceof PriceUnavailableError) return null;
        throw error;
      }
    });
  }

  // ---------------------------------------------------------------------------
  // FX
  // ---------------------------------------------------------------------------

  /** Units of `to` per unit of `from`, or null when no source knows the pair. */
  async fxRate(from: string, to: string, options: LookupOptions = {}): Promise<FxQuote | null> {
    throwIfCancelled(options.signal);
    if (from === to) {
      return { from, to, rate: 1, asOf: this.store.now(), source: 'cache', degraded: false };
    }

    const key = `${from}/${to}`;
    const cached = this.store.fx.get(key);
    if (cached) return { ...cached, source: 'cache' };

    const result = await this.walk(
      key,
      provider => provider.capabilities.fx && provider.fetchFxRate !== undefined,
      async (provider, signal) => {
        if (!provider.fetchFxRate) throw new MalformedPayloadError(`${provider.name} has no FX support`);
        const rate = await provider.fetchFxRate(from, to, signal);
        if (!validPrice(rate)) throw new MalformedPayloadError(`${provider.name} returned no usable rate for ${key}`);
        return rate;
      },
      options.signal
    );

    if (result) {
      const quote: FxQuote = { from, to, rate: result.value, asOf: this.store.now(), source: result.provider, degraded: false };
      this.store.fx.set(key, quote);
      return quote;
    }

    if (!this.syntheticFallback) return null;

    const synthetic = this.synthetic.fxRate(from, to, this.store.now());
    log.warn('FX providers exhausted', { pair: key, synthetic: synthetic?.rate ?? 'none' });
    return synthetic;
  }

  // ---------------------------------------------------------------------------
  // Status
  // ---------------------------------------------------------------------------

  providerStatus(): ProviderStatus[] {
    return this.chain.map(({ provider, priority }) => ({
      name: provider.name,
      priority,
      coolingDown: this.store.isCoolingDown(provider.name),
      cooldown: this.store.cooldown(provider.name) ?? null,
    }));
  }
}
