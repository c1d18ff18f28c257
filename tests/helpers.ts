import { MarketDataStore } from '../src/market/store.js';
import { MarketDataFetcher } from '../src/market/fetcher.js';
import { SyntheticMarketData } from '../src/market/synthetic.js';
import { SymbolRegistry } from '../src/registry/symbols.js';
import { parseStrategy } from '../src/engine/strategy-loader.js';
import { RequestCancelledError } from '../src/utils/errors.js';
import type { DemoData } from '../src/market/synthetic.js';
import type { FetcherOptions } from '../src/market/fetcher.js';
import { EMPTY_FUNDAMENTALS } from '../src/market/types.js';
import type { MarketDataProvider, ProviderName, ProviderQuote } from '../src/market/types.js';
import type { StrategyVersion } from '../src/engine/types.js';

export type QuoteBehaviour = number | { price: number; currency: string; beta?: number } | Error | 'hang';

/** In-process provider: answers from a table and records every call. */
export class FakeProvider implements MarketDataProvider {
  readonly capabilities = { fundamentals: false, history: true, fx: true };
  readonly calls: string[] = [];
  readonly fxCalls: string[] = [];

  constructor(
    readonly name: ProviderName,
    private readonly quotes: Record<string, QuoteBehaviour> = {},
    private readonly rates: Record<string, number | Error> = {}
  ) {}

  async fetchQuote(symbol: string, signal: AbortSignal): Promise<ProviderQuote> {
    this.calls.push(symbol);
    const behaviour = this.quotes[symbol];
    if (behaviour === undefined) throw new Error(`${this.name}: unknown symbol ${symbol}`);
    if (behaviour === 'hang') return hang(signal);
    if (behaviour instanceof Error) throw behaviour;

    const { price, currency, beta } =
      typeof behaviour === 'number' ? { price: behaviour, currency: 'USD', beta: undefined } : behaviour;
    return {
      symbol,
      name: `${symbol} Inc`,
      price,
      currency,
      asOf: 1_700_000_000_000,
      fundamentals: beta === undefined ? null : { ...EMPTY_FUNDAMENTALS, beta },
      closes: [price / 2, null, price],
    };
  }

  async fetchFxRate(from: string, to: string): Promise<number> {
    const pair = `${from}/${to}`;
    this.fxCalls.push(pair);
    const rate = this.rates[pair];
    if (rate === undefined) throw new Error(`${this.name}: unknown pair ${pair}`);
    if (rate instanceof Error) throw rate;
    return rate;
  }
}

function hang<T>(signal: AbortSignal): Promise<T> {
  return new Promise<T>((_, reject) => {
    signal.addEventListener('abort', () => reject(new RequestCancelledError()), { once: true });
  });
}

export class Clock {
  constructor(public time = 1_000_000) {}
  now = (): number => this.time;
  advance(ms: number): void {
    this.time += ms;
  }
}

export function makeStore(clock = new Clock()): MarketDataStore {
  return new MarketDataStore({ priceTtlMs: 120_000, fundamentalsTtlMs: 3_600_000, fxTtlMs: 300_000, now: clock.now });
}

export function makeFetcher(
  providers: MarketDataProvider[],
  options: Partial<FetcherOptions> & { clock?: Clock; demo?: DemoData } = {}
): MarketDataFetcher {
  const { clock, demo, ...rest } = options;
  return new MarketDataFetcher({
    providers: providers.map((provider, i) => ({ provider, priority: i + 1, enabled: true })),
    store: makeStore(clock),
    synthetic: new SyntheticMarketData(demo),
    timeoutMs: 1000,
    ...rest,
  });
}

/** Two brokers, four US names and a Paris listing (DDD) that Alpaca does not carry. */
export function testRegistry(): SymbolRegistry {
  return SymbolRegistry.fromTable({
    brokers: [
      { broker: 'alpaca', displayName: 'Alpaca', fractional: true, quantityDecimals: 6 },
      { broker: 'swissquote', displayName: 'Swissquote', fractional: false, quantityDecimals: 0 },
    ],
    instruments: [
      { ticker: 'AAA', displayName: 'Alpha Corp' },
      { ticker: 'BBB', displayName: 'Beta Corp' },
      { ticker: 'CCC', displayName: 'Gamma Corp' },
      { ticker: 'DDD', displayName: 'Delta SA' },
      { ticker: 'EEE', displayName: 'Epsilon Inc' },
    ],
    mappings: [
      { ticker: 'AAA', broker: 'alpaca', brokerSymbol: 'AAA', currency: 'USD', venue: 'XNAS' },
      { ticker: 'BBB', broker: 'alpaca', brokerSymbol: 'BBB', currency: 'USD', venue: 'XNAS' },
      { ticker: 'CCC', broker: 'alpaca', brokerSymbol: 'CCC', currency: 'USD', venue: 'XNYS' },
      { ticker: 'EEE', broker: 'alpaca', brokerSymbol: 'EEE', currency: 'USD', venue: 'XNYS' },
      { ticker: 'AAA', broker: 'swissquote', brokerSymbol: 'AAA', currency: 'USD', venue: 'XNAS' },
      { ticker: 'BBB', broker: 'swissquote', brokerSymbol: 'BBB', currency: 'USD', venue: 'XNAS' },
      { ticker: 'CCC', broker: 'swissquote', brokerSymbol: 'CCC', currency: 'USD', venue: 'XNYS' },
      { ticker: 'DDD', broker: 'swissquote', brokerSymbol: 'DDD.PA', currency: 'EUR', venue: 'XPAR' },
      { ticker: 'EEE', broker: 'swissquote', brokerSymbol: 'EEE', currency: 'USD', venue: 'XNYS' },
    ],
  });
}

export interface PositionInput {
  ticker: string;
  side: 'long' | 'short';
  weight: number;
}

export function makeStrategy(positions: PositionInput[], overrides: Record<string, unknown> = {}): StrategyVersion {
  return parseStrategy({
    id: 'test-strategy',
    version: 1,
    name: 'Test strategy',
    baseCurrency: 'USD',
    longShare: 0.6,
    shortShare: 0.4,
    positions: positions.map(p => ({ ...p, rationale: `${p.ticker} thesis`, confidence: 70 })),
    ...overrides,
  });
}
