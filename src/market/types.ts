/**
 * Market data types: provider contracts, snapshots and FX quotes.
 */

export type ProviderName = 'fmp' | 'yahoo';

export type SnapshotSource = ProviderName | 'cache' | 'synthetic';

export interface Fundamentals {
  pe: number | null;
  ps: number | null;
  pb: number | null;
  evEbitda: number | null;
  marketCap: number | null;
  fiftyTwoWeekHigh: number | null;
  fiftyTwoWeekLow: number | null;
  volume: number | null;
  /** Sensitivity to the broad market; null when the provider has none */
  beta: number | null;
}

export interface PriceSnapshot {
  /** Canonical ticker the caller asked about */
  ticker: string;
  /** Symbol actually quoted (broker/venue symbol, or the ticker itself) */
  symbol: string;
  name: string;
  price: number;
  currency: string;
  /** Epoch ms of the provider's quote */
  asOf: number;
  source: SnapshotSource;
  /** Provider that produced a cached snapshot */
  origin?: ProviderName;
  /** True for synthetic data; surfaced as demo mode downstream */
  degraded: boolean;
  fundamentals: Fundamentals | null;
  sixMonthReturn: number | null;
}

export interface FxQuote {
  from: string;
  to: string;
  /** Units of `to` per one unit of `from` */
  rate: number;
  asOf: number;
  source: SnapshotSource;
  degraded: boolean;
}

/** Raw provider result before validation. `price` may be missing on bad payloads. */
export interface ProviderQuote {
  symbol: string;
  name: string | null;
  price: number | null;
  currency: string | null;
  asOf: number | null;
  fundamentals: Fundamentals | null;
  /** Daily closes over roughly six months, oldest first; nulls are gaps */
  closes: Array<number | null> | null;
}

export interface ProviderCapabilities {
  fundamentals: boolean;
  history: boolean;
  fx: boolean;
}

export interface MarketDataProvider {
  readonly name: ProviderName;
  readonly capabilities: ProviderCapabilities;
  fetchQuote(symbol: string, signal: AbortSignal): Promise<ProviderQuote>;
  fetchFxRate?(from: string, to: string, signal: AbortSignal): Promise<number>;
}

/** One link of the provider chain, walked in ascending priority. */
export interface ProviderDescriptor {
  provider: MarketDataProvider;
  priority: number;
  enabled: boolean;
}

export interface SnapshotRequest {
  ticker: string;
  /** Venue-specific symbol to quote instead of the ticker */
  symbol?: string;
  /** Listing currency to assume when the provider does not report one */
  currency?: string;
}

export const EMPTY_FUNDAMENTALS: Readonly<Fundamentals> = Object.freeze({
  pe: null,
  ps: null,
  pb: null,
  evEbitda: null,
  marketCap: null,
  fiftyTwoWeekHigh: null,
  fiftyTwoWeekLow: null,
  volume: null,
  beta: null,
});
