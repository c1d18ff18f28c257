/**
 * Market Data Store
 *
 * The only long-lived mutable state of the market-data layer: TTL tables for
 * prices, fundamentals and FX rates, plus each provider's cooldown. Owned by a
 * fetcher instance and injectable, so every test can start from a clean store
 * and drive time through `now`.
 *
 * Writes are upserts by key. Concurrent writers for the same key each hold a
 * complete value, so the last one simply wins.
 */

import type { Fundamentals, FxQuote, PriceSnapshot } from './types.js';

export type Clock = () => number;

interface Entry<T> {
  value: T;
  expiresAt: number;
}

export class TtlTable<T> {
  private entries = new Map<string, Entry<T>>();

  constructor(
    readonly ttlMs: number,
    private readonly now: Clock
  ) {}

  /** Returns a copy of a live entry. Expired entries are evicted here. */
  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return structuredClone(entry.value);
  }

  set(key: string, value: T): void {
    this.entries.set(key, { value: structuredClone(value), expiresAt: this.now() + this.ttlMs });
  }

  delete(key: string): void {
    this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

export interface CooldownState {
  /** Epoch ms until which the provider is skipped */
  until: number;
  /** Consecutive rate-limit responses since the last success */
  strikes: number;
}

export interface CooldownPolicy {
  baseMs: number;
  maxMs: number;
}

export interface StoreOptions {
  priceTtlMs: number;
  fundamentalsTtlMs: number;
  fxTtlMs: number;
  now?: Clock;
}

export class MarketDataStore {
  readonly prices: TtlTable<PriceSnapshot>;
  readonly fundamentals: TtlTable<Fundamentals>;
  readonly fx: TtlTable<FxQuote>;
  readonly now: Clock;
  private cooldowns = new Map<string, CooldownState>();

  constructor(options: StoreOptions) {
    this.now = options.now ?? Date.now;
    this.prices = new TtlTable(options.priceTtlMs, this.now);
    this.fundamentals = new TtlTable(options.fundamentalsTtlMs, this.now);
    this.fx = new TtlTable(options.fxTtlMs, this.now);
  }

  isCoolingDown(provider: string): boolean {
    const state = this.cooldowns.get(provider);
    return state !== undefined && state.until > this.now();
  }

  cooldown(provider: string): CooldownState | undefined {
    const state = this.cooldowns.get(provider);
    return state ? { ...state } : undefined;
  }

  /**
   * Exponential backoff: base, 2·base, 4·base … capped at `maxMs`. A longer
   * Retry-After from the provider wins, within the same cap.
   */
  recordRateLimit(provider: string, policy: CooldownPolicy, retryAfterMs = 0): CooldownState {
    const strikes = this.cooldowns.get(provider)?.strikes ?? 0;
    const backoff = Math.min(policy.baseMs * 2 ** strikes, policy.maxMs);
    const delay = Math.min(Math.max(backoff, retryAfterMs), policy.maxMs);
    const state = { until: this.now() + delay, strikes: strikes + 1 };
    this.cooldowns.set(provider, state);
    return { ...state };
  }

  recordSuccess(provider: string): void {
    this.cooldowns.delete(provider);
  }

  clear(): void {
    this.prices.clear();
    this.fundamentals.clear();
    this.fx.clear();
    this.cooldowns.clear();
  }
}
