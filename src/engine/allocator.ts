/**
 * Allocation Engine
 *
 * Turns a strategy version, a capital amount and a broker into a rounded,
 * broker-specific order list. Positions that cannot be priced, mapped or
 * converted are dropped with a warning; only bad input and cancellation fail
 * the whole request.
 *
 * Usage:
 *   const engine = new AllocationEngine({ registry, fetcher });
 *   const result = await engine.allocate({ totalCapital: 100000, allocationPercent: 50, strategy, broker: 'alpaca' });
 */

import { createLogger } from '../utils/logger.js';
import { InvalidInputError, UnmappedInstrumentError } from '../utils/errors.js';
import { floorTo, roundTo } from '../utils/rounding.js';
import type { BrokerProfile, BrokerSymbolMapping, SymbolRegistry } from '../registry/symbols.js';
import type { MarketDataFetcher } from '../market/fetcher.js';
import type { FxQuote, PriceSnapshot } from '../market/types.js';
import type {
  AllocationRequest,
  AllocationResult,
  AllocationWarning,
  Order,
  StrategyVersion,
  TargetPosition,
} from './types.js';

const log = createLogger('ALLOC');

export const DEFAULT_MAX_DROP_RATIO = 0.5;

export interface AllocationEngineOptions {
  registry: SymbolRegistry;
  fetcher: MarketDataFetcher;
  /** Share of dropped positions above which a result is marked incomplete */
  maxDropRatio?: number;
}

interface ResolvedPosition {
  position: TargetPosition;
  mapping: BrokerSymbolMapping;
  dollarAmount: number;
  weight: number;
}

function validateRequest(totalCapital: number, allocationPercent: number): void {
  if (!Number.isFinite(totalCapital) || totalCapital <= 0) {
    throw new InvalidInputError('totalCapital', `totalCapital must be a positive number, got ${totalCapital}`);
  }
  if (!Number.isFinite(allocationPercent) || allocationPercent < 0 || allocationPercent > 100) {
    throw new InvalidInputError(
      'allocationPercent',
      `allocationPercent must be between 0 and 100, got ${allocationPercent}`
    );
  }
}

function sideShare(strategy: StrategyVersion, position: TargetPosition): number {
  return position.side === 'long' ? strategy.longShare : strategy.shortShare;
}

export class AllocationEngine {
  private readonly registry: SymbolRegistry;
  private readonly fetcher: MarketDataFetcher;
  private readonly maxDropRatio: number;

  constructor(options: AllocationEngineOptions) {
    this.registry = options.registry;
    this.fetcher = options.fetcher;
    this.maxDropRatio = options.maxDropRatio ?? DEFAULT_MAX_DROP_RATIO;
  }

  async allocate(request: AllocationRequest): Promise<AllocationResult> {
    const { totalCapital, allocationPercent, strategy, broker, signal } = request;
    validateRequest(totalCapital, allocationPercent);

    const allocatedCapital = (totalCapital * allocationPercent) / 100;
    const longPool = allocatedCapital * strategy.longShare;
    const shortPool = allocatedCapital * strategy.shortShare;

    const result: AllocationResult = {
      strategyId: strategy.id,
      strategyVersion: strategy.version,
      broker,
      baseCurrency: strategy.baseCurrency,
      totalCapital,
      allocationPercent,
      allocatedCapital: roundTo(allocatedCapital, 2),
      longPool: roundTo(longPool, 2),
      shortPool: roundTo(shortPool, 2),
      orders: [],
      warnings: [],
      droppedCount: 0,
      degraded: false,
      complete: true,
    };

    if (allocationPercent === 0) {
      log.info('Nothing to allocate', { strategy: strategy.id, broker });
      return result;
    }

    const profile = this.registry.profile(broker);
    const warn = (warning: AllocationWarning) => {
      result.warnings.push(warning);
      if (warning.ticker !== null) result.droppedCount++;
      log.warn('Position dropped', { ticker: warning.ticker, code: warning.code });
    };

    // 1. Map every position to the broker's instrument
    const resolved: ResolvedPosition[] = [];
    const committed = { long: 0, short: 0 };
    for (const position of strategy.positions) {
      const pool = position.side === 'long' ? longPool : shortPool;
      // Weights only sum to 1 within tolerance; a side never spends past its pool
      const dollarAmount = Math.max(
        0,
        Math.min(floorTo(pool * position.weight, 2), floorTo(pool - committed[position.side], 2))
      );
      committed[position.side] += dollarAmount;
      let mapping: BrokerSymbolMapping;
      try {
        mapping = this.registry.resolve(position.ticker, broker);
      } catch (error) {
        if (!(error instanceof UnmappedInstrumentError)) throw error;
        warn({ code: 'UNMAPPED_INSTRUMENT', ticker: position.ticker, message: error.message });
        continue;
      }
      resolved.push({
        position,
        mapping,
        dollarAmount,
        weight: sideShare(strategy, position) * position.weight,
      });
    }

    // 2. One batch of price lookups, joined back by position
    const snapshots = await this.fetcher.snapshots(
      resolved.map(r => ({ ticker: r.position.ticker, symbol: r.mapping.brokerSymbol, currency: r.mapping.currency })),
      { signal }
    );

    // 3. FX for every listing currency that differs from the base
    const currencies = new Set<string>();
    for (const snap of snapshots) {
      if (snap && snap.price > 0 && snap.currency !== strategy.baseCurrency) currencies.add(snap.currency);
    }
    const rates = new Map<string, FxQuote | null>();
    for (const currency of [...currencies].sort()) {
      rates.set(currency, await this.fetcher.fxRate(currency, strategy.baseCurrency, { signal }));
    }

    // 4. Orders, in strategy order
    resolved.forEach((entry, i) => {
      const order = this.buildOrder(entry, snapshots[i] ?? null, rates, strategy.baseCurrency, profile, warn);
      if (order) result.orders.push(order);
    });

    result.degraded = result.orders.some(o => o.degraded);

    const total = strategy.positions.length;
    if (total > 0 && result.droppedCount / total > this.maxDropRatio) {
      result.complete = false;
      result.warnings.push({
        code: 'ALLOCATION_INCOMPLETE',
        ticker: null,
        message: `${result.droppedCount} of ${total} positions dropped, above the ${this.maxDropRatio * 100}% limit`,
      });
    }

    log.info('Allocation built', {
      strategy: `${strategy.id}@v${strategy.version}`,
      broker,
      orders: result.orders.length,
      dropped: result.droppedCount,
      degraded: result.degraded,
      complete: result.complete,
    });

    return result;
  }

  private buildOrder(
    entry: ResolvedPosition,
    snapshot: PriceSnapshot | null,
    rates: Map<string, FxQuote | null>,
    baseCurrency: string,
    profile: BrokerProfile,
    warn: (warning: AllocationWarning) => void
  ): Order | null {
    const { position, mapping, dollarAmount, weight } = entry;

    if (!snapshot || !(snapshot.price > 0)) {
      warn({
        code: 'PRICE_UNAVAILABLE',
        ticker: position.ticker,
        message: `No price for ${mapping.brokerSymbol}`,
      });
      return null;
    }

    let fxRate = 1;
    let fxDegraded = false;
    if (snapshot.currency !== baseCurrency) {
      const quote = rates.get(snapshot.currency) ?? null;
      if (!quote) {
        warn({
          code: 'FX_UNAVAILABLE',
          ticker: position.ticker,
          message: `No ${snapshot.currency}/${baseCurrency} rate`,
        });
        return null;
      }
      fxRate = quote.rate;
      fxDegraded = quote.degraded;
    }

    const decimals = profile.fractional ? profile.quantityDecimals : 0;
    const quantity = floorTo(dollarAmount / fxRate / snapshot.price, decimals);
    if (quantity <= 0) {
      warn({
        code: 'QUANTITY_ROUNDS_TO_ZERO',
        ticker: position.ticker,
        message: `${dollarAmount} ${baseCurrency} buys less than one tradable unit of ${mapping.brokerSymbol}`,
      });
      return null;
    }

    return {
      ticker: position.ticker,
      brokerSymbol: mapping.brokerSymbol,
      name: this.registry.instrument(position.ticker)?.displayName ?? snapshot.name,
      side: position.side === 'long' ? 'buy' : 'sell',
      quantity,
      price: snapshot.price,
      dollarAmount,
      weight,
      currency: snapshot.currency,
      fxRate,
      venue: mapping.venue,
      rationale: position.rationale,
      source: snapshot.source,
      degraded: snapshot.degraded || fxDegraded,
      beta: snapshot.fundamentals?.beta ?? null,
    };
  }
}
