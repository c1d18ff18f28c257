/**
 * Read-only digest of a strategy version for listings: counts, effective
 * weights and, given a registry, where each broker would trade each name.
 */

import { BROKERS } from '../registry/symbols.js';
import { roundTo } from '../utils/rounding.js';
import type { BrokerId, SymbolRegistry } from '../registry/symbols.js';
import type { PositionSide, StrategyVersion } from './types.js';

export interface PositionSummary {
  ticker: string;
  name: string;
  side: PositionSide;
  weight: number;
  /** Share of the allocated capital: side share × weight */
  effectiveWeight: number;
  confidence: number | null;
  rationale: string;
}

export interface BrokerCoverage {
  broker: BrokerId;
  mapped: number;
  unmapped: string[];
  currencies: string[];
  venues: string[];
}

export interface StrategySummary {
  id: string;
  version: number;
  name: string;
  description: string;
  baseCurrency: string;
  longShare: number;
  shortShare: number;
  longCount: number;
  shortCount: number;
  averageConfidence: number | null;
  positions: PositionSummary[];
  coverage: BrokerCoverage[];
}

export function summarizeStrategy(strategy: StrategyVersion, registry?: SymbolRegistry): StrategySummary {
  const positions = strategy.positions.map(p => ({
    ticker: p.ticker,
    name: registry?.instrument(p.ticker)?.displayName ?? p.ticker,
    side: p.side,
    weight: p.weight,
    effectiveWeight: roundTo((p.side === 'long' ? strategy.longShare : strategy.shortShare) * p.weight, 6),
    confidence: p.confidence,
    rationale: p.rationale,
  }));

  const scores = strategy.positions.flatMap(p => (p.confidence === null ? [] : [p.confidence]));
  const averageConfidence =
    scores.length > 0 ? roundTo(scores.reduce((sum, c) => sum + c, 0) / scores.length, 1) : null;

  const coverage: BrokerCoverage[] = [];
  if (registry) {
    for (const broker of BROKERS) {
      const mapped = new Map(registry.mappingsFor(broker).map(m => [m.ticker, m]));
      const hits = strategy.positions.flatMap(p => {
        const mapping = mapped.get(p.ticker);
        return mapping ? [mapping] : [];
      });
      coverage.push({
        broker,
        mapped: hits.length,
        unmapped: strategy.positions.filter(p => !mapped.has(p.ticker)).map(p => p.ticker),
        currencies: [...new Set(hits.map(m => m.currency))].sort(),
        venues: [...new Set(hits.map(m => m.venue))].sort(),
      });
    }
  }

  return {
    id: strategy.id,
    version: strategy.version,
    name: strategy.name,
    description: strategy.description,
    baseCurrency: strategy.baseCurrency,
    longShare: strategy.longShare,
    shortShare: strategy.shortShare,
    longCount: strategy.positions.filter(p => p.side === 'long').length,
    shortCount: strategy.positions.filter(p => p.side === 'short').length,
    averageConfidence,
    positions,
    coverage,
  };
}
