/**
 * Synthetic market data used once every provider has failed.
 *
 * Prices come from a static demo table so the allocation flow stays usable
 * offline. A symbol missing from the table gets price 0, which the allocation
 * engine treats as unavailable.
 */

import fs from 'node:fs';
import { z } from 'zod';
import { EMPTY_FUNDAMENTALS } from './types.js';
import type { FxQuote, PriceSnapshot } from './types.js';

const DemoDataSchema = z.object({
  prices: z.record(z.object({ price: z.number().positive(), currency: z.string().length(3) })),
  fx: z.record(z.number().positive()),
});

export type DemoData = z.infer<typeof DemoDataSchema>;
type DemoPrice = DemoData['prices'][string];

export function loadDemoData(filePath: string): DemoData {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  return DemoDataSchema.parse(raw);
}

export const EMPTY_DEMO_DATA: DemoData = { prices: {}, fx: {} };

export class SyntheticMarketData {
  constructor(private readonly demo: DemoData = EMPTY_DEMO_DATA) {}

  /** Deterministic: the same symbol always yields the same snapshot. */
  snapshot(ticker: string, symbol: string, currencyHint?: string, asOf = 0): PriceSnapshot {
    const entry: DemoPrice | undefined = this.demo.prices[symbol] ?? this.demo.prices[ticker];
    return {
      ticker,
      symbol,
      name: ticker,
      price: entry?.price ?? 0,
      currency: entry?.currency ?? currencyHint ?? 'USD',
      asOf,
      source: 'synthetic',
      degraded: true,
      fundamentals: { ...EMPTY_FUNDAMENTALS },
      sixMonthReturn: 0,
    };
  }

  /** Looks up `FROM/TO`, falling back to the inverse of `TO/FROM`. */
  fxRate(from: string, to: string, asOf = 0): FxQuote | null {
    const direct: number | undefined = this.demo.fx[`${from}/${to}`];
    const inverse: number | undefined = this.demo.fx[`${to}/${from}`];
    const rate = direct ?? (inverse !== undefined ? 1 / inverse : undefined);
    if (rate === undefined) return null;
    return { from, to, rate, asOf, source: 'synthetic', degraded: true };
  }
}
