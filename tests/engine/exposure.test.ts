import { describe, expect, it } from 'vitest';

import { summarizeExposure } from '../../src/engine/exposure.js';
import type { AllocationResult, Order } from '../../src/engine/types.js';

function order(ticker: string, side: Order['side'], dollarAmount: number, extra: Partial<Order> = {}): Order {
  return {
    ticker,
    brokerSymbol: ticker,
    name: ticker,
    side,
    quantity: dollarAmount / 100,
    price: 100,
    dollarAmount,
    weight: 0,
    currency: 'USD',
    fxRate: 1,
    venue: 'XNAS',
    rationale: '',
    source: 'fmp',
    degraded: false,
    beta: null,
    ...extra,
  };
}

function result(allocatedCapital: number, orders: Order[]): AllocationResult {
  return {
    strategyId: 'test-strategy',
    strategyVersion: 1,
    broker: 'alpaca',
    baseCurrency: 'USD',
    totalCapital: allocatedCapital,
    allocationPercent: 100,
    allocatedCapital,
    longPool: allocatedCapital * 0.6,
    shortPool: allocatedCapital * 0.4,
    orders,
    warnings: [],
    droppedCount: 0,
    degraded: false,
    complete: true,
  };
}

describe('summarizeExposure', () => {
  it('computes dollar exposures, margin and percentages of the allocation', () => {
    const summary = summarizeExposure(
      result(50000, [
        order('AAA', 'buy', 15000, { weight: 0.3 }),
        order('BBB', 'buy', 15000, { weight: 0.3 }),
        order('CCC', 'sell', 20000, { weight: 0.4 }),
      ])
    );

    expect(summary).toEqual({
      longDollars: 30000,
      shortDollars: 20000,
      shortMargin: 10000,
      netExposure: 10000,
      grossExposure: 50000,
      netCapitalRequired: 20000,
      longPercent: 60,
      shortPercent: 40,
      netPercent: 20,
      grossPercent: 100,
      portfolioBeta: 0.2,
    });
  });

  it('applies a custom margin requirement', () => {
    const summary = summarizeExposure(result(10000, [order('AAA', 'buy', 6000), order('CCC', 'sell', 4000)]), 1);

    expect(summary.shortMargin).toBe(4000);
    expect(summary.netCapitalRequired).toBe(6000);
  });

  it('reflects dropped positions as under-allocation', () => {
    const summary = summarizeExposure(result(10000, [order('AAA', 'buy', 6000)]));

    expect(summary.grossPercent).toBe(60);
    expect(summary.shortDollars).toBe(0);
  });

  it('nets long and short betas by order weight', () => {
    const summary = summarizeExposure(
      result(100000, [
        order('AAA', 'buy', 24000, { weight: 0.24, beta: 1.2 }),
        order('BBB', 'buy', 21000, { weight: 0.21, beta: 0.9 }),
        order('EEE', 'buy', 15000, { weight: 0.15, beta: 1.1 }),
        order('CCC', 'sell', 20000, { weight: 0.2, beta: 2 }),
      ])
    );

    // 0.288 + 0.189 + 0.165 - 0.4
    expect(summary.portfolioBeta).toBe(0.24);
  });

  it('counts an unknown beta as the market', () => {
    const summary = summarizeExposure(
      result(10000, [order('AAA', 'buy', 6000, { weight: 0.6 }), order('CCC', 'sell', 4000, { weight: 0.4, beta: 2 })])
    );

    expect(summary.portfolioBeta).toBe(-0.2);
  });

  it('reports zero percentages for an empty allocation', () => {
    const summary = summarizeExposure(result(0, []));

    expect(summary.longPercent).toBe(0);
    expect(summary.grossPercent).toBe(0);
    expect(summary.netCapitalRequired).toBe(0);
    expect(summary.portfolioBeta).toBe(0);
  });
});
