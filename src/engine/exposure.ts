import { roundTo } from '../utils/rounding.js';
import type { AllocationResult } from './types.js';

/** Reg T initial margin on short sales */
export const DEFAULT_SHORT_MARGIN = 0.5;

export interface ExposureSummary {
  longDollars: number;
  shortDollars: number;
  /** Collateral held against the shorts */
  shortMargin: number;
  netExposure: number;
  grossExposure: number;
  /** Cash actually tied up: longs, minus short proceeds, plus margin */
  netCapitalRequired: number;
  /** Exposures as a percentage of the allocated capital */
  longPercent: number;
  shortPercent: number;
  netPercent: number;
  grossPercent: number;
  /** Weight-averaged market beta, shorts negative; an unknown beta counts as 1 */
  portfolioBeta: number;
}

export function summarizeExposure(
  result: AllocationResult,
  marginRequirement = DEFAULT_SHORT_MARGIN
): ExposureSummary {
  let longDollars = 0;
  let shortDollars = 0;
  let beta = 0;
  for (const order of result.orders) {
    if (order.side === 'buy') longDollars += order.dollarAmount;
    else shortDollars += order.dollarAmount;
    beta += (order.side === 'buy' ? 1 : -1) * order.weight * (order.beta ?? 1);
  }

  const shortMargin = shortDollars * marginRequirement;
  const pct = (value: number) =>
    result.allocatedCapital > 0 ? roundTo((value / result.allocatedCapital) * 100, 1) : 0;

  return {
    longDollars: roundTo(longDollars, 2),
    shortDollars: roundTo(shortDollars, 2),
    shortMargin: roundTo(shortMargin, 2),
    netExposure: roundTo(longDollars - shortDollars, 2),
    grossExposure: roundTo(longDollars + shortDollars, 2),
    netCapitalRequired: roundTo(longDollars - shortDollars + shortMargin, 2),
    longPercent: pct(longDollars),
    shortPercent: pct(shortDollars),
    netPercent: pct(longDollars - shortDollars),
    grossPercent: pct(longDollars + shortDollars),
    portfolioBeta: roundTo(beta, 2),
  };
}
