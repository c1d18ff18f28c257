/**
 * Core engine types: strategy versions, target positions, orders and the
 * allocation result handed back to callers.
 */

import type { BrokerId } from '../registry/symbols.js';
import type { SnapshotSource } from '../market/types.js';

// =============================================================================
// Strategy
// =============================================================================

export type PositionSide = 'long' | 'short';

export interface TargetPosition {
  ticker: string;
  side: PositionSide;
  /** Fraction of its side's pool, in (0, 1]. Weights per side sum to 1. */
  weight: number;
  rationale: string;
  /** Conviction score 0-100, informational only */
  confidence: number | null;
}

export interface StrategyVersion {
  id: string;
  version: number;
  name: string;
  description: string;
  /** Currency every dollar amount of this strategy is expressed in */
  baseCurrency: string;
  longShare: number;
  shortShare: number;
  positions: readonly TargetPosition[];
}

// =============================================================================
// Orders
// =============================================================================

export type OrderSide = 'buy' | 'sell';

export interface Order {
  ticker: string;
  brokerSymbol: string;
  name: string;
  side: OrderSide;
  quantity: number;
  /** Instrument price in `currency` */
  price: number;
  /** Target notional in the strategy's base currency */
  dollarAmount: number;
  /** Share of the allocated capital: side share × position weight */
  weight: number;
  currency: string;
  /** Base-currency units per unit of `currency` */
  fxRate: number;
  venue: string;
  rationale: string;
  source: SnapshotSource;
  degraded: boolean;
  /** Market beta from fundamentals, when known */
  beta: number | null;
}

// =============================================================================
// Allocation
// =============================================================================

export type AllocationWarningCode =
  | 'UNMAPPED_INSTRUMENT'
  | 'PRICE_UNAVAILABLE'
  | 'FX_UNAVAILABLE'
  | 'QUANTITY_ROUNDS_TO_ZERO'
  | 'ALLOCATION_INCOMPLETE';

export interface AllocationWarning {
  code: AllocationWarningCode;
  ticker: string | null;
  message: string;
}

export interface AllocationRequest {
  totalCapital: number;
  /** 0-100 */
  allocationPercent: number;
  strategy: StrategyVersion;
  broker: BrokerId;
  signal?: AbortSignal;
}

export interface AllocationResult {
  strategyId: string;
  strategyVersion: number;
  broker: BrokerId;
  baseCurrency: string;
  totalCapital: number;
  allocationPercent: number;
  allocatedCapital: number;
  longPool: number;
  shortPool: number;
  orders: Order[];
  warnings: AllocationWarning[];
  droppedCount: number;
  /** True when any order was priced from synthetic data */
  degraded: boolean;
  /** False once more positions were dropped than the drop policy allows */
  complete: boolean;
}
