/**
 * Execution Adapter
 *
 * Sends an allocation's orders to a broker through its REST client, one at a
 * time and in order. Without a live connection the orders are simulated with
 * stable ids, which is a mode rather than an error.
 */

import crypto from 'node:crypto';
import { createLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import type { ConnectionManager } from './connection-manager.js';
import type { BrokerId } from '../registry/symbols.js';
import type { Order, OrderSide } from '../engine/types.js';

const log = createLogger('EXEC');

export type ExecutionStatus = 'submitted' | 'simulated' | 'failed';

export interface ExecutionResult {
  ticker: string;
  brokerSymbol: string;
  side: OrderSide;
  quantity: number;
  dollarAmount: number;
  status: ExecutionStatus;
  brokerOrderId?: string;
  error?: string;
}

export interface ExecuteOptions {
  /** An incomplete allocation is never sent to a live broker */
  complete?: boolean;
  signal?: AbortSignal;
}

export function simulatedOrderId(broker: BrokerId, order: Pick<Order, 'brokerSymbol' | 'side' | 'quantity'>): string {
  const hash = crypto
    .createHash('sha1')
    .update(`${broker}|${order.brokerSymbol}|${order.side}|${order.quantity}`)
    .digest('hex')
    .slice(0, 10);
  return `sim-${broker}-${order.brokerSymbol}-${hash}`;
}

function baseResult(order: Order): Omit<ExecutionResult, 'status'> {
  return {
    ticker: order.ticker,
    brokerSymbol: order.brokerSymbol,
    side: order.side,
    quantity: order.quantity,
    dollarAmount: order.dollarAmount,
  };
}

export class ExecutionAdapter {
  constructor(private readonly connections: ConnectionManager) {}

  async execute(orders: readonly Order[], broker: BrokerId, options: ExecuteOptions = {}): Promise<ExecutionResult[]> {
    const client = this.connections.client(broker);

    if (!client || options.complete === false) {
      if (client) {
        log.warn('Allocation incomplete, simulating instead of submitting', { broker, orders: orders.length });
      } else {
        log.info('Broker not connected, simulating orders', { broker, orders: orders.length });
      }
      return orders.map((order): ExecutionResult => ({
        ...baseResult(order),
        status: 'simulated',
        brokerOrderId: simulatedOrderId(broker, order),
      }));
    }

    const results: ExecutionResult[] = [];
    for (const order of orders) {
      try {
        const submitted = await client.submitOrder(
          { symbol: order.brokerSymbol, quantity: order.quantity, side: order.side, orderType: 'market' },
          options.signal
        );
        results.push({ ...baseResult(order), status: 'submitted', brokerOrderId: submitted.id });
      } catch (error) {
        const msg = errorMessage(error);
        log.error('Order failed', { broker, symbol: order.brokerSymbol, side: order.side, msg });
        results.push({ ...baseResult(order), status: 'failed', error: msg });
      }
    }

    const failed = results.filter(r => r.status === 'failed').length;
    log.info('Orders executed', { broker, submitted: results.length - failed, failed });
    return results;
  }
}
