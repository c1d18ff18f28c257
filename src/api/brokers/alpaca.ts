/**
 * Alpaca Trading API v2 client.
 *
 * Fractional quantities are sent as strings with market orders good for the
 * day. Order submission is never retried; account reads retry on transient
 * failures.
 */

import { z } from 'zod';
import { alpacaHeaders } from '../auth.js';
import { requestJson } from '../http.js';
import type { FetchLike } from '../http.js';
import { createLogger } from '../../utils/logger.js';
import type { BrokerAccount, BrokerClient, BrokerCredentials, SubmitOrderRequest, SubmittedOrder } from './types.js';

const log = createLogger('ALPACA');

export const ALPACA_URLS = {
  paper: 'https://paper-api.alpaca.markets',
  live: 'https://api.alpaca.markets',
} as const;

const numeric = z.union([z.number(), z.string()]).pipe(z.coerce.number());

const AccountSchema = z.object({
  id: z.string(),
  currency: z.string().default('USD'),
  cash: numeric,
  buying_power: numeric,
  portfolio_value: numeric.optional(),
  equity: numeric.optional(),
  status: z.string(),
});

const OrderSchema = z.object({
  id: z.string(),
  status: z.string(),
});

export interface AlpacaClientOptions {
  fetchImpl?: FetchLike;
  timeoutMs?: number;
}

export class AlpacaClient implements BrokerClient {
  readonly broker = 'alpaca';
  readonly mode: BrokerCredentials['mode'];
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl?: FetchLike;
  private readonly timeoutMs?: number;

  constructor(credentials: BrokerCredentials, options: AlpacaClientOptions = {}) {
    this.mode = credentials.mode;
    this.baseUrl = credentials.baseUrl ?? ALPACA_URLS[credentials.mode];
    this.headers = alpacaHeaders(credentials.keyId, credentials.secret);
    this.fetchImpl = options.fetchImpl;
    this.timeoutMs = options.timeoutMs;
  }

  async getAccount(signal?: AbortSignal): Promise<BrokerAccount> {
    const account = await requestJson(`${this.baseUrl}/v2/account`, AccountSchema, {
      headers: this.headers,
      signal,
      maxAttempts: 3,
      timeoutMs: this.timeoutMs,
      fetchImpl: this.fetchImpl,
    });

    return {
      accountId: account.id,
      currency: account.currency,
      cash: account.cash,
      buyingPower: account.buying_power,
      portfolioValue: account.portfolio_value ?? account.equity ?? account.cash,
      status: account.status,
    };
  }

  async submitOrder(order: SubmitOrderRequest, signal?: AbortSignal): Promise<SubmittedOrder> {
    const body = {
      symbol: order.symbol,
      qty: String(order.quantity),
      side: order.side,
      type: order.orderType,
      time_in_force: 'day',
    };

    const response = await requestJson(`${this.baseUrl}/v2/orders`, OrderSchema, {
      method: 'POST',
      headers: this.headers,
      body: JSON.stringify(body),
      signal,
      timeoutMs: this.timeoutMs,
      fetchImpl: this.fetchImpl,
    });

    log.info('Order accepted', { symbol: order.symbol, side: order.side, qty: body.qty, id: response.id });
    return { id: response.id, status: response.status };
  }
}
