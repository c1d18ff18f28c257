/**
 * Swissquote OpenWealth client.
 *
 * Authenticates with OAuth2 client credentials. Sell orders are expressed as a
 * negative quantity; only whole shares are traded.
 */

import crypto from 'node:crypto';
import { z } from 'zod';
import { ClientCredentialsToken } from '../auth.js';
import { requestJson } from '../http.js';
import type { FetchLike } from '../http.js';
import { createLogger } from '../../utils/logger.js';
import { HttpError } from '../../utils/errors.js';
import type { BrokerAccount, BrokerClient, BrokerCredentials, SubmitOrderRequest, SubmittedOrder } from './types.js';

const log = createLogger('SWISSQUOTE');

export const SWISSQUOTE_URLS = {
  paper: 'https://bankingapi.swissquote.ch/sandbox',
  live: 'https://bankingapi.swissquote.ch',
} as const;

const AccountSchema = z.object({
  account_id: z.string(),
  currency: z.string(),
  cash_balance: z.number(),
  buying_power: z.number().optional(),
  portfolio_value: z.number().optional(),
  status: z.string().default('ACTIVE'),
});

const OrderSchema = z.object({
  orderId: z.string().optional(),
  clientOrderId: z.string(),
  status: z.string(),
});

export interface SwissquoteClientOptions {
  fetchImpl?: FetchLike;
  timeoutMs?: number;
  now?: () => number;
}

export class SwissquoteClient implements BrokerClient {
  readonly broker = 'swissquote';
  readonly mode: BrokerCredentials['mode'];
  private readonly baseUrl: string;
  private readonly token: ClientCredentialsToken;
  private readonly fetchImpl?: FetchLike;
  private readonly timeoutMs?: number;

  constructor(credentials: BrokerCredentials, options: SwissquoteClientOptions = {}) {
    this.mode = credentials.mode;
    this.baseUrl = credentials.baseUrl ?? SWISSQUOTE_URLS[credentials.mode];
    this.fetchImpl = options.fetchImpl;
    this.timeoutMs = options.timeoutMs;
    this.token = new ClientCredentialsToken({
      tokenUrl: `${this.baseUrl}/oauth2/token`,
      clientId: credentials.keyId,
      clientSecret: credentials.secret,
      fetchImpl: options.fetchImpl,
      now: options.now,
    });
  }

  private async authorized<T>(call: (headers: Record<string, string>) => Promise<T>, signal?: AbortSignal): Promise<T> {
    const headers = async () => ({
      'Content-Type': 'application/json',
      Authorization: `Bearer ${await this.token.bearer(signal)}`,
    });

    try {
      return await call(await headers());
    } catch (error) {
      // A revoked token is refreshed once
      if (error instanceof HttpError && error.statusCode === 401) {
        this.token.invalidate();
        return call(await headers());
      }
      throw error;
    }
  }

  async getAccount(signal?: AbortSignal): Promise<BrokerAccount> {
    const account = await this.authorized(
      headers =>
        requestJson(`${this.baseUrl}/v1/account`, AccountSchema, {
          headers,
          signal,
          maxAttempts: 3,
          timeoutMs: this.timeoutMs,
          fetchImpl: this.fetchImpl,
        }),
      signal
    );

    return {
      accountId: account.account_id,
      currency: account.currency,
      cash: account.cash_balance,
      buyingPower: account.buying_power ?? account.cash_balance,
      portfolioValue: account.portfolio_value ?? account.cash_balance,
      status: account.status,
    };
  }

  async submitOrder(order: SubmitOrderRequest, signal?: AbortSignal): Promise<SubmittedOrder> {
    const quantity = Math.floor(order.quantity);
    const body = {
      clientOrderId: `LSA-${crypto.randomUUID()}`,
      financialInstrumentDetails: { stockKey: order.symbol },
      quantity: order.side === 'sell' ? -quantity : quantity,
      executionType: order.orderType,
      timeInForce: 'day',
      bestEffort: false,
      dryRun: false,
    };

    const response = await this.authorized(
      headers =>
        requestJson(`${this.baseUrl}/v1/orders`, OrderSchema, {
          method: 'POST',
          headers,
          body: JSON.stringify(body),
          signal,
          timeoutMs: this.timeoutMs,
          fetchImpl: this.fetchImpl,
        }),
      signal
    );

    const id = response.orderId ?? response.clientOrderId;
    log.info('Order accepted', { symbol: order.symbol, side: order.side, qty: body.quantity, id });
    return { id, status: response.status };
  }
}
