import type { BrokerId } from '../../registry/symbols.js';
import type { OrderSide } from '../../engine/types.js';

export type BrokerMode = 'live' | 'paper';

export interface BrokerCredentials {
  /** Alpaca key id, or Swissquote OAuth client id */
  keyId: string;
  secret: string;
  mode: BrokerMode;
  /** Overrides the broker's default endpoint for `mode` */
  baseUrl?: string;
}

export interface BrokerAccount {
  accountId: string;
  currency: string;
  cash: number;
  buyingPower: number;
  portfolioValue: number;
  status: string;
}

export interface SubmitOrderRequest {
  symbol: string;
  quantity: number;
  side: OrderSide;
  orderType: 'market';
}

export interface SubmittedOrder {
  id: string;
  status: string;
}

export interface BrokerClient {
  readonly broker: BrokerId;
  readonly mode: BrokerMode;
  getAccount(signal?: AbortSignal): Promise<BrokerAccount>;
  submitOrder(order: SubmitOrderRequest, signal?: AbortSignal): Promise<SubmittedOrder>;
}

export type BrokerClientFactory = (broker: BrokerId, credentials: BrokerCredentials) => BrokerClient;
