import { AlpacaClient } from './alpaca.js';
import { SwissquoteClient } from './swissquote.js';
import type { FetchLike } from '../http.js';
import type { BrokerClient, BrokerClientFactory, BrokerCredentials } from './types.js';
import type { BrokerId } from '../../registry/symbols.js';

export { AlpacaClient, SwissquoteClient };
export type * from './types.js';

/** Builds the REST client for a broker. */
export function createBrokerClient(
  broker: BrokerId,
  credentials: BrokerCredentials,
  options: { fetchImpl?: FetchLike; timeoutMs?: number } = {}
): BrokerClient {
  switch (broker) {
    case 'alpaca':
      return new AlpacaClient(credentials, options);
    case 'swissquote':
      return new SwissquoteClient(credentials, options);
  }
}

export const defaultBrokerClientFactory: BrokerClientFactory = (broker, credentials) =>
  createBrokerClient(broker, credentials);
