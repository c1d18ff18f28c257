/**
 * Connection Manager
 *
 * Holds one connection per broker: credentials, the REST client built from
 * them, and the health of the last account query. Connecting never throws; a
 * broker that cannot be reached is simply reported as not connected and the
 * execution path falls back to simulation.
 */

import { createLogger } from '../utils/logger.js';
import { ConnectionFailedError, errorMessage } from '../utils/errors.js';
import { defaultBrokerClientFactory } from '../api/brokers/index.js';
import type {
  BrokerAccount,
  BrokerClient,
  BrokerClientFactory,
  BrokerCredentials,
  BrokerMode,
} from '../api/brokers/types.js';
import type { BrokerId } from '../registry/symbols.js';

const log = createLogger('CONN');

export interface ConnectionState {
  broker: BrokerId;
  connected: boolean;
  credentialsPresent: boolean;
  /** Epoch ms of the last account query, null before the first */
  lastCheckedAt: number | null;
  mode: BrokerMode;
  account?: BrokerAccount;
  error?: string;
}

interface Connection {
  state: ConnectionState;
  client: BrokerClient | null;
}

export interface ConnectionManagerOptions {
  clientFactory?: BrokerClientFactory;
  now?: () => number;
}

function hasCredentials(credentials: BrokerCredentials | null | undefined): credentials is BrokerCredentials {
  return !!credentials && credentials.keyId.trim() !== '' && credentials.secret.trim() !== '';
}

export class ConnectionManager {
  private connections = new Map<BrokerId, Connection>();
  private readonly clientFactory: BrokerClientFactory;
  private readonly now: () => number;

  constructor(options: ConnectionManagerOptions = {}) {
    this.clientFactory = options.clientFactory ?? defaultBrokerClientFactory;
    this.now = options.now ?? Date.now;
  }

  async connect(
    broker: BrokerId,
    credentials: BrokerCredentials | null | undefined,
    signal?: AbortSignal
  ): Promise<ConnectionState> {
    const mode = credentials?.mode ?? 'paper';

    if (!hasCredentials(credentials)) {
      this.connections.set(broker, {
        client: null,
        state: { broker, connected: false, credentialsPresent: false, lastCheckedAt: null, mode },
      });
      log.info('No credentials, broker runs in simulation', { broker });
      return this.status(broker);
    }

    try {
      const client = this.clientFactory(broker, credentials);
      const account = await client.getAccount(signal);
      this.connections.set(broker, {
        client,
        state: { broker, connected: true, credentialsPresent: true, lastCheckedAt: this.now(), mode, account },
      });
      log.info('Broker connected', { broker, mode, account: account.accountId, currency: account.currency });
    } catch (error) {
      const failure = new ConnectionFailedError(broker, errorMessage(error), { cause: error });
      this.connections.set(broker, {
        client: null,
        state: {
          broker,
          connected: false,
          credentialsPresent: true,
          lastCheckedAt: this.now(),
          mode,
          error: failure.message,
        },
      });
      log.error('ConnectionFailed', { broker, mode, msg: failure.message });
    }

    return this.status(broker);
  }

  disconnect(broker: BrokerId): ConnectionState {
    const current = this.connections.get(broker);
    const mode = current?.state.mode ?? 'paper';
    this.connections.set(broker, {
      client: null,
      state: {
        broker,
        connected: false,
        credentialsPresent: current?.state.credentialsPresent ?? false,
        lastCheckedAt: current?.state.lastCheckedAt ?? null,
        mode,
      },
    });
    log.info('Broker disconnected', { broker });
    return this.status(broker);
  }

  /**
   * Re-queries the account. A failure downgrades the connection; the client is
   * kept, so a later successful check restores it.
   */
  async healthCheck(broker: BrokerId, signal?: AbortSignal): Promise<boolean> {
    const connection = this.connections.get(broker);
    if (!connection?.client) return false;

    const { client } = connection;
    try {
      const account = await client.getAccount(signal);
      connection.state = {
        broker,
        connected: true,
        credentialsPresent: true,
        lastCheckedAt: this.now(),
        mode: connection.state.mode,
        account,
      };
      return true;
    } catch (error) {
      const failure = new ConnectionFailedError(broker, errorMessage(error), { cause: error });
      connection.state = {
        ...connection.state,
        connected: false,
        lastCheckedAt: this.now(),
        error: failure.message,
      };
      log.error('ConnectionFailed', { broker, msg: failure.message, during: 'health check' });
      return false;
    }
  }

  status(broker: BrokerId): ConnectionState {
    const state = this.connections.get(broker)?.state;
    if (!state) {
      return { broker, connected: false, credentialsPresent: false, lastCheckedAt: null, mode: 'paper' };
    }
    const copy: ConnectionState = { ...state };
    if (state.account) copy.account = { ...state.account };
    return copy;
  }

  /** The live client, or null when orders for this broker must be simulated. */
  client(broker: BrokerId): BrokerClient | null {
    const connection = this.connections.get(broker);
    return connection?.state.connected ? connection.client : null;
  }
}
