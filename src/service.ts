/**
 * Core service facade
 *
 * Wires the registry, market data, strategies, allocation engine and broker
 * connections together and exposes the operations the HTTP layer serves.
 */

import path from 'node:path';
import { createLogger } from './utils/logger.js';
import { NotFoundError } from './utils/errors.js';
import { SymbolRegistry } from './registry/symbols.js';
import { MarketDataStore } from './market/store.js';
import { MarketDataFetcher } from './market/fetcher.js';
import { SyntheticMarketData, loadDemoData } from './market/synthetic.js';
import { FmpProvider } from './api/providers/fmp.js';
import { YahooProvider } from './api/providers/yahoo.js';
import { AllocationEngine } from './engine/allocator.js';
import { StrategyStore, reloadStrategies } from './engine/strategy-loader.js';
import { summarizeStrategy } from './engine/summary.js';
import { summarizeExposure } from './engine/exposure.js';
import { ConnectionManager } from './execution/connection-manager.js';
import { ExecutionAdapter } from './execution/adapter.js';
import type { AppConfig } from './config.js';
import type { BrokerCredentials } from './api/brokers/types.js';
import type { BrokerId } from './registry/symbols.js';
import type { PriceSnapshot, ProviderDescriptor } from './market/types.js';
import type { AllocationResult, Order, StrategyVersion } from './engine/types.js';
import type { ReloadReport } from './engine/strategy-loader.js';
import type { StrategySummary } from './engine/summary.js';
import type { ExposureSummary } from './engine/exposure.js';
import type { ConnectionState } from './execution/connection-manager.js';
import type { ExecutionResult } from './execution/adapter.js';

const log = createLogger('CORE');

export interface CoreServiceDeps {
  registry: SymbolRegistry;
  fetcher: MarketDataFetcher;
  strategies: StrategyStore;
  connections: ConnectionManager;
  credentials?: Partial<Record<BrokerId, BrokerCredentials | null>>;
  strategiesDir?: string;
  maxDropRatio?: number;
}

export interface AllocateParams {
  totalCapital: number;
  allocationPercent: number;
  broker: BrokerId;
  strategyId?: string;
  version?: number;
  signal?: AbortSignal;
}

export interface AllocationReport extends AllocationResult {
  exposure: ExposureSummary;
}

export interface ExecutionReport {
  allocation: AllocationReport;
  executions: ExecutionResult[];
}

export interface StrategyListing {
  id: string;
  name: string;
  latestVersion: number;
  versions: number[];
  baseCurrency: string;
}

export function buildProviderChain(config: AppConfig['market']): ProviderDescriptor[] {
  const chain: ProviderDescriptor[] = [];
  if (config.fmpApiKey) {
    chain.push({ provider: new FmpProvider({ apiKey: config.fmpApiKey }), priority: 1, enabled: true });
  }
  chain.push({ provider: new YahooProvider(), priority: 2, enabled: config.yahooEnabled });
  return chain;
}

export class CoreService {
  readonly registry: SymbolRegistry;
  readonly fetcher: MarketDataFetcher;
  readonly strategies: StrategyStore;
  readonly connections: ConnectionManager;
  readonly engine: AllocationEngine;
  readonly executor: ExecutionAdapter;
  private readonly credentials: Partial<Record<BrokerId, BrokerCredentials | null>>;
  private readonly strategiesDir?: string;

  constructor(deps: CoreServiceDeps) {
    this.registry = deps.registry;
    this.fetcher = deps.fetcher;
    this.strategies = deps.strategies;
    this.connections = deps.connections;
    this.credentials = deps.credentials ?? {};
    this.strategiesDir = deps.strategiesDir;
    this.engine = new AllocationEngine({
      registry: deps.registry,
      fetcher: deps.fetcher,
      maxDropRatio: deps.maxDropRatio,
    });
    this.executor = new ExecutionAdapter(deps.connections);
  }

  static fromConfig(config: AppConfig): CoreService {
    const registry = SymbolRegistry.fromFile(path.join(config.dataDir, 'symbols.json'));
    const store = new MarketDataStore({
      priceTtlMs: config.market.priceTtlMs,
      fundamentalsTtlMs: config.market.fundamentalsTtlMs,
      fxTtlMs: config.market.fxTtlMs,
    });
    const fetcher = new MarketDataFetcher({
      providers: buildProviderChain(config.market),
      store,
      synthetic: new SyntheticMarketData(loadDemoData(path.join(config.dataDir, 'demo-prices.json'))),
      timeoutMs: config.market.timeoutMs,
      concurrency: config.market.concurrency,
      cooldown: config.market.cooldown,
      syntheticFallback: config.market.syntheticFallback,
    });

    return new CoreService({
      registry,
      fetcher,
      strategies: new StrategyStore(),
      connections: new ConnectionManager(),
      credentials: config.brokers,
      strategiesDir: config.strategiesDir,
      maxDropRatio: config.maxDropRatio,
    });
  }

  // ---------------------------------------------------------------------------
  // Prices
  // ---------------------------------------------------------------------------

  /** Quotes the broker's listing when a broker is given, else the ticker itself. */
  async priceOf(ticker: string, broker?: BrokerId, signal?: AbortSignal): Promise<PriceSnapshot> {
    if (!broker) return this.fetcher.snapshot(ticker, { signal });
    const mapping = this.registry.resolve(ticker, broker);
    return this.fetcher.snapshot(ticker, { symbol: mapping.brokerSymbol, currency: mapping.currency, signal });
  }

  // ---------------------------------------------------------------------------
  // Strategies
  // ---------------------------------------------------------------------------

  strategy(id?: string, version?: number): StrategyVersion {
    if (id === undefined) {
      const [first] = this.strategies.list();
      if (!first) throw new NotFoundError('No strategies loaded');
      return first;
    }
    const strategy = this.strategies.get(id, version);
    if (!strategy) {
      throw new NotFoundError(
        version === undefined ? `Unknown strategy '${id}'` : `Unknown strategy version '${id}' v${version}`
      );
    }
    return strategy;
  }

  listStrategies(): StrategyListing[] {
    return this.strategies.list().map(s => ({
      id: s.id,
      name: s.name,
      latestVersion: s.version,
      versions: this.strategies.versionsOf(s.id),
      baseCurrency: s.baseCurrency,
    }));
  }

  strategySummary(id: string, version?: number): StrategySummary {
    return summarizeStrategy(this.strategy(id, version), this.registry);
  }

  reloadStrategies(): ReloadReport {
    if (!this.strategiesDir) throw new NotFoundError('No strategies directory configured');
    return reloadStrategies(this.strategies, this.strategiesDir);
  }

  // ---------------------------------------------------------------------------
  // Allocation & execution
  // ---------------------------------------------------------------------------

  async allocate(params: AllocateParams): Promise<AllocationReport> {
    const strategy = this.strategy(params.strategyId, params.version);
    const result = await this.engine.allocate({
      totalCapital: params.totalCapital,
      allocationPercent: params.allocationPercent,
      strategy,
      broker: params.broker,
      signal: params.signal,
    });
    return { ...result, exposure: summarizeExposure(result) };
  }

  execute(
    orders: readonly Order[],
    broker: BrokerId,
    options: { complete?: boolean; signal?: AbortSignal } = {}
  ): Promise<ExecutionResult[]> {
    return this.executor.execute(orders, broker, options);
  }

  async allocateAndExecute(params: AllocateParams): Promise<ExecutionReport> {
    const allocation = await this.allocate(params);
    const executions = await this.execute(allocation.orders, params.broker, {
      complete: allocation.complete,
      signal: params.signal,
    });
    return { allocation, executions };
  }

  // ---------------------------------------------------------------------------
  // Connections
  // ---------------------------------------------------------------------------

  connect(broker: BrokerId, signal?: AbortSignal): Promise<ConnectionState> {
    return this.connections.connect(broker, this.credentials[broker] ?? null, signal);
  }

  healthCheck(broker: BrokerId, signal?: AbortSignal): Promise<boolean> {
    return this.connections.healthCheck(broker, signal);
  }

  connectionStatus(broker: BrokerId): ConnectionState {
    return this.connections.status(broker);
  }

  async connectAll(brokers: readonly BrokerId[]): Promise<ConnectionState[]> {
    const states = await Promise.all(brokers.map(b => this.connect(b)));
    log.info('Broker connections', {
      connected: states.filter(s => s.connected).map(s => s.broker).join(',') || 'none',
    });
    return states;
  }
}
