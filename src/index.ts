/**
 * Entry point
 *
 * Loads configuration, the symbol table and the strategy versions, connects
 * the brokers that have credentials, then serves the HTTP API.
 */

import 'dotenv/config';
import { loadConfig } from './config.js';
import { CoreService } from './service.js';
import { loadStrategies, watchStrategies } from './engine/strategy-loader.js';
import { BROKERS } from './registry/symbols.js';
import { createLogger, setLogLevel } from './utils/logger.js';
import { errorMessage } from './utils/errors.js';
import { startServer } from './server.js';

const log = createLogger('MAIN');

async function main() {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  log.info('=== Long/Short Allocation Core ===');
  log.info('Config loaded', {
    dataDir: config.dataDir,
    fmp: config.market.fmpApiKey ? 'enabled' : 'disabled',
    yahoo: config.market.yahooEnabled ? 'enabled' : 'disabled',
    syntheticFallback: config.market.syntheticFallback,
  });

  const service = CoreService.fromConfig(config);

  // --- Strategies: load once, then pick up new versions on change ---
  loadStrategies(service.strategies, config.strategiesDir);
  const watcher = config.watchStrategies ? watchStrategies(service.strategies, config.strategiesDir) : null;

  // --- Brokers: no credentials or a failed connect means simulation ---
  await service.connectAll(BROKERS);

  const server = startServer(service, config.port);

  // --- Graceful shutdown ---
  const shutdown = () => {
    log.info('Shutting down...');
    watcher?.close();
    server.close(() => process.exit(0));
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch(err => {
  log.error('Fatal error', { msg: errorMessage(err), stack: err instanceof Error ? err.stack : undefined });
  process.exit(1);
});
