/**
 * Runtime configuration, read once from the environment at startup.
 */

import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { ConfigError } from './utils/errors.js';
import { isLogLevel } from './utils/logger.js';
import type { LogLevel } from './utils/logger.js';
import type { BrokerCredentials, BrokerMode } from './api/brokers/types.js';
import type { BrokerId } from './registry/symbols.js';

export type Env = Record<string, string | undefined>;

export interface MarketDataConfig {
  fmpApiKey: string | null;
  yahooEnabled: boolean;
  priceTtlMs: number;
  fundamentalsTtlMs: number;
  fxTtlMs: number;
  timeoutMs: number;
  concurrency: number;
  cooldown: { baseMs: number; maxMs: number };
  syntheticFallback: boolean;
}

export interface AppConfig {
  port: number;
  logLevel: LogLevel;
  dataDir: string;
  strategiesDir: string;
  watchStrategies: boolean;
  market: MarketDataConfig;
  maxDropRatio: number;
  brokers: Record<BrokerId, BrokerCredentials | null>;
}

export const DEFAULT_DATA_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', 'data');

function read(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function number(env: Env, key: string, fallback: number, check: (n: number) => boolean = n => n >= 0): number {
  const raw = read(env, key);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || !check(value)) {
    throw new ConfigError(`${key} must be a valid number, got '${raw}'`);
  }
  return value;
}

function integer(env: Env, key: string, fallback: number, min = 0): number {
  return number(env, key, fallback, n => Number.isInteger(n) && n >= min);
}

function flag(env: Env, key: string, fallback: boolean): boolean {
  const raw = read(env, key)?.toLowerCase();
  if (raw === undefined) return fallback;
  if (['true', '1', 'yes', 'on'].includes(raw)) return true;
  if (['false', '0', 'no', 'off'].includes(raw)) return false;
  throw new ConfigError(`${key} must be true or false, got '${raw}'`);
}

function mode(env: Env, key: string): BrokerMode {
  const raw = read(env, key) ?? 'paper';
  if (raw !== 'paper' && raw !== 'live') {
    throw new ConfigError(`${key} must be 'paper' or 'live', got '${raw}'`);
  }
  return raw;
}

function credentials(env: Env, idKey: string, secretKey: string, modeKey: string, urlKey?: string): BrokerCredentials | null {
  const keyId = read(env, idKey);
  const secret = read(env, secretKey);
  const brokerMode = mode(env, modeKey);
  if (!keyId || !secret) return null;
  const result: BrokerCredentials = { keyId, secret, mode: brokerMode };
  const baseUrl = urlKey ? read(env, urlKey) : undefined;
  if (baseUrl) result.baseUrl = baseUrl;
  return result;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const logLevel = read(env, 'LOG_LEVEL') ?? 'info';
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(`LOG_LEVEL must be one of debug, info, warn, error, silent, got '${logLevel}'`);
  }

  const dataDir = path.resolve(read(env, 'DATA_DIR') ?? DEFAULT_DATA_DIR);
  const cooldownBase = integer(env, 'COOLDOWN_BASE_MS', 5000, 1);
  const cooldownMax = integer(env, 'COOLDOWN_MAX_MS', 300000, 1);
  if (cooldownMax < cooldownBase) {
    throw new ConfigError(`COOLDOWN_MAX_MS (${cooldownMax}) is below COOLDOWN_BASE_MS (${cooldownBase})`);
  }

  return {
    port: integer(env, 'PORT', 3456),
    logLevel,
    dataDir,
    strategiesDir: path.resolve(read(env, 'STRATEGIES_DIR') ?? path.join(dataDir, 'strategies')),
    watchStrategies: flag(env, 'WATCH_STRATEGIES', true),
    market: {
      fmpApiKey: read(env, 'FMP_API_KEY') ?? null,
      yahooEnabled: flag(env, 'YAHOO_ENABLED', true),
      priceTtlMs: number(env, 'PRICE_TTL_SECONDS', 120) * 1000,
      fundamentalsTtlMs: number(env, 'FUNDAMENTALS_TTL_SECONDS', 3600) * 1000,
      fxTtlMs: number(env, 'FX_TTL_SECONDS', 300) * 1000,
      timeoutMs: integer(env, 'PROVIDER_TIMEOUT_MS', 4000, 1),
      concurrency: integer(env, 'FETCH_CONCURRENCY', 4, 1),
      cooldown: { baseMs: cooldownBase, maxMs: cooldownMax },
      syntheticFallback: flag(env, 'SYNTHETIC_FALLBACK', true),
    },
    maxDropRatio: number(env, 'MAX_DROP_RATIO', 0.5, n => n >= 0 && n <= 1),
    brokers: {
      alpaca: credentials(env, 'ALPACA_API_KEY_ID', 'ALPACA_API_SECRET', 'ALPACA_ENV'),
      swissquote: credentials(
        env,
        'SWISSQUOTE_CLIENT_ID',
        'SWISSQUOTE_CLIENT_SECRET',
        'SWISSQUOTE_ENV',
        'SWISSQUOTE_BASE_URL'
      ),
    },
  };
}
