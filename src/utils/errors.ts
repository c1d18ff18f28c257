/**
 * Error taxonomy shared by the market-data layer, the allocation engine and
 * the execution path. Every error carries a stable `code` so the HTTP layer
 * and the allocation warnings can report it without string matching.
 */

export type ErrorCode =
  | 'INVALID_INPUT'
  | 'UNMAPPED_INSTRUMENT'
  | 'NOT_FOUND'
  | 'PRICE_UNAVAILABLE'
  | 'PROVIDER_RATE_LIMITED'
  | 'CONNECTION_FAILED'
  | 'HTTP_ERROR'
  | 'MALFORMED_PAYLOAD'
  | 'STRATEGY_INVALID'
  | 'CONFIG_INVALID'
  | 'REQUEST_CANCELLED';

export abstract class CoreError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad capital or percentage. Raised before any I/O. */
export class InvalidInputError extends CoreError {
  readonly code = 'INVALID_INPUT';
  readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.field = field;
  }
}

export class UnmappedInstrumentError extends CoreError {
  readonly code = 'UNMAPPED_INSTRUMENT';
  readonly ticker: string;
  readonly broker: string;

  constructor(ticker: string, broker: string) {
    super(`No ${broker} mapping for '${ticker}'`);
    this.ticker = ticker;
    this.broker = broker;
  }
}

/** Unknown strategy, strategy version or broker. */
export class NotFoundError extends CoreError {
  readonly code = 'NOT_FOUND';
}

export class PriceUnavailableError extends CoreError {
  readonly code = 'PRICE_UNAVAILABLE';
  readonly symbol: string;

  constructor(symbol: string, reason = 'all providers exhausted') {
    super(`Price unavailable for '${symbol}': ${reason}`);
    this.symbol = symbol;
  }
}

/** Internal to the fetcher: puts a provider into cooldown, never reaches callers. */
export class ProviderRateLimitedError extends CoreError {
  readonly code = 'PROVIDER_RATE_LIMITED';
  readonly provider: string;
  readonly retryAfterMs: number;

  constructor(provider: string, retryAfterMs = 0) {
    super(`Provider '${provider}' is rate limited`);
    this.provider = provider;
    this.retryAfterMs = retryAfterMs;
  }
}

export class ConnectionFailedError extends CoreError {
  readonly code = 'CONNECTION_FAILED';
  readonly broker: string;

  constructor(broker: string, reason: string, options?: { cause?: unknown }) {
    super(`Connection to ${broker} failed: ${reason}`, options);
    this.broker = broker;
  }
}

export class HttpError extends CoreError {
  readonly code = 'HTTP_ERROR';
  readonly statusCode: number;
  readonly apiMessage: string;
  readonly retryAfterMs: number;

  constructor(statusCode: number, apiMessage: string, retryAfterMs = 0) {
    super(`HTTP ${statusCode}: ${apiMessage}`);
    this.statusCode = statusCode;
    this.apiMessage = apiMessage;
    this.retryAfterMs = retryAfterMs;
  }
}

export class MalformedPayloadError extends CoreError {
  readonly code = 'MALFORMED_PAYLOAD';
}

export class StrategyValidationError extends CoreError {
  readonly code = 'STRATEGY_INVALID';
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`Strategy ${source} rejected: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export class ConfigError extends CoreError {
  readonly code = 'CONFIG_INVALID';
}

export class RequestCancelledError extends CoreError {
  readonly code = 'REQUEST_CANCELLED';

  constructor(message = 'Request cancelled') {
    super(message);
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
