/**
 * Broker authentication
 *
 * Alpaca signs every request with a static key pair sent as headers.
 * Swissquote uses an OAuth2 client-credentials token that is fetched once and
 * reused until shortly before it expires.
 */

import { z } from 'zod';
import { createLogger } from '../utils/logger.js';
import { requestJson } from './http.js';
import type { FetchLike } from './http.js';

const log = createLogger('AUTH');

export function alpacaHeaders(keyId: string, secret: string): Record<string, string> {
  return {
    'Content-Type': 'application/json',
    'APCA-API-KEY-ID': keyId,
    'APCA-API-SECRET-KEY': secret,
  };
}

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.number().positive().optional(),
});

const DEFAULT_TOKEN_LIFETIME_S = 3600;
// Tokens are renewed this long before their reported expiry
const EXPIRY_MARGIN_MS = 30_000;

export interface TokenSourceOptions {
  tokenUrl: string;
  clientId: string;
  clientSecret: string;
  fetchImpl?: FetchLike;
  now?: () => number;
}

export class ClientCredentialsToken {
  private token: string | null = null;
  private expiresAt = 0;
  private readonly now: () => number;

  constructor(private readonly options: TokenSourceOptions) {
    this.now = options.now ?? Date.now;
  }

  async bearer(signal?: AbortSignal): Promise<string> {
    if (this.token && this.now() < this.expiresAt - EXPIRY_MARGIN_MS) {
      return this.token;
    }

    const body = new URLSearchParams({
      grant_type: 'client_credentials',
      client_id: this.options.clientId,
      client_secret: this.options.clientSecret,
    });

    const response = await requestJson(this.options.tokenUrl, TokenResponseSchema, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: body.toString(),
      signal,
      fetchImpl: this.options.fetchImpl,
    });

    this.token = response.access_token;
    this.expiresAt = this.now() + (response.expires_in ?? DEFAULT_TOKEN_LIFETIME_S) * 1000;
    log.debug('Access token refreshed', { expiresInS: response.expires_in ?? DEFAULT_TOKEN_LIFETIME_S });
    return this.token;
  }

  invalidate(): void {
    this.token = null;
    this.expiresAt = 0;
  }
}
