/**
 * Vendor session manager
 *
 * Owns the account credentials and the one live token set. Token exchanges
 * (refresh or full login) are single-flight: concurrent callers of
 * ensureValid() share the same in-flight promise.
 */
import * as crypto from 'crypto';
import { AuthError, TransportError, parseRetryAfter } from './errors';
import { sendVendorRequest, isRecord, type VendorHttpOptions, type VendorResponse } from './vendor-http';

const EXPIRY_MARGIN_MS = 60_000;          // treat tokens as expired 60 s early
const DEFAULT_TOKEN_TTL_SECONDS = 3600;
const DEFAULT_THROTTLE_MS = 60_000;

export type AuthToken = string;

export interface Credentials {
  username: string;
  password: string;
}

export interface SessionTokens {
  accessToken: string;
  refreshToken: string | null;
  expiresAt: number;
  deviceId: string;
}

export interface SessionStore {
  load(username: string): SessionTokens | null;
  save(username: string, tokens: SessionTokens): void;
  clear(username: string): void;
}

/** Anything the API client needs from a session. */
export interface TokenProvider {
  ensureValid(): Promise<AuthToken>;
  invalidate(token?: AuthToken): void;
}

export interface VendorSessionOptions extends VendorHttpOptions {
  credentials: Credentials;
  store?: SessionStore;
  now?: () => number;
}

export function generateDeviceId(username: string): string {
  return crypto.createHash('sha256').update(`laundry-fleet_${username}`, 'utf8').digest('hex').slice(0, 32);
}

function pickString(body: Record<string, unknown>, ...keys: string[]): string | null {
  for (const key of keys) {
    const value = body[key];
    if (typeof value === 'string' && value) return value;
  }
  return null;
}

function pickNumber(body: Record<string, unknown>, ...keys: string[]): number | null {
  for (const key of keys) {
    const value = body[key];
    if (typeof value === 'number' && Number.isFinite(value)) return value;
  }
  return null;
}

/**
 * Build a token set from a login/refresh response. Accepts camelCase and
 * snake_case field names; a missing refresh token keeps the previous one.
 */
export function parseTokenResponse(
  body: unknown,
  deviceId: string,
  now: number,
  previousRefreshToken: string | null = null,
): SessionTokens {
  if (!isRecord(body)) {
    throw new AuthError('network_failure', 'Token response was not an object');
  }
  const accessToken = pickString(body, 'accessToken', 'access_token');
  if (!accessToken) {
    throw new AuthError('network_failure', 'Token response carried no access token');
  }
  const expiresIn = pickNumber(body, 'expiresIn', 'expires_in') ?? DEFAULT_TOKEN_TTL_SECONDS;
  return {
    accessToken,
    refreshToken: pickString(body, 'refreshToken', 'refresh_token') ?? previousRefreshToken,
    expiresAt: now + expiresIn * 1000,
    deviceId,
  };
}

export class VendorSession implements TokenProvider {
  private http: VendorHttpOptions;
  private credentials: Credentials;
  private store: SessionStore | null;
  private now: () => number;

  private tokens: SessionTokens | null = null;
  private invalidated = false;
  private exchange: Promise<SessionTokens> | null = null;

  // Set after the vendor rejected the credentials; cleared by updateCredentials()
  private terminalError: AuthError | null = null;
  private throttledUntil = 0;

  constructor(options: VendorSessionOptions) {
    this.http = { baseUrl: options.baseUrl, timeoutMs: options.timeoutMs, fetchImpl: options.fetchImpl };
    this.credentials = options.credentials;
    this.store = options.store ?? null;
    this.now = options.now ?? Date.now;

    const stored = this.store?.load(this.credentials.username) ?? null;
    if (stored) {
      this.tokens = stored;
      console.log('[vendor-session] Restored stored session');
    }
  }

  async ensureValid(): Promise<AuthToken> {
    if (this.terminalError) throw this.terminalError;

    const current = this.tokens;
    if (current && !this.invalidated && !this.isExpiring(current)) {
      return current.accessToken;
    }

    if (!this.exchange) {
      const remaining = this.throttledUntil - this.now();
      if (remaining > 0) {
        throw new AuthError('throttled', `Authentication throttled, retry in ${remaining}ms`, { retryAfterMs: remaining });
      }
      this.exchange = this.performExchange().finally(() => {
        this.exchange = null;
      });
    }

    const tokens = await this.exchange;
    return tokens.accessToken;
  }

  /**
   * Mark the current token unusable. When `token` is given, only invalidate if
   * it is still the current one; a late 401 for a replaced token is ignored.
   */
  invalidate(token?: AuthToken): void {
    if (!this.tokens) return;
    if (token !== undefined && token !== this.tokens.accessToken) return;
    if (!this.invalidated) {
      console.log('[vendor-session] Access token invalidated');
    }
    this.invalidated = true;
  }

  updateCredentials(credentials: Credentials): void {
    this.store?.clear(this.credentials.username);
    this.credentials = credentials;
    this.tokens = null;
    this.invalidated = false;
    this.terminalError = null;
    this.throttledUntil = 0;
    console.log('[vendor-session] Credentials updated');
  }

  isAuthenticated(): boolean {
    return this.tokens !== null && !this.invalidated && !this.isExpiring(this.tokens);
  }

  private isExpiring(tokens: SessionTokens): boolean {
    return tokens.expiresAt <= this.now() + EXPIRY_MARGIN_MS;
  }

  private async performExchange(): Promise<SessionTokens> {
    const refreshToken = this.tokens?.refreshToken ?? null;
    if (refreshToken) {
      try {
        return this.adopt(await this.refresh(refreshToken));
      } catch (err) {
        if (!(err instanceof AuthError) || err.reason !== 'invalid_credentials') throw err;
        console.log('[vendor-session] Refresh token rejected, performing full login');
      }
    }
    return this.adopt(await this.login());
  }

  private adopt(tokens: SessionTokens): SessionTokens {
    this.tokens = tokens;
    this.invalidated = false;
    try {
      this.store?.save(this.credentials.username, tokens);
    } catch (err) {
      console.error('[vendor-session] Failed to persist session:', err);
    }
    return tokens;
  }

  private async login(): Promise<SessionTokens> {
    const deviceId = generateDeviceId(this.credentials.username);
    const res = await this.exchangeRequest('/login', {
      username: this.credentials.username,
      password: this.credentials.password,
      deviceId,
    });

    if (res.status === 400 || res.status === 401 || res.status === 403) {
      console.error(`[vendor-session] Login rejected: ${res.status}`);
      const err = new AuthError('invalid_credentials', 'Vendor rejected the configured credentials', { statusCode: res.status });
      this.terminalError = err;
      throw err;
    }
    this.assertExchangeOk(res, '/login');

    const tokens = parseTokenResponse(res.body, deviceId, this.now());
    console.log('[vendor-session] Logged in');
    return tokens;
  }

  private async refresh(refreshToken: string): Promise<SessionTokens> {
    const deviceId = this.tokens?.deviceId || generateDeviceId(this.credentials.username);
    const res = await this.exchangeRequest('/refresh', { refreshToken });

    if (res.status >= 400 && res.status < 500 && res.status !== 429) {
      throw new AuthError('invalid_credentials', 'Vendor rejected the refresh token', { statusCode: res.status });
    }
    this.assertExchangeOk(res, '/refresh');

    const tokens = parseTokenResponse(res.body, deviceId, this.now(), refreshToken);
    console.log('[vendor-session] Token refreshed');
    return tokens;
  }

  private async exchangeRequest(path: string, body: Record<string, unknown>): Promise<VendorResponse> {
    try {
      return await sendVendorRequest(this.http, { method: 'POST', path, body });
    } catch (err) {
      if (err instanceof TransportError) {
        console.error(`[vendor-session] POST ${path} failed: ${err.reason}`);
        throw new AuthError('network_failure', err.message);
      }
      throw err;
    }
  }

  private assertExchangeOk(res: VendorResponse, path: string): void {
    if (res.status === 429) {
      const retryAfterMs = parseRetryAfter(res.headers.get('retry-after'), this.now(), DEFAULT_THROTTLE_MS);
      this.throttledUntil = this.now() + retryAfterMs;
      console.warn(`[vendor-session] POST ${path} throttled, retry in ${retryAfterMs}ms`);
      throw new AuthError('throttled', 'Authentication throttled by vendor', { statusCode: 429, retryAfterMs });
    }
    if (res.status < 200 || res.status >= 300) {
      console.error(`[vendor-session] POST ${path} failed: ${res.status}`);
      throw new AuthError('network_failure', `Token exchange failed: ${res.status}`, { statusCode: res.status });
    }
  }
}
