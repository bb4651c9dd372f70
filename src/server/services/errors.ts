/**
 * Error taxonomy for everything that talks to the vendor cloud.
 *
 * Every class carries a machine-readable `code` and a `retryable` flag so the
 * poll coordinator can decide between backoff and halting without string
 * matching on messages.
 */

export type AuthErrorReason = 'invalid_credentials' | 'network_failure' | 'throttled';
export type TransportErrorReason = 'timeout' | 'network_failure' | 'http_5xx' | 'throttled' | 'malformed_payload';
export type DomainErrorReason = 'machine_not_found' | 'machine_unavailable' | 'insufficient_balance' | 'rejected';

export class VendorError extends Error {
  public readonly code: string;
  public readonly retryable: boolean;
  public readonly statusCode: number | null;

  constructor(message: string, code: string, retryable: boolean, statusCode: number | null = null) {
    super(message);
    this.name = 'VendorError';
    this.code = code;
    this.retryable = retryable;
    this.statusCode = statusCode;
    Object.setPrototypeOf(this, VendorError.prototype);
  }

  toJSON(): { error: string; code: string } {
    return { error: this.message, code: this.code };
  }
}

export class AuthError extends VendorError {
  public readonly reason: AuthErrorReason;
  public readonly retryAfterMs: number | null;

  constructor(reason: AuthErrorReason, message: string, options: { statusCode?: number; retryAfterMs?: number } = {}) {
    super(message, `auth_${reason}`, reason !== 'invalid_credentials', options.statusCode ?? null);
    this.name = 'AuthError';
    this.reason = reason;
    this.retryAfterMs = options.retryAfterMs ?? null;
    Object.setPrototypeOf(this, AuthError.prototype);
  }
}

export class TransportError extends VendorError {
  public readonly reason: TransportErrorReason;
  public readonly retryAfterMs: number | null;

  constructor(reason: TransportErrorReason, message: string, options: { statusCode?: number; retryAfterMs?: number } = {}) {
    super(message, `transport_${reason}`, true, options.statusCode ?? null);
    this.name = 'TransportError';
    this.reason = reason;
    this.retryAfterMs = options.retryAfterMs ?? null;
    Object.setPrototypeOf(this, TransportError.prototype);
  }
}

export class DomainError extends VendorError {
  public readonly reason: DomainErrorReason;
  public readonly vendorReason: string | null;

  constructor(reason: DomainErrorReason, message: string, options: { statusCode?: number; vendorReason?: string } = {}) {
    super(message, reason, false, options.statusCode ?? null);
    this.name = 'DomainError';
    this.reason = reason;
    this.vendorReason = options.vendorReason ?? null;
    Object.setPrototypeOf(this, DomainError.prototype);
  }
}

/** Non-retryable request failure: unknown resource, bad input, forbidden. */
export class FatalError extends VendorError {
  public readonly callerFault: boolean;

  constructor(message: string, options: { statusCode?: number; callerFault?: boolean } = {}) {
    super(message, 'fatal', false, options.statusCode ?? null);
    this.name = 'FatalError';
    this.callerFault = options.callerFault ?? false;
    Object.setPrototypeOf(this, FatalError.prototype);
  }
}

export function isInvalidCredentials(err: unknown): err is AuthError {
  return err instanceof AuthError && err.reason === 'invalid_credentials';
}

export function retryAfterOf(err: unknown): number | null {
  if (err instanceof AuthError || err instanceof TransportError) {
    return err.retryAfterMs;
  }
  return null;
}

export function describeError(err: unknown): { code: string; message: string } {
  if (err instanceof VendorError) {
    return { code: err.code, message: err.message };
  }
  if (err instanceof Error) {
    return { code: 'internal', message: err.message };
  }
  return { code: 'internal', message: String(err) };
}

/**
 * Parse a Retry-After header (delta-seconds or HTTP date) into milliseconds.
 */
export function parseRetryAfter(header: string | null, now: number, fallbackMs: number): number {
  if (!header) return fallbackMs;
  const trimmed = header.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed) * 1000;
  }
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return fallbackMs;
  return Math.max(0, date - now);
}
