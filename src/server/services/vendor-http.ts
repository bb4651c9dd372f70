/**
 * Single bounded-timeout request against the vendor cloud.
 *
 * Used by both the session manager (login/refresh) and the API client. Network
 * and timeout failures come back as TransportError; HTTP status handling is
 * left to the caller, which knows what a 401 or a 404 means for its endpoint.
 */
import { TransportError } from './errors';

export const DEFAULT_API_BASE = 'https://api.machine-guardian.com';
export const DEFAULT_TIMEOUT_MS = 15_000; // 15 s per request
export const APP_VERSION = '1.6.0';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface VendorHttpOptions {
  baseUrl: string;
  timeoutMs: number;
  fetchImpl?: FetchLike;
}

export interface VendorRequest {
  method: 'GET' | 'POST';
  path: string;
  body?: unknown;
  token?: string;
  signal?: AbortSignal;
}

export interface VendorResponse {
  status: number;
  headers: Headers;
  body: unknown;
}

export async function sendVendorRequest(options: VendorHttpOptions, req: VendorRequest): Promise<VendorResponse> {
  const fetchImpl: FetchLike = options.fetchImpl ?? ((url, init) => fetch(url, init));
  const url = `${options.baseUrl.replace(/\/+$/, '')}${req.path}`;
  const headers: Record<string, string> = {
    'Accept': 'application/json',
    'Content-Type': 'application/json',
    'x-app-version': APP_VERSION,
  };
  if (req.token) {
    headers['Authorization'] = `Bearer ${req.token}`;
  }

  const controller = new AbortController();
  let timedOut = false;
  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, options.timeoutMs);

  const onCallerAbort = () => controller.abort();
  if (req.signal) {
    if (req.signal.aborted) {
      controller.abort();
    } else {
      req.signal.addEventListener('abort', onCallerAbort, { once: true });
    }
  }

  const init: RequestInit = { method: req.method, headers, signal: controller.signal };
  if (req.body !== undefined) {
    init.body = JSON.stringify(req.body);
  }

  try {
    const res = await fetchImpl(url, init);
    const text = await res.text();
    let body: unknown = null;
    if (text) {
      try {
        body = JSON.parse(text);
      } catch {
        if (res.ok) {
          throw new TransportError('malformed_payload', `${req.method} ${req.path} returned non-JSON body`, { statusCode: res.status });
        }
      }
    }
    return { status: res.status, headers: res.headers, body };
  } catch (err) {
    if (err instanceof TransportError) throw err;
    if (timedOut) {
      throw new TransportError('timeout', `${req.method} ${req.path} timed out after ${options.timeoutMs}ms`);
    }
    if (controller.signal.aborted) {
      throw new TransportError('network_failure', `${req.method} ${req.path} aborted`);
    }
    const message = err instanceof Error ? err.message : String(err);
    throw new TransportError('network_failure', `${req.method} ${req.path} failed: ${message}`);
  } finally {
    clearTimeout(timeoutId);
    req.signal?.removeEventListener('abort', onCallerAbort);
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
