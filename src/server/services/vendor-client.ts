/**
 * Vendor cloud API client
 *
 * Thin typed layer over the three endpoints that drive the fleet view:
 * list machines, read the card balance, start a cycle. Authentication comes
 * from a TokenProvider; a 401 invalidates the token and the request is retried
 * exactly once with a fresh one.
 */
import type { StartCycleAck } from '../../../types';
import {
  AuthError,
  DomainError,
  FatalError,
  TransportError,
  parseRetryAfter,
  type DomainErrorReason,
} from './errors';
import { sendVendorRequest, isRecord, type VendorHttpOptions, type VendorResponse } from './vendor-http';
import type { TokenProvider } from './vendor-session';

const DEFAULT_THROTTLE_MS = 30_000;

export interface RawCard {
  id?: unknown;
  balance: number;
  currency?: unknown;
  label?: unknown;
  nickname?: unknown;
}

/** What the poll coordinator needs from the API client. */
export interface FleetApi {
  fetchMachines(signal?: AbortSignal): Promise<unknown[]>;
  fetchCard(cardId: string, signal?: AbortSignal): Promise<RawCard>;
  startCycle(machineId: string, cardId: string, signal?: AbortSignal): Promise<StartCycleAck>;
}

type Operation = 'fetchMachines' | 'fetchCard' | 'startCycle';

const REJECTION_REASONS: Record<string, DomainErrorReason> = {
  machine_unavailable: 'machine_unavailable',
  machine_busy: 'machine_unavailable',
  machine_not_found: 'machine_not_found',
  insufficient_balance: 'insufficient_balance',
  insufficient_funds: 'insufficient_balance',
};

function toDomainError(vendorReason: string, statusCode?: number): DomainError {
  const reason = REJECTION_REASONS[vendorReason.toLowerCase()] ?? 'rejected';
  const message = reason === 'rejected'
    ? `Vendor rejected the start request: ${vendorReason}`
    : `Start rejected: ${reason.replace(/_/g, ' ')}`;
  return new DomainError(reason, message, { statusCode, vendorReason });
}

function rejectionReasonOf(body: unknown): string | null {
  if (!isRecord(body)) return null;
  const value = body.rejectionReason ?? body.rejection_reason;
  return typeof value === 'string' && value ? value : null;
}

export class VendorClient implements FleetApi {
  private http: VendorHttpOptions;
  private session: TokenProvider;

  constructor(http: VendorHttpOptions, session: TokenProvider) {
    this.http = http;
    this.session = session;
  }

  async fetchMachines(signal?: AbortSignal): Promise<unknown[]> {
    const res = await this.authorized('fetchMachines', { method: 'GET', path: '/machines', signal });
    // The vendor may wrap lists as `{ data: [...], meta: {...} }`
    if (Array.isArray(res.body)) {
      return res.body;
    }
    if (isRecord(res.body) && Array.isArray(res.body.data)) {
      return res.body.data;
    }
    throw new TransportError('malformed_payload', 'GET /machines returned no machine list', { statusCode: res.status });
  }

  async fetchCard(cardId: string, signal?: AbortSignal): Promise<RawCard> {
    const path = `/card/${encodeURIComponent(cardId)}`;
    const res = await this.authorized('fetchCard', { method: 'GET', path, signal });
    const body = res.body;
    if (!isRecord(body)) {
      throw new TransportError('malformed_payload', `GET ${path} returned no card`, { statusCode: res.status });
    }
    const balance = typeof body.balance === 'string'
      ? (body.balance.trim() ? Number(body.balance) : NaN)
      : body.balance;
    if (typeof balance !== 'number' || !Number.isFinite(balance)) {
      throw new TransportError('malformed_payload', `GET ${path} returned no usable balance`, { statusCode: res.status });
    }
    return { id: body.id, balance, currency: body.currency, label: body.label, nickname: body.nickname };
  }

  async startCycle(machineId: string, cardId: string, signal?: AbortSignal): Promise<StartCycleAck> {
    const path = `/machines/${encodeURIComponent(machineId)}/start`;
    const res = await this.authorized('startCycle', { method: 'POST', path, body: { cardId }, signal });

    const vendorReason = rejectionReasonOf(res.body);
    if (vendorReason) {
      throw toDomainError(vendorReason, res.status);
    }
    if (isRecord(res.body) && res.body.ack === false) {
      throw new DomainError('rejected', 'Vendor did not acknowledge the start request', { statusCode: res.status });
    }

    let orderId: string | null = null;
    if (isRecord(res.body)) {
      const raw = res.body.orderId ?? res.body.order_id ?? res.body.id;
      if (typeof raw === 'string' || typeof raw === 'number') orderId = String(raw);
    }
    console.log(`[vendor-client] Started machine ${machineId}${orderId ? ` (order ${orderId})` : ''}`);
    return { machineId, cardId, orderId };
  }

  private async authorized(
    op: Operation,
    req: { method: 'GET' | 'POST'; path: string; body?: unknown; signal?: AbortSignal },
  ): Promise<VendorResponse> {
    const token = await this.session.ensureValid();
    let res = await sendVendorRequest(this.http, { ...req, token });

    if (res.status === 401) {
      console.log(`[vendor-client] ${req.method} ${req.path} rejected token, re-authenticating`);
      this.session.invalidate(token);
      const freshToken = await this.session.ensureValid();
      res = await sendVendorRequest(this.http, { ...req, token: freshToken });
      if (res.status === 401) {
        console.error(`[vendor-client] ${req.method} ${req.path} rejected fresh token`);
        this.session.invalidate(freshToken);
        throw new AuthError('invalid_credentials', 'Vendor rejected a freshly issued token', { statusCode: 401 });
      }
    }

    this.classify(op, req.method, req.path, res);
    return res;
  }

  private classify(op: Operation, method: string, path: string, res: VendorResponse): void {
    const { status } = res;
    if (status >= 200 && status < 300) return;

    // Log only status and path, never the vendor body
    console.error(`[vendor-client] ${method} ${path} failed: ${status}`);

    if (status === 429) {
      const retryAfterMs = parseRetryAfter(res.headers.get('retry-after'), Date.now(), DEFAULT_THROTTLE_MS);
      throw new TransportError('throttled', `${method} ${path} throttled`, { statusCode: status, retryAfterMs });
    }
    if (status >= 500) {
      throw new TransportError('http_5xx', `${method} ${path} failed: ${status}`, { statusCode: status });
    }

    if (op === 'startCycle') {
      const vendorReason = rejectionReasonOf(res.body);
      if (vendorReason) throw toDomainError(vendorReason, status);
      if (status === 404) throw new DomainError('machine_not_found', 'Machine not found', { statusCode: status });
      if (status === 402) throw new DomainError('insufficient_balance', 'Start rejected: insufficient balance', { statusCode: status });
      if (status === 409) throw new DomainError('machine_unavailable', 'Start rejected: machine unavailable', { statusCode: status });
    }

    throw new FatalError(`${method} ${path} failed: ${status}`, { statusCode: status });
  }
}
