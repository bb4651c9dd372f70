/**
 * Mock vendor cloud for local development and tests.
 *
 * Enable via: VENDOR_MOCK=true
 *
 * Serves the vendor endpoints from memory through a fetch-compatible function:
 *  - login / refresh with expiring tokens
 *  - machine list with live cycles (IN_USE → AVAILABLE when the cycle ends)
 *  - card balance, debited on every started cycle
 *  - start command with the vendor's rejection reasons
 *  - scripted responses (status codes, network errors) for resilience tests
 */
import { v4 as uuidv4 } from 'uuid';
import { isRecord, type FetchLike } from './vendor-http';

export type MockStatusCode = 'AVAILABLE' | 'IN_USE' | 'END_OF_CYCLE' | 'OUT_OF_ORDER' | 'OFFLINE' | 'RESERVED' | string;

export interface MockMachine {
  id: string;
  label: string;
  type: 'WASHER' | 'DRYER';
  statusCode: MockStatusCode;
  price: number;
  cycleMinutes: number;
  cycle: { startedAt: number; durationSeconds: number; cardId: string | null } | null;
}

export interface MockCard {
  id: string;
  balance: number;
  currency: string;
  nickname: string;
}

export interface MockVendorOptions {
  username?: string;
  password?: string;
  machines?: MockMachine[];
  cards?: MockCard[];
  tokenTtlSeconds?: number;
  issueRefreshTokens?: boolean;
  now?: () => number;
}

type ScriptedResponse =
  | { kind: 'status'; status: number; body?: unknown; headers?: Record<string, string> }
  | { kind: 'network'; message: string };

export interface RecordedRequest {
  method: string;
  path: string;
  token: string | null;
}

function json(status: number, body: unknown, headers: Record<string, string> = {}): Response {
  return new Response(body === undefined ? '' : JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json', ...headers },
  });
}

function parseBody(init: RequestInit): Record<string, unknown> {
  if (typeof init.body !== 'string' || !init.body) return {};
  try {
    const parsed: unknown = JSON.parse(init.body);
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

function bearerOf(init: RequestInit): string | null {
  const headers = new Headers(init.headers);
  const value = headers.get('authorization');
  if (!value || !value.startsWith('Bearer ')) return null;
  return value.slice('Bearer '.length);
}

export class MockVendor {
  readonly requests: RecordedRequest[] = [];

  private username: string;
  private password: string;
  private machines = new Map<string, MockMachine>();
  private cards = new Map<string, MockCard>();
  private tokenTtlSeconds: number;
  private issueRefreshTokens: boolean;
  private now: () => number;

  private accessTokens = new Map<string, number>(); // token → expiresAt
  private refreshTokens = new Set<string>();
  private scripted = new Map<string, ScriptedResponse[]>();

  constructor(options: MockVendorOptions = {}) {
    this.username = options.username ?? 'demo@example.com';
    this.password = options.password ?? 'demo-password';
    this.tokenTtlSeconds = options.tokenTtlSeconds ?? 3600;
    this.issueRefreshTokens = options.issueRefreshTokens ?? true;
    this.now = options.now ?? Date.now;
    for (const m of options.machines ?? []) this.machines.set(m.id, { ...m });
    for (const c of options.cards ?? []) this.cards.set(c.id, { ...c });
  }

  /** fetch-compatible entry point handed to the session and client. */
  readonly fetch: FetchLike = async (url, init) => this.handle(url, init);

  /** Answer the next `times` requests to `METHOD /path` with a scripted response. */
  respondNext(route: string, status: number, options: { times?: number; body?: unknown; headers?: Record<string, string> } = {}): void {
    const queue = this.scripted.get(route) ?? [];
    for (let i = 0; i < (options.times ?? 1); i++) {
      queue.push({ kind: 'status', status, body: options.body, headers: options.headers });
    }
    this.scripted.set(route, queue);
  }

  /** Make the next `times` requests to `METHOD /path` fail at the network level. */
  dropNext(route: string, times = 1): void {
    const queue = this.scripted.get(route) ?? [];
    for (let i = 0; i < times; i++) {
      queue.push({ kind: 'network', message: 'socket hang up' });
    }
    this.scripted.set(route, queue);
  }

  /** Server-side revocation of every issued access token. */
  revokeAccessTokens(): void {
    this.accessTokens.clear();
  }

  setPassword(password: string): void {
    this.password = password;
  }

  setMachine(machine: MockMachine): void {
    this.machines.set(machine.id, { ...machine });
  }

  getMachine(id: string): MockMachine | undefined {
    const machine = this.machines.get(id);
    if (machine) this.settle(machine);
    return machine;
  }

  getCard(id: string): MockCard | undefined {
    return this.cards.get(id);
  }

  count(route: string): number {
    return this.requests.filter(r => `${r.method} ${r.path}` === route).length;
  }

  private async handle(url: string, init: RequestInit): Promise<Response> {
    const method = (init.method ?? 'GET').toUpperCase();
    const path = new URL(url).pathname;
    const token = bearerOf(init);
    this.requests.push({ method, path, token });

    const routeKey = `${method} ${path}`;
    const queue = this.scripted.get(routeKey);
    const scripted = queue?.shift();
    if (scripted) {
      if (scripted.kind === 'network') throw new TypeError(`fetch failed: ${scripted.message}`);
      return json(scripted.status, scripted.body ?? { error: 'scripted response' }, scripted.headers);
    }

    if (method === 'POST' && path === '/login') return this.login(parseBody(init));
    if (method === 'POST' && path === '/refresh') return this.refresh(parseBody(init));

    if (!token || (this.accessTokens.get(token) ?? 0) <= this.now()) {
      return json(401, { error: 'unauthorized' });
    }

    if (method === 'GET' && path === '/machines') {
      return json(200, { data: Array.from(this.machines.values()).map(m => this.toRaw(m)) });
    }

    const cardMatch = path.match(/^\/card\/([^/]+)$/);
    if (method === 'GET' && cardMatch) {
      const card = this.cards.get(decodeURIComponent(cardMatch[1]));
      if (!card) return json(404, { error: 'card not found' });
      return json(200, { id: card.id, balance: card.balance, currency: card.currency, nickname: card.nickname });
    }

    const startMatch = path.match(/^\/machines\/([^/]+)\/start$/);
    if (method === 'POST' && startMatch) {
      return this.start(decodeURIComponent(startMatch[1]), parseBody(init));
    }

    return json(404, { error: 'not found' });
  }

  private issueTokens(): Response {
    const accessToken = `tok_${uuidv4()}`;
    this.accessTokens.set(accessToken, this.now() + this.tokenTtlSeconds * 1000);
    const body: Record<string, unknown> = { accessToken, expiresIn: this.tokenTtlSeconds };
    if (this.issueRefreshTokens) {
      const refreshToken = `ref_${uuidv4()}`;
      this.refreshTokens.add(refreshToken);
      body.refreshToken = refreshToken;
    }
    return json(200, body);
  }

  private login(body: Record<string, unknown>): Response {
    if (body.username !== this.username || body.password !== this.password) {
      return json(401, { error: 'invalid credentials' });
    }
    return this.issueTokens();
  }

  private refresh(body: Record<string, unknown>): Response {
    const refreshToken = body.refreshToken;
    if (typeof refreshToken !== 'string' || !this.refreshTokens.has(refreshToken)) {
      return json(401, { error: 'invalid refresh token' });
    }
    this.refreshTokens.delete(refreshToken);
    return this.issueTokens();
  }

  private start(machineId: string, body: Record<string, unknown>): Response {
    const machine = this.machines.get(machineId);
    if (!machine) return json(404, { error: 'machine not found' });
    this.settle(machine);

    const cardId = typeof body.cardId === 'string' ? body.cardId : '';
    const card = this.cards.get(cardId);
    if (!card) return json(400, { error: 'unknown card' });

    if (machine.statusCode !== 'AVAILABLE') {
      return json(409, { rejectionReason: 'machine_unavailable' });
    }
    if (card.balance < machine.price) {
      return json(402, { rejectionReason: 'insufficient_balance' });
    }

    card.balance = Math.round((card.balance - machine.price) * 100) / 100;
    machine.statusCode = 'IN_USE';
    machine.cycle = { startedAt: this.now(), durationSeconds: machine.cycleMinutes * 60, cardId };
    const orderId = `ord_${uuidv4()}`;
    console.log(`[vendor-mock] ${machine.label} started by ${cardId} (${orderId})`);
    return json(200, { ack: true, orderId });
  }

  /** Finish cycles whose time is up. */
  private settle(machine: MockMachine): void {
    if (machine.statusCode === 'IN_USE' && machine.cycle) {
      if (machine.cycle.startedAt + machine.cycle.durationSeconds * 1000 <= this.now()) {
        machine.statusCode = 'AVAILABLE';
        machine.cycle = null;
      }
    }
  }

  private toRaw(machine: MockMachine): Record<string, unknown> {
    this.settle(machine);
    return {
      id: machine.id,
      displayName: machine.label,
      type: machine.type,
      status_code: machine.statusCode,
      price: machine.price,
      cycle_info: machine.cycle
        ? {
            started_at: new Date(machine.cycle.startedAt).toISOString(),
            duration_seconds: machine.cycle.durationSeconds,
            card_id: machine.cycle.cardId,
          }
        : null,
    };
  }
}

/** Demo laundry served when VENDOR_MOCK=true. */
export function createDemoVendor(username: string, password: string, cardId: string | null): MockVendor {
  const now = Date.now();
  const demoCardId = cardId || 'card-demo';
  return new MockVendor({
    username,
    password,
    cards: [{ id: demoCardId, balance: 50, currency: 'BRL', nickname: 'Demo card' }],
    machines: [
      { id: 'washer-1', label: 'Washer 1', type: 'WASHER', statusCode: 'AVAILABLE', price: 16.9, cycleMinutes: 35, cycle: null },
      { id: 'washer-2', label: 'Washer 2', type: 'WASHER', statusCode: 'IN_USE', price: 16.9, cycleMinutes: 35,
        cycle: { startedAt: now - 12 * 60_000, durationSeconds: 35 * 60, cardId: null } },
      { id: 'dryer-1', label: 'Dryer 1', type: 'DRYER', statusCode: 'AVAILABLE', price: 16.9, cycleMinutes: 45, cycle: null },
      { id: 'dryer-2', label: 'Dryer 2', type: 'DRYER', statusCode: 'OUT_OF_ORDER', price: 16.9, cycleMinutes: 45, cycle: null },
    ],
  });
}
