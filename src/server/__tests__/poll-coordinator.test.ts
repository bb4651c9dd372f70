import { describe, it, expect, vi, afterEach } from 'vitest';
import type { PollHealth, Snapshot, StartCycleAck } from '../../../types';
import { AuthError, DomainError, FatalError, TransportError } from '../services/errors';
import { PollCoordinator, type PollCoordinatorOptions } from '../services/poll-coordinator';
import { VendorClient, type FleetApi, type RawCard } from '../services/vendor-client';
import { VendorSession, type Credentials } from '../services/vendor-session';
import { BASE_URL, CARD_ID, PASSWORD, USERNAME, createClock, createVendor } from './helpers';

interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (err: unknown) => void;
}

const deferred = <T>(): Deferred<T> => {
  let resolve: (value: T) => void = () => {};
  let reject: (err: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
};

class ScriptedApi implements FleetApi {
  machines: unknown[] = [{ id: 'w1', label: 'Washer 1', type: 'WASHER', status_code: 'AVAILABLE', price: 10 }];
  card: RawCard = { balance: 25 };
  failure: unknown = null;
  startFailure: unknown = null;
  fetchCount = 0;
  startCount = 0;
  signals: AbortSignal[] = [];
  private held: Deferred<unknown[]> | null = null;

  hold(): Deferred<unknown[]> {
    this.held = deferred<unknown[]>();
    return this.held;
  }

  fetchMachines(signal?: AbortSignal): Promise<unknown[]> {
    this.fetchCount++;
    if (signal) this.signals.push(signal);
    const held = this.held;
    if (held) {
      this.held = null;
      return held.promise;
    }
    if (this.failure) return Promise.reject(this.failure);
    return Promise.resolve(this.machines);
  }

  fetchCard(): Promise<RawCard> {
    return Promise.resolve(this.card);
  }

  startCycle(machineId: string, cardId: string): Promise<StartCycleAck> {
    this.startCount++;
    if (this.startFailure) return Promise.reject(this.startFailure);
    return Promise.resolve({ machineId, cardId, orderId: 'ord-1' });
  }
}

class CredentialRecorder {
  readonly updates: Credentials[] = [];
  updateCredentials(credentials: Credentials): void {
    this.updates.push(credentials);
  }
}

const create = (api: FleetApi, options: Partial<PollCoordinatorOptions> = {}) => new PollCoordinator({
  api,
  cardId: CARD_ID,
  intervalMs: 1000,
  maxBackoffMs: 5000,
  now: () => Date.now(),
  ...options,
});

const untilSnapshots = (coordinator: PollCoordinator, count: number): Promise<Snapshot[]> => new Promise((resolve) => {
  const seen: Snapshot[] = [];
  const off = coordinator.subscribe((snapshot) => {
    seen.push(snapshot);
    if (seen.length === count) {
      off();
      resolve(seen);
    }
  });
});

describe('PollCoordinator', () => {
  let coordinator: PollCoordinator | null = null;

  afterEach(() => {
    coordinator?.stop();
    coordinator = null;
    vi.useRealTimers();
  });

  // -------------------------------------------------------------------
  // Snapshots
  // -------------------------------------------------------------------
  it('is unavailable before the first poll', () => {
    coordinator = create(new ScriptedApi());
    const reading = coordinator.currentSnapshot();
    expect(reading.status).toBe('unavailable');
    expect(reading.health.state).toBe('stopped');
  });

  it('publishes a frozen snapshot with the card', async () => {
    coordinator = create(new ScriptedApi());
    const snapshot = await coordinator.refreshNow();

    expect(snapshot.sequence).toBe(1);
    expect(snapshot.card).toEqual({ id: CARD_ID, balance: 25, currency: 'BRL', label: CARD_ID });
    expect(snapshot.machines.map(m => m.status)).toEqual(['available']);
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.machines)).toBe(true);
    expect(Object.isFrozen(snapshot.machines[0])).toBe(true);

    const reading = coordinator.currentSnapshot();
    expect(reading.status === 'available' && reading.snapshot).toBe(snapshot);
  });

  it('coalesces concurrent refreshes into one fetch', async () => {
    const api = new ScriptedApi();
    coordinator = create(api);
    const held = api.hold();

    const a = coordinator.refreshNow();
    const b = coordinator.refreshNow();
    const c = coordinator.refreshNow();
    expect(b).toBe(a);
    expect(c).toBe(a);

    held.resolve(api.machines);
    const [sa, sb, sc] = await Promise.all([a, b, c]);
    expect(api.fetchCount).toBe(1);
    expect(sb).toBe(sa);
    expect(sc).toBe(sa);
  });

  it('notifies subscribers once per snapshot and survives a throwing listener', async () => {
    coordinator = create(new ScriptedApi());
    const sequences: number[] = [];
    coordinator.subscribe(() => {
      throw new Error('listener bug');
    });
    const off = coordinator.subscribe((snapshot, health) => {
      sequences.push(snapshot.sequence);
      expect(health.consecutiveFailures).toBe(0);
    });

    await coordinator.refreshNow();
    expect(sequences).toEqual([1]);

    off();
    await coordinator.refreshNow();
    expect(sequences).toEqual([1]);
  });

  // -------------------------------------------------------------------
  // Failures
  // -------------------------------------------------------------------
  it('reports stopped after a refresh on a coordinator that is not running', async () => {
    coordinator = create(new ScriptedApi());
    await coordinator.refreshNow();
    expect(coordinator.getHealth()).toMatchObject({ state: 'stopped', nextRefreshAt: null, lastError: null });
  });

  it('keeps the last snapshot when a poll fails', async () => {
    const api = new ScriptedApi();
    coordinator = create(api, { unavailableAfterFailures: 2 });
    const first = await coordinator.refreshNow();

    api.failure = new TransportError('http_5xx', 'GET /machines failed: 503', { statusCode: 503 });
    await expect(coordinator.refreshNow()).rejects.toBe(api.failure);

    let reading = coordinator.currentSnapshot();
    expect(reading.status === 'available' && reading.snapshot).toBe(first);
    expect(reading.health).toMatchObject({
      state: 'stopped',
      consecutiveFailures: 1,
      lastError: { code: 'transport_http_5xx', message: 'GET /machines failed: 503' },
      stale: false,
    });

    await expect(coordinator.refreshNow()).rejects.toBe(api.failure);
    reading = coordinator.currentSnapshot();
    expect(reading.status).toBe('available');
    expect(reading.health.stale).toBe(true);
  });

  it('backs off exponentially up to the cap, then returns to the interval', async () => {
    vi.useFakeTimers();
    const api = new ScriptedApi();
    api.failure = new TransportError('http_5xx', 'down');
    coordinator = create(api);

    coordinator.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(api.fetchCount).toBe(1);
    expect((coordinator.getHealth().nextRefreshAt ?? 0) - Date.now()).toBe(2000);

    await vi.advanceTimersByTimeAsync(1999);
    expect(api.fetchCount).toBe(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(api.fetchCount).toBe(2);
    expect((coordinator.getHealth().nextRefreshAt ?? 0) - Date.now()).toBe(4000);

    await vi.advanceTimersByTimeAsync(4000);
    expect(api.fetchCount).toBe(3);
    expect((coordinator.getHealth().nextRefreshAt ?? 0) - Date.now()).toBe(5000);

    api.failure = null;
    await vi.advanceTimersByTimeAsync(5000);
    expect(api.fetchCount).toBe(4);
    expect(coordinator.getHealth()).toMatchObject({ state: 'idle', consecutiveFailures: 0, lastError: null });
    expect((coordinator.getHealth().nextRefreshAt ?? 0) - Date.now()).toBe(1000);
  });

  it('waits at least as long as the vendor asks when throttled', async () => {
    vi.useFakeTimers();
    const api = new ScriptedApi();
    api.failure = new TransportError('throttled', 'slow down', { statusCode: 429, retryAfterMs: 10_000 });
    coordinator = create(api);

    coordinator.start();
    await vi.advanceTimersByTimeAsync(0);
    expect((coordinator.getHealth().nextRefreshAt ?? 0) - Date.now()).toBe(10_000);
  });

  it('halts on rejected credentials and resumes after they are updated', async () => {
    vi.useFakeTimers();
    const api = new ScriptedApi();
    const session = new CredentialRecorder();
    api.failure = new AuthError('invalid_credentials', 'Vendor rejected the configured credentials');
    coordinator = create(api, { session });
    const alerts: AuthError[] = [];
    coordinator.onAuthFailure(err => alerts.push(err));

    coordinator.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(coordinator.getHealth()).toMatchObject({ state: 'auth_failed', nextRefreshAt: null, stale: true });
    expect(alerts).toHaveLength(1);
    expect(alerts[0].reason).toBe('invalid_credentials');

    await vi.advanceTimersByTimeAsync(600_000);
    expect(api.fetchCount).toBe(1);

    api.failure = null;
    coordinator.updateCredentials({ username: USERNAME, password: 'new-secret' });
    expect(session.updates).toEqual([{ username: USERNAME, password: 'new-secret' }]);
    await vi.advanceTimersByTimeAsync(0);
    expect(api.fetchCount).toBe(2);
    expect(coordinator.getHealth().state).toBe('idle');
    expect(coordinator.currentSnapshot().status).toBe('available');
  });

  it('keeps the last good snapshot when the vendor rejects a fresh token twice', async () => {
    const clock = createClock();
    const vendor = createVendor(clock);
    const http = { baseUrl: BASE_URL, timeoutMs: 1000, fetchImpl: vendor.fetch };
    const session = new VendorSession({ ...http, credentials: { username: USERNAME, password: PASSWORD }, now: clock.now });
    coordinator = create(new VendorClient(http, session), { now: clock.now, session });
    const alerts: AuthError[] = [];
    coordinator.onAuthFailure(err => alerts.push(err));
    const first = await coordinator.refreshNow();

    vendor.respondNext('GET /machines', 401, { times: 2 });
    await expect(coordinator.refreshNow()).rejects.toMatchObject({ reason: 'invalid_credentials' });

    expect(vendor.count('GET /machines')).toBe(3);
    expect(alerts).toHaveLength(1);
    expect(alerts[0].reason).toBe('invalid_credentials');
    const reading = coordinator.currentSnapshot();
    expect(reading.status === 'available' && reading.snapshot).toBe(first);
    expect(reading.health).toMatchObject({ state: 'auth_failed', stale: true, lastError: { code: 'auth_invalid_credentials' } });
  });

  it('stays halted when a poll in flight fails after a command found the credentials rejected', async () => {
    vi.useFakeTimers();
    const api = new ScriptedApi();
    coordinator = create(api);
    const held = api.hold();
    coordinator.start();
    await vi.advanceTimersByTimeAsync(0);

    api.startFailure = new AuthError('invalid_credentials', 'Vendor rejected a freshly issued token');
    await expect(coordinator.requestStartCycle('w1')).rejects.toBe(api.startFailure);
    held.reject(new TransportError('timeout', 'GET /machines timed out'));

    await vi.advanceTimersByTimeAsync(60_000);
    expect(api.fetchCount).toBe(1);
    expect(coordinator.getHealth()).toMatchObject({
      state: 'auth_failed',
      nextRefreshAt: null,
      stale: true,
      lastError: { code: 'auth_invalid_credentials' },
    });
  });

  it('stays halted when a poll in flight succeeds after a command found the credentials rejected', async () => {
    vi.useFakeTimers();
    const api = new ScriptedApi();
    coordinator = create(api);
    const held = api.hold();
    coordinator.start();
    await vi.advanceTimersByTimeAsync(0);

    api.startFailure = new AuthError('invalid_credentials', 'Vendor rejected a freshly issued token');
    await expect(coordinator.requestStartCycle('w1')).rejects.toBe(api.startFailure);
    held.resolve(api.machines);

    await vi.advanceTimersByTimeAsync(60_000);
    expect(api.fetchCount).toBe(1);
    expect(coordinator.currentSnapshot().status).toBe('available');
    expect(coordinator.getHealth()).toMatchObject({ state: 'auth_failed', nextRefreshAt: null, stale: true });
  });

  it('drops the follow-up refresh when the poll in flight finds the credentials rejected', async () => {
    vi.useFakeTimers();
    const api = new ScriptedApi();
    coordinator = create(api);
    const held = api.hold();
    coordinator.start();
    await vi.advanceTimersByTimeAsync(0);

    await coordinator.requestStartCycle('w1');
    held.reject(new AuthError('invalid_credentials', 'Vendor rejected a freshly issued token'));

    await vi.advanceTimersByTimeAsync(60_000);
    expect(api.fetchCount).toBe(1);
    expect(coordinator.getHealth().state).toBe('auth_failed');
  });

  // -------------------------------------------------------------------
  // Scheduling
  // -------------------------------------------------------------------
  it('publishes health with the next refresh already scheduled', async () => {
    vi.useFakeTimers();
    const api = new ScriptedApi();
    coordinator = create(api);
    const seen: PollHealth[] = [];
    coordinator.subscribe((_snapshot, health) => {
      seen.push(health);
    });

    coordinator.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(seen).toHaveLength(1);
    expect(seen[0]).toMatchObject({ state: 'idle', nextRefreshAt: Date.now() + 1000 });
    expect(seen[0].nextRefreshAt).toBe(coordinator.getHealth().nextRefreshAt);
  });

  it('polls immediately on start and then one interval after each completion', async () => {
    vi.useFakeTimers();
    const api = new ScriptedApi();
    coordinator = create(api);

    coordinator.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(api.fetchCount).toBe(1);

    await vi.advanceTimersByTimeAsync(999);
    expect(api.fetchCount).toBe(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(api.fetchCount).toBe(2);
  });

  it('re-arms the timer after an out-of-band refresh', async () => {
    vi.useFakeTimers();
    const api = new ScriptedApi();
    coordinator = create(api);

    coordinator.start();
    await vi.advanceTimersByTimeAsync(500);
    await coordinator.refreshNow();
    expect(api.fetchCount).toBe(2);

    await vi.advanceTimersByTimeAsync(999);
    expect(api.fetchCount).toBe(2);
    await vi.advanceTimersByTimeAsync(1);
    expect(api.fetchCount).toBe(3);
  });

  it('aborts and discards a fetch that completes after stop', async () => {
    const api = new ScriptedApi();
    coordinator = create(api);
    const held = api.hold();

    const outcome = coordinator.refreshNow().catch((err: unknown) => err);
    coordinator.stop();
    expect(api.signals[0].aborted).toBe(true);

    held.resolve(api.machines);
    const err = await outcome;
    expect(err).toBeInstanceOf(FatalError);
    expect(coordinator.currentSnapshot().status).toBe('unavailable');
    expect(coordinator.getHealth()).toMatchObject({ state: 'stopped', consecutiveFailures: 0 });
  });

  it('reports a fetch that fails after stop as discarded', async () => {
    const api = new ScriptedApi();
    coordinator = create(api);
    const held = api.hold();

    const outcome = coordinator.refreshNow().catch((err: unknown) => err);
    coordinator.stop();
    held.reject(new TransportError('network_failure', 'GET /machines aborted'));

    const err = await outcome;
    expect(err).toBeInstanceOf(FatalError);
    expect(err).toMatchObject({ message: 'Refresh discarded: coordinator stopped' });
    expect(coordinator.getHealth()).toMatchObject({ state: 'stopped', consecutiveFailures: 0, lastError: null });
  });

  // -------------------------------------------------------------------
  // Commands
  // -------------------------------------------------------------------
  describe('requestStartCycle', () => {
    it('requires a card when none is configured', async () => {
      const api = new ScriptedApi();
      coordinator = create(api, { cardId: null });
      const err = await coordinator.requestStartCycle('w1').catch((e: unknown) => e);
      expect(err).toBeInstanceOf(FatalError);
      expect(err).toMatchObject({ callerFault: true });
      expect(api.startCount).toBe(0);
    });

    it('returns domain rejections and leaves the snapshot alone', async () => {
      const api = new ScriptedApi();
      coordinator = create(api);
      await coordinator.refreshNow();
      api.startFailure = new DomainError('machine_unavailable', 'Start rejected: machine unavailable');

      await expect(coordinator.requestStartCycle('w1')).rejects.toBe(api.startFailure);
      expect(api.fetchCount).toBe(1);
      const reading = coordinator.currentSnapshot();
      expect(reading.status === 'available' && reading.snapshot.sequence).toBe(1);
    });

    it('halts polling when the command finds the credentials rejected', async () => {
      const api = new ScriptedApi();
      coordinator = create(api);
      api.startFailure = new AuthError('invalid_credentials', 'Vendor rejected a freshly issued token');

      await expect(coordinator.requestStartCycle('w1')).rejects.toBe(api.startFailure);
      expect(coordinator.getHealth().state).toBe('auth_failed');
    });

    it('runs one more refresh after a fetch that was already in flight', async () => {
      const api = new ScriptedApi();
      coordinator = create(api);
      const published = untilSnapshots(coordinator, 2);
      const held = api.hold();

      const first = coordinator.refreshNow();
      const ack = await coordinator.requestStartCycle('w1');
      expect(ack).toEqual({ machineId: 'w1', cardId: CARD_ID, orderId: 'ord-1' });
      expect(api.fetchCount).toBe(1);

      held.resolve(api.machines);
      await first;
      const snapshots = await published;
      expect(api.fetchCount).toBe(2);
      expect(snapshots.map(s => s.sequence)).toEqual([1, 2]);
    });

    it('shows the machine in use on the refresh that follows a start', async () => {
      const clock = createClock();
      const vendor = createVendor(clock);
      const http = { baseUrl: BASE_URL, timeoutMs: 1000, fetchImpl: vendor.fetch };
      const session = new VendorSession({ ...http, credentials: { username: USERNAME, password: PASSWORD }, now: clock.now });
      coordinator = create(new VendorClient(http, session), { now: clock.now, session });

      const before = await coordinator.refreshNow();
      expect(before.machines.find(m => m.id === 'w1')?.status).toBe('available');

      const next = untilSnapshots(coordinator, 1);
      await coordinator.requestStartCycle('w1');
      const [after] = await next;

      const machine = after.machines.find(m => m.id === 'w1');
      expect(machine?.status).toBe('in_use');
      expect(machine?.cycle).toMatchObject({ durationSeconds: 1800, remainingSeconds: 1800, startedByCurrentCard: true });
      expect(after.card?.balance).toBe(15);
      expect(after.sequence).toBe(2);
    });
  });
});
