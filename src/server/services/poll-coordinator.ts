/**
 * PollCoordinator: periodic fleet refresh and snapshot publication
 *
 * - One fetch in flight at a time; refreshNow() joins it instead of starting another
 * - Next periodic refresh is armed when the previous one completes (no overlap)
 * - Failed polls keep the last snapshot and back off exponentially up to a cap
 * - Rejected credentials halt the schedule until updateCredentials() and notify
 *   the operator channel; nothing in flight at that moment re-arms it
 * - Snapshots are frozen and swapped by reference
 */
import type {
  CoordinatorState,
  Machine,
  PollHealth,
  Snapshot,
  SnapshotReading,
  StartCycleAck,
} from '../../../types';
import {
  AuthError,
  FatalError,
  VendorError,
  describeError,
  isInvalidCredentials,
  retryAfterOf,
} from './errors';
import { normalizeFleet } from './normalizer';
import type { FleetApi } from './vendor-client';
import type { Credentials } from './vendor-session';

export const DEFAULT_POLL_INTERVAL_MS = 60_000;
export const DEFAULT_MAX_BACKOFF_MS = 15 * 60_000;
export const DEFAULT_UNAVAILABLE_AFTER_FAILURES = 3;

export type SnapshotListener = (snapshot: Snapshot, health: PollHealth) => void;
export type AuthFailureListener = (error: AuthError) => void;

export interface CredentialTarget {
  updateCredentials(credentials: Credentials): void;
}

export interface PollCoordinatorOptions {
  api: FleetApi;
  cardId: string | null;
  intervalMs?: number;
  maxBackoffMs?: number;
  unavailableAfterFailures?: number;
  session?: CredentialTarget;
  now?: () => number;
}

function freezeSnapshot(snapshot: Snapshot): Snapshot {
  const machines = snapshot.machines.map((m): Machine => Object.freeze({
    ...m,
    cycle: m.cycle ? Object.freeze({ ...m.cycle }) : null,
  }));
  return Object.freeze({
    ...snapshot,
    card: snapshot.card ? Object.freeze({ ...snapshot.card }) : null,
    machines: Object.freeze(machines),
  });
}

export class PollCoordinator {
  private api: FleetApi;
  private cardId: string | null;
  private intervalMs: number;
  private maxBackoffMs: number;
  private unavailableAfterFailures: number;
  private session: CredentialTarget | null;
  private now: () => number;

  private state: CoordinatorState = 'stopped';
  private running = false;
  private halted = false;
  private generation = 0;
  private timer: ReturnType<typeof setTimeout> | null = null;

  // In-flight fetch guard
  private inFlight: Promise<Snapshot> | null = null;
  private abortController: AbortController | null = null;
  private followUpRequested = false;

  private snapshot: Snapshot | null = null;
  private sequence = 0;
  private consecutiveFailures = 0;
  private lastSuccessAt: number | null = null;
  private lastFailureAt: number | null = null;
  private lastError: { code: string; message: string } | null = null;
  private nextRefreshAt: number | null = null;

  private listeners = new Set<SnapshotListener>();
  private authListeners = new Set<AuthFailureListener>();

  constructor(options: PollCoordinatorOptions) {
    this.api = options.api;
    this.cardId = options.cardId;
    this.intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.maxBackoffMs = options.maxBackoffMs ?? DEFAULT_MAX_BACKOFF_MS;
    this.unavailableAfterFailures = options.unavailableAfterFailures ?? DEFAULT_UNAVAILABLE_AFTER_FAILURES;
    this.session = options.session ?? null;
    this.now = options.now ?? Date.now;
  }

  start(intervalMs?: number): void {
    if (this.running) return;
    if (intervalMs !== undefined) this.intervalMs = intervalMs;
    this.running = true;
    if (this.halted) {
      this.state = 'auth_failed';
      console.warn('[poll] Not polling: credentials were rejected and have not been updated');
      return;
    }
    this.state = 'idle';
    console.log(`[poll] Starting, interval ${this.intervalMs}ms`);
    this.tick();
  }

  stop(): void {
    if (!this.running && this.state === 'stopped') return;
    this.running = false;
    this.generation++;
    this.clearTimer();
    this.abortController?.abort();
    this.abortController = null;
    this.inFlight = null;
    this.followUpRequested = false;
    this.state = 'stopped';
    console.log('[poll] Stopped');
  }

  /**
   * Refresh now, or join the refresh already in flight. Every caller of a
   * coalesced refresh receives the same snapshot (or the same error).
   */
  refreshNow(): Promise<Snapshot> {
    if (this.inFlight) return this.inFlight;

    const controller = new AbortController();
    this.abortController = controller;
    this.clearTimer();
    if (!this.halted) this.state = 'refreshing';

    const run = this.execute(this.generation, controller);
    this.inFlight = run;
    return run;
  }

  async requestStartCycle(machineId: string, cardId?: string): Promise<StartCycleAck> {
    if (!machineId) {
      throw new FatalError('machine id is required', { callerFault: true });
    }
    const card = cardId || this.cardId;
    if (!card) {
      throw new FatalError('No card id given and no card configured', { callerFault: true });
    }

    let ack: StartCycleAck;
    try {
      ack = await this.api.startCycle(machineId, card);
    } catch (err) {
      console.error(`[poll] Start cycle on ${machineId} failed: ${describeError(err).code}`);
      if (isInvalidCredentials(err)) this.haltOnAuthFailure(err);
      throw err;
    }

    console.log(`[poll] Start cycle accepted for ${machineId}, refreshing`);
    this.requestRefresh();
    return ack;
  }

  currentSnapshot(): SnapshotReading {
    const health = this.getHealth();
    if (!this.snapshot) return { status: 'unavailable', health };
    return { status: 'available', snapshot: this.snapshot, health };
  }

  getHealth(): PollHealth {
    return {
      state: this.state,
      consecutiveFailures: this.consecutiveFailures,
      lastSuccessAt: this.lastSuccessAt,
      lastFailureAt: this.lastFailureAt,
      lastError: this.lastError,
      nextRefreshAt: this.nextRefreshAt,
      stale: this.halted || this.consecutiveFailures >= this.unavailableAfterFailures,
    };
  }

  subscribe(listener: SnapshotListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  onAuthFailure(listener: AuthFailureListener): () => void {
    this.authListeners.add(listener);
    return () => {
      this.authListeners.delete(listener);
    };
  }

  /** Operator reconfiguration after a credentials failure. */
  updateCredentials(credentials: Credentials): void {
    if (!this.session) {
      throw new FatalError('Coordinator has no session to reconfigure');
    }
    this.session.updateCredentials(credentials);
    this.consecutiveFailures = 0;
    this.lastError = null;
    if (this.halted) {
      this.halted = false;
      this.state = this.running ? 'idle' : 'stopped';
      if (this.running) this.tick();
    }
  }

  private async execute(generation: number, controller: AbortController): Promise<Snapshot> {
    try {
      const cardId = this.cardId;
      const [rawMachines, rawCard] = await Promise.all([
        this.api.fetchMachines(controller.signal),
        cardId ? this.api.fetchCard(cardId, controller.signal) : Promise.resolve(null),
      ]);

      if (generation !== this.generation) {
        throw new FatalError('Refresh discarded: coordinator stopped');
      }

      const capturedAt = this.now();
      const fleet = normalizeFleet(rawMachines, rawCard, { capturedAt, cardId });
      for (const issue of fleet.issues) {
        console.warn(`[poll] ${issue.kind} (${issue.machineId ?? 'no id'}): ${issue.detail}`);
      }

      const snapshot = freezeSnapshot({
        sequence: ++this.sequence,
        capturedAt,
        card: fleet.card,
        machines: fleet.machines,
      });
      this.snapshot = snapshot;
      this.consecutiveFailures = 0;
      this.lastSuccessAt = capturedAt;
      console.log(`[poll] Snapshot #${snapshot.sequence}: ${snapshot.machines.map(m => `${m.id}=${m.status}`).join(', ') || 'no machines'}`);

      if (!this.halted) {
        this.lastError = null;
        this.state = this.running ? 'idle' : 'stopped';
        if (this.running) this.schedule(this.intervalMs);
      }
      this.publish(snapshot);
      return snapshot;
    } catch (err) {
      controller.abort();
      if (generation !== this.generation) {
        throw new FatalError('Refresh discarded: coordinator stopped');
      }
      this.recordFailure(err);
      throw err;
    } finally {
      if (this.abortController === controller) {
        this.abortController = null;
        this.inFlight = null;
        if (this.followUpRequested) {
          this.followUpRequested = false;
          if (!this.halted) this.requestRefresh();
        }
      }
    }
  }

  private recordFailure(err: unknown): void {
    this.consecutiveFailures++;
    this.lastFailureAt = this.now();

    if (isInvalidCredentials(err)) {
      this.haltOnAuthFailure(err);
      return;
    }

    const failure = describeError(err);
    if (this.halted) {
      // Keep the credentials error as the reason polling is halted
      console.warn(`[poll] Refresh failed (${failure.code}) while halted; not rescheduling`);
      return;
    }

    this.lastError = failure;
    if (!this.running) {
      this.state = 'stopped';
      this.nextRefreshAt = null;
      console.warn(`[poll] Refresh failed (${failure.code}), failure #${this.consecutiveFailures}`);
      return;
    }

    const delay = this.backoffDelay(err);
    this.state = 'backoff';
    console.warn(`[poll] Refresh failed (${failure.code}), failure #${this.consecutiveFailures}, retrying in ${delay}ms`);
    this.schedule(delay);
  }

  private backoffDelay(err: unknown): number {
    const delay = Math.min(this.intervalMs * 2 ** this.consecutiveFailures, this.maxBackoffMs);
    return Math.max(delay, retryAfterOf(err) ?? 0);
  }

  private haltOnAuthFailure(err: AuthError): void {
    this.clearTimer();
    this.halted = true;
    this.followUpRequested = false;
    this.state = 'auth_failed';
    this.lastError = describeError(err);
    console.error('[poll] Vendor rejected the credentials; polling halted until they are updated');
    for (const listener of this.authListeners) {
      queueMicrotask(() => {
        try {
          listener(err);
        } catch (listenerErr) {
          console.error('[poll] Auth failure listener threw:', listenerErr);
        }
      });
    }
  }

  private publish(snapshot: Snapshot): void {
    const health = this.getHealth();
    for (const listener of this.listeners) {
      queueMicrotask(() => {
        try {
          listener(snapshot, health);
        } catch (err) {
          console.error('[poll] Snapshot listener threw:', err);
        }
      });
    }
  }

  private requestRefresh(): void {
    if (this.inFlight) {
      // The running fetch may predate the command; run one more right after it
      this.followUpRequested = true;
      return;
    }
    this.tick();
  }

  private tick(): void {
    this.timer = null;
    this.refreshNow().catch((err: unknown) => {
      // Vendor failures are already recorded and rescheduled by execute()
      if (!(err instanceof VendorError)) {
        console.error('[poll] Unexpected refresh error:', err);
      }
    });
  }

  private schedule(delayMs: number): void {
    this.clearTimer();
    this.nextRefreshAt = this.now() + delayMs;
    this.timer = setTimeout(() => this.tick(), delayMs);
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.nextRefreshAt = null;
  }
}
