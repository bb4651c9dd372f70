export type MachineStatus = 'available' | 'in_use' | 'out_of_order' | 'unknown';

export type MachineType = 'washer' | 'dryer' | 'unknown';

export interface Cycle {
  startedAt: number;            // epoch ms
  durationSeconds: number;
  remainingSeconds: number;     // frozen at the snapshot's capture time
  endsAt: number;               // epoch ms
  // null when the vendor does not report the originating card
  startedByCurrentCard: boolean | null;
}

export interface Machine {
  id: string;
  label: string;
  type: MachineType;
  status: MachineStatus;
  price: number | null;
  cycle: Cycle | null;
}

export interface Card {
  id: string;
  balance: number;
  currency: string;
  label: string;
}

export interface Snapshot {
  sequence: number;
  capturedAt: number;
  card: Card | null;
  machines: readonly Machine[];
}

export type CoordinatorState = 'idle' | 'refreshing' | 'backoff' | 'stopped' | 'auth_failed';

export interface PollHealth {
  state: CoordinatorState;
  consecutiveFailures: number;
  lastSuccessAt: number | null;
  lastFailureAt: number | null;
  lastError: { code: string; message: string } | null;
  nextRefreshAt: number | null;
  stale: boolean;
}

export type SnapshotReading =
  | { status: 'unavailable'; health: PollHealth }
  | { status: 'available'; snapshot: Snapshot; health: PollHealth };

export interface StartCycleAck {
  machineId: string;
  cardId: string;
  orderId: string | null;
}

export type LiveMessage =
  | { type: 'snapshot'; snapshot: Snapshot; health: PollHealth }
  | { type: 'auth_failed'; message: string };
