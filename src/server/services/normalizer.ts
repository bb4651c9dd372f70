/**
 * Raw vendor payload → domain model.
 *
 * Pure and total: malformed machines are coerced (status 'unknown', no cycle)
 * or dropped, never thrown. Derived cycle fields use the poll's capture time,
 * so the same payload and timestamp always produce the same snapshot.
 */
import type { Card, Cycle, Machine, MachineStatus, MachineType } from '../../../types';
import type { RawCard } from './vendor-client';
import { isRecord } from './vendor-http';

export type ModelIssueKind = 'unrecognized_status' | 'inconsistent_cycle' | 'malformed_machine';

export interface ModelIssue {
  kind: ModelIssueKind;
  machineId: string | null;
  detail: string;
}

export interface NormalizeContext {
  capturedAt: number;
  cardId: string | null;
}

export interface NormalizedFleet {
  machines: Machine[];
  card: Card | null;
  issues: ModelIssue[];
}

const DEFAULT_CURRENCY = 'BRL';

const STATUS_CODES: Record<string, MachineStatus> = {
  AVAILABLE: 'available',
  END_OF_CYCLE: 'available',
  IN_USE: 'in_use',
  RUNNING: 'in_use',
  OUT_OF_ORDER: 'out_of_order',
  OFFLINE: 'out_of_order',
  DIAGNOSTIC: 'out_of_order',
  ERROR: 'out_of_order',
  RESERVED: 'unknown',
};

/** Map a vendor status code; null when the code is not one we know. */
export function mapVendorStatus(code: unknown): MachineStatus | null {
  if (typeof code !== 'string') return null;
  return STATUS_CODES[code.trim().toUpperCase()] ?? null;
}

function mapMachineType(raw: unknown): MachineType {
  if (typeof raw !== 'string') return 'unknown';
  switch (raw.toUpperCase()) {
    case 'WASHER': return 'washer';
    case 'DRYER': return 'dryer';
    default: return 'unknown';
  }
}

function firstString(record: Record<string, unknown>, ...keys: string[]): string | null {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === 'string' && value.trim()) return value.trim();
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  }
  return null;
}

function toNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim()) {
    const n = Number(value);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

function parseTimestamp(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim()) {
    const ms = Date.parse(value);
    return Number.isNaN(ms) ? null : ms;
  }
  return null;
}

/**
 * Build the Cycle for an in-use machine. Returns a string describing the
 * problem when the cycle info is missing or unusable.
 */
export function deriveCycle(raw: unknown, context: NormalizeContext): Cycle | string {
  if (!isRecord(raw)) return 'in use without cycle info';

  const startedAt = parseTimestamp(raw.startedAt ?? raw.started_at);
  if (startedAt === null) return 'cycle info has no valid start time';

  let durationSeconds = toNumber(raw.durationSeconds ?? raw.duration_seconds);
  if (durationSeconds === null) {
    const minutes = toNumber(raw.durationMinutes ?? raw.duration_minutes);
    durationSeconds = minutes === null ? null : minutes * 60;
  }
  if (durationSeconds === null || durationSeconds <= 0) return 'cycle info has no valid duration';

  const elapsedMs = Math.max(0, context.capturedAt - startedAt);
  const remainingMs = Math.max(0, durationSeconds * 1000 - elapsedMs);

  const originCard = firstString(raw, 'cardId', 'card_id');
  const startedByCurrentCard = originCard !== null && context.cardId !== null
    ? originCard === context.cardId
    : null;

  return {
    startedAt,
    durationSeconds,
    remainingSeconds: Math.ceil(remainingMs / 1000),
    endsAt: startedAt + durationSeconds * 1000,
    startedByCurrentCard,
  };
}

export function normalizeMachine(raw: unknown, context: NormalizeContext, issues: ModelIssue[]): Machine | null {
  if (!isRecord(raw)) {
    issues.push({ kind: 'malformed_machine', machineId: null, detail: 'machine entry is not an object' });
    return null;
  }
  const id = firstString(raw, 'id');
  if (!id) {
    issues.push({ kind: 'malformed_machine', machineId: null, detail: 'machine entry has no id' });
    return null;
  }

  const statusCode = raw.status_code ?? raw.statusCode ?? raw.status;
  let status = mapVendorStatus(statusCode);
  if (status === null) {
    issues.push({ kind: 'unrecognized_status', machineId: id, detail: `status code ${JSON.stringify(statusCode) ?? 'undefined'}` });
    status = 'unknown';
  }

  const cycleInfo = raw.cycle_info ?? raw.cycleInfo ?? null;
  let cycle: Cycle | null = null;
  if (status === 'in_use') {
    const derived = deriveCycle(cycleInfo, context);
    if (typeof derived === 'string') {
      issues.push({ kind: 'inconsistent_cycle', machineId: id, detail: derived });
      status = 'unknown';
    } else {
      cycle = derived;
    }
  } else if (cycleInfo !== null && status !== 'unknown') {
    issues.push({ kind: 'inconsistent_cycle', machineId: id, detail: `cycle info on a machine reported ${status}` });
    status = 'unknown';
  }

  const price = toNumber(raw.price);
  return {
    id,
    label: firstString(raw, 'label', 'displayName', 'display_name') ?? id,
    type: mapMachineType(raw.type),
    status,
    price: price !== null && price >= 0 ? price : null,
    cycle,
  };
}

export function normalizeCard(raw: RawCard, cardId: string): Card {
  const record: Record<string, unknown> = { ...raw };
  return {
    id: firstString(record, 'id') ?? cardId,
    balance: raw.balance,
    currency: firstString(record, 'currency') ?? DEFAULT_CURRENCY,
    label: firstString(record, 'label', 'nickname') ?? cardId,
  };
}

export function normalizeFleet(
  rawMachines: readonly unknown[],
  rawCard: RawCard | null,
  context: NormalizeContext,
): NormalizedFleet {
  const issues: ModelIssue[] = [];
  const machines: Machine[] = [];
  const seen = new Set<string>();

  for (const raw of rawMachines) {
    const machine = normalizeMachine(raw, context, issues);
    if (!machine) continue;
    if (seen.has(machine.id)) {
      issues.push({ kind: 'malformed_machine', machineId: machine.id, detail: 'duplicate machine id' });
      continue;
    }
    seen.add(machine.id);
    machines.push(machine);
  }

  const card = rawCard && context.cardId ? normalizeCard(rawCard, context.cardId) : null;
  return { machines, card, issues };
}
