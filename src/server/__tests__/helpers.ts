import type { Snapshot } from '../../../types';
import type { PollCoordinator } from '../services/poll-coordinator';
import { MockVendor, type MockMachine, type MockVendorOptions } from '../services/vendor-mock';
import type { SessionStore, SessionTokens } from '../services/vendor-session';

export const BASE_URL = 'https://vendor.test';
export const USERNAME = 'user@example.com';
export const PASSWORD = 'test-secret';
export const CARD_ID = 'card-1';
export const START = Date.parse('2026-03-01T12:00:00.000Z');

export class MemorySessionStore implements SessionStore {
  readonly saved = new Map<string, SessionTokens>();

  load(username: string): SessionTokens | null {
    return this.saved.get(username) ?? null;
  }

  save(username: string, tokens: SessionTokens): void {
    this.saved.set(username, { ...tokens });
  }

  clear(username: string): void {
    this.saved.delete(username);
  }
}

export interface TestClock {
  now: () => number;
  advance: (ms: number) => void;
}

export const createClock = (start = START): TestClock => {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
};

export const washer = (id: string, overrides: Partial<MockMachine> = {}): MockMachine => ({
  id,
  label: `Washer ${id}`,
  type: 'WASHER',
  statusCode: 'AVAILABLE',
  price: 10,
  cycleMinutes: 30,
  cycle: null,
  ...overrides,
});

export const createVendor = (clock: TestClock, options: MockVendorOptions = {}): MockVendor => new MockVendor({
  username: USERNAME,
  password: PASSWORD,
  now: clock.now,
  cards: [{ id: CARD_ID, balance: 25, currency: 'BRL', nickname: 'Test card' }],
  machines: [washer('w1'), washer('w2')],
  ...options,
});

export const nextSnapshot = (coordinator: PollCoordinator): Promise<Snapshot> => new Promise((resolve) => {
  const off = coordinator.subscribe((snapshot) => {
    off();
    resolve(snapshot);
  });
});
