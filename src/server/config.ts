import * as dotenv from 'dotenv';
import { DEFAULT_API_BASE, DEFAULT_TIMEOUT_MS } from './services/vendor-http';

export interface FleetConfig {
  vendor: {
    username: string;
    password: string;
    cardId: string | null;
    baseUrl: string;
    timeoutMs: number;
    mock: boolean;
  };
  poll: {
    intervalMs: number;
    maxBackoffMs: number;
    unavailableAfterFailures: number;
  };
  dbPath: string;
  port: number;
  apiToken: string | null;
  corsOrigins: string[];
}

const MIN_POLL_INTERVAL_SECONDS = 5;

export class ConfigError extends Error {
  public readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration:\n  - ${problems.join('\n  - ')}`);
    this.name = 'ConfigError';
    this.problems = problems;
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/** Load FLEET_ENV_FILE (default .env) into process.env without overriding set values. */
export const loadEnvFile = (env: NodeJS.ProcessEnv = process.env) => {
  const path = env.FLEET_ENV_FILE || '.env';
  const result = dotenv.config({ path });
  if (result.error && env.FLEET_ENV_FILE) {
    console.warn(`[fleet] Could not read env file ${path}: ${result.error.message}`);
  }
};

const isTrue = (val?: string) => val === '1' || val?.toLowerCase() === 'true';

export function loadConfig(env: NodeJS.ProcessEnv = process.env): FleetConfig {
  const problems: string[] = [];

  const integer = (name: string, fallback: number, min: number): number => {
    const raw = env[name]?.trim();
    if (!raw) return fallback;
    if (!/^\d+$/.test(raw)) {
      problems.push(`${name} must be a whole number (got "${raw}")`);
      return fallback;
    }
    const value = Number(raw);
    if (value < min) {
      problems.push(`${name} must be at least ${min} (got ${value})`);
      return fallback;
    }
    return value;
  };

  const mock = isTrue(env.VENDOR_MOCK);
  const username = env.VENDOR_USERNAME?.trim() || '';
  const password = env.VENDOR_PASSWORD || '';
  if (!mock) {
    if (!username) problems.push('VENDOR_USERNAME is required');
    if (!password) problems.push('VENDOR_PASSWORD is required');
  }

  const baseUrl = env.VENDOR_API_BASE?.trim() || DEFAULT_API_BASE;
  if (!/^https?:\/\/\S+$/.test(baseUrl)) {
    problems.push(`VENDOR_API_BASE must be an http(s) URL (got "${baseUrl}")`);
  }

  const timeoutMs = integer('VENDOR_TIMEOUT_MS', DEFAULT_TIMEOUT_MS, 1);
  const intervalSeconds = integer('POLL_INTERVAL_SECONDS', 60, MIN_POLL_INTERVAL_SECONDS);
  const maxBackoffSeconds = integer('POLL_MAX_BACKOFF_SECONDS', 900, 1);
  const unavailableAfterFailures = integer('POLL_UNAVAILABLE_AFTER_FAILURES', 3, 1);
  const port = integer('FLEET_PORT', 4000, 0);
  if (port > 65535) problems.push(`FLEET_PORT must be at most 65535 (got ${port})`);
  if (maxBackoffSeconds < intervalSeconds) {
    problems.push('POLL_MAX_BACKOFF_SECONDS must not be shorter than POLL_INTERVAL_SECONDS');
  }

  if (problems.length) throw new ConfigError(problems);

  return {
    vendor: {
      username: username || 'demo@example.com',
      password: password || 'demo-password',
      cardId: env.VENDOR_CARD_ID?.trim() || null,
      baseUrl,
      timeoutMs,
      mock,
    },
    poll: {
      intervalMs: intervalSeconds * 1000,
      maxBackoffMs: maxBackoffSeconds * 1000,
      unavailableAfterFailures,
    },
    dbPath: env.FLEET_DB_PATH || './fleet.db',
    port,
    apiToken: env.FLEET_API_TOKEN || null,
    corsOrigins: (env.CORS_ORIGINS || '').split(',').map(s => s.trim()).filter(Boolean),
  };
}
