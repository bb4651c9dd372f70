import * as http from 'http';
import express = require('express');
import { loadConfig, loadEnvFile, ConfigError, type FleetConfig } from './config';
import { openSessionStore, type SqliteSessionStore } from './db';
import { initAuthMiddleware, requireApiToken } from './middleware/auth';
import { corsMiddleware, initCorsMiddleware } from './middleware/cors';
import { createFleetRouter } from './routes/fleet';
import { attachLiveUpdates, LIVE_PATH, type LiveUpdates } from './services/live-updates';
import { PollCoordinator } from './services/poll-coordinator';
import { VendorClient } from './services/vendor-client';
import type { FetchLike, VendorHttpOptions } from './services/vendor-http';
import { createDemoVendor } from './services/vendor-mock';
import { VendorSession, type SessionStore } from './services/vendor-session';

export interface FleetServerDeps {
  fetchImpl?: FetchLike;
  store?: SessionStore;
  now?: () => number;
}

export interface FleetServer {
  app: express.Express;
  server: http.Server;
  coordinator: PollCoordinator;
  session: VendorSession;
  live: LiveUpdates;
  close(): Promise<void>;
}

export function createFleetServer(config: FleetConfig, deps: FleetServerDeps = {}): FleetServer {
  let fetchImpl = deps.fetchImpl;
  if (!fetchImpl && config.vendor.mock) {
    console.log('[fleet] VENDOR_MOCK enabled, serving the demo laundry');
    fetchImpl = createDemoVendor(config.vendor.username, config.vendor.password, config.vendor.cardId).fetch;
  }
  const cardId = config.vendor.cardId ?? (config.vendor.mock ? 'card-demo' : null);

  const vendorHttp: VendorHttpOptions = { baseUrl: config.vendor.baseUrl, timeoutMs: config.vendor.timeoutMs, fetchImpl };
  let ownedStore: SqliteSessionStore | null = null;
  let store: SessionStore;
  if (deps.store) {
    store = deps.store;
  } else {
    ownedStore = openSessionStore(config.dbPath);
    store = ownedStore;
  }

  const session = new VendorSession({
    ...vendorHttp,
    credentials: { username: config.vendor.username, password: config.vendor.password },
    store,
    now: deps.now,
  });
  const client = new VendorClient(vendorHttp, session);
  const coordinator = new PollCoordinator({
    api: client,
    cardId,
    intervalMs: config.poll.intervalMs,
    maxBackoffMs: config.poll.maxBackoffMs,
    unavailableAfterFailures: config.poll.unavailableAfterFailures,
    session,
    now: deps.now,
  });
  coordinator.onAuthFailure((err) => {
    console.error(`[fleet] Operator action needed: ${err.message}. Update VENDOR_USERNAME/VENDOR_PASSWORD and restart.`);
  });

  initAuthMiddleware(config.apiToken);
  initCorsMiddleware(config.corsOrigins);

  const app = express();
  app.use(corsMiddleware);
  app.use(express.json());
  app.use('/api', createFleetRouter({
    currentSnapshot: () => coordinator.currentSnapshot(),
    getHealth: () => coordinator.getHealth(),
    startCycle: (machineId, card) => coordinator.requestStartCycle(machineId, card),
    requireApiToken,
  }));

  const server = http.createServer(app);
  const live = attachLiveUpdates(server, coordinator);

  const close = async () => {
    coordinator.stop();
    await live.close();
    if (server.listening) {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
    }
    ownedStore?.close();
  };

  return { app, server, coordinator, session, live, close };
}

function main(): void {
  loadEnvFile();
  let config: FleetConfig;
  try {
    config = loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`[fleet] ${err.message}`);
      process.exit(1);
    }
    throw err;
  }

  const fleet = createFleetServer(config);
  fleet.server.listen(config.port, () => {
    console.log(`[fleet] HTTP+WS listening on ${config.port}`);
    console.log(`[fleet] WS endpoint ws://localhost:${config.port}${LIVE_PATH}`);
    fleet.coordinator.start();
  });

  const shutdown = (signal: string) => {
    console.log(`[fleet] ${signal} received, shutting down`);
    fleet.close().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error('[fleet] Shutdown failed:', err);
        process.exit(1);
      },
    );
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

if (require.main === module) {
  main();
}
