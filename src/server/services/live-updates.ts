import type * as http from 'http';
import { WebSocketServer, WebSocket } from 'ws';
import type { LiveMessage } from '../../../types';
import type { PollCoordinator } from './poll-coordinator';

export const LIVE_PATH = '/live';

export interface LiveUpdates {
  wss: WebSocketServer;
  clientCount(): number;
  close(): Promise<void>;
}

const send = (socket: WebSocket, message: LiveMessage) => {
  if (socket.readyState !== WebSocket.OPEN) return;
  socket.send(JSON.stringify(message), (err) => {
    if (err) console.warn('[live] send failed:', err.message);
  });
};

/**
 * Push every published snapshot to connected dashboards. New clients get the
 * current snapshot right away, when there is one.
 */
export function attachLiveUpdates(server: http.Server, coordinator: PollCoordinator, path = LIVE_PATH): LiveUpdates {
  const wss = new WebSocketServer({ server, path });

  const broadcast = (message: LiveMessage) => {
    for (const client of wss.clients) send(client, message);
  };

  const unsubscribeSnapshots = coordinator.subscribe((snapshot, health) => {
    broadcast({ type: 'snapshot', snapshot, health });
  });
  const unsubscribeAuth = coordinator.onAuthFailure((err) => {
    broadcast({ type: 'auth_failed', message: err.message });
  });

  wss.on('connection', (socket) => {
    console.log(`[live] client connected (${wss.clients.size} total)`);
    const reading = coordinator.currentSnapshot();
    if (reading.status === 'available') {
      send(socket, { type: 'snapshot', snapshot: reading.snapshot, health: reading.health });
    }
    socket.on('close', () => {
      console.log(`[live] client disconnected (${wss.clients.size} total)`);
    });
    socket.on('error', (err) => {
      console.warn('[live] socket error:', err.message);
    });
  });

  return {
    wss,
    clientCount: () => wss.clients.size,
    close: () => new Promise<void>((resolve, reject) => {
      unsubscribeSnapshots();
      unsubscribeAuth();
      for (const client of wss.clients) client.terminate();
      wss.close((err) => (err ? reject(err) : resolve()));
    }),
  };
}
