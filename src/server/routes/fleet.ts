import express = require('express');
import { v4 as uuidv4 } from 'uuid';
import type { PollHealth, SnapshotReading, StartCycleAck } from '../../../types';
import { AuthError, DomainError, FatalError, TransportError, VendorError, type DomainErrorReason } from '../services/errors';

export interface FleetRouterDeps {
  currentSnapshot: () => SnapshotReading;
  getHealth: () => PollHealth;
  startCycle: (machineId: string, cardId?: string) => Promise<StartCycleAck>;
  requireApiToken: express.RequestHandler;
}

const DOMAIN_STATUS: Record<DomainErrorReason, number> = {
  machine_not_found: 404,
  machine_unavailable: 409,
  insufficient_balance: 402,
  rejected: 422,
};

/** HTTP status for a failed start-cycle command. */
export function commandErrorStatus(err: unknown): number {
  if (err instanceof DomainError) return DOMAIN_STATUS[err.reason];
  if (err instanceof AuthError) return err.reason === 'invalid_credentials' ? 502 : 503;
  if (err instanceof TransportError) return 503;
  if (err instanceof FatalError) return err.callerFault ? 400 : 502;
  return 500;
}

export function createFleetRouter(deps: FleetRouterDeps): express.Router {
  const router = express.Router();

  router.get('/snapshot', (_req, res) => {
    const reading = deps.currentSnapshot();
    if (reading.status === 'unavailable') {
      return res.status(503).json({ error: 'snapshot unavailable', health: reading.health });
    }
    res.json({ snapshot: reading.snapshot, health: reading.health });
  });

  router.get('/health', (_req, res) => {
    res.json(deps.getHealth());
  });

  // Start a cycle on a machine with the configured (or given) card
  router.post('/machines/:machineId/start', deps.requireApiToken, async (req, res) => {
    const { machineId } = req.params;
    const body: unknown = req.body;
    let cardId: string | undefined;
    if (typeof body === 'object' && body !== null && 'cardId' in body) {
      if (typeof body.cardId !== 'string' || !body.cardId.trim()) {
        return res.status(400).json({ error: 'cardId must be a non-empty string', code: 'invalid_request' });
      }
      cardId = body.cardId.trim();
    }

    const requestId = uuidv4();
    try {
      const ack = await deps.startCycle(machineId, cardId);
      console.log(`[fleet] ${requestId} start ${machineId} accepted`);
      res.json({ ok: true, requestId, ack });
    } catch (err) {
      const status = commandErrorStatus(err);
      if (err instanceof VendorError) {
        console.warn(`[fleet] ${requestId} start ${machineId} failed: ${err.code} -> ${status}`);
        return res.status(status).json({ ...err.toJSON(), requestId });
      }
      console.error(`[fleet] ${requestId} start ${machineId} failed:`, err);
      res.status(status).json({ error: 'Command failed', code: 'internal', requestId });
    }
  });

  return router;
}
