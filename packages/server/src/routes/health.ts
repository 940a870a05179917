/**
 * GET /api/health: liveness plus a storage round trip.
 */

import { Hono } from 'hono';
import { getErrorMessage } from '@creditledger/core';
import { createLogger } from '../lib/logger.js';

const log = createLogger('Health');

export const SERVER_VERSION = '0.1.0';

export interface HealthRouteDeps {
  storageBackend: 'sqlite' | 'postgres';
  /** Resolves when storage answers a trivial query */
  ping: () => Promise<void>;
}

export function healthRoutes(deps: HealthRouteDeps) {
  const app = new Hono();

  app.get('/', async (c) => {
    try {
      await deps.ping();
    } catch (err) {
      log.warn('Storage ping failed', { error: getErrorMessage(err) });
      return c.json(
        { status: 'degraded', version: SERVER_VERSION, storage: deps.storageBackend },
        503,
      );
    }
    return c.json({ status: 'ok', version: SERVER_VERSION, storage: deps.storageBackend });
  });

  return app;
}
