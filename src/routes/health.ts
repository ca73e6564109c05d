// =============================================================================
// AGENT TEST PLATFORM — Health Routes
//
//   GET /api/health   Unauthenticated probe for Docker / load balancers.
//                     Checks out a pooled connection and runs SELECT 1.
// =============================================================================

import { Router } from 'express';
import { AppConfig } from '../config';
import { ConnectionManager } from '../db/pool';
import { PoolState } from '../types/database';

const PROBE_TIMEOUT_MS = 3000;

interface DatabaseCheck {
  status: 'healthy' | 'unhealthy';
  state: PoolState;
  latencyMs: number;
  error?: string;
}

export function healthRoutes(config: AppConfig, connections: ConnectionManager): Router {
  const router = Router();
  const startTime = Date.now();

  router.get('/health', async (_req, res) => {
    const dbStart = Date.now();
    let database: DatabaseCheck;

    try {
      await connections.acquireConnection(
        config.db,
        (handle) => handle.query('SELECT 1'),
        { signal: AbortSignal.timeout(PROBE_TIMEOUT_MS) }
      );
      database = {
        status: 'healthy',
        state: connections.state(config.db),
        latencyMs: Date.now() - dbStart,
      };
    } catch (err) {
      database = {
        status: 'unhealthy',
        state: connections.state(config.db),
        latencyMs: Date.now() - dbStart,
        error: err instanceof Error ? err.message : String(err),
      };
    }

    const healthy = database.status === 'healthy';
    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'healthy' : 'degraded',
      service: config.app.name,
      version: config.app.version,
      uptime: Math.floor((Date.now() - startTime) / 1000),
      checks: { database },
      timestamp: new Date().toISOString(),
    });
  });

  return router;
}
