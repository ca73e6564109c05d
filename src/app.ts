// =============================================================================
// AGENT TEST PLATFORM — Express Application
//
//   /             Service descriptor
//   /api/health   Database health probe (unauthenticated)
//
// The connection manager is injected so tests can run the app against a
// fake driver.
// =============================================================================

import express from 'express';
import helmet from 'helmet';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { AppConfig } from './config';
import { ConnectionManager } from './db/pool';
import { errorHandler, requestId } from './middleware/security';
import { healthRoutes } from './routes/health';

export function createApp(config: AppConfig, connections: ConnectionManager): express.Express {
  const app = express();

  // ── Middleware ───────────────────────────────────────────────────────

  app.use(helmet());
  app.use(cors({
    origin: config.nodeEnv === 'development' ? '*' : undefined,
    credentials: true,
  }));
  app.use(requestId());
  app.use(express.json({ limit: '100kb' }));

  const apiLimiter = rateLimit({
    windowMs: 1 * 60 * 1000, // 1 minute
    limit: 120,
    standardHeaders: true,
    legacyHeaders: false,
  });

  // ── Routes ───────────────────────────────────────────────────────────

  app.get('/', (_req, res) => {
    res.json({
      app: config.app.name,
      version: config.app.version,
      health: '/api/health',
    });
  });

  app.use('/api', apiLimiter, healthRoutes(config, connections));

  // ── 404 Handler ──────────────────────────────────────────────────────

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use(errorHandler(config.nodeEnv));

  return app;
}
