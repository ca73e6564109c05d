// =============================================================================
// AGENT TEST PLATFORM — Main Server
//
// Startup order:
//   1. Resolve configuration (a malformed DATABASE_URL aborts here)
//   2. Probe the database through the shared pool (DB_VERIFY_ON_STARTUP)
//   3. Listen
//
// SIGINT / SIGTERM stop the listener, then close the pool.
// =============================================================================

import { Server } from 'http';
import { createApp } from './app';
import { AppConfig, loadConfig } from './config';
import { describeConnection } from './db/connection-config';
import { DatabaseError } from './db/errors';
import { ConnectionManager } from './db/pool';

async function verifyDatabase(config: AppConfig, connections: ConnectionManager): Promise<void> {
  const started = Date.now();
  await connections.acquireConnection(config.db, (handle) => handle.query('SELECT 1'));
  console.log(`[DB] Connected to ${describeConnection(config.db)} in ${Date.now() - started}ms`);
}

function listen(config: AppConfig, connections: ConnectionManager): Promise<Server> {
  const app = createApp(config, connections);
  return new Promise((resolve, reject) => {
    const server = app.listen(config.port, config.host, () => resolve(server));
    server.once('error', reject);
  });
}

function installShutdown(server: Server, connections: ConnectionManager): void {
  let stopping = false;

  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    console.log(`[Server] ${signal} received, shutting down`);

    server.close((serverErr) => {
      if (serverErr) console.error('[Server] Error closing listener:', serverErr.message);
      connections.close().then(
        () => {
          console.log('[Server] Shutdown complete');
          process.exit(serverErr ? 1 : 0);
        },
        (err: unknown) => {
          console.error('[Server] Error closing database pool:', err instanceof Error ? err.message : err);
          process.exit(1);
        }
      );
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

async function main(): Promise<void> {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (err) {
    if (err instanceof DatabaseError) {
      console.error(`[Config] ${err.message}`);
      process.exit(1);
    }
    throw err;
  }

  const connections = new ConnectionManager();

  if (config.verifyOnStartup) {
    try {
      await verifyDatabase(config, connections);
    } catch (err) {
      console.error('[DB] Startup connectivity check failed:', err instanceof Error ? err.message : err);
      await connections.close();
      process.exit(1);
    }
  }

  const server = await listen(config, connections);
  installShutdown(server, connections);

  console.log(`
  ${config.app.name} v${config.app.version}

    Listen:    ${config.host}:${config.port}
    Env:       ${config.nodeEnv}
    Database:  ${describeConnection(config.db)}
    Health:    /api/health
  `);
}

main().catch((err: unknown) => {
  console.error('[Server] Fatal startup error:', err);
  process.exit(1);
});
