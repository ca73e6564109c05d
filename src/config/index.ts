// =============================================================================
// AGENT TEST PLATFORM — Application Configuration
// Loads from environment variables with defaults for development.
//
// DATABASE_URL is resolved here, once, at startup. A malformed value throws;
// the server reports it and exits instead of running against a wrong endpoint.
// =============================================================================

import { ConnectionConfigResolver } from '../db/connection-config';
import { ConfigParseError } from '../db/errors';
import { ConnectionConfig } from '../types/database';

export interface AppConfig {
  readonly app: { readonly name: string; readonly version: string };
  readonly host: string;
  readonly port: number;
  readonly nodeEnv: string;
  readonly db: ConnectionConfig;
  readonly verifyOnStartup: boolean;
}

export const APP_NAME = 'Agent Test Platform';
export const APP_VERSION = '0.1.0';

function parsePort(value: string | undefined): number {
  if (!value) return 8000;
  const port = Number(value);
  if (!/^\d+$/.test(value) || port < 1 || port > 65535) {
    throw new ConfigParseError(`Invalid PORT "${value}": expected an integer in 1-65535`);
  }
  return port;
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  resolver: ConnectionConfigResolver = new ConnectionConfigResolver()
): AppConfig {
  return Object.freeze({
    app: Object.freeze({ name: APP_NAME, version: APP_VERSION }),
    host: env.HOST || '0.0.0.0',
    port: parsePort(env.PORT),
    nodeEnv: env.NODE_ENV || 'development',

    db: resolver.resolve(env.DATABASE_URL),

    // Probe the database before accepting traffic
    verifyOnStartup: env.DB_VERIFY_ON_STARTUP !== 'false',
  });
}
