// =============================================================================
// AGENT TEST PLATFORM — Database Types
//
// Connection configuration resolved from DATABASE_URL, and the minimal driver
// surface the connection manager needs from `pg`.
// =============================================================================

import type { PoolConfig } from 'pg';

/** Driver schemes accepted in a connection descriptor. All select `pg`. */
export const SUPPORTED_SCHEMES = [
  'async-postgres',
  'postgres',
  'postgresql',
  'postgresql+asyncpg',
] as const;

export type DriverScheme = (typeof SUPPORTED_SCHEMES)[number];

/**
 * Resolved database endpoint. Built once at startup and shared by
 * reference; frozen, never mutated.
 *
 * `password` is sensitive: log `describeConnection(config)` instead.
 */
export interface ConnectionConfig {
  readonly driverScheme: DriverScheme;
  readonly host: string;
  readonly port: number;
  readonly username: string;
  readonly password: string;
  readonly database: string;
}

// ── Shared pool lifecycle ──────────────────────────────────────────────

/**
 * `closed` is terminal: reached on shutdown or on an unrecoverable
 * connection failure, and never left again.
 */
export type PoolState = 'uninitialized' | 'acquiring' | 'ready' | 'closed';

// ── Driver surface ─────────────────────────────────────────────────────

/** A checked-out client. Satisfied by `pg.PoolClient`. */
export interface ConnectionHandle {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
  release(err?: Error | boolean): void;
}

/** A connection pool. Satisfied by `pg.Pool`. */
export interface DriverPool {
  connect(): Promise<ConnectionHandle>;
  end(): Promise<void>;
  on(event: 'error', listener: (err: Error) => void): unknown;
}

export type PoolFactory = (options: PoolConfig) => DriverPool;

export interface AcquireOptions {
  /** Aborting releases whatever the pending checkout eventually yields. */
  signal?: AbortSignal;
}
