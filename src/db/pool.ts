// =============================================================================
// AGENT TEST PLATFORM — Database Connection Pool
//
// One lazily-created `pg` pool per resolved endpoint, shared by every caller
// in the process. Callers never hold a client directly: acquireConnection
// checks one out, runs the caller's work, and returns it to the pool on every
// exit path.
//
// Pool lifecycle:
//   uninitialized → acquiring   first acquireConnection creates the pool
//   acquiring     → ready       first successful checkout
//   *             → closed      close(), or authentication / missing database
// =============================================================================

import { Pool } from 'pg';
import { describeConnection, toPoolOptions } from './connection-config';
import {
  AcquisitionCancelledError,
  ConnectionUnavailableError,
} from './errors';
import {
  AcquireOptions,
  ConnectionConfig,
  ConnectionHandle,
  DriverPool,
  PoolFactory,
  PoolState,
} from '../types/database';

// invalid_password, invalid_authorization_specification, invalid_catalog_name
const UNRECOVERABLE_CODES = new Set(['28P01', '28000', '3D000']);

export const createPgPool: PoolFactory = (options) => new Pool(options);

interface PoolEntry {
  pool: DriverPool;
  state: PoolState;
  endpoint: string;
}

function connectionKey(config: ConnectionConfig): string {
  return JSON.stringify([
    config.driverScheme,
    config.host,
    config.port,
    config.username,
    config.password,
    config.database,
  ]);
}

function isUnrecoverable(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err &&
    typeof err.code === 'string' && UNRECOVERABLE_CODES.has(err.code);
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class ConnectionManager {
  private readonly entries = new Map<string, PoolEntry>();
  private closed = false;

  constructor(private readonly createPool: PoolFactory = createPgPool) {}

  /** Lifecycle state of the shared pool serving `config`'s endpoint. */
  state(config: ConnectionConfig): PoolState {
    if (this.closed) return 'closed';
    return this.entries.get(connectionKey(config))?.state ?? 'uninitialized';
  }

  /**
   * Check out a connection for `config`, run `work` with it, and release it.
   *
   * Rejects with ConnectionUnavailableError when the endpoint cannot be
   * reached, authentication fails, or the pool is closed, and with
   * AcquisitionCancelledError when `options.signal` aborts first. Errors
   * thrown by `work` propagate unchanged. Nothing is retried.
   */
  async acquireConnection<T>(
    config: ConnectionConfig,
    work: (handle: ConnectionHandle) => Promise<T>,
    options: AcquireOptions = {}
  ): Promise<T> {
    const { signal } = options;
    if (signal?.aborted) {
      throw new AcquisitionCancelledError(
        `Acquisition for ${describeConnection(config)} cancelled before checkout`
      );
    }

    const entry = this.entryFor(config);
    const handle = await this.checkout(entry, signal);
    let result: T;
    try {
      result = await work(handle);
    } catch (err) {
      // pg discards a client released with an error instead of pooling it
      handle.release(err instanceof Error ? err : true);
      throw err;
    }
    handle.release();
    return result;
  }

  /** End every pool. Later acquisitions fail; calling again is a no-op. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    const open = [...this.entries.values()].filter((entry) => entry.state !== 'closed');
    for (const entry of open) entry.state = 'closed';

    await Promise.all(open.map(async (entry) => {
      await entry.pool.end();
      console.log(`[DB] Pool closed for ${entry.endpoint}`);
    }));
  }

  private entryFor(config: ConnectionConfig): PoolEntry {
    const endpoint = describeConnection(config);
    if (this.closed) {
      throw new ConnectionUnavailableError(`Connection pool is closed; cannot connect to ${endpoint}`);
    }

    const key = connectionKey(config);
    const existing = this.entries.get(key);
    if (existing) {
      if (existing.state === 'closed') {
        throw new ConnectionUnavailableError(
          `Connection pool for ${endpoint} was closed after an unrecoverable failure`
        );
      }
      return existing;
    }

    const pool = this.createPool(toPoolOptions(config));
    pool.on('error', (err) => {
      console.error(`[DB] Unexpected pool error (${endpoint}):`, err.message);
    });

    const entry: PoolEntry = { pool, state: 'acquiring', endpoint };
    this.entries.set(key, entry);
    return entry;
  }

  private checkout(entry: PoolEntry, signal?: AbortSignal): Promise<ConnectionHandle> {
    const pending = entry.pool.connect();

    return new Promise<ConnectionHandle>((resolve, reject) => {
      let abandoned = false;

      const onAbort = () => {
        abandoned = true;
        reject(new AcquisitionCancelledError(
          `Acquisition for ${entry.endpoint} cancelled while waiting for a connection`
        ));
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      pending.then(
        (handle) => {
          signal?.removeEventListener('abort', onAbort);
          if (abandoned || entry.state === 'closed') {
            handle.release();
            if (!abandoned) {
              reject(new ConnectionUnavailableError(`Connection pool for ${entry.endpoint} is closed`));
            }
            return;
          }
          if (entry.state === 'acquiring') entry.state = 'ready';
          resolve(handle);
        },
        (err: unknown) => {
          signal?.removeEventListener('abort', onAbort);
          const failure = this.connectFailed(entry, err);
          if (abandoned) {
            console.warn(`[DB] Cancelled checkout also failed: ${failure.message}`);
            return;
          }
          reject(failure);
        }
      );
    });
  }

  private connectFailed(entry: PoolEntry, err: unknown): ConnectionUnavailableError {
    const failure = new ConnectionUnavailableError(
      `Cannot connect to ${entry.endpoint}: ${messageOf(err)}`,
      { cause: err }
    );

    if (isUnrecoverable(err) && entry.state !== 'closed') {
      entry.state = 'closed';
      console.error(`[DB] Unrecoverable connection failure, closing pool for ${entry.endpoint}`);
      entry.pool.end().catch((endErr: unknown) => {
        console.error(`[DB] Failed to end pool for ${entry.endpoint}:`, messageOf(endErr));
      });
    }

    return failure;
  }
}
