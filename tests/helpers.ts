// =============================================================================
// AGENT TEST PLATFORM — Test Helpers
//
// Starts the Express app in-process on an ephemeral port and talks to it with
// fetch, the same way a probe or client would.
// =============================================================================

import { createApp } from '../src/app';
import { AppConfig, loadConfig } from '../src/config';
import { ConnectionManager } from '../src/db/pool';
import { FakeDriver } from './fake-driver';

export interface TestServer {
  baseUrl: string;
  driver: FakeDriver;
  connections: ConnectionManager;
  close(): Promise<void>;
}

/** Start the app against a fresh fake driver. */
export function startTestServer(config: AppConfig = loadConfig({})): Promise<TestServer> {
  const driver = new FakeDriver();
  const connections = new ConnectionManager(driver.factory);
  const app = createApp(config, connections);

  return new Promise((resolve, reject) => {
    const server = app.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (!address || typeof address === 'string') {
        reject(new Error(`Unexpected server address: ${String(address)}`));
        return;
      }
      resolve({
        baseUrl: `http://127.0.0.1:${address.port}`,
        driver,
        connections,
        close: async () => {
          server.closeAllConnections();
          await new Promise<void>((done, fail) => server.close((err) => (err ? fail(err) : done())));
          await connections.close();
        },
      });
    });
    server.once('error', reject);
  });
}

/**
 * Make a request to the test server.
 * Returns the raw Response object for flexible assertion.
 */
export async function api(
  server: TestServer,
  method: string,
  path: string,
  options: { body?: string; headers?: Record<string, string> } = {},
): Promise<Response> {
  return fetch(`${server.baseUrl}${path}`, {
    method,
    headers: options.headers,
    body: options.body,
  });
}

/**
 * Parse JSON response with error context.
 */
export async function json(res: Response): Promise<unknown> {
  const text = await res.text();
  try {
    return JSON.parse(text);
  } catch {
    throw new Error(`Expected JSON but got: ${text.slice(0, 200)}`);
  }
}
