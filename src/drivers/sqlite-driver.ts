/**
 * BatchDB SQLite Driver
 *
 * One libSQL client per connection, each on its own handle to the same
 * database file. Statements run asynchronously, so the queries of a batch
 * overlap.
 */

import { createClient } from '@libsql/client';
import type { Client, Config, InValue } from '@libsql/client';
import type { ConnectOptions, Driver, DriverConnection, RawResult } from '../types.js';

function toInValue(value: unknown): InValue {
  if (value === null || value === undefined) return null;
  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'bigint' ||
    typeof value === 'boolean' ||
    value instanceof Uint8Array ||
    value instanceof Date
  ) {
    return value;
  }
  if (value instanceof ArrayBuffer) return new Uint8Array(value);
  return String(value);
}

export class SqliteConnection implements DriverConnection {
  private client: Client;

  constructor(client: Client) {
    this.client = client;
  }

  async query(sql: string, params: unknown[]): Promise<RawResult> {
    const result = await this.client.execute({ sql, args: params.map(toInValue) });
    const width = result.columns.length;
    return {
      columns: result.columns,
      rows: result.rows.map(row => Array.from({ length: width }, (_, i) => row[i])),
    };
  }

  async close(): Promise<void> {
    if (!this.client.closed) this.client.close();
  }

  raw(): Client {
    return this.client;
  }
}

export class SqliteDriver implements Driver {
  readonly name = 'sqlite' as const;

  // SQLite raises no errors outside of a statement, so onError never fires
  async connect(options: ConnectOptions, _onError: (err: unknown) => void): Promise<DriverConnection> {
    const config: Config = { url: libsqlUrl(options.uri) };
    Object.assign(config, options.driverOptions, { url: config.url });
    return new SqliteConnection(createClient(config));
  }
}

/**
 * "sqlite:/tmp/app.db", "sqlite:///tmp/app.db", "file:app.db" and
 * "sqlite::memory:" all map to a libSQL URL.
 */
export function libsqlUrl(uri: string): string {
  let rest = uri.replace(/^(sqlite|file):/, '');
  if (rest.startsWith('//')) rest = rest.slice(2);
  return rest === ':memory:' ? ':memory:' : `file:${rest}`;
}
