/**
 * BatchDB PostgreSQL Driver
 *
 * One pg.Client per connection, so every query of a batch runs on its
 * own backend session. Rows are fetched in array mode and named
 * afterwards by the shaping step.
 */

import pg from 'pg';
import type { Client, ClientConfig } from 'pg';
import type { ConnectOptions, Driver, DriverConnection, RawResult } from '../types.js';

export class PgConnection implements DriverConnection {
  private client: Client;

  constructor(client: Client) {
    this.client = client;
  }

  async query(sql: string, params: unknown[]): Promise<RawResult> {
    const result = await this.client.query({ text: sql, values: params, rowMode: 'array' });
    return {
      columns: result.fields.map(f => f.name),
      rows: result.rows,
    };
  }

  async close(): Promise<void> {
    await this.client.end();
  }

  raw(): Client {
    return this.client;
  }
}

export class PgDriver implements Driver {
  readonly name = 'pg' as const;

  async connect(options: ConnectOptions, onError: (err: unknown) => void): Promise<DriverConnection> {
    const config: ClientConfig = {};
    Object.assign(config, options.driverOptions, { connectionString: options.uri });
    if (options.username !== undefined) config.user = options.username;
    if (options.password !== undefined) config.password = options.password;

    const client = new pg.Client(config);
    client.on('error', onError);
    await client.connect();
    return new PgConnection(client);
  }
}
