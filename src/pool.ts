/**
 * BatchDB Connection Pool — lazily grown, never shrinking
 *
 * Owned by one client, or created on its own and injected into several.
 * Slot i is lent to the i-th descriptor of a batch; nothing is checked in
 * or out. A connection that reports a connection-level error is marked
 * invalid and reopened in place on the next ensureSize().
 *
 * Only one batch may hold the pool at a time (acquire/release), which is
 * what keeps two in-flight queries off the same connection. When clients
 * share a pool, a connection error is reported to every listener; clients
 * other than the holder ignore it while a batch is running.
 */

import { BatchDBError, connectionLostError, mapDriverError } from './errors.js';
import { resolveDriver } from './drivers/resolve.js';
import type { ConnectOptions, Driver, DriverConnection, DriverName } from './types.js';

export class PooledConnection {
  readonly index: number;
  readonly connection: DriverConnection;
  valid = true;
  /** The connection-level error that invalidated this connection. */
  error: unknown = undefined;

  constructor(index: number, connection: DriverConnection) {
    this.index = index;
    this.connection = connection;
  }
}

export interface GrowthReport {
  from: number;
  to: number;
  created: number;
  reconnected: number;
  /** Slot indexes that received a new connection. */
  opened: number[];
}

/** `index` is null for connections opened outside the pool slots. */
export type ConnectionErrorListener = (err: unknown, index: number | null) => void;

export class ConnectionPool {
  private readonly driver: Driver;
  private readonly connectOptions: ConnectOptions;
  private slots: PooledConnection[] = [];
  private retired: DriverConnection[] = [];
  private standalone: DriverConnection[] = [];
  private listeners = new Set<ConnectionErrorListener>();
  private busy = false;
  private closed = false;

  constructor(driver: Driver, connectOptions: ConnectOptions) {
    this.driver = driver;
    this.connectOptions = connectOptions;
  }

  /**
   * Build a pool for a connection string, picking the driver from its scheme.
   */
  static fromUri(
    uri: string,
    username?: string,
    password?: string,
    driverOptions: Record<string, unknown> = {},
  ): ConnectionPool {
    return new ConnectionPool(resolveDriver(uri), { uri, username, password, driverOptions });
  }

  get driverName(): DriverName {
    return this.driver.name;
  }

  get size(): number {
    return this.slots.length;
  }

  get validCount(): number {
    return this.slots.filter(s => s.valid).length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get inUse(): boolean {
    return this.busy;
  }

  at(index: number): PooledConnection {
    const slot = this.slots[index];
    if (!slot) {
      throw new BatchDBError({
        code: 'INTERNAL_ERROR',
        message: `Pool slot ${index} requested but the pool holds ${this.slots.length} connection(s).`,
        fix: `Call ensureSize() before dispatching.`,
        driver: this.driver.name,
      });
    }
    return slot;
  }

  onConnectionError(listener: ConnectionErrorListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Reserve the pool for one batch. Returns the release function.
   */
  acquire(): () => void {
    this.assertOpen();
    if (this.busy) {
      throw new BatchDBError({
        code: 'BATCH_IN_PROGRESS',
        message: `A batch is already running on this connection pool.`,
        fix: `Await the running executeBatch() before starting another one.`,
        driver: this.driver.name,
        operation: 'executeBatch',
      });
    }
    this.busy = true;
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.busy = false;
    };
  }

  /**
   * Grow to at least `target` connections and reopen invalid ones.
   * All-or-nothing: if any connection fails to open, or drops before it
   * reaches its slot, the pool keeps its previous slots and the first
   * failure is thrown. A pool closed meanwhile closes what was opened.
   */
  async ensureSize(target: number): Promise<GrowthReport> {
    this.assertOpen();
    const from = this.slots.length;

    const indexes: number[] = [];
    this.slots.forEach(slot => {
      if (!slot.valid) indexes.push(slot.index);
    });
    const reconnected = indexes.length;
    for (let i = from; i < target; i++) indexes.push(i);

    if (indexes.length === 0) {
      return { from, to: from, created: 0, reconnected: 0, opened: [] };
    }

    const results = await Promise.allSettled(indexes.map(i => this.open(i)));
    const opened: PooledConnection[] = [];
    let failure: { reason: unknown } | undefined;
    for (const result of results) {
      if (result.status === 'fulfilled') opened.push(result.value);
      else failure ??= { reason: result.reason };
    }

    if (this.closed) {
      await Promise.allSettled(opened.map(p => p.connection.close()));
      throw this.closedError();
    }

    if (failure) {
      this.retired.push(...opened.map(p => p.connection));
      throw mapDriverError(this.driver.name, failure.reason, { operation: 'connect' });
    }

    const dropped = opened.find(p => !p.valid);
    if (dropped) {
      this.retired.push(...opened.map(p => p.connection));
      throw connectionLostError(this.driver.name, dropped.error, dropped.index);
    }

    for (const pooled of opened) {
      const previous = this.slots[pooled.index];
      if (previous) this.retired.push(previous.connection);
      this.slots[pooled.index] = pooled;
    }

    return { from, to: this.slots.length, created: opened.length, reconnected, opened: indexes };
  }

  /**
   * Open one connection outside the slots. It is closed with the pool.
   */
  async connectRaw(): Promise<DriverConnection> {
    this.assertOpen();
    let connection: DriverConnection;
    try {
      connection = await this.driver.connect(this.connectOptions, err => this.notify(err, null));
    } catch (err) {
      throw mapDriverError(this.driver.name, err, { operation: 'rawConnection' });
    }
    if (this.closed) {
      await connection.close();
      throw this.closedError();
    }
    this.standalone.push(connection);
    return connection;
  }

  async close(): Promise<number> {
    if (this.closed) return 0;
    this.closed = true;

    const connections = [
      ...this.slots.map(s => s.connection),
      ...this.retired,
      ...this.standalone,
    ];
    this.slots = [];
    this.retired = [];
    this.standalone = [];
    this.listeners.clear();

    const results = await Promise.allSettled(connections.map(c => c.close()));
    const failures = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');
    if (failures.length > 0) {
      throw new BatchDBError({
        code: 'INTERNAL_ERROR',
        message: `${failures.length} of ${connections.length} connection(s) failed to close.`,
        fix: `Check the original errors; the pool is closed either way.`,
        driver: this.driver.name,
        originalError: failures.map(f => f.reason),
        operation: 'close',
      });
    }
    return connections.length;
  }

  private async open(index: number): Promise<PooledConnection> {
    let pooled: PooledConnection | undefined;
    // errors reported while connect() is still pending
    const early: unknown[] = [];
    const connection = await this.driver.connect(this.connectOptions, err => {
      if (pooled) this.invalidate(pooled, err);
      else early.push(err);
    });
    pooled = new PooledConnection(index, connection);
    if (early.length > 0) {
      pooled.valid = false;
      pooled.error = early[0];
    }
    return pooled;
  }

  private invalidate(pooled: PooledConnection, err: unknown): void {
    if (!pooled.valid) return;
    pooled.valid = false;
    pooled.error = err;
    // a connection still being opened is checked by ensureSize()
    if (this.slots[pooled.index] === pooled) this.notify(err, pooled.index);
  }

  private notify(err: unknown, index: number | null): void {
    for (const listener of this.listeners) listener(err, index);
  }

  private assertOpen(): void {
    if (this.closed) throw this.closedError();
  }

  private closedError(): BatchDBError {
    return new BatchDBError({
      code: 'CLIENT_CLOSED',
      message: `The connection pool is closed.`,
      fix: `Create a new client; a closed one cannot run batches.`,
      driver: this.driver.name,
    });
  }
}
