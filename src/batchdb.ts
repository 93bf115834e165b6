/**
 * BatchDB — Deferred, parallel read batches
 *
 * Queries are enqueued with a response callback and nothing runs until
 * executeBatch(). A batch flows through:
 *
 *   enqueue* → queue
 *   executeBatch()
 *     → acquire pool (one batch at a time)
 *     → pre-flight (usage checks, guardrails)
 *     → drain queue
 *     → grow pool to the batch width
 *     → dispatcher (fan out, shape, callback, fan in)
 *     → receipt + logger (emit event)
 *     → return to caller
 */

import type {
  BatchDBEvents,
  BatchReceipt,
  ClientStatus,
  Driver,
  DriverConnection,
  EnqueueOptions,
  KeyField,
} from './types.js';
import { BatchDBError, captureCallSite, connectionLostError, mapDriverError } from './errors.js';
import { BatchDBEventEmitter } from './events.js';
import { BatchDBLogger } from './logger.js';
import { createReceipt } from './receipts.js';
import { resolveConfig } from './config.js';
import type { BatchDBOptions, ResolvedConfig } from './config.js';
import { checkGuardrails } from './guardrails.js';
import { QueryQueue } from './queue.js';
import * as descriptors from './descriptor.js';
import { checkDescriptor } from './shaping.js';
import { ConnectionPool } from './pool.js';
import { CompletionTracker } from './tracker.js';
import { batchWidth, dispatchBatch } from './dispatcher.js';
import { redactUri, resolveDriver } from './drivers/resolve.js';

interface ActiveBatch {
  tracker: CompletionTracker;
  callSite?: string;
}

export class BatchDB {
  private config: ResolvedConfig;
  private driver: Driver;
  private pool: ConnectionPool;
  private ownsPool: boolean;
  private queue = new QueryQueue();
  private emitter = new BatchDBEventEmitter();
  private logger: BatchDBLogger;
  private activeBatch: ActiveBatch | null = null;
  private batchesRun = 0;
  private closed = false;
  private unsubscribe: () => void;

  /**
   * No I/O happens here; connections are opened by the first batch that
   * needs them, or by rawConnection().
   */
  constructor(uri: string, username?: string, password?: string, options: BatchDBOptions = {}) {
    this.config = resolveConfig(uri, username, password, options);
    this.driver = resolveDriver(this.config.uri, this.config.driver);
    this.logger = new BatchDBLogger(
      {
        enabled: this.config.logging.enabled,
        verbose: this.config.logging.verbose,
        slowQueryMs: this.config.slowQueryMs,
      },
      this.emitter,
    );

    this.ownsPool = this.config.pool === undefined;
    this.pool = this.config.pool ?? new ConnectionPool(this.driver, {
      uri: this.config.uri,
      username: this.config.username,
      password: this.config.password,
      driverOptions: this.config.driverOptions,
    });
    this.unsubscribe = this.pool.onConnectionError((err, index) => this.handleConnectionError(err, index));
  }

  // ─── Enqueue Operations ────────────────────────────────────────────────────

  enqueueRowAsMapping(sql: string, options: EnqueueOptions<'rowAsMapping'>, ...binds: unknown[]): this {
    this.queue.push(descriptors.rowAsMapping(sql, options, binds));
    return this;
  }

  enqueueColumnAsList(sql: string, options: EnqueueOptions<'columnAsList'>, ...binds: unknown[]): this {
    this.queue.push(descriptors.columnAsList(sql, options, binds));
    return this;
  }

  enqueueRowsAsListOfMappings(
    sql: string,
    keyField: KeyField,
    options: EnqueueOptions<'rowsAsListOfMappings'>,
    ...binds: unknown[]
  ): this {
    this.queue.push(descriptors.rowsAsListOfMappings(sql, keyField, options, binds));
    return this;
  }

  enqueueRowsAsListOfLists(sql: string, options: EnqueueOptions<'rowsAsListOfLists'>, ...binds: unknown[]): this {
    this.queue.push(descriptors.rowsAsListOfLists(sql, options, binds));
    return this;
  }

  get queueLength(): number {
    return this.queue.length;
  }

  get poolSize(): number {
    return this.pool.size;
  }

  // ─── Batch Execution ───────────────────────────────────────────────────────

  /**
   * Run every queued query concurrently and resolve once all callbacks
   * have run. Rejects with the first failure; the queue is empty either way.
   */
  async executeBatch(): Promise<BatchReceipt> {
    const callSite = captureCallSite();
    const startTime = Date.now();
    this.assertOpen();

    if (this.queue.length === 0) {
      return createReceipt({
        batchId: 0,
        driver: this.driver.name,
        startTime,
        poolSize: this.pool.size,
      });
    }

    const release = this.pool.acquire();
    const batchId = ++this.batchesRun;
    const tracker = new CompletionTracker();
    const batch = this.queue.drain();
    this.activeBatch = { tracker, callSite };
    let connectionsCreated = 0;

    try {
      for (const descriptor of batch) {
        checkDescriptor(descriptor, this.driver.name);
        checkGuardrails(
          { enabled: this.config.guardrails, emitter: this.emitter, driver: this.driver.name },
          descriptor.sql,
        );
      }

      const growth = await this.pool.ensureSize(batchWidth(batch.length, this.config.maxConnections));
      connectionsCreated = growth.created;
      if (growth.created > 0) {
        this.emitter.emit('pool-grown', { from: growth.from, to: growth.to, reconnected: growth.reconnected });
        for (const index of growth.opened) {
          this.emitter.emit('connected', { driver: this.driver.name, index, label: this.config.label });
        }
      }

      await dispatchBatch(batch, {
        batchId,
        pool: this.pool,
        tracker,
        logger: this.logger,
        driver: this.driver.name,
        maxConnections: this.config.maxConnections,
        timeoutMs: this.config.timeoutMs,
        callSite,
      });

      const receipt = createReceipt({
        batchId,
        driver: this.driver.name,
        startTime,
        queued: batch.length,
        completed: tracker.completed,
        poolSize: this.pool.size,
        connectionsCreated,
      });
      this.logger.logBatch(receipt);
      return receipt;
    } catch (err) {
      const error = mapDriverError(this.driver.name, err, { operation: 'executeBatch', callSite });
      this.discardQueue('batch-failed');
      this.emitter.emit('error', {
        code: error.code,
        message: error.message,
        fix: error.fix,
        driver: error.driver,
      });
      this.logger.logBatch(createReceipt({
        batchId,
        driver: this.driver.name,
        startTime,
        queued: batch.length,
        completed: tracker.completed,
        poolSize: this.pool.size,
        connectionsCreated,
        success: false,
      }));
      throw error;
    } finally {
      this.activeBatch = null;
      release();
    }
  }

  /**
   * Drop every query that has not been dispatched yet. Their callbacks never run.
   */
  cancelQueue(): void {
    this.discardQueue('cancelled');
  }

  // ─── Raw Access ────────────────────────────────────────────────────────────

  /**
   * One live connection outside the queue and the pool slots, e.g. for
   * schema setup. It is closed by close().
   */
  async rawConnection(): Promise<DriverConnection> {
    this.assertOpen();
    const connection = await this.pool.connectRaw();
    this.emitter.emit('connected', { driver: this.driver.name, index: -1, label: this.config.label });
    return connection;
  }

  // ─── Status ────────────────────────────────────────────────────────────────

  status(): ClientStatus {
    return {
      state: this.closed ? 'closed' : 'open',
      driver: this.driver.name,
      uri: redactUri(this.config.uri),
      label: this.config.label,
      queueLength: this.queue.length,
      batchInProgress: this.activeBatch !== null,
      batchesRun: this.batchesRun,
      pool: {
        size: this.pool.size,
        valid: this.pool.validCount,
        max: this.config.maxConnections,
      },
    };
  }

  // ─── Events ────────────────────────────────────────────────────────────────

  on<E extends keyof BatchDBEvents>(event: E, listener: (payload: BatchDBEvents[E]) => void): this {
    this.emitter.on(event, listener);
    return this;
  }

  once<E extends keyof BatchDBEvents>(event: E, listener: (payload: BatchDBEvents[E]) => void): this {
    this.emitter.once(event, listener);
    return this;
  }

  off<E extends keyof BatchDBEvents>(event: E, listener: (payload: BatchDBEvents[E]) => void): this {
    this.emitter.off(event, listener);
    return this;
  }

  // ─── Lifecycle ─────────────────────────────────────────────────────────────

  /**
   * Close the pool (unless it was injected) and every raw connection.
   * A running batch rejects with CLIENT_CLOSED.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.discardQueue('cancelled');
    this.unsubscribe();
    const running = this.activeBatch;
    if (running) {
      running.tracker.fail(new BatchDBError({
        code: 'CLIENT_CLOSED',
        message: `The client was closed while a batch was running.`,
        fix: `Await executeBatch() before calling close().`,
        driver: this.driver.name,
        operation: 'executeBatch',
        callSite: running.callSite,
      }));
    }

    const connections = this.ownsPool ? await this.pool.close() : 0;
    this.emitter.emit('closed', { connections });
  }

  // ─── Internals ─────────────────────────────────────────────────────────────

  /**
   * A pooled or raw connection failed outside a query: drop pending work,
   * then fail the running batch, or report through the error event when
   * no batch is running on the pool.
   */
  private handleConnectionError(err: unknown, index: number | null): void {
    // another client sharing the pool is running a batch; it owns the error
    if (!this.activeBatch && this.pool.inUse) return;

    const error = connectionLostError(this.driver.name, err, index, this.activeBatch?.callSite);
    this.discardQueue('connection-error');

    if (this.activeBatch) {
      this.activeBatch.tracker.fail(error);
      return;
    }
    this.emitter.emit('error', {
      code: error.code,
      message: error.message,
      fix: error.fix,
      driver: error.driver,
    });
  }

  private discardQueue(reason: BatchDBEvents['queue-cleared']['reason']): void {
    const discarded = this.queue.clear();
    if (discarded > 0) {
      this.emitter.emit('queue-cleared', { discarded, reason });
    }
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new BatchDBError({
        code: 'CLIENT_CLOSED',
        message: `This client has been closed.`,
        fix: `Create a new BatchDB instance.`,
        driver: this.driver.name,
      });
    }
  }
}
