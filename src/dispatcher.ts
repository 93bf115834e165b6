/**
 * BatchDB Batch Dispatcher — fan-out / fan-in for one batch
 *
 * Descriptor i runs on pool slot i. Every query is submitted before any
 * result is handled; results are shaped and handed to callbacks in driver
 * completion order. With a connection cap, descriptors that share a slot
 * (i mod cap) run one after another on it.
 *
 * The batch fails as soon as one query, shaping step or callback fails.
 * Queries already in flight are left to settle, but no callback runs
 * after the failure.
 */

import { BatchDBError, connectionLostError, mapDriverError } from './errors.js';
import { deliver } from './shaping.js';
import type { BatchDBLogger } from './logger.js';
import type { ConnectionPool, PooledConnection } from './pool.js';
import type { CompletionTracker } from './tracker.js';
import type { DriverName, QueryDescriptor } from './types.js';

export interface DispatchContext {
  batchId: number;
  pool: ConnectionPool;
  tracker: CompletionTracker;
  logger: BatchDBLogger;
  driver: DriverName;
  maxConnections: number | null;
  timeoutMs: number | null;
  callSite?: string;
}

/** How many pool slots a batch of `count` descriptors occupies. */
export function batchWidth(count: number, maxConnections: number | null): number {
  return maxConnections === null ? count : Math.min(count, maxConnections);
}

/**
 * Submit every descriptor and return a promise that resolves when all of
 * them completed, or rejects on the first failure.
 */
export function dispatchBatch(descriptors: QueryDescriptor[], ctx: DispatchContext): Promise<void> {
  const { tracker } = ctx;
  const width = batchWidth(descriptors.length, ctx.maxConnections);
  // runQuery never rejects, so lane tails only order queries that share a slot
  const lanes: Array<Promise<void>> = [];

  descriptors.forEach((descriptor, i) => {
    const lane = i % width;
    const slot = ctx.pool.at(lane);
    tracker.begin();

    const previous = lanes[lane];
    lanes[lane] = previous
      ? previous.then(() => runQuery(descriptor, slot, ctx))
      : runQuery(descriptor, slot, ctx);
  });

  return withTimeout(tracker.wait(), ctx);
}

async function runQuery(descriptor: QueryDescriptor, slot: PooledConnection, ctx: DispatchContext): Promise<void> {
  const { tracker } = ctx;
  const started = Date.now();
  try {
    // a lane behind a failed query does not fire the rest of its queue
    if (tracker.failed) return;
    if (!slot.valid) {
      tracker.fail(connectionLostError(ctx.driver, slot.error, slot.index, ctx.callSite));
      return;
    }

    const raw = await slot.connection.query(descriptor.sql, [...descriptor.binds]);
    if (tracker.failed) return;

    ctx.logger.logQuery(ctx.batchId, descriptor.mode, descriptor.sql, Date.now() - started, slot.index);
    deliver(descriptor, raw, slot.connection, ctx.driver);
  } catch (err) {
    tracker.fail(mapDriverError(ctx.driver, err, {
      operation: 'executeBatch',
      sql: descriptor.sql,
      callSite: ctx.callSite,
    }));
  } finally {
    tracker.end();
  }
}

async function withTimeout(done: Promise<void>, ctx: DispatchContext): Promise<void> {
  const { timeoutMs } = ctx;
  if (timeoutMs === null) return done;

  const timer = setTimeout(() => {
    ctx.tracker.fail(new BatchDBError({
      code: 'TIMEOUT',
      message: `Batch ${ctx.batchId} did not complete within ${timeoutMs}ms (${ctx.tracker.pending} quer${ctx.tracker.pending === 1 ? 'y' : 'ies'} outstanding).`,
      fix: `Raise { timeoutMs }, or find the query that hangs; it is still running on its connection.`,
      driver: ctx.driver,
      operation: 'executeBatch',
      callSite: ctx.callSite,
    }));
  }, timeoutMs);

  try {
    await done;
  } finally {
    clearTimeout(timer);
  }
}
