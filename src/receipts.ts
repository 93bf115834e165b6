/**
 * BatchDB Batch Receipts — Structured batch results
 *
 * Every executeBatch() resolves to a BatchReceipt. Never void.
 */

import type { BatchReceipt, DriverName } from './types.js';

export function createReceipt(opts: {
  batchId: number;
  driver: DriverName;
  startTime: number;
  queued?: number;
  completed?: number;
  poolSize?: number;
  connectionsCreated?: number;
  success?: boolean;
}): BatchReceipt {
  const queued = opts.queued ?? 0;
  const completed = opts.completed ?? 0;
  return {
    batchId: opts.batchId,
    success: opts.success ?? true,
    queued,
    completed,
    failed: queued - completed,
    poolSize: opts.poolSize ?? 0,
    connectionsCreated: opts.connectionsCreated ?? 0,
    duration: Date.now() - opts.startTime,
    driver: opts.driver,
  };
}
