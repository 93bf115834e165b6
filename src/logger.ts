/**
 * BatchDB Logger — Structured query and batch logging
 *
 * Emits query and batch events with timing, and flags slow queries.
 */

import type { BatchReceipt, ShapingMode } from './types.js';
import type { BatchDBEventEmitter } from './events.js';

export interface LoggerConfig {
  enabled: boolean;
  verbose: boolean;
  slowQueryMs: number;
}

export class BatchDBLogger {
  private config: LoggerConfig;
  private emitter: BatchDBEventEmitter;

  constructor(config: LoggerConfig, emitter: BatchDBEventEmitter) {
    this.config = config;
    this.emitter = emitter;
  }

  /**
   * Log one completed query of a batch. Per-query events are verbose only;
   * the slow-query check always runs while logging is on.
   */
  logQuery(batchId: number, mode: ShapingMode, sql: string, durationMs: number, connection: number): void {
    if (!this.config.enabled) return;

    if (this.config.verbose) {
      this.emitter.emit('query', { batchId, mode, sql, durationMs, connection });
    }

    if (durationMs >= this.config.slowQueryMs) {
      this.emitter.emit('slow-query', {
        batchId,
        sql,
        durationMs,
        threshold: this.config.slowQueryMs,
      });
    }
  }

  logBatch(receipt: BatchReceipt): void {
    if (!this.config.enabled) return;

    this.emitter.emit('batch', {
      batchId: receipt.batchId,
      durationMs: receipt.duration,
      receipt,
    });
  }
}
