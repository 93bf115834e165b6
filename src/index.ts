/**
 * BatchDB — Public API Entry Point
 *
 * Deferred, parallel read batches over pooled SQL connections.
 */

// Main class
export { BatchDB } from './batchdb.js';

// Pool (create one to share it between clients)
export { ConnectionPool, PooledConnection } from './pool.js';
export type { ConnectionErrorListener, GrowthReport } from './pool.js';

// Drivers
export { PgDriver, PgConnection } from './drivers/pg-driver.js';
export { SqliteDriver, SqliteConnection } from './drivers/sqlite-driver.js';
export { resolveDriver } from './drivers/resolve.js';

// Error class
export { BatchDBError } from './errors.js';

// Config
export type { BatchDBOptions } from './config.js';

// Types
export type {
  BatchDBEvents,
  BatchErrorCode,
  BatchReceipt,
  ClientStatus,
  ColumnOptions,
  ConnectOptions,
  Driver,
  DriverConnection,
  DriverName,
  EnqueueOptions,
  KeyField,
  QueryDescriptor,
  RawResult,
  ResponseCallback,
  Row,
  RowsOptions,
  ShapedResults,
  ShapingMode,
} from './types.js';
