/**
 * BatchDB — All shared types and interfaces
 *
 * This is the ONLY file every other file imports.
 * No circular dependencies. No file imports from a driver.
 */

// ─── Drivers ─────────────────────────────────────────────────────────────────

export type DriverName = 'pg' | 'sqlite' | 'custom';

/** Positional result as every driver reports it. */
export interface RawResult {
  columns: string[];
  rows: unknown[][];
}

/**
 * One live database session. Lent to exactly one in-flight query at a time.
 */
export interface DriverConnection {
  query(sql: string, params: unknown[]): Promise<RawResult>;
  close(): Promise<void>;
  /** Escape hatch to the native driver object. */
  raw(): unknown;
}

export interface ConnectOptions {
  uri: string;
  username?: string;
  password?: string;
  driverOptions: Record<string, unknown>;
}

export interface Driver {
  readonly name: DriverName;
  /**
   * Open a connection. `onError` fires for connection-level failures that
   * happen after the connection was established.
   */
  connect(options: ConnectOptions, onError: (err: unknown) => void): Promise<DriverConnection>;
}

// ─── Query Descriptors ───────────────────────────────────────────────────────

export type ShapingMode = 'rowAsMapping' | 'columnAsList' | 'rowsAsListOfMappings' | 'rowsAsListOfLists';

export type Row = Record<string, unknown>;

/** Column name, or 1-based column number. */
export type KeyField = string | number;

export type ResponseCallback<R> = (result: R, connection: DriverConnection) => void;

export interface ShapedResults {
  rowAsMapping: Row | undefined;
  columnAsList: unknown[];
  rowsAsListOfMappings: Record<string, Row>;
  rowsAsListOfLists: unknown[][];
}

export interface ColumnOptions {
  /** 1-based column numbers to collect. Defaults to the first column. */
  columns?: number[];
}

export interface RowsOptions {
  maxRows?: number;
}

export interface ExtraOptions {
  rowAsMapping: Record<string, unknown>;
  columnAsList: ColumnOptions;
  rowsAsListOfMappings: Record<string, unknown>;
  rowsAsListOfLists: RowsOptions;
}

export type EnqueueOptions<M extends ShapingMode> = ExtraOptions[M] & {
  response: ResponseCallback<ShapedResults[M]>;
};

export interface DescriptorBase<M extends ShapingMode> {
  readonly mode: M;
  readonly sql: string;
  readonly binds: readonly unknown[];
  readonly options: Readonly<ExtraOptions[M]>;
  readonly response: ResponseCallback<ShapedResults[M]>;
  readonly enqueuedAt: number;
}

export type RowAsMappingDescriptor = DescriptorBase<'rowAsMapping'>;
export type ColumnAsListDescriptor = DescriptorBase<'columnAsList'>;
export type RowsAsListOfListsDescriptor = DescriptorBase<'rowsAsListOfLists'>;
export interface RowsAsListOfMappingsDescriptor extends DescriptorBase<'rowsAsListOfMappings'> {
  readonly keyField: KeyField;
}

export type QueryDescriptor =
  | RowAsMappingDescriptor
  | ColumnAsListDescriptor
  | RowsAsListOfMappingsDescriptor
  | RowsAsListOfListsDescriptor;

// ─── Batch Receipt ───────────────────────────────────────────────────────────

export interface BatchReceipt {
  batchId: number;
  success: boolean;
  queued: number;
  completed: number;
  failed: number;
  poolSize: number;
  connectionsCreated: number;
  duration: number;
  driver: DriverName;
}

// ─── Error Codes ─────────────────────────────────────────────────────────────

export type BatchErrorCode =
  | 'CONNECTION_FAILED'
  | 'CONNECTION_LOST'
  | 'AUTHENTICATION_FAILED'
  | 'TIMEOUT'
  | 'TABLE_NOT_FOUND'
  | 'QUERY_ERROR'
  | 'USAGE_ERROR'
  | 'CALLBACK_FAILED'
  | 'BATCH_IN_PROGRESS'
  | 'GUARDRAIL_BLOCKED'
  | 'CONFIG_INVALID'
  | 'CLIENT_CLOSED'
  | 'UNSUPPORTED_DRIVER'
  | 'INTERNAL_ERROR';

// ─── Event Types ─────────────────────────────────────────────────────────────

export interface BatchDBEvents {
  /** index is -1 for a connection opened by rawConnection(). */
  connected: { driver: DriverName; index: number; label: string };
  'pool-grown': { from: number; to: number; reconnected: number };
  query: { batchId: number; mode: ShapingMode; sql: string; durationMs: number; connection: number };
  batch: { batchId: number; durationMs: number; receipt: BatchReceipt };
  'slow-query': { batchId: number; sql: string; durationMs: number; threshold: number };
  'queue-cleared': { discarded: number; reason: 'cancelled' | 'connection-error' | 'batch-failed' };
  'guardrail-blocked': { sql: string; reason: string };
  error: { code: BatchErrorCode; message: string; fix: string; driver: DriverName };
  closed: { connections: number };
}

// ─── Connection Status ───────────────────────────────────────────────────────

export interface ClientStatus {
  state: 'open' | 'closed';
  driver: DriverName;
  uri: string;
  label: string;
  queueLength: number;
  batchInProgress: boolean;
  batchesRun: number;
  pool: { size: number; valid: number; max: number | null };
}
