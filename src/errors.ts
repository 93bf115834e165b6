/**
 * BatchDB Error System — Normalized errors with fix instructions
 *
 * Driver errors are caught, normalized into BatchDBError instances, and
 * carry a fix hint plus the call site of the batch that failed.
 */

import type { BatchErrorCode, DriverName } from './types.js';

// ─── BatchDBError ────────────────────────────────────────────────────────────

export class BatchDBError extends Error {
  readonly code: BatchErrorCode;
  readonly driver: DriverName;
  readonly originalError: unknown;
  readonly operation?: string;
  readonly sql?: string;
  readonly callSite?: string;
  readonly retryable: boolean;
  readonly timestamp: Date;
  readonly fix: string;

  constructor(opts: {
    code: BatchErrorCode;
    message: string;
    fix: string;
    driver: DriverName;
    originalError?: unknown;
    operation?: string;
    sql?: string;
    callSite?: string;
    retryable?: boolean;
  }) {
    const at = opts.callSite ? ` at ${opts.callSite}` : '';
    super(`${opts.message}${at} Fix: ${opts.fix}`);
    this.name = 'BatchDBError';
    this.code = opts.code;
    this.driver = opts.driver;
    this.originalError = opts.originalError;
    this.operation = opts.operation;
    this.sql = opts.sql;
    this.callSite = opts.callSite;
    this.retryable = opts.retryable ?? ERROR_RETRYABLE[opts.code];
    this.timestamp = new Date();
    this.fix = opts.fix;
  }
}

// ─── Error Code Metadata ─────────────────────────────────────────────────────

export const ERROR_RETRYABLE: Record<BatchErrorCode, boolean> = {
  CONNECTION_FAILED: true,
  CONNECTION_LOST: true,
  AUTHENTICATION_FAILED: false,
  TIMEOUT: true,
  TABLE_NOT_FOUND: false,
  QUERY_ERROR: false,
  USAGE_ERROR: false,
  CALLBACK_FAILED: false,
  BATCH_IN_PROGRESS: true,
  GUARDRAIL_BLOCKED: false,
  CONFIG_INVALID: false,
  CLIENT_CLOSED: false,
  UNSUPPORTED_DRIVER: false,
  INTERNAL_ERROR: false,
};

export interface ErrorContext {
  operation?: string;
  sql?: string;
  callSite?: string;
}

function readField(err: unknown, field: string): unknown {
  if (typeof err !== 'object' || err === null) return undefined;
  return field in err ? Reflect.get(err, field) : undefined;
}

/** Driver message text, whatever shape the driver threw. */
export function errorText(err: unknown): string {
  if (err instanceof Error) return err.message;
  const message = readField(err, 'message');
  return typeof message === 'string' ? message : String(err);
}

// ─── PostgreSQL Error Mapping ────────────────────────────────────────────────

export function mapPgError(err: unknown, ctx: ErrorContext = {}): BatchDBError {
  const rawCode = readField(err, 'code');
  const code = typeof rawCode === 'string' ? rawCode : '';
  const message = errorText(err);
  const base = { driver: 'pg' as const, originalError: err, ...ctx };

  if (code === 'ECONNREFUSED' || message.includes('ECONNREFUSED') || message.includes('getaddrinfo ENOTFOUND')) {
    return new BatchDBError({
      ...base,
      code: 'CONNECTION_FAILED',
      message: `Cannot connect to PostgreSQL: ${message}`,
      fix: `Verify the connection string and that the database server is running.`,
    });
  }

  if (code === '28P01' || code === '28000' || message.includes('password authentication failed')) {
    return new BatchDBError({
      ...base,
      code: 'AUTHENTICATION_FAILED',
      message: `PostgreSQL authentication failed: ${message}`,
      fix: `Check the username and password passed to the client.`,
    });
  }

  // 57014 query_canceled (statement timeout)
  if (code === '57014' || message.includes('canceling statement due to statement timeout')) {
    return new BatchDBError({
      ...base,
      code: 'TIMEOUT',
      message: `PostgreSQL query timed out: ${message}`,
      fix: `Narrow the query, add an index, or raise statement_timeout in driverOptions.`,
    });
  }

  if (code === '42P01') {
    return new BatchDBError({
      ...base,
      code: 'TABLE_NOT_FOUND',
      message: `PostgreSQL error: ${message}`,
      fix: `Create the table first, or check the table name in the query.`,
    });
  }

  if (code === '57P01' || message.includes('Connection terminated')) {
    return new BatchDBError({
      ...base,
      code: 'CONNECTION_LOST',
      message: `PostgreSQL connection lost: ${message}`,
      fix: `The connection was dropped by the server. Run the batch again; the pool reconnects the slot.`,
    });
  }

  return new BatchDBError({
    ...base,
    code: 'QUERY_ERROR',
    message: `PostgreSQL error: ${message}`,
    fix: `Check the SQL text and the number of bind arguments.`,
  });
}

// ─── SQLite Error Mapping ────────────────────────────────────────────────────

export function mapSqliteError(err: unknown, ctx: ErrorContext = {}): BatchDBError {
  const rawCode = readField(err, 'code');
  const code = typeof rawCode === 'string' ? rawCode : '';
  const message = errorText(err);
  const base = { driver: 'sqlite' as const, originalError: err, ...ctx };

  if (code === 'SQLITE_CANTOPEN' || message.includes('unable to open database') || message.includes('directory does not exist')) {
    return new BatchDBError({
      ...base,
      code: 'CONNECTION_FAILED',
      message: `Cannot open SQLite database: ${message}`,
      fix: `Check the database file path in the connection string.`,
    });
  }

  if (code === 'SQLITE_BUSY' || code === 'SQLITE_LOCKED') {
    return new BatchDBError({
      ...base,
      code: 'TIMEOUT',
      message: `SQLite database is locked: ${message}`,
      fix: `Raise the busy timeout with driverOptions { timeout }, or avoid long-running writers.`,
    });
  }

  if (message.includes('no such table')) {
    return new BatchDBError({
      ...base,
      code: 'TABLE_NOT_FOUND',
      message: `SQLite error: ${message}`,
      fix: `Create the table first, or check the table name in the query.`,
    });
  }

  return new BatchDBError({
    ...base,
    code: 'QUERY_ERROR',
    message: `SQLite error: ${message}`,
    fix: `Check the SQL text and the number of bind arguments.`,
  });
}

// ─── Generic Error Mapper ────────────────────────────────────────────────────

export function mapDriverError(driver: DriverName, err: unknown, ctx: ErrorContext = {}): BatchDBError {
  if (err instanceof BatchDBError) return err;

  switch (driver) {
    case 'pg':
      return mapPgError(err, ctx);
    case 'sqlite':
      return mapSqliteError(err, ctx);
    case 'custom': {
      const connecting = ctx.operation === 'connect' || ctx.operation === 'rawConnection';
      return new BatchDBError({
        code: connecting ? 'CONNECTION_FAILED' : 'QUERY_ERROR',
        message: `Driver error: ${errorText(err)}`,
        fix: connecting
          ? `Check the connection string and credentials passed to the client.`
          : `Check the original error for details.`,
        driver,
        originalError: err,
        ...ctx,
      });
    }
  }
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

/** `slot` is the pool slot of the failed connection, null outside the pool. */
export function connectionLostError(
  driver: DriverName,
  err: unknown,
  slot: number | null,
  callSite?: string,
): BatchDBError {
  const where = slot === null ? '' : ` on pool slot ${slot}`;
  return new BatchDBError({
    code: 'CONNECTION_LOST',
    message: `Connection error${where}: ${errorText(err)}.`,
    fix: `The pending queue was cleared. Re-enqueue the queries and run the batch again.`,
    driver,
    originalError: err,
    operation: 'executeBatch',
    callSite,
  });
}

export function usageError(driver: DriverName, message: string, fix: string, sql?: string): BatchDBError {
  return new BatchDBError({ code: 'USAGE_ERROR', message, fix, driver, sql, operation: 'executeBatch' });
}

/**
 * First stack frame outside this library, as "file:line:column".
 */
export function captureCallSite(): string | undefined {
  const stack = new Error().stack;
  if (!stack) return undefined;

  for (const line of stack.split('\n').slice(1)) {
    if (isLibraryFrame(line)) continue;
    const match = line.match(/\(?([^()\s]+:\d+:\d+)\)?\s*$/);
    if (match?.[1]) return match[1];
  }
  return undefined;
}

const LIBRARY_FILES = ['batchdb.ts', 'errors.ts', 'dispatcher.ts', 'batchdb.js', 'errors.js', 'dispatcher.js'];

function isLibraryFrame(line: string): boolean {
  return LIBRARY_FILES.some(file => line.includes(`/src/${file}:`) || line.includes(`/dist/${file}:`));
}
