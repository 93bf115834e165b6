/**
 * BatchDB Result Shaping — raw positional rows → the shape a callback asked for
 *
 * rowAsMapping          first row as { column: value }, undefined when empty
 * columnAsList          selected columns of every row, flattened row by row
 * rowsAsListOfMappings  every row keyed by one column: { [key]: row }
 * rowsAsListOfLists     every row as a positional array
 */

import { BatchDBError, usageError } from './errors.js';
import type {
  DriverConnection,
  DriverName,
  KeyField,
  QueryDescriptor,
  RawResult,
  Row,
} from './types.js';

// Object.fromEntries defines own properties, so "__proto__" stays a key
function toRow(columns: string[], values: unknown[]): Row {
  return Object.fromEntries(columns.map((name, i): [string, unknown] => [name, values[i]]));
}

export function shapeRowAsMapping(raw: RawResult): Row | undefined {
  const first = raw.rows[0];
  return first ? toRow(raw.columns, first) : undefined;
}

export function shapeColumnAsList(raw: RawResult, columns: number[], driver: DriverName, sql?: string): unknown[] {
  const width = raw.columns.length;
  for (const column of columns) {
    if (width > 0 && column > width) {
      throw usageError(
        driver,
        `Column ${column} requested but the query returns ${width} column(s).`,
        `Use 1-based column numbers between 1 and ${width} in { columns }.`,
        sql,
      );
    }
  }

  const values: unknown[] = [];
  for (const row of raw.rows) {
    for (const column of columns) {
      values.push(row[column - 1]);
    }
  }
  return values;
}

export function shapeRowsAsListOfMappings(
  raw: RawResult,
  keyField: KeyField,
  driver: DriverName,
  sql?: string,
): Record<string, Row> {
  const index = typeof keyField === 'number' ? keyField - 1 : raw.columns.indexOf(keyField);
  if (index < 0 || index >= raw.columns.length) {
    throw usageError(
      driver,
      `Key field "${keyField}" is not a column of the result (${raw.columns.join(', ') || 'no columns'}).`,
      `Pass a column name or a 1-based column number that the query selects.`,
      sql,
    );
  }

  return Object.fromEntries(
    raw.rows.map((values): [string, Row] => [String(values[index]), toRow(raw.columns, values)]),
  );
}

export function shapeRowsAsListOfLists(raw: RawResult, maxRows?: number): unknown[][] {
  return maxRows === undefined ? raw.rows : raw.rows.slice(0, maxRows);
}

// ─── Pre-flight ──────────────────────────────────────────────────────────────

/**
 * Usage checks that need no database. Run for every descriptor before a
 * batch creates connections or fires queries.
 */
export function checkDescriptor(descriptor: QueryDescriptor, driver: DriverName): void {
  switch (descriptor.mode) {
    case 'rowsAsListOfMappings': {
      const { keyField } = descriptor;
      const invalid = typeof keyField === 'number'
        ? !Number.isInteger(keyField) || keyField < 1
        : keyField.length === 0;
      if (invalid) {
        throw usageError(
          driver,
          `rowsAsListOfMappings needs a key field.`,
          `Pass the column to key rows by: enqueueRowsAsListOfMappings(sql, "id", { response })`,
          descriptor.sql,
        );
      }
      return;
    }
    case 'columnAsList': {
      const columns = descriptor.options.columns;
      if (columns && (columns.length === 0 || columns.some(c => !Number.isInteger(c) || c < 1))) {
        throw usageError(
          driver,
          `Invalid { columns } option: [${columns.join(', ')}].`,
          `List 1-based column numbers, e.g. { columns: [1, 2] }.`,
          descriptor.sql,
        );
      }
      return;
    }
    case 'rowsAsListOfLists': {
      const maxRows = descriptor.options.maxRows;
      if (maxRows !== undefined && (!Number.isInteger(maxRows) || maxRows < 0)) {
        throw usageError(
          driver,
          `Invalid { maxRows } option: ${maxRows}.`,
          `Pass a non-negative integer, or leave maxRows out.`,
          descriptor.sql,
        );
      }
      return;
    }
    case 'rowAsMapping':
      return;
  }
}

// ─── Delivery ────────────────────────────────────────────────────────────────

function respond(driver: DriverName, sql: string, invoke: () => void): void {
  try {
    invoke();
  } catch (err) {
    throw new BatchDBError({
      code: 'CALLBACK_FAILED',
      message: `Response callback threw: ${err instanceof Error ? err.message : String(err)}`,
      fix: `Handle errors inside the response callback; a throwing callback fails the whole batch.`,
      driver,
      originalError: err,
      operation: 'executeBatch',
      sql,
    });
  }
}

/**
 * Shape a raw result for its descriptor and hand it to the response callback.
 */
export function deliver(
  descriptor: QueryDescriptor,
  raw: RawResult,
  connection: DriverConnection,
  driver: DriverName,
): void {
  switch (descriptor.mode) {
    case 'rowAsMapping': {
      const shaped = shapeRowAsMapping(raw);
      const { response } = descriptor;
      respond(driver, descriptor.sql, () => response(shaped, connection));
      return;
    }
    case 'columnAsList': {
      const shaped = shapeColumnAsList(raw, descriptor.options.columns ?? [1], driver, descriptor.sql);
      const { response } = descriptor;
      respond(driver, descriptor.sql, () => response(shaped, connection));
      return;
    }
    case 'rowsAsListOfMappings': {
      const shaped = shapeRowsAsListOfMappings(raw, descriptor.keyField, driver, descriptor.sql);
      const { response } = descriptor;
      respond(driver, descriptor.sql, () => response(shaped, connection));
      return;
    }
    case 'rowsAsListOfLists': {
      const shaped = shapeRowsAsListOfLists(raw, descriptor.options.maxRows);
      const { response } = descriptor;
      respond(driver, descriptor.sql, () => response(shaped, connection));
      return;
    }
  }
}
