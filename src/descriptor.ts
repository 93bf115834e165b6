/**
 * BatchDB Query Descriptors — the deferred record of one enqueued query
 *
 * The response callback is lifted out of the caller's options so the
 * remaining options describe the query alone. Descriptors are frozen.
 */

import type {
  ColumnAsListDescriptor,
  EnqueueOptions,
  KeyField,
  RowAsMappingDescriptor,
  RowsAsListOfListsDescriptor,
  RowsAsListOfMappingsDescriptor,
} from './types.js';

function common(sql: string, binds: unknown[]): { sql: string; binds: readonly unknown[]; enqueuedAt: number } {
  return { sql, binds: Object.freeze([...binds]), enqueuedAt: Date.now() };
}

export function rowAsMapping(
  sql: string,
  options: EnqueueOptions<'rowAsMapping'>,
  binds: unknown[],
): RowAsMappingDescriptor {
  const { response, ...extra } = options;
  const descriptor: RowAsMappingDescriptor = {
    mode: 'rowAsMapping',
    ...common(sql, binds),
    options: Object.freeze(extra),
    response,
  };
  return Object.freeze(descriptor);
}

export function columnAsList(
  sql: string,
  options: EnqueueOptions<'columnAsList'>,
  binds: unknown[],
): ColumnAsListDescriptor {
  const { response, ...extra } = options;
  const descriptor: ColumnAsListDescriptor = {
    mode: 'columnAsList',
    ...common(sql, binds),
    options: Object.freeze(extra),
    response,
  };
  return Object.freeze(descriptor);
}

export function rowsAsListOfMappings(
  sql: string,
  keyField: KeyField,
  options: EnqueueOptions<'rowsAsListOfMappings'>,
  binds: unknown[],
): RowsAsListOfMappingsDescriptor {
  const { response, ...extra } = options;
  const descriptor: RowsAsListOfMappingsDescriptor = {
    mode: 'rowsAsListOfMappings',
    keyField,
    ...common(sql, binds),
    options: Object.freeze(extra),
    response,
  };
  return Object.freeze(descriptor);
}

export function rowsAsListOfLists(
  sql: string,
  options: EnqueueOptions<'rowsAsListOfLists'>,
  binds: unknown[],
): RowsAsListOfListsDescriptor {
  const { response, ...extra } = options;
  const descriptor: RowsAsListOfListsDescriptor = {
    mode: 'rowsAsListOfLists',
    ...common(sql, binds),
    options: Object.freeze(extra),
    response,
  };
  return Object.freeze(descriptor);
}
