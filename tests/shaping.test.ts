/**
 * Result Shaping Tests
 */

import { describe, it, expect, vi } from 'vitest';
import {
  checkDescriptor,
  deliver,
  shapeColumnAsList,
  shapeRowAsMapping,
  shapeRowsAsListOfLists,
  shapeRowsAsListOfMappings,
} from '../src/shaping.js';
import { columnAsList, rowAsMapping, rowsAsListOfLists, rowsAsListOfMappings } from '../src/descriptor.js';
import { BatchDBError } from '../src/errors.js';
import type { DriverConnection, RawResult } from '../src/types.js';

const raw: RawResult = {
  columns: ['id', 'name', 'score'],
  rows: [
    [1, 'ann', 10],
    [2, 'bob', 20],
    [3, 'cy', 30],
  ],
};

const empty: RawResult = { columns: ['id', 'name', 'score'], rows: [] };

const connection: DriverConnection = {
  query: async () => ({ columns: [], rows: [] }),
  close: async () => undefined,
  raw: () => null,
};

function thrown(run: () => unknown): BatchDBError {
  try {
    run();
  } catch (err) {
    if (err instanceof BatchDBError) return err;
    throw err;
  }
  throw new Error('expected a BatchDBError');
}

describe('shapeRowAsMapping', () => {
  it('names the first row', () => {
    expect(shapeRowAsMapping(raw)).toEqual({ id: 1, name: 'ann', score: 10 });
  });

  it('is undefined for an empty result', () => {
    expect(shapeRowAsMapping(empty)).toBeUndefined();
  });

  it('keeps a column named "__proto__"', () => {
    const row = shapeRowAsMapping({ columns: ['__proto__', 'id'], rows: [['x', 1]] });

    expect(Object.keys(row ?? {})).toEqual(['__proto__', 'id']);
    expect(Object.getPrototypeOf(row)).toBe(Object.prototype);
  });
});

describe('shapeColumnAsList', () => {
  it('collects one column', () => {
    expect(shapeColumnAsList(raw, [1], 'sqlite')).toEqual([1, 2, 3]);
  });

  it('flattens several columns row by row', () => {
    expect(shapeColumnAsList(raw, [2, 3], 'sqlite')).toEqual(['ann', 10, 'bob', 20, 'cy', 30]);
  });

  it('is empty for an empty result', () => {
    expect(shapeColumnAsList(empty, [1], 'sqlite')).toEqual([]);
  });

  it('rejects a column beyond the result width', () => {
    const err = thrown(() => shapeColumnAsList(raw, [4], 'pg', 'select id, name, score from t'));
    expect(err.code).toBe('USAGE_ERROR');
    expect(err.sql).toBe('select id, name, score from t');
    expect(err.message).toContain('Column 4 requested but the query returns 3 column(s).');
  });
});

describe('shapeRowsAsListOfMappings', () => {
  it('keys rows by column name', () => {
    expect(shapeRowsAsListOfMappings(raw, 'name', 'pg')).toEqual({
      ann: { id: 1, name: 'ann', score: 10 },
      bob: { id: 2, name: 'bob', score: 20 },
      cy: { id: 3, name: 'cy', score: 30 },
    });
  });

  it('keys rows by 1-based column number', () => {
    expect(Object.keys(shapeRowsAsListOfMappings(raw, 1, 'pg'))).toEqual(['1', '2', '3']);
  });

  it('lets a later row win on a duplicate key', () => {
    const dupes: RawResult = { columns: ['k', 'v'], rows: [[1, 'a'], [1, 'b']] };
    expect(shapeRowsAsListOfMappings(dupes, 'k', 'pg')).toEqual({ 1: { k: 1, v: 'b' } });
  });

  it('keeps a "__proto__" key as an entry', () => {
    const rows: RawResult = { columns: ['k', 'v'], rows: [['__proto__', 1], ['a', 2]] };
    const keyed = shapeRowsAsListOfMappings(rows, 'k', 'pg');

    expect(Object.keys(keyed)).toEqual(['__proto__', 'a']);
    expect(Object.getOwnPropertyDescriptor(keyed, '__proto__')?.value).toEqual({ k: '__proto__', v: 1 });
    expect(Object.getPrototypeOf(keyed)).toBe(Object.prototype);
  });

  it('rejects a key that is not a column', () => {
    const err = thrown(() => shapeRowsAsListOfMappings(raw, 'nope', 'pg'));
    expect(err.code).toBe('USAGE_ERROR');
    expect(err.message).toContain('Key field "nope" is not a column of the result (id, name, score).');
  });

  it('rejects a column number beyond the result width', () => {
    expect(thrown(() => shapeRowsAsListOfMappings(raw, 4, 'pg')).code).toBe('USAGE_ERROR');
  });
});

describe('shapeRowsAsListOfLists', () => {
  it('returns the rows as the driver reported them', () => {
    expect(shapeRowsAsListOfLists(raw)).toBe(raw.rows);
  });

  it('stops at maxRows', () => {
    expect(shapeRowsAsListOfLists(raw, 2)).toEqual([[1, 'ann', 10], [2, 'bob', 20]]);
  });
});

describe('checkDescriptor', () => {
  const response = vi.fn();

  it('rejects an empty key field', () => {
    const err = thrown(() => checkDescriptor(rowsAsListOfMappings('select id from t', '', { response }, []), 'pg'));
    expect(err.code).toBe('USAGE_ERROR');
    expect(err.message).toContain('rowsAsListOfMappings needs a key field.');
  });

  it('rejects a key column number below 1', () => {
    expect(() => checkDescriptor(rowsAsListOfMappings('select id from t', 0, { response }, []), 'pg'))
      .toThrow(BatchDBError);
  });

  it('accepts a key field', () => {
    expect(() => checkDescriptor(rowsAsListOfMappings('select id from t', 'id', { response }, []), 'pg'))
      .not.toThrow();
  });

  it('rejects bad column lists', () => {
    expect(() => checkDescriptor(columnAsList('select 1', { columns: [], response }, []), 'pg')).toThrow(BatchDBError);
    expect(() => checkDescriptor(columnAsList('select 1', { columns: [0], response }, []), 'pg')).toThrow(BatchDBError);
    expect(() => checkDescriptor(columnAsList('select 1', { columns: [1], response }, []), 'pg')).not.toThrow();
  });

  it('rejects bad maxRows', () => {
    expect(() => checkDescriptor(rowsAsListOfLists('select 1', { maxRows: -1, response }, []), 'pg')).toThrow(BatchDBError);
    expect(() => checkDescriptor(rowsAsListOfLists('select 1', { maxRows: 1.5, response }, []), 'pg')).toThrow(BatchDBError);
    expect(() => checkDescriptor(rowsAsListOfLists('select 1', { maxRows: 0, response }, []), 'pg')).not.toThrow();
  });
});

describe('deliver', () => {
  it('hands the shaped result and the connection to the callback', () => {
    const response = vi.fn();
    deliver(rowAsMapping('select 1', { response }, []), raw, connection, 'sqlite');
    expect(response).toHaveBeenCalledTimes(1);
    expect(response).toHaveBeenCalledWith({ id: 1, name: 'ann', score: 10 }, connection);
  });

  it('defaults columnAsList to the first column', () => {
    const response = vi.fn();
    deliver(columnAsList('select 1', { response }, []), raw, connection, 'sqlite');
    expect(response).toHaveBeenCalledWith([1, 2, 3], connection);
  });

  it('wraps a throwing callback as CALLBACK_FAILED', () => {
    const boom = new Error('callback broke');
    const descriptor = rowsAsListOfLists('select * from t', {
      response: () => {
        throw boom;
      },
    }, []);

    const err = thrown(() => deliver(descriptor, raw, connection, 'sqlite'));
    expect(err.code).toBe('CALLBACK_FAILED');
    expect(err.originalError).toBe(boom);
    expect(err.sql).toBe('select * from t');
    expect(err.message).toContain('Response callback threw: callback broke');
  });
});
