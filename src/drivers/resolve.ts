/**
 * Driver detection from the connection string scheme.
 */

import { BatchDBError } from '../errors.js';
import type { Driver, DriverName } from '../types.js';
import { PgDriver } from './pg-driver.js';
import { SqliteDriver } from './sqlite-driver.js';

export function detectDriverName(uri: string): DriverName | null {
  if (uri.startsWith('postgresql://') || uri.startsWith('postgres://')) return 'pg';
  if (uri.startsWith('file:') || uri.startsWith('sqlite:')) return 'sqlite';
  return null;
}

export function resolveDriver(uri: string, custom?: Driver): Driver {
  if (custom) return custom;

  switch (detectDriverName(uri)) {
    case 'pg':
      return new PgDriver();
    case 'sqlite':
      return new SqliteDriver();
    default:
      throw new BatchDBError({
        code: 'UNSUPPORTED_DRIVER',
        message: `Unsupported connection string scheme in "${uri.substring(0, 20)}..."`,
        fix: 'Use postgresql://, sqlite: or file:, or pass { driver } in the client options.',
        driver: 'custom',
        operation: 'constructor',
      });
  }
}

export function redactUri(uri: string): string {
  try {
    const url = new URL(uri);
    if (url.password) url.password = '***';
    return url.toString();
  } catch {
    return uri.replace(/\/\/[^:]+:[^@]+@/, '//***:***@');
  }
}
