/**
 * BatchDB Configuration — zod-validated client settings
 *
 * Constructor arguments are parsed once; everything downstream works on
 * the resolved, defaulted shape.
 */

import { z } from 'zod';
import { BatchDBError } from './errors.js';
import { ConnectionPool } from './pool.js';
import { detectDriverName } from './drivers/resolve.js';
import type { Driver } from './types.js';

const driverSchema = z.custom<Driver>(
  value =>
    typeof value === 'object' &&
    value !== null &&
    'connect' in value &&
    typeof value.connect === 'function' &&
    'name' in value &&
    typeof value.name === 'string',
  { message: 'Expected a driver with a name and a connect(options, onError) method' },
);

export const optionsSchema = z.object({
  driver: driverSchema.optional(),
  driverOptions: z.record(z.unknown()).default({}),
  pool: z.instanceof(ConnectionPool).optional(),
  maxConnections: z.number().int().positive().optional(),
  timeoutMs: z.number().int().positive().optional(),
  slowQueryMs: z.number().nonnegative().default(1000),
  logging: z.union([z.boolean(), z.literal('verbose')]).default(true),
  guardrails: z.boolean().default(false),
  label: z.string().min(1).optional(),
}).strict();

export type BatchDBOptions = z.input<typeof optionsSchema>;

const connectionSchema = z.object({
  uri: z.string().min(1, 'Connection string must not be empty'),
  username: z.string().optional(),
  password: z.string().optional(),
});

export interface ResolvedConfig {
  uri: string;
  username?: string;
  password?: string;
  driver?: Driver;
  driverOptions: Record<string, unknown>;
  pool?: ConnectionPool;
  maxConnections: number | null;
  timeoutMs: number | null;
  slowQueryMs: number;
  logging: { enabled: boolean; verbose: boolean };
  guardrails: boolean;
  label: string;
}

export function resolveConfig(
  uri: string,
  username?: string,
  password?: string,
  options: BatchDBOptions = {},
): ResolvedConfig {
  const connection = connectionSchema.safeParse({ uri, username, password });
  const parsed = optionsSchema.safeParse(options);

  if (!connection.success || !parsed.success) {
    const issues = [
      ...(connection.success ? [] : connection.error.issues),
      ...(parsed.success ? [] : parsed.error.issues),
    ];
    throw new BatchDBError({
      code: 'CONFIG_INVALID',
      message: `Invalid client configuration: ${issues.map(i => `${i.path.join('.') || 'config'}: ${i.message}`).join(', ')}`,
      fix: `Pass a connection string such as "sqlite:/path/to.db" or "postgresql://host/db", and check the options object.`,
      driver: options.driver?.name ?? detectDriverName(uri) ?? 'custom',
      operation: 'constructor',
    });
  }

  const opts = parsed.data;
  return {
    uri: connection.data.uri,
    username: connection.data.username,
    password: connection.data.password,
    driver: opts.driver,
    driverOptions: opts.driverOptions,
    pool: opts.pool,
    maxConnections: opts.maxConnections ?? null,
    timeoutMs: opts.timeoutMs ?? null,
    slowQueryMs: opts.slowQueryMs,
    logging: {
      enabled: opts.logging !== false,
      verbose: opts.logging === 'verbose',
    },
    guardrails: opts.guardrails,
    label: opts.label ?? 'default',
  };
}
