/**
 * BatchDB Guardrails — read-only batch protection
 *
 * Batches are meant for independent reads. With guardrails on, a batch
 * that contains a statement which writes, or more than one statement in
 * a single query, is rejected before any connection is touched.
 */

import { BatchDBError } from './errors.js';
import type { DriverName } from './types.js';
import type { BatchDBEventEmitter } from './events.js';

export interface GuardrailContext {
  enabled: boolean;
  emitter: BatchDBEventEmitter;
  driver: DriverName;
}

const READ_KEYWORDS = new Set(['select', 'with', 'values', 'explain', 'show', 'pragma', 'describe', 'table']);
const WRITE_PATTERN = /\b(insert|update|delete|merge|drop|alter|create|truncate|grant|revoke)\b/i;

/**
 * Throws BatchDBError with code GUARDRAIL_BLOCKED if the statement is not a read.
 */
export function checkGuardrails(ctx: GuardrailContext, sql: string): void {
  if (!ctx.enabled) return;

  const statement = stripComments(sql).trim().replace(/;\s*$/, '');
  const keyword = statement.replace(/^\(+\s*/, '').split(/\s+/)[0]?.toLowerCase() ?? '';

  if (statement.includes(';')) {
    emitAndThrow(ctx, sql,
      'Batched queries must contain a single statement.',
      'Enqueue each statement separately.',
    );
  }

  if (!READ_KEYWORDS.has(keyword)) {
    emitAndThrow(ctx, sql,
      `"${keyword.toUpperCase() || '(empty)'}" statements are not allowed in a read-only batch.`,
      'Run writes on rawConnection(), or create the client with { guardrails: false }.',
    );
  }

  // WITH ... DELETE / UPDATE RETURNING and friends
  if (keyword === 'with' && WRITE_PATTERN.test(statement)) {
    emitAndThrow(ctx, sql,
      'Common table expressions that modify data are not allowed in a read-only batch.',
      'Run writes on rawConnection(), or create the client with { guardrails: false }.',
    );
  }
}

function stripComments(sql: string): string {
  return sql.replace(/\/\*[\s\S]*?\*\//g, ' ').replace(/--[^\n]*/g, ' ');
}

function emitAndThrow(ctx: GuardrailContext, sql: string, message: string, fix: string): never {
  ctx.emitter.emit('guardrail-blocked', { sql, reason: message });

  throw new BatchDBError({
    code: 'GUARDRAIL_BLOCKED',
    message,
    fix,
    driver: ctx.driver,
    operation: 'executeBatch',
    sql,
  });
}
