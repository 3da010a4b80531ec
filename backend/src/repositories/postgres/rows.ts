/**
 * Row decoding for the PostgreSQL adapters
 */

import type { QueryResultRow } from 'pg';
import type { z } from 'zod';

export function decodeRow<T extends z.ZodTypeAny>(schema: T, row: QueryResultRow, table: string): z.output<T> {
  const parsed = schema.safeParse(row);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Unexpected ${table} row shape (${issues.join('; ')})`);
  }
  return parsed.data;
}

/** JSONB parameter; SQL NULL stays NULL rather than the JSON literal. */
export function jsonb(value: unknown): string | null {
  return value === null || value === undefined ? null : JSON.stringify(value);
}
