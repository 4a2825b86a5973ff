import { z } from 'zod';
import { upstreamError } from '../shared/index.js';

export type SqlParam = string | number;

export type Row = Record<string, unknown>;

export interface QueryOptions {
  signal?: AbortSignal;
}

/**
 * Runs one parametrized statement and returns its rows in order. Positional
 * `?` placeholders are bound from `params`.
 */
export type QueryExecutor = (
  sql: string,
  params: readonly SqlParam[],
  options?: QueryOptions
) => Promise<Row[]>;

const RowSchema = z.record(z.string(), z.unknown());

/** Validate executor output against `schema`, one row at a time. */
export function parseRows<T>(
  rows: readonly unknown[],
  schema: z.ZodType<T>,
  context: { sql: string }
): T[] {
  return rows.map((row, index) => {
    const result = schema.safeParse(row);
    if (!result.success) {
      throw upstreamError('Query returned a malformed row', {
        index,
        issues: result.error.issues,
        sql: context.sql,
      });
    }
    return result.data;
  });
}

export function toRows(rows: readonly unknown[], sql: string): Row[] {
  return parseRows(rows, RowSchema, { sql });
}
