/**
 * The part of a pg Pool the stores rely on. A `pg.Pool` satisfies it, and so
 * does an in-process fake.
 *
 * Rows come back as `unknown` and are validated by each adapter.
 *
 * @module @leadflow/infrastructure/database/client
 */

import type { z } from 'zod';

import { DatabaseOperationError } from '@leadflow/core';

export interface SqlResult {
  rows: unknown[];
  rowCount: number | null;
}

export interface SqlClient {
  query(sql: string, params?: unknown[]): Promise<SqlResult>;
}

export interface SqlPoolClient extends SqlClient {
  release(): void;
}

export interface SqlPool extends SqlClient {
  connect(): Promise<SqlPoolClient>;
}

/**
 * Validate result rows against a row schema
 *
 * @throws DatabaseOperationError when a row does not match
 */
export function parseRows<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, rows: unknown[], operation: string): T[] {
  return rows.map((row) => {
    const parsed = schema.safeParse(row);
    if (!parsed.success) {
      throw new DatabaseOperationError(operation, `unexpected row shape: ${parsed.error.message}`);
    }
    return parsed.data;
  });
}
