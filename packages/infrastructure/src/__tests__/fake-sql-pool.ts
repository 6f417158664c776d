import type { SqlPool, SqlPoolClient, SqlResult } from '../database/client.js';

export interface RecordedQuery {
  sql: string;
  params: unknown[];
}

export type QueryResponder = (sql: string, params: unknown[]) => SqlResult | Error;

/**
 * In-process stand-in for a pg Pool that records every statement
 */
export class FakeSqlPool implements SqlPool {
  readonly queries: RecordedQuery[] = [];
  released = 0;

  constructor(private responder: QueryResponder = () => ({ rows: [], rowCount: 0 })) {}

  respondWith(responder: QueryResponder): void {
    this.responder = responder;
  }

  query(sql: string, params: unknown[] = []): Promise<SqlResult> {
    this.queries.push({ sql: sql.trim(), params });
    const result = this.responder(sql.trim(), params);
    return result instanceof Error ? Promise.reject(result) : Promise.resolve(result);
  }

  connect(): Promise<SqlPoolClient> {
    return Promise.resolve({
      query: (sql: string, params?: unknown[]) => this.query(sql, params),
      release: () => {
        this.released++;
      },
    });
  }

  statements(): string[] {
    return this.queries.map((q) => q.sql.split(/\s+/)[0] ?? '');
  }
}

export function rows(...values: unknown[]): SqlResult {
  return { rows: values, rowCount: values.length };
}
