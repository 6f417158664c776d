/**
 * @fileoverview PostgreSQL Lead Record Store (Infrastructure Layer)
 *
 * Adapter implementing the LeadRecordStore port. Each lead is one JSONB
 * document; the `version` column carries the optimistic-concurrency counter
 * and is the source of truth for the record's version.
 *
 * @module @leadflow/infrastructure/repositories/postgres-lead-record-store
 *
 * @example
 * ```typescript
 * const pool = createPool({ connectionString: process.env.DATABASE_URL });
 * await applyWorkflowSchema(pool);
 * const store = new PostgresLeadRecordStore({ pool });
 * ```
 */

import { z } from 'zod';

import { AppError, ConflictError, DatabaseOperationError, createLogger, toError } from '@leadflow/core';
import type { LeadRecordStore, StageCounts } from '@leadflow/domain';
import {
  LeadRecordSchema,
  StageSchema,
  emptyStageCounts,
  type LeadRecord,
  type Stage,
} from '@leadflow/types';

import { parseRows, type SqlClient, type SqlPool } from '../database/client.js';
import { LEAD_RECORDS_TABLE } from '../database/schema.js';

const logger = createLogger({ name: 'postgres-lead-record-store' });

export interface PostgresLeadRecordStoreConfig {
  pool: SqlPool;
}

// ============================================================================
// DATABASE ROW TYPES
// ============================================================================

const LeadRecordRowSchema = z.object({
  document: z.unknown(),
  version: z.coerce.number().int().nonnegative(),
});

type LeadRecordRow = z.infer<typeof LeadRecordRowSchema>;

const StageCountRowSchema = z.object({
  stage: z.string(),
  count: z.coerce.number().int().nonnegative(),
});

const IdRowSchema = z.object({ id: z.string() });

const SELECT_ACTIVE = `SELECT document, version FROM ${LEAD_RECORDS_TABLE} WHERE archived_at IS NULL`;

const UPDATE_IF_CURRENT = `
  UPDATE ${LEAD_RECORDS_TABLE}
  SET document = $3, stage = $4, updated_at = $5, version = version + 1
  WHERE id = $1 AND version = $2 AND archived_at IS NULL
  RETURNING version
`;

// ============================================================================
// REPOSITORY IMPLEMENTATION
// ============================================================================

export class PostgresLeadRecordStore implements LeadRecordStore {
  private readonly pool: SqlPool;

  constructor(config: PostgresLeadRecordStoreConfig) {
    this.pool = config.pool;
  }

  async get(leadId: string): Promise<LeadRecord | null> {
    const rows = await this.query(LeadRecordRowSchema, 'get', `${SELECT_ACTIVE} AND id = $1`, [leadId]);
    const [row] = rows;
    return row ? toLeadRecord(row) : null;
  }

  async create(record: LeadRecord): Promise<LeadRecord> {
    const stored: LeadRecord = { ...record, version: 0 };
    const rows = await this.query(
      IdRowSchema,
      'create',
      `INSERT INTO ${LEAD_RECORDS_TABLE} (id, stage, version, document, created_at, updated_at)
       VALUES ($1, $2, 0, $3, $4, $5)
       ON CONFLICT (id) DO NOTHING
       RETURNING id`,
      [stored.id, stored.stage, JSON.stringify(stored), stored.createdAt, stored.updatedAt]
    );

    if (rows.length === 0) {
      throw new ConflictError('LeadRecord', record.id);
    }
    return stored;
  }

  async save(record: LeadRecord): Promise<LeadRecord> {
    const client = await this.pool.connect();
    try {
      return await this.update(client, record);
    } finally {
      client.release();
    }
  }

  /**
   * All updates run in one transaction; a single stale version rolls back the batch
   */
  async saveAll(records: readonly LeadRecord[]): Promise<LeadRecord[]> {
    if (records.length === 0) return [];

    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const saved: LeadRecord[] = [];
      for (const record of records) {
        saved.push(await this.update(client, record));
      }
      await client.query('COMMIT');
      return saved;
    } catch (error) {
      await client.query('ROLLBACK');
      logger.warn({ count: records.length, err: error }, 'Batch save rolled back');
      throw error;
    } finally {
      client.release();
    }
  }

  async listByStage(stage: Stage): Promise<LeadRecord[]> {
    const rows = await this.query(
      LeadRecordRowSchema,
      'listByStage',
      `${SELECT_ACTIVE} AND stage = $1 ORDER BY created_at ASC, id ASC`,
      [stage]
    );
    return rows.map(toLeadRecord);
  }

  async listAll(): Promise<LeadRecord[]> {
    const rows = await this.query(LeadRecordRowSchema, 'listAll', `${SELECT_ACTIVE} ORDER BY created_at ASC, id ASC`);
    return rows.map(toLeadRecord);
  }

  async countByStage(): Promise<StageCounts> {
    const rows = await this.query(
      StageCountRowSchema,
      'countByStage',
      `SELECT stage, COUNT(*)::int AS count FROM ${LEAD_RECORDS_TABLE}
       WHERE archived_at IS NULL GROUP BY stage`
    );

    const counts = emptyStageCounts();
    for (const row of rows) {
      const stage = StageSchema.safeParse(row.stage);
      if (stage.success) {
        counts[stage.data] = row.count;
      } else {
        logger.warn({ stage: row.stage }, 'Ignoring unknown stage in lead_records');
      }
    }
    return counts;
  }

  async archive(leadId: string): Promise<boolean> {
    const rows = await this.query(
      IdRowSchema,
      'archive',
      `UPDATE ${LEAD_RECORDS_TABLE} SET archived_at = NOW()
       WHERE id = $1 AND archived_at IS NULL
       RETURNING id`,
      [leadId]
    );
    return rows.length > 0;
  }

  private async update(client: SqlClient, record: LeadRecord): Promise<LeadRecord> {
    const next: LeadRecord = { ...record, version: record.version + 1 };
    let rowCount: number | null;
    try {
      const result = await client.query(UPDATE_IF_CURRENT, [
        record.id,
        record.version,
        JSON.stringify(next),
        next.stage,
        next.updatedAt,
      ]);
      rowCount = result.rowCount;
    } catch (error) {
      throw wrapDatabaseError('save', error);
    }

    if (rowCount === 0 || rowCount === null) {
      throw new ConflictError('LeadRecord', record.id, record.version);
    }
    return next;
  }

  private async query<R>(
    schema: z.ZodType<R, z.ZodTypeDef, unknown>,
    operation: string,
    sql: string,
    params: unknown[] = []
  ): Promise<R[]> {
    let rows: unknown[];
    try {
      rows = (await this.pool.query(sql, params)).rows;
    } catch (error) {
      throw wrapDatabaseError(operation, error);
    }
    return parseRows(schema, rows, operation);
  }
}

function wrapDatabaseError(operation: string, error: unknown): AppError {
  if (error instanceof AppError) return error;
  const err = toError(error);
  return new DatabaseOperationError(operation, err.message, err);
}

/**
 * Validate a stored document; the version column wins over the copy inside it
 */
function toLeadRecord(row: LeadRecordRow): LeadRecord {
  const document = typeof row.document === 'object' && row.document !== null ? row.document : {};
  const parsed = LeadRecordSchema.safeParse({ ...document, version: row.version });
  if (!parsed.success) {
    throw new DatabaseOperationError('read', `stored lead record is invalid: ${parsed.error.message}`);
  }
  return parsed.data;
}

export function createPostgresLeadRecordStore(config: PostgresLeadRecordStoreConfig): PostgresLeadRecordStore {
  return new PostgresLeadRecordStore(config);
}
