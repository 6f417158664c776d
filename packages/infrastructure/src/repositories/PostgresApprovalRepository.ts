/**
 * @fileoverview PostgreSQL Approval Repository (Infrastructure Layer)
 *
 * Resolution is a conditional UPDATE on `status = 'PENDING'`, so two
 * reviewers racing on the same token cannot both win.
 *
 * @module @leadflow/infrastructure/repositories/postgres-approval-repository
 */

import { z } from 'zod';

import { DatabaseOperationError, toError } from '@leadflow/core';
import type { ApprovalRepository, ApprovalResolution } from '@leadflow/domain';
import { ApprovalRequestSchema, type ApprovalRequest } from '@leadflow/types';

import { parseRows, type SqlPool } from '../database/client.js';
import { APPROVAL_REQUESTS_TABLE } from '../database/schema.js';

export interface PostgresApprovalRepositoryConfig {
  pool: SqlPool;
}

const TimestampColumnSchema = z.union([z.date(), z.string()]);

const ApprovalRowSchema = z.object({
  token: z.string(),
  lead_id: z.string(),
  gate: z.string(),
  stage: z.string(),
  instance: z.coerce.number().int(),
  payload: z.unknown(),
  status: z.string(),
  requested_at: TimestampColumnSchema,
  resolved_at: TimestampColumnSchema.nullable(),
  resolved_by: z.string().nullable(),
  note: z.string().nullable(),
});

type ApprovalRow = z.infer<typeof ApprovalRowSchema>;

const COLUMNS =
  'token, lead_id, gate, stage, instance, payload, status, requested_at, resolved_at, resolved_by, note';

export class PostgresApprovalRepository implements ApprovalRepository {
  private readonly pool: SqlPool;

  constructor(config: PostgresApprovalRepositoryConfig) {
    this.pool = config.pool;
  }

  async findByToken(token: string): Promise<ApprovalRequest | null> {
    const [row] = await this.query(
      'findByToken',
      `SELECT ${COLUMNS} FROM ${APPROVAL_REQUESTS_TABLE} WHERE token = $1`,
      [token]
    );
    return row ? toApprovalRequest(row) : null;
  }

  async insertIfAbsent(request: ApprovalRequest): Promise<{ request: ApprovalRequest; wasCreated: boolean }> {
    const [inserted] = await this.query(
      'insert',
      `INSERT INTO ${APPROVAL_REQUESTS_TABLE} (${COLUMNS})
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
       ON CONFLICT (token) DO NOTHING
       RETURNING ${COLUMNS}`,
      [
        request.token,
        request.leadId,
        request.gate,
        request.stage,
        request.instance,
        JSON.stringify(request.payload),
        request.status,
        request.requestedAt,
        request.resolvedAt,
        request.resolvedBy,
        request.note,
      ]
    );
    if (inserted) {
      return { request: toApprovalRequest(inserted), wasCreated: true };
    }

    const existing = await this.findByToken(request.token);
    if (existing === null) {
      throw new DatabaseOperationError('insert', `approval request ${request.token} vanished after conflict`);
    }
    return { request: existing, wasCreated: false };
  }

  async resolvePending(token: string, resolution: ApprovalResolution): Promise<ApprovalRequest | null> {
    const [row] = await this.query(
      'resolve',
      `UPDATE ${APPROVAL_REQUESTS_TABLE}
       SET status = $2, resolved_at = $3, resolved_by = $4, note = $5
       WHERE token = $1 AND status = 'PENDING'
       RETURNING ${COLUMNS}`,
      [token, resolution.status, resolution.resolvedAt, resolution.resolvedBy, resolution.note]
    );
    return row ? toApprovalRequest(row) : null;
  }

  async listPending(): Promise<ApprovalRequest[]> {
    const rows = await this.query(
      'listPending',
      `SELECT ${COLUMNS} FROM ${APPROVAL_REQUESTS_TABLE} WHERE status = 'PENDING' ORDER BY requested_at ASC`
    );
    return rows.map(toApprovalRequest);
  }

  async listByLead(leadId: string): Promise<ApprovalRequest[]> {
    const rows = await this.query(
      'listByLead',
      `SELECT ${COLUMNS} FROM ${APPROVAL_REQUESTS_TABLE} WHERE lead_id = $1 ORDER BY requested_at ASC`,
      [leadId]
    );
    return rows.map(toApprovalRequest);
  }

  private async query(operation: string, sql: string, params: unknown[] = []): Promise<ApprovalRow[]> {
    let rows: unknown[];
    try {
      rows = (await this.pool.query(sql, params)).rows;
    } catch (error) {
      const err = toError(error);
      throw new DatabaseOperationError(operation, err.message, err);
    }
    return parseRows(ApprovalRowSchema, rows, operation);
  }
}

function toIso(value: Date | string): string {
  return value instanceof Date ? value.toISOString() : new Date(value).toISOString();
}

function toApprovalRequest(row: ApprovalRow): ApprovalRequest {
  const parsed = ApprovalRequestSchema.safeParse({
    token: row.token,
    leadId: row.lead_id,
    gate: row.gate,
    stage: row.stage,
    instance: row.instance,
    payload: row.payload,
    status: row.status,
    requestedAt: toIso(row.requested_at),
    resolvedAt: row.resolved_at === null ? null : toIso(row.resolved_at),
    resolvedBy: row.resolved_by,
    note: row.note,
  });
  if (!parsed.success) {
    throw new DatabaseOperationError('read', `stored approval request is invalid: ${parsed.error.message}`);
  }
  return parsed.data;
}

export function createPostgresApprovalRepository(
  config: PostgresApprovalRepositoryConfig
): PostgresApprovalRepository {
  return new PostgresApprovalRepository(config);
}
