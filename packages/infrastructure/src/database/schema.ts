/**
 * Tables backing the PostgreSQL lead store and approval repository
 *
 * @module @leadflow/infrastructure/database/schema
 */

import type { SqlClient } from './client.js';

export const LEAD_RECORDS_TABLE = 'lead_records';
export const APPROVAL_REQUESTS_TABLE = 'approval_requests';

export const WORKFLOW_SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS ${LEAD_RECORDS_TABLE} (
    id VARCHAR(255) PRIMARY KEY,
    stage VARCHAR(64) NOT NULL,
    version INTEGER NOT NULL DEFAULT 0,
    document JSONB NOT NULL,
    created_at TIMESTAMPTZ NOT NULL,
    updated_at TIMESTAMPTZ NOT NULL,
    archived_at TIMESTAMPTZ
  );

  CREATE INDEX IF NOT EXISTS idx_lead_records_stage
  ON ${LEAD_RECORDS_TABLE} (stage) WHERE archived_at IS NULL;

  CREATE TABLE IF NOT EXISTS ${APPROVAL_REQUESTS_TABLE} (
    token VARCHAR(255) PRIMARY KEY,
    lead_id VARCHAR(255) NOT NULL,
    gate VARCHAR(32) NOT NULL,
    stage VARCHAR(64) NOT NULL,
    instance INTEGER NOT NULL,
    payload JSONB NOT NULL,
    status VARCHAR(16) NOT NULL DEFAULT 'PENDING',
    requested_at TIMESTAMPTZ NOT NULL,
    resolved_at TIMESTAMPTZ,
    resolved_by VARCHAR(128),
    note TEXT
  );

  CREATE INDEX IF NOT EXISTS idx_approval_requests_pending
  ON ${APPROVAL_REQUESTS_TABLE} (requested_at) WHERE status = 'PENDING';

  CREATE INDEX IF NOT EXISTS idx_approval_requests_lead
  ON ${APPROVAL_REQUESTS_TABLE} (lead_id);
`;

/**
 * Create the workflow tables if they do not exist
 */
export async function applyWorkflowSchema(pool: SqlClient): Promise<void> {
  await pool.query(WORKFLOW_SCHEMA_SQL);
}
