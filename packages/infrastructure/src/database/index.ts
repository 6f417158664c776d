export { createPool, type PoolConfig } from './pool.js';
export { parseRows, type SqlClient, type SqlPool, type SqlPoolClient, type SqlResult } from './client.js';
export {
  applyWorkflowSchema,
  WORKFLOW_SCHEMA_SQL,
  LEAD_RECORDS_TABLE,
  APPROVAL_REQUESTS_TABLE,
} from './schema.js';
