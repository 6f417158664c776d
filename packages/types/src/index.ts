/**
 * LeadFlow Types Package
 *
 * Zod schemas and inferred types shared by every layer of the workflow:
 * pipeline stages and their transition table, the persisted lead record,
 * and approval requests.
 *
 * @module @leadflow/types
 */

export * from './schemas/common.js';
export * from './schemas/pipeline.js';
export * from './schemas/lead-record.js';
export * from './schemas/approval.js';
