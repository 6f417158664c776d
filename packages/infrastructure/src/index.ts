/**
 * @fileoverview Infrastructure Layer Package
 *
 * Adapters implementing the persistence and notification ports of the
 * workflow.
 *
 * @module @leadflow/infrastructure
 *
 * ## Architecture Overview
 *
 * ```
 *    APPLICATION LAYER                    INFRASTRUCTURE LAYER
 *   ┌─────────────────┐                  ┌─────────────────────┐
 *   │  Secondary      │                  │  ┌───────────────┐  │
 *   │  Ports          │─────implements──▶│  │ PostgreSQL    │  │
 *   │  (Interfaces)   │                  │  │ Stores        │  │
 *   │                 │                  │  └───────────────┘  │
 *   │  LeadRecord     │                  │  ┌───────────────┐  │
 *   │  Store          │─────implements──▶│  │ In-memory     │  │
 *   │                 │                  │  │ Stores        │  │
 *   │  Approval       │                  │  └───────────────┘  │
 *   │  Notifier       │─────implements──▶│  Logging notifier   │
 *   └─────────────────┘                  └─────────────────────┘
 * ```
 *
 * ## Usage
 *
 * ```typescript
 * import { createPool, applyWorkflowSchema, PostgresLeadRecordStore } from '@leadflow/infrastructure';
 *
 * const pool = createPool({ connectionString: process.env.DATABASE_URL });
 * await applyWorkflowSchema(pool);
 * const store = new PostgresLeadRecordStore({ pool });
 * ```
 */

// ============================================================================
// REPOSITORIES
// ============================================================================

export * from './repositories/index.js';

// ============================================================================
// DATABASE
// ============================================================================

export * from './database/index.js';

// ============================================================================
// NOTIFICATIONS
// ============================================================================

export { LoggingApprovalNotifier } from './notifications/LoggingApprovalNotifier.js';
