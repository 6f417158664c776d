/**
 * @fileoverview Domain Package Exports
 *
 * Pure workflow logic for the lead pipeline: record transitions, the
 * shortlisting rule, reply screening and the approval gate, plus the ports
 * their adapters implement.
 *
 * @module @leadflow/domain
 */

export * from './workflow/index.js';
export * from './approvals/index.js';
