/**
 * @fileoverview Secondary Ports Index
 *
 * Secondary ports define what the application needs from infrastructure.
 *
 * @module application/ports/secondary
 */

// Messaging ports
export * from './messaging/ApprovalNotifier.js';

// External service ports
export * from './external/ScoringPort.js';
export * from './external/OutreachPort.js';
export * from './external/SchedulingPort.js';
export * from './external/AnalyticsPort.js';

// Persistence ports
export type { LeadRecordStore, StageCounts, ApprovalRepository } from '@leadflow/domain';
