/**
 * @fileoverview Secondary Port - ApprovalNotifier
 *
 * The gate publishes `approval.requested` and `approval.resolved` through
 * this port; adapters forward them to whatever channel reviewers watch.
 *
 * @module application/ports/secondary/messaging/ApprovalNotifier
 */

export type { ApprovalNotifier, ApprovalEvent, ApprovalEventType } from '@leadflow/domain';
