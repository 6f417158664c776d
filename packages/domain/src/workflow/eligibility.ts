/**
 * Which leads the scheduler may pick up on a tick
 */

import { isTerminalStage, type LeadRecord, type Stage } from '@leadflow/types';

export type AnalyticsTrigger = 'any_stage' | 'scheduled_only';

/**
 * Stages the orchestrator advances without outside input.
 *
 * SCORED waits for the shortlist batch, AWAITING_REPLY for the reply poll.
 * The approval stages are polled: a pending gate is a cheap no-op.
 */
export const AUTONOMOUS_STAGES: ReadonlySet<Stage> = new Set<Stage>([
  'DISCOVERED',
  'SHORTLISTED',
  'DRAFTED',
  'AWAITING_SEND_APPROVAL',
  'SENT',
  'REPLY_RECEIVED',
  'AWAITING_SCHEDULE_APPROVAL',
]);

/**
 * A transcript is attached, no summary yet, and the stage allows analysis
 */
export function isAnalyticsEligible(record: LeadRecord, trigger: AnalyticsTrigger): boolean {
  if (record.transcriptRef === null || record.analyticsSummary !== null) return false;
  if (record.stage === 'SCHEDULED') return true;
  return trigger === 'any_stage' && !isTerminalStage(record.stage);
}
