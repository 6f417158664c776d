/**
 * Lead pipeline stages and the transition table
 *
 * The stage set is closed: every edge the orchestrator may take is listed in
 * `STAGE_TRANSITIONS`, and the table is checked against the enum at compile
 * time so a new stage cannot be added without deciding its edges.
 *
 * @module @leadflow/types/schemas/pipeline
 */

import { z } from 'zod';

// =============================================================================
// STAGES
// =============================================================================

export const StageSchema = z.enum([
  'DISCOVERED',
  'SCORED',
  'SHORTLISTED',
  'DRAFTED',
  'AWAITING_SEND_APPROVAL',
  'SENT',
  'AWAITING_REPLY',
  'REPLY_RECEIVED',
  'AWAITING_SCHEDULE_APPROVAL',
  'SCHEDULED',
  'ANALYZED',
  'FAILED',
  'ABANDONED',
]);

export type Stage = z.infer<typeof StageSchema>;

export const STAGES: readonly Stage[] = StageSchema.options;

/** Stages with no outgoing edge except the ones listed in the table below */
export const TERMINAL_STAGES: ReadonlySet<Stage> = new Set<Stage>([
  'SCHEDULED',
  'ANALYZED',
  'FAILED',
  'ABANDONED',
]);

/** Stages that only leave through an explicit manual reset */
export const HALTED_STAGES: ReadonlySet<Stage> = new Set<Stage>(['FAILED', 'ABANDONED']);

// =============================================================================
// TRANSITION TABLE
// =============================================================================

const exits = ['FAILED', 'ABANDONED', 'ANALYZED'] as const;

export const STAGE_TRANSITIONS = {
  DISCOVERED: ['SCORED', ...exits],
  SCORED: ['SHORTLISTED', ...exits],
  SHORTLISTED: ['DRAFTED', ...exits],
  DRAFTED: ['AWAITING_SEND_APPROVAL', ...exits],
  AWAITING_SEND_APPROVAL: ['SENT', ...exits],
  SENT: ['AWAITING_REPLY', ...exits],
  AWAITING_REPLY: ['REPLY_RECEIVED', ...exits],
  // AWAITING_REPLY again after a follow-up asking for meeting times
  REPLY_RECEIVED: ['AWAITING_SCHEDULE_APPROVAL', 'AWAITING_REPLY', ...exits],
  AWAITING_SCHEDULE_APPROVAL: ['SCHEDULED', ...exits],
  SCHEDULED: ['ANALYZED'],
  ANALYZED: [],
  FAILED: [],
  ABANDONED: [],
} as const satisfies Record<Stage, readonly Stage[]>;

export function isTerminalStage(stage: Stage): boolean {
  return TERMINAL_STAGES.has(stage);
}

export function isValidStageTransition(from: Stage, to: Stage): boolean {
  const allowed: readonly Stage[] = STAGE_TRANSITIONS[from];
  return allowed.includes(to);
}

/**
 * The one backward edge: FAILED or ABANDONED back to the stage the lead
 * halted in, on explicit operator request.
 */
export function isValidResetTransition(from: Stage, to: Stage): boolean {
  return HALTED_STAGES.has(from) && !isTerminalStage(to);
}

/** A zero for every stage */
export function emptyStageCounts(): Record<Stage, number> {
  return {
    DISCOVERED: 0,
    SCORED: 0,
    SHORTLISTED: 0,
    DRAFTED: 0,
    AWAITING_SEND_APPROVAL: 0,
    SENT: 0,
    AWAITING_REPLY: 0,
    REPLY_RECEIVED: 0,
    AWAITING_SCHEDULE_APPROVAL: 0,
    SCHEDULED: 0,
    ANALYZED: 0,
    FAILED: 0,
    ABANDONED: 0,
  };
}

// =============================================================================
// APPROVAL GATES
// =============================================================================

export const ApprovalGateSchema = z.enum(['SEND', 'SCHEDULE']);

export type ApprovalGate = z.infer<typeof ApprovalGateSchema>;

export const GATE_STAGE = {
  SEND: 'AWAITING_SEND_APPROVAL',
  SCHEDULE: 'AWAITING_SCHEDULE_APPROVAL',
} as const satisfies Record<ApprovalGate, Stage>;

/** Stages that the gate must have approved before they can be entered */
export const GATED_TARGET = {
  SEND: 'SENT',
  SCHEDULE: 'SCHEDULED',
} as const satisfies Record<ApprovalGate, Stage>;

export function gateForStage(stage: Stage): ApprovalGate | null {
  if (stage === GATE_STAGE.SEND) return 'SEND';
  if (stage === GATE_STAGE.SCHEDULE) return 'SCHEDULE';
  return null;
}
