export {
  ApprovalGate,
  createApprovalGate,
  type ApprovalGateOptions,
  type ApprovalNotifier,
  type ApprovalEvent,
  type ApprovalEventType,
  type ResolveOptions,
} from './approval-gate.js';
export type { ApprovalRepository, ApprovalResolution } from './approval-repository.js';
