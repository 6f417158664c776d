export {
  createLeadRecord,
  transitionLead,
  touchLead,
  haltLead,
  recordFailure,
  resetLead,
  describeError,
  counterValue,
  isBackingOff,
  isRetryBudgetSpent,
  type NewLeadInput,
  type LeadPatch,
  type TransitionOptions,
  type ErrorDescriptor,
  type RetryPolicy,
} from './lead-record.js';
export { selectShortlist, compareForShortlist, type ShortlistRule, type ShortlistSelection } from './shortlisting.js';
export { isMeaningfulReply } from './reply-screening.js';
export { AUTONOMOUS_STAGES, isAnalyticsEligible, type AnalyticsTrigger } from './eligibility.js';
export type { LeadRecordStore, StageCounts } from './lead-record-store.js';
