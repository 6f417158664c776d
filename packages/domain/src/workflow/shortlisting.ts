/**
 * Batch shortlisting rule
 *
 * Ranks SCORED leads by intent score, highest first. Ties go to the lead
 * discovered earlier, then to the smaller id, so a batch is deterministic.
 */

import type { LeadRecord } from '@leadflow/types';

export interface ShortlistRule {
  topK: number;
  minScore: number;
}

export interface ShortlistSelection {
  selected: LeadRecord[];
  unselected: LeadRecord[];
}

export function compareForShortlist(a: LeadRecord, b: LeadRecord): number {
  const byScore = (b.intentScore ?? 0) - (a.intentScore ?? 0);
  if (byScore !== 0) return byScore;
  if (a.createdAt !== b.createdAt) return a.createdAt < b.createdAt ? -1 : 1;
  if (a.id === b.id) return 0;
  return a.id < b.id ? -1 : 1;
}

export function selectShortlist(candidates: readonly LeadRecord[], rule: ShortlistRule): ShortlistSelection {
  const ranked = [...candidates].sort(compareForShortlist);
  const selected: LeadRecord[] = [];
  const unselected: LeadRecord[] = [];

  for (const lead of ranked) {
    const qualifies = lead.intentScore !== null && lead.intentScore >= rule.minScore;
    if (qualifies && selected.length < rule.topK) {
      selected.push(lead);
    } else {
      unselected.push(lead);
    }
  }

  return { selected, unselected };
}
