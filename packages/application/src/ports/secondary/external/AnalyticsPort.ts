/**
 * @fileoverview Secondary Port - AnalyticsPort
 *
 * Call transcript analysis.
 *
 * @module application/ports/secondary/external/AnalyticsPort
 */

import type { AnalyticsSummaryInput } from '@leadflow/types';

export interface AnalyticsPort {
  analyze(transcriptRef: string): Promise<AnalyticsSummaryInput>;
}
