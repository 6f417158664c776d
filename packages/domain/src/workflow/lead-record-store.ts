/**
 * Lead Record Store Interface (Port)
 *
 * Persistence contract for lead records. Adapters live in
 * `@leadflow/infrastructure`:
 * - InMemoryLeadRecordStore: tests and local runs
 * - PostgresLeadRecordStore: JSONB document guarded by a version column
 *
 * @module @leadflow/domain/workflow/lead-record-store
 */

import type { LeadRecord, Stage } from '@leadflow/types';

export type StageCounts = Record<Stage, number>;

export interface LeadRecordStore {
  /**
   * Fetch a record, or null when no lead has that id
   */
  get(leadId: string): Promise<LeadRecord | null>;

  /**
   * Insert a new record at version 0
   *
   * @throws ConflictError when the id is taken
   */
  create(record: LeadRecord): Promise<LeadRecord>;

  /**
   * Optimistic save. `record.version` must equal the stored version; the
   * stored copy gets `version + 1`, which the returned record carries.
   *
   * @throws ConflictError when the stored version moved on or the lead is gone
   */
  save(record: LeadRecord): Promise<LeadRecord>;

  /**
   * All-or-nothing `save` of several records; nothing is written if any
   * version check fails
   */
  saveAll(records: readonly LeadRecord[]): Promise<LeadRecord[]>;

  listByStage(stage: Stage): Promise<LeadRecord[]>;

  listAll(): Promise<LeadRecord[]>;

  countByStage(): Promise<StageCounts>;

  /**
   * Remove a lead from the active set; false when it does not exist
   */
  archive(leadId: string): Promise<boolean>;
}
