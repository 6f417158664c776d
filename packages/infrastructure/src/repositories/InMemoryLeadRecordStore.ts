/**
 * @fileoverview In-Memory Lead Record Store (Infrastructure Layer)
 *
 * Adapter implementing the LeadRecordStore port with a Map. Records are
 * cloned on the way in and out, so callers never share state with the store.
 * Suitable for development and testing.
 *
 * @module @leadflow/infrastructure/repositories/in-memory-lead-record-store
 */

import { ConflictError, createLogger } from '@leadflow/core';
import type { LeadRecordStore, StageCounts } from '@leadflow/domain';
import { emptyStageCounts, type LeadRecord, type Stage } from '@leadflow/types';

const logger = createLogger({ name: 'in-memory-lead-record-store' });

export class InMemoryLeadRecordStore implements LeadRecordStore {
  private records = new Map<string, LeadRecord>();
  private archived = new Map<string, LeadRecord>();

  get(leadId: string): Promise<LeadRecord | null> {
    const record = this.records.get(leadId);
    return Promise.resolve(record ? structuredClone(record) : null);
  }

  create(record: LeadRecord): Promise<LeadRecord> {
    if (this.records.has(record.id) || this.archived.has(record.id)) {
      return Promise.reject(new ConflictError('LeadRecord', record.id));
    }
    const stored: LeadRecord = { ...structuredClone(record), version: 0 };
    this.records.set(stored.id, stored);
    return Promise.resolve(structuredClone(stored));
  }

  save(record: LeadRecord): Promise<LeadRecord> {
    try {
      this.assertCurrent(record);
    } catch (error) {
      return Promise.reject(error);
    }
    return Promise.resolve(this.write(record));
  }

  saveAll(records: readonly LeadRecord[]): Promise<LeadRecord[]> {
    const ids = new Set<string>();
    try {
      for (const record of records) {
        if (ids.has(record.id)) {
          throw new ConflictError('LeadRecord', record.id, record.version);
        }
        ids.add(record.id);
        this.assertCurrent(record);
      }
    } catch (error) {
      return Promise.reject(error);
    }
    return Promise.resolve(records.map((record) => this.write(record)));
  }

  listByStage(stage: Stage): Promise<LeadRecord[]> {
    return Promise.resolve(this.sorted().filter((r) => r.stage === stage).map((r) => structuredClone(r)));
  }

  listAll(): Promise<LeadRecord[]> {
    return Promise.resolve(this.sorted().map((r) => structuredClone(r)));
  }

  countByStage(): Promise<StageCounts> {
    const counts = emptyStageCounts();
    for (const record of this.records.values()) {
      counts[record.stage]++;
    }
    return Promise.resolve(counts);
  }

  archive(leadId: string): Promise<boolean> {
    const record = this.records.get(leadId);
    if (!record) return Promise.resolve(false);
    this.records.delete(leadId);
    this.archived.set(leadId, record);
    logger.debug({ leadId }, 'Lead record archived');
    return Promise.resolve(true);
  }

  /** Number of active records; test helper */
  get size(): number {
    return this.records.size;
  }

  clear(): void {
    this.records.clear();
    this.archived.clear();
  }

  private assertCurrent(record: LeadRecord): void {
    const stored = this.records.get(record.id);
    if (!stored || stored.version !== record.version) {
      throw new ConflictError('LeadRecord', record.id, record.version);
    }
  }

  private write(record: LeadRecord): LeadRecord {
    const stored: LeadRecord = { ...structuredClone(record), version: record.version + 1 };
    this.records.set(stored.id, stored);
    return structuredClone(stored);
  }

  private sorted(): LeadRecord[] {
    return [...this.records.values()].sort((a, b) =>
      a.createdAt === b.createdAt ? a.id.localeCompare(b.id) : a.createdAt.localeCompare(b.createdAt)
    );
  }
}

export function createInMemoryLeadRecordStore(): InMemoryLeadRecordStore {
  return new InMemoryLeadRecordStore();
}
