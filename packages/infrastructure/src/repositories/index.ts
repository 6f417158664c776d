/**
 * @fileoverview Repository Adapters
 *
 * @module @leadflow/infrastructure/repositories
 */

export {
  InMemoryLeadRecordStore,
  createInMemoryLeadRecordStore,
} from './InMemoryLeadRecordStore.js';
export {
  PostgresLeadRecordStore,
  createPostgresLeadRecordStore,
  type PostgresLeadRecordStoreConfig,
} from './PostgresLeadRecordStore.js';
export {
  InMemoryApprovalRepository,
  createInMemoryApprovalRepository,
} from './InMemoryApprovalRepository.js';
export {
  PostgresApprovalRepository,
  createPostgresApprovalRepository,
  type PostgresApprovalRepositoryConfig,
} from './PostgresApprovalRepository.js';
