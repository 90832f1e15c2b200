export { ChangeLedger } from './change-ledger.js';
export type { SnapshotOptions, RollbackOptions } from './change-ledger.js';
export { emptyCounts } from './types.js';
export type {
  RiskLevel,
  ChangeStatus,
  ChangeEntry,
  LotStatus,
  LotRecordState,
  Batch,
  BatchSnapshot,
  OperationKind,
  OperationStatus,
  OperationCounts,
  OperationLogEntry,
  OperationFilter,
  ChangeEntryFilter,
  RollbackResult,
} from './types.js';
