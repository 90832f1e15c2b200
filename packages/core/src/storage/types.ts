import type { LotRecord } from '../shared/types.js';
import type { Rule } from '../rules-engine/types.js';
import type {
  Batch,
  BatchSnapshot,
  ChangeEntry,
  ChangeEntryFilter,
  ChangeStatus,
  LotRecordState,
  OperationFilter,
  OperationLogEntry,
} from '../change-ledger/types.js';

export interface RuleRepository {
  insert(rule: Rule): Promise<Rule>;
  findById(id: string): Promise<Rule | null>;
  /** Active rules of the client plus global ones, most used first. */
  findForClient(client: string | null): Promise<Rule[]>;
  listPermanent(): Promise<Rule[]>;
  /** Replace a rule if its stored version equals `expectedVersion`; null otherwise. */
  update(rule: Rule, expectedVersion: number): Promise<Rule | null>;
  /** Single-row atomic counter update. Null when the rule does not exist. */
  recordUsage(id: string, success: boolean, at: Date): Promise<Rule | null>;
}

export interface RecordReader {
  getBatch(batchId: string): Promise<Batch | null>;
  /** Records of a batch in input order. */
  listRecords(batchId: string): Promise<LotRecordState[]>;
}

export interface RecordWriter {
  insertBatch(batch: Batch, records: LotRecord[]): Promise<void>;
  /** Lock and return the named records; missing lots are absent from the map. */
  lockRecords(batchId: string, lotIds: string[]): Promise<Map<string, LotRecordState>>;
  /**
   * Write a record if its stored version equals `expectedVersion`; the stored
   * row gets `expectedVersion + 1`. Throws EntityNotFoundError for a missing
   * row, ConcurrencyConflictError on a version mismatch and
   * RecordConstraintError when the store rejects the row.
   */
  writeRecord(next: LotRecordState, expectedVersion: number): Promise<LotRecordState>;
}

export interface LedgerReader {
  getOperation(operationId: string): Promise<OperationLogEntry | null>;
  listOperations(filter?: OperationFilter): Promise<OperationLogEntry[]>;
  /** Entries in batch position order. */
  listChangeEntries(filter?: ChangeEntryFilter): Promise<ChangeEntry[]>;
  getSnapshot(snapshotId: string): Promise<BatchSnapshot | null>;
}

export interface LedgerWriter {
  insertSnapshot(snapshot: BatchSnapshot): Promise<void>;
  insertOperation(operation: OperationLogEntry): Promise<void>;
  insertChangeEntries(entries: ChangeEntry[]): Promise<void>;
  /** Read an operation and hold it until the transaction ends. */
  lockOperation(operationId: string): Promise<OperationLogEntry | null>;
  setChangeStatus(operationId: string, from: ChangeStatus, to: ChangeStatus): Promise<number>;
  markOperationRolledBack(operationId: string, rolledBackBy: string): Promise<void>;
}

export interface StorageTransaction {
  records: RecordReader & RecordWriter;
  ledger: LedgerReader & LedgerWriter;
  /** Run `work` so that a throw undoes only its own writes. */
  savepoint<T>(name: string, work: () => Promise<T>): Promise<T>;
}

/**
 * Persistence used by cleaning. Everything that mutates records or the
 * ledger goes through `withTransaction`.
 */
export interface CleaningStorage {
  rules: RuleRepository;
  records: RecordReader;
  ledger: LedgerReader;
  withTransaction<T>(work: (tx: StorageTransaction) => Promise<T>): Promise<T>;
}
