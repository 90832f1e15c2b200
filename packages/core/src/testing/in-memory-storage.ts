import {
  ConcurrencyConflictError,
  EntityNotFoundError,
  RecordConstraintError,
  ValidationError,
} from '../shared/errors.js';
import type { LotRecord } from '../shared/types.js';
import type { Rule } from '../rules-engine/types.js';
import { nextSuccessRate } from '../rule-store/rule-store.js';
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
import type {
  CleaningStorage,
  LedgerReader,
  LedgerWriter,
  RecordReader,
  RecordWriter,
  RuleRepository,
  StorageTransaction,
} from '../storage/types.js';

export interface RecordConstraint {
  name: string;
  /** False when the row must be rejected. */
  check: (record: LotRecordState) => boolean;
}

type Undo = () => void;

function recordKey(batchId: string, lotId: string): string {
  return `${batchId}\u0000${lotId}`;
}

function compareRulesByUsage(a: Rule, b: Rule): number {
  return (
    b.usage_count - a.usage_count ||
    a.created_at.getTime() - b.created_at.getTime() ||
    a.id.localeCompare(b.id)
  );
}

class InMemoryRuleRepository implements RuleRepository {
  private readonly rules = new Map<string, Rule>();

  async insert(rule: Rule): Promise<Rule> {
    if (this.rules.has(rule.id)) throw new ValidationError(`Rule already exists: ${rule.id}`, 'id');
    this.rules.set(rule.id, structuredClone(rule));
    return structuredClone(rule);
  }

  async findById(id: string): Promise<Rule | null> {
    const rule = this.rules.get(id);
    return rule ? structuredClone(rule) : null;
  }

  async findForClient(client: string | null): Promise<Rule[]> {
    return [...this.rules.values()]
      .filter((rule) => rule.is_active && (rule.client_context === null || rule.client_context === client))
      .sort(compareRulesByUsage)
      .map((rule) => structuredClone(rule));
  }

  async listPermanent(): Promise<Rule[]> {
    return [...this.rules.values()]
      .filter((rule) => rule.is_active && rule.is_permanent)
      .sort((a, b) => a.created_at.getTime() - b.created_at.getTime() || a.id.localeCompare(b.id))
      .map((rule) => structuredClone(rule));
  }

  async update(rule: Rule, expectedVersion: number): Promise<Rule | null> {
    const current = this.rules.get(rule.id);
    if (!current || current.version !== expectedVersion) return null;
    this.rules.set(rule.id, structuredClone(rule));
    return structuredClone(rule);
  }

  async recordUsage(id: string, success: boolean, at: Date): Promise<Rule | null> {
    const current = this.rules.get(id);
    if (!current) return null;
    const next: Rule = {
      ...current,
      usage_count: current.usage_count + 1,
      success_rate: nextSuccessRate(current.success_rate, current.usage_count, success),
      last_used: at,
      updated_at: at,
    };
    this.rules.set(id, next);
    return structuredClone(next);
  }
}

interface StoreState {
  batches: Map<string, Batch>;
  lots: Map<string, LotRecordState>;
  operations: OperationLogEntry[];
  entries: ChangeEntry[];
  snapshots: Map<string, BatchSnapshot>;
}

function emptyState(): StoreState {
  return { batches: new Map(), lots: new Map(), operations: [], entries: [], snapshots: new Map() };
}

/** Rows are replaced, never mutated, so copying the containers is enough. */
function stageState(state: StoreState): StoreState {
  return {
    batches: new Map(state.batches),
    lots: new Map(state.lots),
    operations: [...state.operations],
    entries: [...state.entries],
    snapshots: new Map(state.snapshots),
  };
}

/**
 * CleaningStorage held in process memory. Transactions run one at a time
 * against a staged copy of the state that replaces the committed one only
 * when the work resolves; readers outside the transaction never see its
 * writes. Writes are journaled so a failing savepoint undoes only its own.
 */
export class InMemoryCleaningStorage implements CleaningStorage {
  readonly rules: RuleRepository = new InMemoryRuleRepository();
  readonly records: RecordReader;
  readonly ledger: LedgerReader;

  private committed: StoreState = emptyState();
  private readonly constraints: RecordConstraint[] = [];
  private queue: Promise<void> = Promise.resolve();

  constructor() {
    this.records = this.createRecordReader(() => this.committed);
    this.ledger = this.createLedgerReader(() => this.committed);
  }

  /** Reject record writes for which `check` returns false. */
  addConstraint(name: string, check: RecordConstraint['check']): void {
    this.constraints.push({ name, check });
  }

  /** Drop a stored record outside any transaction, as another process might. */
  deleteRecord(batchId: string, lotId: string): boolean {
    return this.committed.lots.delete(recordKey(batchId, lotId));
  }

  async withTransaction<T>(work: (tx: StorageTransaction) => Promise<T>): Promise<T> {
    const run = this.queue.then(() => this.runTransaction(work));
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async runTransaction<T>(work: (tx: StorageTransaction) => Promise<T>): Promise<T> {
    const staged = stageState(this.committed);
    const journal: Undo[] = [];
    const current = () => staged;
    const tx: StorageTransaction = {
      records: { ...this.createRecordReader(current), ...this.createRecordWriter(staged, journal) },
      ledger: { ...this.createLedgerReader(current), ...this.createLedgerWriter(staged, journal) },
      savepoint: async <R>(_name: string, savepointWork: () => Promise<R>): Promise<R> => {
        const mark = journal.length;
        try {
          return await savepointWork();
        } catch (error) {
          this.undo(journal, mark);
          throw error;
        }
      },
    };
    const result = await work(tx);
    this.committed = staged;
    return result;
  }

  private undo(journal: Undo[], mark: number): void {
    while (journal.length > mark) {
      const step = journal.pop();
      if (step) step();
    }
  }

  private createRecordReader(state: () => StoreState): RecordReader {
    return {
      getBatch: async (batchId) => {
        const batch = state().batches.get(batchId);
        return batch ? structuredClone(batch) : null;
      },
      listRecords: async (batchId) =>
        [...state().lots.values()]
          .filter((record) => record.batch_id === batchId)
          .sort((a, b) => a.position - b.position)
          .map((record) => structuredClone(record)),
    };
  }

  private createRecordWriter(state: StoreState, journal: Undo[]): RecordWriter {
    return {
      insertBatch: async (batch: Batch, records: LotRecord[]) => {
        if (state.batches.has(batch.id)) throw new ValidationError(`Batch already exists: ${batch.id}`, 'batch_id');
        state.batches.set(batch.id, structuredClone(batch));
        journal.push(() => state.batches.delete(batch.id));
        records.forEach((data, position) => {
          const key = recordKey(batch.id, data.lot_id);
          state.lots.set(key, {
            batch_id: batch.id,
            lot_id: data.lot_id,
            position,
            data: structuredClone(data),
            status: 'original',
            issues: [],
            version: 1,
          });
          journal.push(() => state.lots.delete(key));
        });
      },

      lockRecords: async (batchId: string, lotIds: string[]) => {
        const locked = new Map<string, LotRecordState>();
        for (const lotId of lotIds) {
          const record = state.lots.get(recordKey(batchId, lotId));
          if (record) locked.set(lotId, structuredClone(record));
        }
        return locked;
      },

      writeRecord: async (next: LotRecordState, expectedVersion: number) => {
        const key = recordKey(next.batch_id, next.lot_id);
        const current = state.lots.get(key);
        if (!current) throw new EntityNotFoundError('lot_record', next.lot_id);
        if (current.version !== expectedVersion) {
          throw new ConcurrencyConflictError(next.lot_id, expectedVersion, current.version);
        }
        const stored: LotRecordState = { ...structuredClone(next), version: expectedVersion + 1 };
        for (const constraint of this.constraints) {
          if (!constraint.check(stored)) {
            throw new RecordConstraintError(
              next.lot_id,
              constraint.name,
              `Record ${next.lot_id} violates constraint ${constraint.name}`,
            );
          }
        }
        state.lots.set(key, stored);
        journal.push(() => state.lots.set(key, current));
        return structuredClone(stored);
      },
    };
  }

  private createLedgerReader(state: () => StoreState): LedgerReader {
    return {
      getOperation: async (operationId) => {
        const operation = state().operations.find((op) => op.operation_id === operationId);
        return operation ? structuredClone(operation) : null;
      },

      listOperations: async (filter: OperationFilter = {}) => {
        const { operations } = state();
        const matching = operations
          .filter((op) => filter.batch_id === undefined || op.batch_id === filter.batch_id)
          .filter((op) => filter.kind === undefined || op.kind === filter.kind)
          .reverse();
        const limited = filter.limit === undefined ? matching : matching.slice(0, filter.limit);
        return limited.map((op) => structuredClone(op));
      },

      listChangeEntries: async (filter: ChangeEntryFilter = {}) => {
        const { entries } = state();
        return entries
          .filter((entry) => filter.batch_id === undefined || entry.batch_id === filter.batch_id)
          .filter((entry) => filter.operation_id === undefined || entry.operation_id === filter.operation_id)
          .filter((entry) => filter.status === undefined || entry.status === filter.status)
          .sort((a, b) => a.position - b.position)
          .map((entry) => structuredClone(entry));
      },

      getSnapshot: async (snapshotId) => {
        const snapshot = state().snapshots.get(snapshotId);
        return snapshot ? structuredClone(snapshot) : null;
      },
    };
  }

  private createLedgerWriter(state: StoreState, journal: Undo[]): LedgerWriter {
    return {
      insertSnapshot: async (snapshot: BatchSnapshot) => {
        state.snapshots.set(snapshot.snapshot_id, structuredClone(snapshot));
        journal.push(() => state.snapshots.delete(snapshot.snapshot_id));
      },

      insertOperation: async (operation: OperationLogEntry) => {
        state.operations.push(structuredClone(operation));
        journal.push(() => {
          state.operations.pop();
        });
      },

      insertChangeEntries: async (entries: ChangeEntry[]) => {
        const start = state.entries.length;
        state.entries.push(...entries.map((entry) => structuredClone(entry)));
        journal.push(() => {
          state.entries.length = start;
        });
      },

      lockOperation: async (operationId: string) => {
        const operation = state.operations.find((op) => op.operation_id === operationId);
        return operation ? structuredClone(operation) : null;
      },

      setChangeStatus: async (operationId: string, from: ChangeStatus, to: ChangeStatus) => {
        const previous = [...state.entries];
        let changed = 0;
        state.entries.forEach((entry, index) => {
          if (entry.operation_id !== operationId || entry.status !== from) return;
          state.entries[index] = { ...entry, status: to };
          changed++;
        });
        journal.push(() => {
          state.entries.splice(0, state.entries.length, ...previous);
        });
        return changed;
      },

      markOperationRolledBack: async (operationId: string, rolledBackBy: string) => {
        const index = state.operations.findIndex((op) => op.operation_id === operationId);
        if (index < 0) throw new EntityNotFoundError('operation', operationId);
        const previous = state.operations[index];
        state.operations[index] = { ...previous, status: 'rolled_back', rolled_back_by: rolledBackBy };
        journal.push(() => {
          state.operations[index] = previous;
        });
      },
    };
  }
}
