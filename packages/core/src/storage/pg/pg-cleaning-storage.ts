import pg from 'pg';
import type { Logger } from 'pino';
import { withTransaction } from '../../shared/database.js';
import {
  ConcurrencyConflictError,
  EntityNotFoundError,
  RecordConstraintError,
} from '../../shared/errors.js';
import { createLogger } from '../../shared/logger.js';
import type { LotRecord } from '../../shared/types.js';
import type { Rule } from '../../rules-engine/types.js';
import type {
  Batch,
  BatchSnapshot,
  ChangeEntry,
  ChangeEntryFilter,
  ChangeStatus,
  LotRecordState,
  OperationFilter,
  OperationLogEntry,
} from '../../change-ledger/types.js';
import type {
  CleaningStorage,
  LedgerReader,
  LedgerWriter,
  RecordReader,
  RecordWriter,
  RuleRepository,
  StorageTransaction,
} from '../types.js';
import { RULE_QUERIES } from './rules.queries.js';
import { RECORD_QUERIES } from './records.queries.js';
import { LEDGER_QUERIES } from './ledger.queries.js';
import {
  rowToBatch,
  rowToChangeEntry,
  rowToLotRecord,
  rowToOperation,
  rowToRule,
  rowToSnapshot,
  type BatchRow,
  type ChangeEntryRow,
  type LotRecordRow,
  type OperationRow,
  type RuleRow,
  type SnapshotRow,
} from './row-mappers.js';

type Db = pg.Pool | pg.PoolClient;

async function query<R extends pg.QueryResultRow>(db: Db, text: string, values: unknown[] = []): Promise<pg.QueryResult<R>> {
  return db instanceof pg.Pool ? db.query<R>(text, values) : db.query<R>(text, values);
}

/** Integrity violations (class 23) carry the violated constraint. */
function constraintOf(error: unknown): string | null {
  if (!(error instanceof Error) || !('code' in error) || typeof error.code !== 'string') return null;
  if (!error.code.startsWith('23')) return null;
  return 'constraint' in error && typeof error.constraint === 'string' ? error.constraint : error.code;
}

const SAVEPOINT_NAME = /^[a-z_][a-z0-9_]*$/;

class PgRuleRepository implements RuleRepository {
  constructor(private readonly pool: pg.Pool) {}

  async insert(rule: Rule): Promise<Rule> {
    const { rows } = await query<RuleRow>(this.pool, RULE_QUERIES.INSERT, [
      rule.id,
      rule.name,
      rule.description,
      rule.source_text,
      JSON.stringify(rule.definition),
      rule.confidence,
      rule.compiled_by,
      rule.client_context,
      rule.priority,
      rule.is_permanent,
      rule.is_active,
      rule.usage_count,
      rule.success_rate,
      rule.last_used,
      rule.created_at,
      rule.updated_at,
      rule.version,
    ]);
    return rowToRule(rows[0]);
  }

  async findById(id: string): Promise<Rule | null> {
    const { rows } = await query<RuleRow>(this.pool, RULE_QUERIES.GET_BY_ID, [id]);
    return rows.length > 0 ? rowToRule(rows[0]) : null;
  }

  async findForClient(client: string | null): Promise<Rule[]> {
    const { rows } = await query<RuleRow>(this.pool, RULE_QUERIES.FIND_FOR_CLIENT, [client]);
    return rows.map(rowToRule);
  }

  async listPermanent(): Promise<Rule[]> {
    const { rows } = await query<RuleRow>(this.pool, RULE_QUERIES.LIST_PERMANENT);
    return rows.map(rowToRule);
  }

  async update(rule: Rule, expectedVersion: number): Promise<Rule | null> {
    const { rows } = await query<RuleRow>(this.pool, RULE_QUERIES.UPDATE, [
      rule.id,
      rule.name,
      rule.description,
      JSON.stringify(rule.definition),
      rule.compiled_by,
      rule.priority,
      rule.is_permanent,
      rule.is_active,
      rule.updated_at,
      rule.version,
      expectedVersion,
    ]);
    return rows.length > 0 ? rowToRule(rows[0]) : null;
  }

  async recordUsage(id: string, success: boolean, at: Date): Promise<Rule | null> {
    const { rows } = await query<RuleRow>(this.pool, RULE_QUERIES.RECORD_USAGE, [id, success ? 1 : 0, at]);
    return rows.length > 0 ? rowToRule(rows[0]) : null;
  }
}

class PgRecordStore implements RecordReader, RecordWriter {
  constructor(private readonly db: Db) {}

  async getBatch(batchId: string): Promise<Batch | null> {
    const { rows } = await query<BatchRow>(this.db, RECORD_QUERIES.GET_BATCH, [batchId]);
    return rows.length > 0 ? rowToBatch(rows[0]) : null;
  }

  async listRecords(batchId: string): Promise<LotRecordState[]> {
    const { rows } = await query<LotRecordRow>(this.db, RECORD_QUERIES.LIST_RECORDS, [batchId]);
    return rows.map(rowToLotRecord);
  }

  async insertBatch(batch: Batch, records: LotRecord[]): Promise<void> {
    await query(this.db, RECORD_QUERIES.INSERT_BATCH, [
      batch.id,
      batch.client_context,
      batch.source_name,
      batch.record_count,
      batch.created_at,
    ]);
    const rows = records.map((data, position) => ({ lot_id: data.lot_id, position, data }));
    await query(this.db, RECORD_QUERIES.INSERT_RECORDS, [batch.id, JSON.stringify(rows)]);
  }

  async lockRecords(batchId: string, lotIds: string[]): Promise<Map<string, LotRecordState>> {
    const { rows } = await query<LotRecordRow>(this.db, RECORD_QUERIES.LOCK_RECORDS, [batchId, lotIds]);
    return new Map(rows.map((row) => [row.lot_id, rowToLotRecord(row)]));
  }

  async writeRecord(next: LotRecordState, expectedVersion: number): Promise<LotRecordState> {
    let rows: LotRecordRow[];
    try {
      const result = await query<LotRecordRow>(this.db, RECORD_QUERIES.WRITE_RECORD, [
        next.batch_id,
        next.lot_id,
        JSON.stringify(next.data),
        next.status,
        next.issues,
        expectedVersion,
      ]);
      rows = result.rows;
    } catch (error) {
      const constraint = constraintOf(error);
      if (constraint === null) throw error;
      throw new RecordConstraintError(
        next.lot_id,
        constraint,
        `Record ${next.lot_id} violates constraint ${constraint}`,
      );
    }
    if (rows.length > 0) return rowToLotRecord(rows[0]);

    const { rows: current } = await query<{ version: number }>(this.db, RECORD_QUERIES.GET_VERSION, [
      next.batch_id,
      next.lot_id,
    ]);
    if (current.length === 0) throw new EntityNotFoundError('lot_record', next.lot_id);
    throw new ConcurrencyConflictError(next.lot_id, expectedVersion, current[0].version);
  }
}

class PgLedgerStore implements LedgerReader, LedgerWriter {
  constructor(private readonly db: Db) {}

  async getOperation(operationId: string): Promise<OperationLogEntry | null> {
    const { rows } = await query<OperationRow>(this.db, LEDGER_QUERIES.GET_OPERATION, [operationId]);
    return rows.length > 0 ? rowToOperation(rows[0]) : null;
  }

  async listOperations(filter: OperationFilter = {}): Promise<OperationLogEntry[]> {
    const { rows } = await query<OperationRow>(this.db, LEDGER_QUERIES.LIST_OPERATIONS, [
      filter.batch_id ?? null,
      filter.kind ?? null,
      filter.limit ?? null,
    ]);
    return rows.map(rowToOperation);
  }

  async listChangeEntries(filter: ChangeEntryFilter = {}): Promise<ChangeEntry[]> {
    const { rows } = await query<ChangeEntryRow>(this.db, LEDGER_QUERIES.LIST_CHANGE_ENTRIES, [
      filter.batch_id ?? null,
      filter.operation_id ?? null,
      filter.status ?? null,
    ]);
    return rows.map(rowToChangeEntry);
  }

  async getSnapshot(snapshotId: string): Promise<BatchSnapshot | null> {
    const { rows } = await query<SnapshotRow>(this.db, LEDGER_QUERIES.GET_SNAPSHOT, [snapshotId]);
    return rows.length > 0 ? rowToSnapshot(rows[0]) : null;
  }

  async insertSnapshot(snapshot: BatchSnapshot): Promise<void> {
    await query(this.db, LEDGER_QUERIES.INSERT_SNAPSHOT, [
      snapshot.snapshot_id,
      snapshot.batch_id,
      snapshot.operation_id,
      JSON.stringify(snapshot.records),
      snapshot.created_at,
    ]);
  }

  async insertOperation(operation: OperationLogEntry): Promise<void> {
    await query(this.db, LEDGER_QUERIES.INSERT_OPERATION, [
      operation.operation_id,
      operation.batch_id,
      operation.kind,
      operation.status,
      operation.rule_ids,
      JSON.stringify(operation.counts),
      operation.client_context,
      operation.actor.type,
      operation.actor.id,
      operation.actor.name,
      operation.snapshot_id,
      operation.target_operation_id,
      operation.rolled_back_by,
      operation.created_at,
    ]);
  }

  async insertChangeEntries(entries: ChangeEntry[]): Promise<void> {
    if (entries.length === 0) return;
    await query(this.db, LEDGER_QUERIES.INSERT_CHANGE_ENTRIES, [JSON.stringify(entries)]);
  }

  async lockOperation(operationId: string): Promise<OperationLogEntry | null> {
    const { rows } = await query<OperationRow>(this.db, LEDGER_QUERIES.LOCK_OPERATION, [operationId]);
    return rows.length > 0 ? rowToOperation(rows[0]) : null;
  }

  async setChangeStatus(operationId: string, from: ChangeStatus, to: ChangeStatus): Promise<number> {
    const result = await query(this.db, LEDGER_QUERIES.SET_CHANGE_STATUS, [operationId, from, to]);
    return result.rowCount ?? 0;
  }

  async markOperationRolledBack(operationId: string, rolledBackBy: string): Promise<void> {
    const result = await query(this.db, LEDGER_QUERIES.MARK_ROLLED_BACK, [operationId, rolledBackBy]);
    if (result.rowCount === 0) throw new EntityNotFoundError('operation', operationId);
  }
}

/**
 * CleaningStorage over PostgreSQL. Transactions hold one pooled client;
 * savepoints map to SAVEPOINT / ROLLBACK TO SAVEPOINT on it.
 */
export class PgCleaningStorage implements CleaningStorage {
  readonly rules: RuleRepository;
  readonly records: RecordReader;
  readonly ledger: LedgerReader;
  private readonly logger: Logger;

  constructor(
    private readonly pool: pg.Pool,
    logger?: Logger,
  ) {
    this.rules = new PgRuleRepository(pool);
    this.records = new PgRecordStore(pool);
    this.ledger = new PgLedgerStore(pool);
    this.logger = logger ?? createLogger('pg-storage');
  }

  async withTransaction<T>(work: (tx: StorageTransaction) => Promise<T>): Promise<T> {
    return withTransaction(this.pool, (client) =>
      work({
        records: new PgRecordStore(client),
        ledger: new PgLedgerStore(client),
        savepoint: (name, savepointWork) => this.savepoint(client, name, savepointWork),
      }),
    );
  }

  private async savepoint<R>(client: pg.PoolClient, name: string, work: () => Promise<R>): Promise<R> {
    if (!SAVEPOINT_NAME.test(name)) throw new Error(`Invalid savepoint name: ${name}`);
    await client.query(`SAVEPOINT ${name}`);
    try {
      const result = await work();
      await client.query(`RELEASE SAVEPOINT ${name}`);
      return result;
    } catch (error) {
      this.logger.debug({ savepoint: name, err: error }, 'Rolling back to savepoint');
      await client.query(`ROLLBACK TO SAVEPOINT ${name}`);
      throw error;
    }
  }
}
