import type { Logger } from 'pino';
import {
  ConcurrencyConflictError,
  EntityNotFoundError,
  RecordConstraintError,
  RollbackError,
} from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { err, generateId, ok, SYSTEM_ACTOR, type Actor, type Result } from '../shared/types.js';
import { withSpan } from '../observability/tracing.js';
import type { CleaningStorage, StorageTransaction } from '../storage/types.js';
import {
  emptyCounts,
  type BatchSnapshot,
  type ChangeEntry,
  type ChangeEntryFilter,
  type LotRecordState,
  type OperationFilter,
  type OperationLogEntry,
  type RollbackResult,
} from './types.js';

export interface SnapshotOptions {
  operation_id: string;
  /** Write inside an open transaction instead of a new one. */
  tx?: StorageTransaction;
}

export interface RollbackOptions {
  actor?: Actor;
}

/** Carries a typed refusal out of the transaction so nothing commits. */
class RollbackAbort extends Error {
  constructor(public readonly reason: RollbackError) {
    super(reason.message);
    this.name = 'RollbackAbort';
  }
}

interface LaterWrite {
  lot_id: string;
  operation_id: string;
}

function uniqueLotIds(entries: ChangeEntry[]): string[] {
  return [...new Set(entries.map((entry) => entry.lot_id))];
}

/**
 * Owns before-images and the operation log, and reverts applied operations.
 */
export class ChangeLedger {
  private readonly logger: Logger;

  constructor(
    private readonly storage: CleaningStorage,
    logger?: Logger,
  ) {
    this.logger = logger ?? createLogger('change-ledger');
  }

  async snapshot(batchId: string, recordsBefore: LotRecordState[], options: SnapshotOptions): Promise<string> {
    const snapshot: BatchSnapshot = {
      snapshot_id: generateId(),
      batch_id: batchId,
      operation_id: options.operation_id,
      records: recordsBefore,
      created_at: new Date(),
    };
    if (options.tx) {
      await options.tx.ledger.insertSnapshot(snapshot);
    } else {
      await this.storage.withTransaction((tx) => tx.ledger.insertSnapshot(snapshot));
    }
    return snapshot.snapshot_id;
  }

  /**
   * Restore every record touched by an applied operation to its before-image.
   * Either the whole operation is reverted or nothing changes.
   */
  async rollback(operationId: string, options: RollbackOptions = {}): Promise<Result<RollbackResult, RollbackError>> {
    const actor = options.actor ?? SYSTEM_ACTOR;

    return withSpan('ledger.rollback', { 'operation.id': operationId }, async (span) => {
      try {
        const result = await this.storage.withTransaction((tx) => this.rollbackInTransaction(tx, operationId, actor));
        span.setAttribute('rollback.restored', result.restored_lot_ids.length);
        this.logger.info(
          {
            operation_id: result.target_operation_id,
            rollback_operation_id: result.operation_id,
            restored: result.restored_lot_ids.length,
            entries: result.entries_rolled_back,
          },
          'Operation rolled back',
        );
        return ok(result);
      } catch (error) {
        if (error instanceof RollbackAbort) {
          this.logger.warn({ operation_id: operationId, code: error.reason.code }, 'Rollback refused');
          return err(error.reason);
        }
        throw error;
      }
    });
  }

  private async rollbackInTransaction(
    tx: StorageTransaction,
    operationId: string,
    actor: Actor,
  ): Promise<RollbackResult> {
    const operation = await tx.ledger.lockOperation(operationId);
    if (!operation) {
      throw new RollbackAbort(
        new RollbackError('operation_not_found', operationId, `Operation not found: ${operationId}`),
      );
    }
    if (operation.kind === 'rollback') {
      throw new RollbackAbort(
        new RollbackError('not_rollbackable', operationId, `Operation ${operationId} is itself a rollback`),
      );
    }
    if (operation.rolled_back_by !== null || operation.status === 'rolled_back') {
      throw new RollbackAbort(
        new RollbackError('already_rolled_back', operationId, `Operation ${operationId} was already rolled back`),
      );
    }

    const applied = await tx.ledger.listChangeEntries({ operation_id: operationId, status: 'applied' });
    const lotIds = uniqueLotIds(applied);
    const snapshot = operation.snapshot_id ? await tx.ledger.getSnapshot(operation.snapshot_id) : null;
    const beforeImages = new Map((snapshot?.records ?? []).map((record) => [record.lot_id, record]));
    const current = await tx.records.lockRecords(operation.batch_id, lotIds);

    const missing = lotIds.filter((lotId) => !current.has(lotId) || !beforeImages.has(lotId));
    if (missing.length > 0) {
      throw new RollbackAbort(
        new RollbackError(
          'restore_blocked',
          operationId,
          `Cannot restore ${missing.length} record(s) of operation ${operationId}`,
          missing,
        ),
      );
    }

    const overwritten = await this.lotsChangedSince(tx, operation, new Set(lotIds), beforeImages);
    if (overwritten.length > 0) {
      const blocking = overwritten.map((lot) => lot.lot_id);
      const later = [...new Set(overwritten.map((lot) => lot.operation_id))];
      throw new RollbackAbort(
        new RollbackError(
          'restore_blocked',
          operationId,
          `Later operation(s) ${later.join(', ')} changed ${blocking.length} record(s) of operation ${operationId}; roll them back first`,
          blocking,
        ),
      );
    }

    for (const lotId of lotIds) {
      const image = beforeImages.get(lotId);
      const stored = current.get(lotId);
      if (!image || !stored) continue;
      try {
        await tx.records.writeRecord({ ...image, version: stored.version }, stored.version);
      } catch (error) {
        if (
          error instanceof RecordConstraintError ||
          error instanceof ConcurrencyConflictError ||
          error instanceof EntityNotFoundError
        ) {
          throw new RollbackAbort(
            new RollbackError('restore_blocked', operationId, `Cannot restore ${lotId}: ${error.message}`, [lotId]),
          );
        }
        throw error;
      }
    }

    const entriesRolledBack = await tx.ledger.setChangeStatus(operationId, 'applied', 'rolled_back');

    const rollbackOperation: OperationLogEntry = {
      operation_id: generateId(),
      batch_id: operation.batch_id,
      kind: 'rollback',
      status: 'completed',
      rule_ids: operation.rule_ids,
      counts: { ...emptyCounts(), restored: lotIds.length },
      client_context: operation.client_context,
      actor,
      snapshot_id: operation.snapshot_id,
      target_operation_id: operationId,
      rolled_back_by: null,
      created_at: new Date(),
    };
    await tx.ledger.insertOperation(rollbackOperation);
    await tx.ledger.markOperationRolledBack(operationId, rollbackOperation.operation_id);

    return {
      operation_id: rollbackOperation.operation_id,
      target_operation_id: operationId,
      batch_id: operation.batch_id,
      restored_lot_ids: lotIds,
      entries_rolled_back: entriesRolledBack,
    };
  }

  /**
   * Lots restored by `operation` that a later apply, still in effect, has written.
   * An apply is later when its before-image of the lot carries a higher
   * version than this operation's before-image.
   */
  private async lotsChangedSince(
    tx: StorageTransaction,
    operation: OperationLogEntry,
    restoring: Set<string>,
    beforeImages: Map<string, LotRecordState>,
  ): Promise<LaterWrite[]> {
    const others = await tx.ledger.listChangeEntries({ batch_id: operation.batch_id, status: 'applied' });
    const byOperation = new Map<string, Set<string>>();
    for (const entry of others) {
      if (entry.operation_id === null || entry.operation_id === operation.operation_id) continue;
      if (!restoring.has(entry.lot_id)) continue;
      const lots = byOperation.get(entry.operation_id) ?? new Set<string>();
      lots.add(entry.lot_id);
      byOperation.set(entry.operation_id, lots);
    }

    const writes: LaterWrite[] = [];
    for (const [otherId, lots] of byOperation) {
      const other = await tx.ledger.getOperation(otherId);
      if (!other || other.rolled_back_by !== null || !other.snapshot_id) continue;
      const snapshot = await tx.ledger.getSnapshot(other.snapshot_id);
      for (const record of snapshot?.records ?? []) {
        const ours = beforeImages.get(record.lot_id);
        if (lots.has(record.lot_id) && ours && record.version > ours.version) {
          writes.push({ lot_id: record.lot_id, operation_id: otherId });
        }
      }
    }
    return writes.sort((a, b) => a.lot_id.localeCompare(b.lot_id));
  }

  async getOperation(operationId: string): Promise<OperationLogEntry | null> {
    return this.storage.ledger.getOperation(operationId);
  }

  async listOperations(filter: OperationFilter = {}): Promise<OperationLogEntry[]> {
    return this.storage.ledger.listOperations(filter);
  }

  async listChangeEntries(filter: ChangeEntryFilter = {}): Promise<ChangeEntry[]> {
    return this.storage.ledger.listChangeEntries(filter);
  }

  async getSnapshot(snapshotId: string): Promise<BatchSnapshot | null> {
    return this.storage.ledger.getSnapshot(snapshotId);
  }
}
