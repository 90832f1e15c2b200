import {
  ApplyError,
  BatchContext,
  ChangeLedger,
  ConcurrencyConflictError,
  EntityNotFoundError,
  PreviewError,
  RecordConstraintError,
  RuleStore,
  SYSTEM_ACTOR,
  createLogger,
  emptyCounts,
  endSpan,
  err,
  evaluateRecord,
  filterActiveRules,
  generateId,
  ok,
  orderRules,
  startSpan,
  withSpan,
  type Actor,
  type Batch,
  type ChangeEntry,
  type CleaningStorage,
  type Diagnostic,
  type EvaluationContext,
  type LotRecord,
  type LotRecordState,
  type LotStatus,
  type Logger,
  type OperationLogEntry,
  type OperationStatus,
  type Result,
  type Rule,
  type RuleMatch,
  type RuleOrdering,
  type StorageTransaction,
} from '@dataherd/core';
import { assessRisk, changeKey, isMutation, riskLevelFor, sealChangeSet, summarize, verifyFingerprint } from './change-set.js';
import type {
  ApplyFailure,
  ApplyFailureCause,
  ApplyOptions,
  ApplyRequest,
  ApplyResult,
  ChangeSet,
  ChangeSetOutcome,
  CompileFailure,
  PreviewOptions,
} from './types.js';

export interface BatchProcessorDeps {
  storage: CleaningStorage;
  ruleStore?: RuleStore;
  ledger?: ChangeLedger;
  logger?: Logger;
  /** Default tie-break between rules on the same field. */
  ordering?: RuleOrdering;
}

export interface IngestOptions {
  batch_id?: string;
  client_context?: string | null;
  source_name?: string | null;
}

export interface BatchPreviewOptions extends PreviewOptions {
  /** Rules evaluated in addition to the stored ones, e.g. freshly compiled drafts. */
  rules?: Rule[];
  include_stored_rules?: boolean;
  compile_errors?: CompileFailure[];
}

interface PositionedRecord {
  position: number;
  record: LotRecord;
}

interface ResolvedRequest {
  /** Every entry of the request, in request order. */
  entries: ChangeEntry[];
  approved: ChangeEntry[];
  unapproved: ChangeEntry[];
}

type RecordFailure = { cause: ApplyFailureCause; message: string };

const STATUS_RANK: Record<LotStatus, number> = { original: 0, flagged: 1, cleaned: 2, removed: 3 };
const NOT_APPROVED = 'not approved';

function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function duplicateLotIds(records: LotRecord[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const record of records) {
    if (seen.has(record.lot_id)) duplicates.add(record.lot_id);
    seen.add(record.lot_id);
  }
  return [...duplicates];
}

function toEntry(batchId: string, position: number, record: LotRecord, match: RuleMatch): ChangeEntry {
  const original = record[match.field] ?? null;
  const newValue = match.mutation ? match.mutation.to : match.action === 'remove' ? null : original;
  return {
    change_key: changeKey(batchId, record.lot_id, match.rule_id, match.field),
    batch_id: batchId,
    lot_id: record.lot_id,
    position,
    field: match.field,
    action: match.action,
    original_value: original,
    new_value: newValue,
    rule_id: match.rule_id,
    confidence: match.confidence,
    reason: match.reason,
    risk_level: riskLevelFor(match.action, match.confidence),
    status: 'proposed',
    operation_id: null,
    failure_reason: null,
  };
}

function higherStatus(a: LotStatus, b: LotStatus): LotStatus {
  return STATUS_RANK[a] >= STATUS_RANK[b] ? a : b;
}

/** The record as it is after all of its approved entries. */
function nextRecordState(current: LotRecordState, entries: ChangeEntry[]): LotRecordState {
  const data: LotRecord = { ...current.data };
  const issues = [...current.issues];
  let status = current.status;

  for (const entry of entries) {
    if (entry.action === 'flag') {
      if (!issues.includes(entry.reason)) issues.push(entry.reason);
      status = higherStatus(status, 'flagged');
    } else if (entry.action === 'remove') {
      status = 'removed';
    } else {
      data[entry.field] = entry.new_value;
      status = higherStatus(status, 'cleaned');
    }
  }
  return { ...current, data, issues, status };
}

function groupByLot(entries: ChangeEntry[]): Map<string, ChangeEntry[]> {
  const groups = new Map<string, ChangeEntry[]>();
  for (const entry of [...entries].sort((a, b) => a.position - b.position)) {
    const group = groups.get(entry.lot_id) ?? [];
    group.push(entry);
    groups.set(entry.lot_id, group);
  }
  return groups;
}

function uniqueRuleIds(entries: ChangeEntry[]): string[] {
  return [...new Set(entries.map((entry) => entry.rule_id))];
}

/**
 * Turns rules and records into ChangeSets, and approved ChangeSets into
 * record mutations with a snapshot and an operation log entry.
 */
export class BatchProcessor {
  private readonly storage: CleaningStorage;
  private readonly ruleStore: RuleStore;
  private readonly ledger: ChangeLedger;
  private readonly logger: Logger;
  private readonly ordering: RuleOrdering;

  constructor(deps: BatchProcessorDeps) {
    this.storage = deps.storage;
    this.logger = deps.logger ?? createLogger('batch-processor');
    this.ruleStore = deps.ruleStore ?? new RuleStore(deps.storage.rules, this.logger);
    this.ledger = deps.ledger ?? new ChangeLedger(deps.storage, this.logger);
    this.ordering = deps.ordering ?? 'priority_then_recency';
  }

  async getBatch(batchId: string): Promise<Batch | null> {
    return this.storage.records.getBatch(batchId);
  }

  /** Store a new batch of records in input order. */
  async ingest(records: LotRecord[], options: IngestOptions = {}): Promise<Result<Batch, PreviewError>> {
    const duplicates = duplicateLotIds(records);
    if (duplicates.length > 0) {
      return err(new PreviewError('duplicate_lot_id', `Duplicate lot_id values: ${duplicates.join(', ')}`, duplicates));
    }
    const batch: Batch = {
      id: options.batch_id ?? generateId(),
      client_context: options.client_context ?? null,
      source_name: options.source_name ?? null,
      record_count: records.length,
      created_at: new Date(),
    };
    await this.storage.withTransaction((tx) => tx.records.insertBatch(batch, records));
    this.logger.info({ batch_id: batch.id, records: records.length, client: batch.client_context }, 'Batch ingested');
    return ok(batch);
  }

  /**
   * Evaluate `rules` against `records` without touching storage. Rules are
   * filtered to active ones in scope for the client and ordered by the
   * configured tie-break.
   */
  preview(
    batchId: string,
    records: LotRecord[],
    rules: Rule[],
    options: PreviewOptions = {},
  ): Result<ChangeSet, PreviewError> {
    const duplicates = duplicateLotIds(records);
    if (duplicates.length > 0) {
      return err(
        new PreviewError('duplicate_lot_id', `Duplicate lot_id in batch ${batchId}: ${duplicates.join(', ')}`, duplicates),
      );
    }
    return ok(
      this.evaluateBatch(
        batchId,
        records.map((record, position) => ({ position, record })),
        rules,
        options,
        [],
      ),
    );
  }

  /** Preview a stored batch against the client's stored rules plus any extra ones. */
  async previewBatch(batchId: string, options: BatchPreviewOptions = {}): Promise<Result<ChangeSet, PreviewError>> {
    const batch = await this.storage.records.getBatch(batchId);
    if (!batch) return err(new PreviewError('batch_not_found', `Batch not found: ${batchId}`));

    const clientContext = options.client_context !== undefined ? options.client_context : batch.client_context;
    const stored = options.include_stored_rules === false ? [] : await this.ruleStore.getForClient(clientContext);
    const states = await this.storage.records.listRecords(batchId);
    const live = states
      .filter((state) => state.status !== 'removed')
      .map((state) => ({ position: state.position, record: state.data }));

    return ok(
      this.evaluateBatch(
        batchId,
        live,
        [...stored, ...(options.rules ?? [])],
        { ...options, client_context: clientContext },
        options.compile_errors ?? [],
      ),
    );
  }

  /** A ChangeSet with no entries, e.g. when no rule could be compiled. */
  emptyChangeSet(
    batchId: string,
    outcome: ChangeSetOutcome,
    options: { client_context?: string | null; as_of?: Date; compile_errors?: CompileFailure[]; records_scanned?: number } = {},
  ): ChangeSet {
    return sealChangeSet({
      batch_id: batchId,
      client_context: options.client_context ?? null,
      as_of: toIsoDate(options.as_of ?? new Date()),
      entries: [],
      rule_ids: [],
      summary: summarize([], [], options.records_scanned ?? 0),
      diagnostics: [],
      risk: assessRisk([]),
      outcome,
      compile_errors: options.compile_errors ?? [],
      min_confidence: null,
    });
  }

  private evaluateBatch(
    batchId: string,
    rows: PositionedRecord[],
    rules: Rule[],
    options: PreviewOptions,
    compileErrors: CompileFailure[],
  ): ChangeSet {
    const clientContext = options.client_context ?? null;
    const asOf = toIsoDate(options.as_of ?? new Date());
    const active = orderRules(filterActiveRules(rules, clientContext), options.ordering ?? this.ordering);
    const ruleIds = active.map((rule) => rule.id);

    if (active.length === 0) {
      return this.emptyChangeSet(batchId, 'no_applicable_rules', {
        client_context: clientContext,
        as_of: options.as_of,
        compile_errors: compileErrors,
        records_scanned: rows.length,
      });
    }

    const context: EvaluationContext = {
      schema: options.schema,
      as_of: new Date(`${asOf}T00:00:00Z`),
      batch: new BatchContext(rows.map((row) => row.record)),
    };

    const span = startSpan('batch.preview', { 'batch.id': batchId, 'rules.count': active.length });
    const entries: ChangeEntry[] = [];
    const diagnostics: Diagnostic[] = [];
    for (const { position, record } of rows) {
      const evaluation = evaluateRecord(active, record, context);
      diagnostics.push(...evaluation.diagnostics);
      for (const match of evaluation.matches) entries.push(toEntry(batchId, position, record, match));
    }
    span.setAttribute('entries.count', entries.length);
    endSpan(span);

    const minConfidence = entries.reduce<number | null>(
      (min, entry) => (min === null ? entry.confidence : Math.min(min, entry.confidence)),
      null,
    );

    return sealChangeSet({
      batch_id: batchId,
      client_context: clientContext,
      as_of: asOf,
      entries,
      rule_ids: ruleIds,
      summary: summarize(entries, ruleIds, rows.length),
      diagnostics,
      risk: assessRisk(entries),
      outcome: entries.length > 0 ? 'changes_proposed' : 'no_issues_found',
      compile_errors: compileErrors,
      min_confidence: minConfidence,
    });
  }

  /**
   * Apply approved entries record by record. A record that fails is reported
   * and skipped; records before it stay applied. Cancellation is honoured
   * between records and leaves the remaining entries proposed.
   */
  async apply(batchId: string, request: ApplyRequest, options: ApplyOptions = {}): Promise<Result<ApplyResult, ApplyError>> {
    const resolved = this.resolveRequest(batchId, request);
    if (!resolved.ok) return err(resolved.error);

    const batch = await this.storage.records.getBatch(batchId);
    if (!batch) return err(new ApplyError('batch_not_found', `Batch not found: ${batchId}`));

    const actor = options.actor ?? SYSTEM_ACTOR;
    return withSpan('batch.apply', { 'batch.id': batchId, 'entries.approved': resolved.value.approved.length }, async (span) => {
      const result = await this.storage.withTransaction((tx) =>
        this.applyInTransaction(tx, batch, resolved.value, actor, options.signal),
      );
      span.setAttribute('operation.id', result.operation_id);
      span.setAttribute('operation.status', result.status);

      await this.recordRuleUsage(result);
      this.logger.info(
        { batch_id: batchId, operation_id: result.operation_id, status: result.status, counts: result.counts },
        'Apply finished',
      );
      return ok(result);
    });
  }

  private resolveRequest(batchId: string, request: ApplyRequest): Result<ResolvedRequest, ApplyError> {
    if (request.kind === 'direct' && !request.bypass_preview) {
      return err(new ApplyError('preview_required', 'Apply needs a previewed ChangeSet or bypass_preview'));
    }
    if (request.kind === 'change_set') {
      const changeSet = request.change_set;
      if (changeSet.batch_id !== batchId) {
        return err(new ApplyError('batch_mismatch', `ChangeSet belongs to batch ${changeSet.batch_id}, not ${batchId}`));
      }
      if (!verifyFingerprint(changeSet)) {
        return err(new ApplyError('invalid_change_set', 'ChangeSet fingerprint does not match its content'));
      }
    }
    if (request.kind === 'change_set' && request.change_set.risk.requires_approval && !request.approved_keys) {
      const { score, high_risk_count } = request.change_set.risk;
      return err(
        new ApplyError(
          'approval_required',
          `ChangeSet needs explicit approved_keys (risk score ${score}, ${high_risk_count} high-risk)`,
        ),
      );
    }
    const entries = request.kind === 'direct' ? request.entries : request.change_set.entries;
    const approvedKeys =
      request.kind === 'change_set' && request.approved_keys ? new Set(request.approved_keys) : null;

    const keys = new Set<string>();
    for (const entry of entries) {
      if (entry.batch_id !== batchId) {
        return err(new ApplyError('batch_mismatch', `Entry ${entry.change_key} belongs to batch ${entry.batch_id}`));
      }
      if (entry.status !== 'proposed') {
        return err(new ApplyError('invalid_change_set', `Entry ${entry.change_key} is ${entry.status}, not proposed`));
      }
      if (keys.has(entry.change_key)) {
        return err(new ApplyError('invalid_change_set', `Duplicate change key ${entry.change_key}`));
      }
      keys.add(entry.change_key);
    }

    if (approvedKeys) {
      const unknown = [...approvedKeys].filter((key) => !keys.has(key));
      if (unknown.length > 0) {
        return err(new ApplyError('invalid_change_set', `Approved keys not in the ChangeSet: ${unknown.join(', ')}`));
      }
    }

    const approved = approvedKeys ? entries.filter((entry) => approvedKeys.has(entry.change_key)) : entries;
    if (approved.length === 0) return err(new ApplyError('nothing_to_apply', 'No approved entries to apply'));
    const unapproved = approvedKeys ? entries.filter((entry) => !approvedKeys.has(entry.change_key)) : [];
    return ok({ entries, approved, unapproved });
  }

  private async applyInTransaction(
    tx: StorageTransaction,
    batch: Batch,
    request: ResolvedRequest,
    actor: Actor,
    signal: AbortSignal | undefined,
  ): Promise<ApplyResult> {
    const operationId = generateId();
    const groups = groupByLot(request.approved);
    const locked = await tx.records.lockRecords(batch.id, [...groups.keys()]);
    const snapshotId = await this.ledger.snapshot(batch.id, [...locked.values()], { operation_id: operationId, tx });

    const final = new Map<string, ChangeEntry>();
    const applied: ChangeEntry[] = [];
    const failed: ApplyFailure[] = [];
    const pending: ChangeEntry[] = [];
    let cancelled = false;
    let index = 0;

    for (const [lotId, lotEntries] of groups) {
      if (!cancelled && signal?.aborted) {
        cancelled = true;
        this.logger.warn({ batch_id: batch.id, operation_id: operationId, at_lot: lotId }, 'Apply cancelled');
      }
      if (cancelled) {
        for (const entry of lotEntries) {
          const kept: ChangeEntry = { ...entry, operation_id: operationId };
          pending.push(kept);
          final.set(entry.change_key, kept);
        }
        continue;
      }

      const outcome = await this.applyRecord(tx, locked.get(lotId), lotEntries, index++);
      for (const entry of lotEntries) {
        if (outcome.ok) {
          const done: ChangeEntry = { ...entry, status: 'applied', operation_id: operationId };
          applied.push(done);
          final.set(entry.change_key, done);
        } else {
          failed.push({ change_key: entry.change_key, lot_id: lotId, rule_id: entry.rule_id, ...outcome.error });
          final.set(entry.change_key, {
            ...entry,
            status: 'rejected',
            operation_id: operationId,
            failure_reason: `${outcome.error.cause}: ${outcome.error.message}`,
          });
        }
      }
    }

    const rejected = request.unapproved.map(
      (entry): ChangeEntry => ({ ...entry, status: 'rejected', operation_id: operationId, failure_reason: NOT_APPROVED }),
    );
    for (const entry of rejected) final.set(entry.change_key, entry);

    const counts = emptyCounts();
    for (const entry of applied) {
      if (entry.action === 'flag') counts.flagged++;
      else if (entry.action === 'remove') counts.removed++;
      else if (isMutation(entry.action)) counts.changed++;
    }
    counts.failed = failed.length;
    counts.rejected = rejected.length;

    const status: OperationStatus = cancelled ? 'cancelled' : failed.length > 0 ? 'partially_applied' : 'applied';
    const stored = request.entries.flatMap((entry) => {
      const outcome = final.get(entry.change_key);
      return outcome ? [outcome] : [];
    });
    await tx.ledger.insertChangeEntries(stored);

    const operation: OperationLogEntry = {
      operation_id: operationId,
      batch_id: batch.id,
      kind: 'apply',
      status,
      rule_ids: uniqueRuleIds(request.approved),
      counts,
      client_context: batch.client_context,
      actor,
      snapshot_id: snapshotId,
      target_operation_id: null,
      rolled_back_by: null,
      created_at: new Date(),
    };
    await tx.ledger.insertOperation(operation);

    return {
      operation_id: operationId,
      batch_id: batch.id,
      status,
      snapshot_id: snapshotId,
      counts,
      applied,
      failed,
      rejected,
      pending,
    };
  }

  private async applyRecord(
    tx: StorageTransaction,
    current: LotRecordState | undefined,
    entries: ChangeEntry[],
    index: number,
  ): Promise<Result<LotRecordState, RecordFailure>> {
    const lotId = entries[0].lot_id;
    if (!current) {
      return err({ cause: 'record_not_found', message: `Record ${lotId} not found` });
    }

    const stale = entries.find((entry) => (current.data[entry.field] ?? null) !== entry.original_value);
    if (stale) {
      const actual = current.data[stale.field] ?? null;
      return err({
        cause: 'stale_value',
        message: `${stale.field} is ${JSON.stringify(actual)}, expected ${JSON.stringify(stale.original_value)}`,
      });
    }

    try {
      const written = await tx.savepoint(`apply_record_${index}`, () =>
        tx.records.writeRecord(nextRecordState(current, entries), current.version),
      );
      return ok(written);
    } catch (error) {
      if (error instanceof RecordConstraintError) return err({ cause: 'constraint_violation', message: error.message });
      if (error instanceof ConcurrencyConflictError) return err({ cause: 'stale_value', message: error.message });
      if (error instanceof EntityNotFoundError) return err({ cause: 'record_not_found', message: error.message });
      throw error;
    }
  }

  /**
   * One usage per rule touched; a rule with any failed entry counts as
   * unsuccessful. Runs after commit, so a storage error here is logged and
   * the apply result still returned.
   */
  private async recordRuleUsage(result: ApplyResult): Promise<void> {
    const failedRules = new Set(result.failed.map((failure) => failure.rule_id));
    const attempted = new Set([...result.applied.map((entry) => entry.rule_id), ...failedRules]);

    for (const ruleId of attempted) {
      try {
        const usage = await this.ruleStore.recordUsage(ruleId, !failedRules.has(ruleId));
        if (!usage.ok) {
          this.logger.debug({ rule_id: ruleId, code: usage.error.code }, 'Usage not recorded for unsaved rule');
        }
      } catch (error) {
        this.logger.warn(
          { err: error, rule_id: ruleId, operation_id: result.operation_id },
          'Failed to record rule usage',
        );
      }
    }
  }
}
