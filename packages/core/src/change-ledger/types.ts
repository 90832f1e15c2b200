import type { Actor, FieldValue, LotRecord } from '../shared/types.js';
import type { RuleActionKind } from '../rules-engine/types.js';

export type RiskLevel = 'low' | 'medium' | 'high';

export type ChangeStatus = 'proposed' | 'applied' | 'rejected' | 'rolled_back';

/**
 * One proposed or applied effect of a rule on a record. `change_key` is
 * derived from batch, lot, rule and field so previews are reproducible.
 */
export interface ChangeEntry {
  change_key: string;
  batch_id: string;
  lot_id: string;
  position: number;
  field: string;
  action: RuleActionKind;
  original_value: FieldValue;
  /** Equal to the original for flags; null for removals. */
  new_value: FieldValue;
  rule_id: string;
  confidence: number;
  reason: string;
  risk_level: RiskLevel;
  status: ChangeStatus;
  operation_id: string | null;
  failure_reason: string | null;
}

export type LotStatus = 'original' | 'flagged' | 'cleaned' | 'removed';

/** A stored record with the state cleaning has left it in. */
export interface LotRecordState {
  batch_id: string;
  lot_id: string;
  position: number;
  data: LotRecord;
  status: LotStatus;
  issues: string[];
  version: number;
}

export interface Batch {
  id: string;
  client_context: string | null;
  source_name: string | null;
  record_count: number;
  created_at: Date;
}

export interface BatchSnapshot {
  snapshot_id: string;
  batch_id: string;
  operation_id: string;
  records: LotRecordState[];
  created_at: Date;
}

export type OperationKind = 'apply' | 'rollback';

export type OperationStatus = 'applied' | 'partially_applied' | 'cancelled' | 'rolled_back' | 'completed';

export interface OperationCounts {
  flagged: number;
  changed: number;
  removed: number;
  failed: number;
  rejected: number;
  restored: number;
}

export interface OperationLogEntry {
  operation_id: string;
  batch_id: string;
  kind: OperationKind;
  status: OperationStatus;
  rule_ids: string[];
  counts: OperationCounts;
  client_context: string | null;
  actor: Actor;
  snapshot_id: string | null;
  /** Set on rollback entries: the apply operation being reverted. */
  target_operation_id: string | null;
  /** Set on apply entries once reverted: the rollback operation id. */
  rolled_back_by: string | null;
  created_at: Date;
}

export interface OperationFilter {
  batch_id?: string;
  kind?: OperationKind;
  limit?: number;
}

export interface ChangeEntryFilter {
  batch_id?: string;
  operation_id?: string;
  status?: ChangeStatus;
}

export interface RollbackResult {
  operation_id: string;
  target_operation_id: string;
  batch_id: string;
  restored_lot_ids: string[];
  entries_rolled_back: number;
}

export function emptyCounts(): OperationCounts {
  return { flagged: 0, changed: 0, removed: 0, failed: 0, rejected: 0, restored: 0 };
}
