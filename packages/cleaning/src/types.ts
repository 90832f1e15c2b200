import type {
  Actor,
  ChangeEntry,
  CompileErrorCode,
  Diagnostic,
  FieldSchema,
  OperationCounts,
  OperationStatus,
  RuleOrdering,
} from '@dataherd/core';

export interface RuleCount {
  rule_id: string;
  flagged: number;
  changed: number;
  removed: number;
}

export interface ChangeSetSummary {
  records_scanned: number;
  records_affected: number;
  flagged: number;
  changed: number;
  removed: number;
  by_rule: RuleCount[];
}

export interface RiskAssessment {
  score: number;
  requires_approval: boolean;
  high_risk_count: number;
}

export type ChangeSetOutcome = 'changes_proposed' | 'no_issues_found' | 'no_applicable_rules' | 'compilation_failed';

export interface CompileFailure {
  text: string;
  code: CompileErrorCode;
  message: string;
}

/**
 * Result of a preview. Holds no timestamps or generated ids, so the same
 * records and rules always produce the same ChangeSet.
 */
export interface ChangeSet {
  batch_id: string;
  client_context: string | null;
  /** Reference date (YYYY-MM-DD) used by date conditions. */
  as_of: string;
  entries: ChangeEntry[];
  rule_ids: string[];
  summary: ChangeSetSummary;
  diagnostics: Diagnostic[];
  risk: RiskAssessment;
  outcome: ChangeSetOutcome;
  compile_errors: CompileFailure[];
  min_confidence: number | null;
  fingerprint: string;
}

export interface PreviewOptions {
  client_context?: string | null;
  ordering?: RuleOrdering;
  as_of?: Date;
  schema?: FieldSchema;
}

export type ApplyRequest =
  | {
      kind: 'change_set';
      change_set: ChangeSet;
      /** Change keys to apply; all entries when omitted. */
      approved_keys?: string[];
    }
  | {
      kind: 'direct';
      /** Must be true: direct lists skip the preview step. */
      bypass_preview: boolean;
      entries: ChangeEntry[];
    };

export interface ApplyOptions {
  actor?: Actor;
  signal?: AbortSignal;
}

export type ApplyFailureCause = 'constraint_violation' | 'record_not_found' | 'stale_value';

export interface ApplyFailure {
  change_key: string;
  lot_id: string;
  rule_id: string;
  cause: ApplyFailureCause;
  message: string;
}

export interface ApplyResult {
  operation_id: string;
  batch_id: string;
  status: OperationStatus;
  snapshot_id: string;
  counts: OperationCounts;
  applied: ChangeEntry[];
  failed: ApplyFailure[];
  /** Entries left out of the approval. */
  rejected: ChangeEntry[];
  /** Entries not reached before cancellation; still proposed. */
  pending: ChangeEntry[];
}
