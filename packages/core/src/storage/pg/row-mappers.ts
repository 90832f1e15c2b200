import { z } from 'zod';
import type { Actor, FieldValue } from '../../shared/types.js';
import { validateRuleDefinition } from '../../rules-engine/rule-validator.js';
import type { CompiledBy, Rule, RuleActionKind } from '../../rules-engine/types.js';
import type {
  Batch,
  BatchSnapshot,
  ChangeEntry,
  ChangeStatus,
  LotRecordState,
  LotStatus,
  OperationKind,
  OperationLogEntry,
  OperationStatus,
  RiskLevel,
} from '../../change-ledger/types.js';

export interface RuleRow {
  id: string;
  name: string;
  description: string;
  source_text: string;
  definition: unknown;
  confidence: number;
  compiled_by: string;
  client_context: string | null;
  priority: number | null;
  is_permanent: boolean;
  is_active: boolean;
  usage_count: number;
  success_rate: number;
  last_used: Date | null;
  created_at: Date;
  updated_at: Date;
  version: number;
}

export interface BatchRow {
  id: string;
  client_context: string | null;
  source_name: string | null;
  record_count: number;
  created_at: Date;
}

export interface LotRecordRow {
  batch_id: string;
  lot_id: string;
  position: number;
  data: unknown;
  status: string;
  issues: string[];
  version: number;
}

export interface OperationRow {
  operation_id: string;
  batch_id: string;
  kind: string;
  status: string;
  rule_ids: string[];
  counts: unknown;
  client_context: string | null;
  actor_type: string;
  actor_id: string;
  actor_name: string;
  snapshot_id: string | null;
  target_operation_id: string | null;
  rolled_back_by: string | null;
  created_at: Date;
}

export interface ChangeEntryRow {
  change_key: string;
  operation_id: string | null;
  batch_id: string;
  lot_id: string;
  position: number;
  field: string;
  action: string;
  original_value: unknown;
  new_value: unknown;
  rule_id: string;
  confidence: number;
  reason: string;
  risk_level: string;
  status: string;
  failure_reason: string | null;
}

export interface SnapshotRow {
  snapshot_id: string;
  batch_id: string;
  operation_id: string;
  records: unknown;
  created_at: Date;
}

const fieldValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const lotRecordSchema = z.object({ lot_id: z.string() }).catchall(fieldValueSchema);

const countsSchema = z.object({
  flagged: z.number().int().default(0),
  changed: z.number().int().default(0),
  removed: z.number().int().default(0),
  failed: z.number().int().default(0),
  rejected: z.number().int().default(0),
  restored: z.number().int().default(0),
});

const LOT_STATUSES: readonly LotStatus[] = ['original', 'flagged', 'cleaned', 'removed'];
const CHANGE_STATUSES: readonly ChangeStatus[] = ['proposed', 'applied', 'rejected', 'rolled_back'];
const RISK_LEVELS: readonly RiskLevel[] = ['low', 'medium', 'high'];
const OPERATION_KINDS: readonly OperationKind[] = ['apply', 'rollback'];
const OPERATION_STATUSES: readonly OperationStatus[] = [
  'applied',
  'partially_applied',
  'cancelled',
  'rolled_back',
  'completed',
];
const ACTION_KINDS: readonly RuleActionKind[] = ['flag', 'remove', 'standardize', 'estimate', 'correct'];
const COMPILED_BY: readonly CompiledBy[] = ['llm', 'pattern', 'manual'];
const ACTOR_TYPES: readonly Actor['type'][] = ['human', 'agent', 'system', 'import'];

/** Narrow a text column to one of its allowed values. */
function oneOf<T extends string>(allowed: readonly T[], value: string, column: string): T {
  const found = allowed.find((candidate) => candidate === value);
  if (found === undefined) throw new Error(`Unexpected ${column} value in storage: ${value}`);
  return found;
}

function fieldValue(value: unknown, column: string): FieldValue {
  const parsed = fieldValueSchema.safeParse(value);
  if (!parsed.success) throw new Error(`Unexpected ${column} value in storage: ${JSON.stringify(value)}`);
  return parsed.data;
}

export function rowToRule(row: RuleRow): Rule {
  const definition = validateRuleDefinition(row.definition);
  if (!definition.ok) {
    throw new Error(`Stored rule ${row.id} has an invalid definition: ${definition.error.join('; ')}`);
  }
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    source_text: row.source_text,
    definition: definition.value,
    confidence: row.confidence,
    compiled_by: oneOf(COMPILED_BY, row.compiled_by, 'compiled_by'),
    client_context: row.client_context,
    priority: row.priority,
    is_permanent: row.is_permanent,
    is_active: row.is_active,
    usage_count: row.usage_count,
    success_rate: row.success_rate,
    last_used: row.last_used,
    created_at: row.created_at,
    updated_at: row.updated_at,
    version: row.version,
  };
}

export function rowToBatch(row: BatchRow): Batch {
  return {
    id: row.id,
    client_context: row.client_context,
    source_name: row.source_name,
    record_count: row.record_count,
    created_at: row.created_at,
  };
}

export function rowToLotRecord(row: LotRecordRow): LotRecordState {
  return {
    batch_id: row.batch_id,
    lot_id: row.lot_id,
    position: row.position,
    data: lotRecordSchema.parse(row.data),
    status: oneOf(LOT_STATUSES, row.status, 'status'),
    issues: row.issues,
    version: row.version,
  };
}

export function rowToOperation(row: OperationRow): OperationLogEntry {
  return {
    operation_id: row.operation_id,
    batch_id: row.batch_id,
    kind: oneOf(OPERATION_KINDS, row.kind, 'kind'),
    status: oneOf(OPERATION_STATUSES, row.status, 'status'),
    rule_ids: row.rule_ids,
    counts: countsSchema.parse(row.counts),
    client_context: row.client_context,
    actor: {
      type: oneOf(ACTOR_TYPES, row.actor_type, 'actor_type'),
      id: row.actor_id,
      name: row.actor_name,
    },
    snapshot_id: row.snapshot_id,
    target_operation_id: row.target_operation_id,
    rolled_back_by: row.rolled_back_by,
    created_at: row.created_at,
  };
}

export function rowToChangeEntry(row: ChangeEntryRow): ChangeEntry {
  return {
    change_key: row.change_key,
    batch_id: row.batch_id,
    lot_id: row.lot_id,
    position: row.position,
    field: row.field,
    action: oneOf(ACTION_KINDS, row.action, 'action'),
    original_value: fieldValue(row.original_value, 'original_value'),
    new_value: fieldValue(row.new_value, 'new_value'),
    rule_id: row.rule_id,
    confidence: row.confidence,
    reason: row.reason,
    risk_level: oneOf(RISK_LEVELS, row.risk_level, 'risk_level'),
    status: oneOf(CHANGE_STATUSES, row.status, 'status'),
    operation_id: row.operation_id,
    failure_reason: row.failure_reason,
  };
}

const snapshotRecordSchema = z.object({
  batch_id: z.string(),
  lot_id: z.string(),
  position: z.number().int(),
  data: lotRecordSchema,
  status: z.enum(['original', 'flagged', 'cleaned', 'removed']),
  issues: z.array(z.string()),
  version: z.number().int(),
});

export function rowToSnapshot(row: SnapshotRow): BatchSnapshot {
  return {
    snapshot_id: row.snapshot_id,
    batch_id: row.batch_id,
    operation_id: row.operation_id,
    records: z.array(snapshotRecordSchema).parse(row.records),
    created_at: row.created_at,
  };
}
