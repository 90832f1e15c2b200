import type { FieldValue } from '../shared/types.js';

export type RuleType = 'validation' | 'standardization' | 'cleaning' | 'estimation';

export type Condition =
  | { operator: 'lt' | 'lte' | 'gt' | 'gte'; value: number }
  | { operator: 'between' | 'outside'; min: number; max: number }
  | { operator: 'missing' }
  | { operator: 'matches' | 'not_matches'; pattern: string }
  | { operator: 'eq'; value: string | number }
  | { operator: 'in'; values: Array<string | number> }
  | { operator: 'not_canonical' }
  | { operator: 'duplicate'; keys: string[]; keep: 'first' | 'last' }
  | { operator: 'invalid_date'; max_age_years?: number; allow_future: boolean };

export type ConditionOperator = Condition['operator'];

export type StandardizeFormat = 'proper_case' | 'upper' | 'lower' | 'trim';

export type EstimationMethod = 'median' | 'mean' | 'group_median';

export type Correction =
  | { kind: 'set'; value: FieldValue }
  | { kind: 'scale'; factor: number; decimals?: number };

export interface FlagAction {
  kind: 'flag';
}

export interface RemoveAction {
  kind: 'remove';
}

export interface StandardizeAction {
  kind: 'standardize';
  format: StandardizeFormat;
  /** Lower-cased input → canonical output; consulted before `format`. */
  mapping?: Record<string, string>;
}

export interface EstimateAction {
  kind: 'estimate';
  method: EstimationMethod;
  group_by: string[];
}

export interface CorrectAction {
  kind: 'correct';
  correction: Correction;
}

export type RuleAction =
  | FlagAction
  | RemoveAction
  | StandardizeAction
  | EstimateAction
  | CorrectAction;

export type RuleActionKind = RuleAction['kind'];

/**
 * The executable part of a rule. Each rule type admits only the actions it may
 * take; validation never carries a mutating action.
 */
export type RuleDefinition =
  | { rule_type: 'validation'; field: string; condition: Condition; action: FlagAction | RemoveAction }
  | { rule_type: 'standardization'; field: string; condition: Condition; action: StandardizeAction }
  | {
      rule_type: 'cleaning';
      field: string;
      condition: Condition;
      action: FlagAction | RemoveAction | CorrectAction;
    }
  | { rule_type: 'estimation'; field: string; condition: Condition; action: EstimateAction };

export type CompiledBy = 'llm' | 'pattern' | 'manual';

/** Output of the compiler; not yet persisted. */
export interface CompiledRule {
  name: string;
  description: string;
  source_text: string;
  definition: RuleDefinition;
  confidence: number;
  compiled_by: CompiledBy;
  client_context: string | null;
  priority: number | null;
}

export interface Rule extends CompiledRule {
  id: string;
  is_permanent: boolean;
  is_active: boolean;
  usage_count: number;
  success_rate: number;
  last_used: Date | null;
  created_at: Date;
  updated_at: Date;
  version: number;
}

export type DiagnosticCode =
  | 'type_mismatch'
  | 'invalid_pattern'
  | 'insufficient_data'
  | 'superseded';

export interface Diagnostic {
  code: DiagnosticCode;
  lot_id: string;
  rule_id: string;
  field: string;
  message: string;
}

export interface FieldMutation {
  field: string;
  from: FieldValue;
  to: FieldValue;
  /** Confidence of this single mutation; estimates carry their own. */
  confidence: number;
  reason: string;
}

export type EvaluationOutcome =
  | { kind: 'no_match'; diagnostics: Diagnostic[] }
  | { kind: 'match'; action: RuleActionKind; mutation: FieldMutation | null; reason: string; diagnostics: Diagnostic[] };

export type RuleOrdering = 'priority_then_recency' | 'recency';
