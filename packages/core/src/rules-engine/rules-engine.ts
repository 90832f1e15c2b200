import type { LotRecord } from '../shared/types.js';
import { evaluateRule, type EvaluableRule, type EvaluationContext } from './condition-evaluator.js';
import type { Diagnostic, FieldMutation, Rule, RuleActionKind, RuleOrdering } from './types.js';

export type EngineRule = EvaluableRule & Pick<Rule, 'priority' | 'created_at'>;

export interface RuleMatch {
  rule_id: string;
  action: RuleActionKind;
  field: string;
  mutation: FieldMutation | null;
  reason: string;
  confidence: number;
}

export interface RecordEvaluation {
  lot_id: string;
  matches: RuleMatch[];
  diagnostics: Diagnostic[];
}

/**
 * Keep active rules that apply to the given client: its own rules plus global
 * ones. A null client sees only global rules.
 */
export function filterActiveRules<R extends Pick<Rule, 'is_active' | 'client_context'>>(
  rules: R[],
  clientContext: string | null,
): R[] {
  return rules.filter(
    (rule) => rule.is_active && (rule.client_context === null || rule.client_context === clientContext),
  );
}

function byRecency(a: EngineRule, b: EngineRule): number {
  const diff = b.created_at.getTime() - a.created_at.getTime();
  if (diff !== 0) return diff;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Evaluation order of rules. `priority_then_recency`: rules with a priority
 * first, ascending, then the rest newest first. `recency`: newest first.
 */
export function orderRules<R extends EngineRule>(rules: R[], ordering: RuleOrdering = 'priority_then_recency'): R[] {
  const sorted = [...rules];
  if (ordering === 'recency') return sorted.sort(byRecency);

  return sorted.sort((a, b) => {
    if (a.priority !== null && b.priority !== null) {
      return a.priority - b.priority || byRecency(a, b);
    }
    if (a.priority !== null) return -1;
    if (b.priority !== null) return 1;
    return byRecency(a, b);
  });
}

/**
 * Evaluate already-ordered rules against one record. The first mutating rule
 * on a field claims it; later mutating matches on that field are reported as
 * superseded. Evaluation stops after a remove match.
 */
export function evaluateRecord(
  rules: EngineRule[],
  record: LotRecord,
  context: EvaluationContext = {},
): RecordEvaluation {
  const matches: RuleMatch[] = [];
  const diagnostics: Diagnostic[] = [];
  const claimed = new Map<string, string>();

  for (const rule of rules) {
    const outcome = evaluateRule(rule, record, context);
    diagnostics.push(...outcome.diagnostics);
    if (outcome.kind === 'no_match') continue;

    const field = rule.definition.field;
    if (outcome.mutation) {
      const owner = claimed.get(field);
      if (owner !== undefined) {
        diagnostics.push({
          code: 'superseded',
          lot_id: record.lot_id,
          rule_id: rule.id,
          field,
          message: `${field} already changed by rule ${owner}`,
        });
        continue;
      }
      claimed.set(field, rule.id);
    }

    matches.push({
      rule_id: rule.id,
      action: outcome.action,
      field,
      mutation: outcome.mutation,
      reason: outcome.reason,
      confidence: outcome.mutation?.confidence ?? rule.confidence,
    });

    if (outcome.action === 'remove') break;
  }

  return { lot_id: record.lot_id, matches, diagnostics };
}
