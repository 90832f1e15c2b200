import type { FieldValue, LotRecord } from '../shared/types.js';
import { parseNumeric, type BatchContext } from './batch-context.js';
import { estimateValue } from './estimation.js';
import { DEFAULT_FIELD_SCHEMA, type FieldSchema } from './field-schema.js';
import { standardizeValue } from './standardization.js';
import type {
  Condition,
  Correction,
  Diagnostic,
  DiagnosticCode,
  EvaluationOutcome,
  FieldMutation,
  Rule,
} from './types.js';

/** The parts of a rule the evaluator reads. */
export type EvaluableRule = Pick<Rule, 'id' | 'name' | 'definition' | 'confidence'>;

export interface EvaluationContext {
  schema?: FieldSchema;
  /** Reference date for age and future-date checks. */
  as_of?: Date;
  /** Required by duplicate conditions and estimate actions. */
  batch?: BatchContext;
}

type ConditionResult = { matched: true; detail: string } | { matched: false; diagnostic?: Diagnostic };

const MS_PER_YEAR = 365.25 * 24 * 60 * 60 * 1000;

export function isMissing(value: FieldValue | undefined): boolean {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

/**
 * Parse a calendar date in ISO form (YYYY-MM-DD, optionally with a time part).
 * Impossible dates such as 2023-02-30 are rejected.
 */
export function parseDate(value: FieldValue | undefined): Date | null {
  if (typeof value !== 'string') return null;
  const match = value.trim().match(/^(\d{4})-(\d{2})-(\d{2})(?:[T ][\d:.]+Z?)?$/);
  if (!match) return null;
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return date;
}

export function describeCondition(field: string, condition: Condition): string {
  switch (condition.operator) {
    case 'lt':
      return `${field} < ${condition.value}`;
    case 'lte':
      return `${field} <= ${condition.value}`;
    case 'gt':
      return `${field} > ${condition.value}`;
    case 'gte':
      return `${field} >= ${condition.value}`;
    case 'between':
      return `${field} between ${condition.min} and ${condition.max}`;
    case 'outside':
      return `${field} outside ${condition.min}-${condition.max}`;
    case 'missing':
      return `${field} is missing`;
    case 'matches':
      return `${field} matches /${condition.pattern}/`;
    case 'not_matches':
      return `${field} does not match /${condition.pattern}/`;
    case 'eq':
      return `${field} = ${condition.value}`;
    case 'in':
      return `${field} in [${condition.values.join(', ')}]`;
    case 'not_canonical':
      return `${field} is not in canonical form`;
    case 'duplicate':
      return condition.keys.length > 0
        ? `duplicate on ${condition.keys.join(', ')}`
        : 'duplicate record';
    case 'invalid_date': {
      const age = condition.max_age_years !== undefined ? ` or older than ${condition.max_age_years} years` : '';
      return `${field} is not a valid date${age}`;
    }
  }
}

function diagnostic(
  code: DiagnosticCode,
  rule: EvaluableRule,
  record: LotRecord,
  message: string,
): Diagnostic {
  return { code, lot_id: record.lot_id, rule_id: rule.id, field: rule.definition.field, message };
}

function noMatch(diagnostics: Diagnostic[] = []): EvaluationOutcome {
  return { kind: 'no_match', diagnostics };
}

function compareNumeric(condition: Condition, value: number): boolean {
  switch (condition.operator) {
    case 'lt':
      return value < condition.value;
    case 'lte':
      return value <= condition.value;
    case 'gt':
      return value > condition.value;
    case 'gte':
      return value >= condition.value;
    case 'between':
      return value >= condition.min && value <= condition.max;
    case 'outside':
      return value < condition.min || value > condition.max;
    default:
      return false;
  }
}

function equals(actual: FieldValue | undefined, expected: string | number): boolean {
  if (isMissing(actual)) return false;
  if (typeof expected === 'number') return parseNumeric(actual) === expected;
  return String(actual).trim().toLowerCase() === expected.trim().toLowerCase();
}

function checkCondition(
  rule: EvaluableRule,
  record: LotRecord,
  context: EvaluationContext,
): ConditionResult {
  const { field, condition } = rule.definition;
  const value = record[field];
  const description = describeCondition(field, condition);

  switch (condition.operator) {
    case 'lt':
    case 'lte':
    case 'gt':
    case 'gte':
    case 'between':
    case 'outside': {
      if (isMissing(value)) return { matched: false };
      const parsed = parseNumeric(value);
      if (parsed === null) {
        return {
          matched: false,
          diagnostic: diagnostic(
            'type_mismatch',
            rule,
            record,
            `${field} value ${JSON.stringify(value)} is not numeric`,
          ),
        };
      }
      return compareNumeric(condition, parsed)
        ? { matched: true, detail: `${description} (was ${parsed})` }
        : { matched: false };
    }

    case 'missing': {
      const type = (context.schema ?? DEFAULT_FIELD_SCHEMA).get(field)?.type;
      const missing =
        isMissing(value) ||
        (type === 'numeric' && parseNumeric(value) === null) ||
        (type === 'date' && parseDate(value) === null);
      return missing ? { matched: true, detail: description } : { matched: false };
    }

    case 'matches':
    case 'not_matches': {
      if (isMissing(value)) return { matched: false };
      let pattern: RegExp;
      try {
        pattern = new RegExp(condition.pattern);
      } catch (error) {
        return {
          matched: false,
          diagnostic: diagnostic(
            'invalid_pattern',
            rule,
            record,
            error instanceof Error ? error.message : `invalid pattern ${condition.pattern}`,
          ),
        };
      }
      const hit = pattern.test(String(value));
      const matched = condition.operator === 'matches' ? hit : !hit;
      return matched ? { matched: true, detail: description } : { matched: false };
    }

    case 'eq':
      return equals(value, condition.value) ? { matched: true, detail: description } : { matched: false };

    case 'in':
      return condition.values.some((expected) => equals(value, expected))
        ? { matched: true, detail: description }
        : { matched: false };

    case 'not_canonical': {
      if (typeof value !== 'string' || value.trim() === '') return { matched: false };
      const action = rule.definition.action;
      const canonical =
        action.kind === 'standardize'
          ? standardizeValue(field, value, action)
          : standardizeValue(field, value, { kind: 'standardize', format: 'proper_case' });
      return canonical !== value ? { matched: true, detail: description } : { matched: false };
    }

    case 'duplicate': {
      if (!context.batch) {
        return {
          matched: false,
          diagnostic: diagnostic('insufficient_data', rule, record, 'duplicate check needs the whole batch'),
        };
      }
      return context.batch.duplicates(condition.keys, condition.keep).has(record.lot_id)
        ? { matched: true, detail: description }
        : { matched: false };
    }

    case 'invalid_date': {
      if (isMissing(value)) return { matched: false };
      const date = parseDate(value);
      if (!date) return { matched: true, detail: `${field} ${JSON.stringify(value)} is not a valid date` };
      const asOf = context.as_of ?? new Date();
      if (!condition.allow_future && date.getTime() > asOf.getTime()) {
        return { matched: true, detail: `${field} ${String(value)} is in the future` };
      }
      if (
        condition.max_age_years !== undefined &&
        asOf.getTime() - date.getTime() > condition.max_age_years * MS_PER_YEAR
      ) {
        return {
          matched: true,
          detail: `${field} ${String(value)} is more than ${condition.max_age_years} years ago`,
        };
      }
      return { matched: false };
    }
  }
}

function applyCorrection(value: FieldValue | undefined, correction: Correction): FieldValue | undefined {
  if (correction.kind === 'set') return correction.value;
  const parsed = parseNumeric(value);
  if (parsed === null) return undefined;
  const factor = 10 ** (correction.decimals ?? 1);
  return Math.round(parsed * correction.factor * factor) / factor;
}

/**
 * Evaluate one rule against one record. A mutating action whose result equals
 * the current value is not a match.
 */
export function evaluateRule(
  rule: EvaluableRule,
  record: LotRecord,
  context: EvaluationContext = {},
): EvaluationOutcome {
  const { field, action } = rule.definition;
  const checked = checkCondition(rule, record, context);
  if (!checked.matched) return noMatch(checked.diagnostic ? [checked.diagnostic] : []);

  const reason = `${rule.name}: ${checked.detail}`;
  const current = record[field] ?? null;

  const mutation = (to: FieldValue, confidence: number, why = reason): EvaluationOutcome => {
    const change: FieldMutation = { field, from: current, to, confidence, reason: why };
    return { kind: 'match', action: action.kind, mutation: change, reason: why, diagnostics: [] };
  };

  switch (action.kind) {
    case 'flag':
    case 'remove':
      return { kind: 'match', action: action.kind, mutation: null, reason, diagnostics: [] };

    case 'standardize': {
      if (typeof current !== 'string') return noMatch();
      const to = standardizeValue(field, current, action);
      if (to === current) return noMatch();
      return mutation(to, rule.confidence);
    }

    case 'estimate': {
      if (!context.batch) {
        return noMatch([diagnostic('insufficient_data', rule, record, 'estimation needs the whole batch')]);
      }
      const estimate = estimateValue(field, record, action, context.batch, rule.confidence);
      if (!estimate) {
        return noMatch([
          diagnostic('insufficient_data', rule, record, `no other lot has a usable ${field} value`),
        ]);
      }
      return mutation(estimate.value, estimate.confidence, `${reason}; estimated from ${estimate.basis}`);
    }

    case 'correct': {
      const to = applyCorrection(current, action.correction);
      if (to === undefined) {
        return noMatch([
          diagnostic('type_mismatch', rule, record, `${field} value ${JSON.stringify(current)} is not numeric`),
        ]);
      }
      if (to === current) return noMatch();
      return mutation(to, rule.confidence);
    }
  }
}
