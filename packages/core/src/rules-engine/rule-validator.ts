import { z } from 'zod';
import { err, ok, type Result } from '../shared/types.js';
import { DEFAULT_FIELD_SCHEMA, type FieldSchema, type FieldType } from './field-schema.js';
import type { Condition, RuleDefinition } from './types.js';

const fieldValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const conditionSchema = z.union([
  z.object({ operator: z.enum(['lt', 'lte', 'gt', 'gte']), value: z.number() }),
  z.object({ operator: z.enum(['between', 'outside']), min: z.number(), max: z.number() }),
  z.object({ operator: z.literal('missing') }),
  z.object({ operator: z.enum(['matches', 'not_matches']), pattern: z.string().min(1) }),
  z.object({ operator: z.literal('eq'), value: z.union([z.string(), z.number()]) }),
  z.object({ operator: z.literal('in'), values: z.array(z.union([z.string(), z.number()])).min(1) }),
  z.object({ operator: z.literal('not_canonical') }),
  z.object({
    operator: z.literal('duplicate'),
    keys: z.array(z.string()).default([]),
    keep: z.enum(['first', 'last']).default('first'),
  }),
  z.object({
    operator: z.literal('invalid_date'),
    max_age_years: z.number().positive().optional(),
    allow_future: z.boolean().default(false),
  }),
]);

const flagSchema = z.object({ kind: z.literal('flag') });
const removeSchema = z.object({ kind: z.literal('remove') });
const standardizeSchema = z.object({
  kind: z.literal('standardize'),
  format: z.enum(['proper_case', 'upper', 'lower', 'trim']).default('proper_case'),
  mapping: z.record(z.string()).optional(),
});
const estimateSchema = z.object({
  kind: z.literal('estimate'),
  method: z.enum(['median', 'mean', 'group_median']).default('median'),
  group_by: z.array(z.string()).default([]),
});
const correctSchema = z.object({
  kind: z.literal('correct'),
  correction: z.union([
    z.object({ kind: z.literal('set'), value: fieldValueSchema }),
    z.object({ kind: z.literal('scale'), factor: z.number(), decimals: z.number().int().min(0).optional() }),
  ]),
});

const base = { field: z.string().min(1), condition: conditionSchema };

export const ruleDefinitionSchema = z.discriminatedUnion('rule_type', [
  z.object({ rule_type: z.literal('validation'), ...base, action: z.union([flagSchema, removeSchema]) }),
  z.object({ rule_type: z.literal('standardization'), ...base, action: standardizeSchema }),
  z.object({
    rule_type: z.literal('cleaning'),
    ...base,
    action: z.union([flagSchema, removeSchema, correctSchema]),
  }),
  z.object({ rule_type: z.literal('estimation'), ...base, action: estimateSchema }),
]);

const NUMERIC_OPERATORS: ReadonlySet<Condition['operator']> = new Set([
  'lt',
  'lte',
  'gt',
  'gte',
  'between',
  'outside',
]);

function semanticIssues(definition: RuleDefinition, schema: FieldSchema): string[] {
  const issues: string[] = [];
  const field = schema.get(definition.field);
  if (!field) return [`unknown field "${definition.field}"`];

  const requireType = (type: FieldType, what: string): void => {
    if (field.type !== type) issues.push(`${what} requires a ${type} field, "${field.name}" is ${field.type}`);
  };

  const { condition, action } = definition;
  if (NUMERIC_OPERATORS.has(condition.operator)) requireType('numeric', `operator ${condition.operator}`);

  switch (condition.operator) {
    case 'between':
    case 'outside':
      if (condition.min > condition.max) issues.push(`range min ${condition.min} exceeds max ${condition.max}`);
      break;
    case 'matches':
    case 'not_matches':
      try {
        new RegExp(condition.pattern);
      } catch (error) {
        issues.push(`invalid pattern: ${error instanceof Error ? error.message : condition.pattern}`);
      }
      break;
    case 'duplicate':
      for (const key of condition.keys) {
        if (!schema.has(key)) issues.push(`unknown duplicate key "${key}"`);
      }
      break;
    case 'invalid_date':
      requireType('date', 'operator invalid_date');
      break;
    case 'not_canonical':
      requireType('string', 'operator not_canonical');
      break;
    default:
      break;
  }

  if (action.kind === 'standardize') requireType('string', 'standardize');
  if (action.kind === 'estimate') {
    requireType('numeric', 'estimate');
    for (const key of action.group_by) {
      if (!schema.has(key)) issues.push(`unknown group_by field "${key}"`);
    }
  }
  if (action.kind === 'correct' && action.correction.kind === 'scale') requireType('numeric', 'scale correction');

  return issues;
}

/**
 * Parse and check a rule definition: shape, rule type / action pairing, field
 * existence and field-type compatibility.
 */
export function validateRuleDefinition(
  input: unknown,
  schema: FieldSchema = DEFAULT_FIELD_SCHEMA,
): Result<RuleDefinition, string[]> {
  const parsed = ruleDefinitionSchema.safeParse(input);
  if (!parsed.success) {
    return err(parsed.error.issues.map((issue) => `${issue.path.join('.') || 'definition'}: ${issue.message}`));
  }
  const definition: RuleDefinition = parsed.data;
  const issues = semanticIssues(definition, schema);
  return issues.length > 0 ? err(issues) : ok(definition);
}
