import { z } from 'zod';
import { ValidationError } from '@dataherd/core';

const fieldValue = z.union([z.string(), z.number(), z.boolean(), z.null()]);
const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected a YYYY-MM-DD date');

export const lotRecordSchema = z.object({ lot_id: z.string().min(1) }).catchall(fieldValue);

export const actorSchema = z.object({
  type: z.enum(['human', 'agent', 'system', 'import']),
  id: z.string().min(1),
  name: z.string().min(1),
});

const strategySchema = z.enum(['auto', 'llm', 'pattern']);
const orderingSchema = z.enum(['priority_then_recency', 'recency']);
const actionKind = z.enum(['flag', 'remove', 'standardize', 'estimate', 'correct']);

export const changeEntrySchema = z.object({
  change_key: z.string(),
  batch_id: z.string(),
  lot_id: z.string(),
  position: z.number().int(),
  field: z.string(),
  action: actionKind,
  original_value: fieldValue,
  new_value: fieldValue,
  rule_id: z.string(),
  confidence: z.number(),
  reason: z.string(),
  risk_level: z.enum(['low', 'medium', 'high']),
  status: z.enum(['proposed', 'applied', 'rejected', 'rolled_back']),
  operation_id: z.string().nullable(),
  failure_reason: z.string().nullable(),
});

const ruleCount = z.object({
  rule_id: z.string(),
  flagged: z.number(),
  changed: z.number(),
  removed: z.number(),
});

export const changeSetSchema = z.object({
  batch_id: z.string(),
  client_context: z.string().nullable(),
  as_of: isoDate,
  entries: z.array(changeEntrySchema),
  rule_ids: z.array(z.string()),
  summary: z.object({
    records_scanned: z.number(),
    records_affected: z.number(),
    flagged: z.number(),
    changed: z.number(),
    removed: z.number(),
    by_rule: z.array(ruleCount),
  }),
  diagnostics: z.array(
    z.object({
      code: z.enum(['type_mismatch', 'invalid_pattern', 'insufficient_data', 'superseded']),
      lot_id: z.string(),
      rule_id: z.string(),
      field: z.string(),
      message: z.string(),
    }),
  ),
  risk: z.object({ score: z.number(), requires_approval: z.boolean(), high_risk_count: z.number() }),
  outcome: z.enum(['changes_proposed', 'no_issues_found', 'no_applicable_rules', 'compilation_failed']),
  compile_errors: z.array(
    z.object({
      text: z.string(),
      code: z.enum(['ambiguous', 'unknown_field', 'invalid_rule', 'service_unavailable', 'malformed_response']),
      message: z.string(),
    }),
  ),
  min_confidence: z.number().nullable(),
  fingerprint: z.string(),
});

export const compileBodySchema = z.object({
  text: z.string().min(1),
  client_context: z.string().nullable().default(null),
  strategy: strategySchema.optional(),
});

export const saveRuleBodySchema = z
  .object({
    text: z.string().min(1).optional(),
    name: z.string().min(1).optional(),
    description: z.string().optional(),
    definition: z.unknown().optional(),
    client_context: z.string().nullable().default(null),
    priority: z.number().int().nullable().default(null),
    confidence: z.number().min(0).max(1).default(1),
    is_permanent: z.boolean().default(true),
    strategy: strategySchema.optional(),
  })
  .refine((body) => body.text !== undefined || body.definition !== undefined, {
    message: 'text or definition is required',
  });

export const updateRuleBodySchema = z.object({
  expected_version: z.number().int().positive(),
  name: z.string().min(1).optional(),
  description: z.string().optional(),
  definition: z.unknown().optional(),
  priority: z.number().int().nullable().optional(),
  is_active: z.boolean().optional(),
  is_permanent: z.boolean().optional(),
});

export const clientQuerySchema = z.object({ client: z.string().min(1).optional() });

export const ingestBodySchema = z.object({
  records: z.array(lotRecordSchema),
  batch_id: z.string().min(1).optional(),
  client_context: z.string().nullable().default(null),
  source_name: z.string().nullable().default(null),
});

export const previewBodySchema = z.object({
  texts: z.array(z.string()).default([]),
  strategy: strategySchema.optional(),
  include_stored_rules: z.boolean().default(true),
  ordering: orderingSchema.optional(),
  as_of: isoDate.optional(),
});

export const applyBodySchema = z.union([
  z.object({
    change_set: changeSetSchema,
    approved_keys: z.array(z.string()).optional(),
    actor: actorSchema.optional(),
  }),
  z.object({
    entries: z.array(changeEntrySchema),
    bypass_preview: z.boolean().default(false),
    actor: actorSchema.optional(),
  }),
]);

export const rollbackBodySchema = z.object({ actor: actorSchema.optional() }).default({});

export const operationsQuerySchema = z.object({
  batch_id: z.string().min(1).optional(),
  kind: z.enum(['apply', 'rollback']).optional(),
  limit: z.coerce.number().int().positive().max(500).optional(),
});

export const idParamsSchema = z.object({ id: z.string().min(1) });

/** Parse request input, raising a ValidationError that names the first bad path. */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    const first = parsed.error.issues[0];
    throw new ValidationError(issues.join('; '), first && first.path.length > 0 ? first.path.join('.') : undefined, {
      issues,
    });
  }
  return parsed.data;
}

/** `YYYY-MM-DD` to a UTC midnight Date. */
export function asOfDate(value: string | undefined): Date | undefined {
  return value === undefined ? undefined : new Date(`${value}T00:00:00Z`);
}
