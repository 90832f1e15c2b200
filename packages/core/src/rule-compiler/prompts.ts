/**
 * Prompts sent to the model when compiling a natural-language rule.
 */

import { describeCondition } from '../rules-engine/condition-evaluator.js';
import type { FieldSchema } from '../rules-engine/field-schema.js';
import type { Rule } from '../rules-engine/types.js';

export function buildRuleCompilationSystem(schema: FieldSchema): string {
  const fields = schema
    .fields()
    .map((field) => {
      const range = field.typical_range
        ? ` (typical range ${field.typical_range.min}-${field.typical_range.max}${field.unit ? ` ${field.unit}` : ''})`
        : '';
      return `- ${field.name} [${field.type}]: ${field.description}${range}`;
    })
    .join('\n');

  return `You convert data cleaning instructions for cattle lot records into a single structured rule.

## Fields
${fields}

## Output
Return one JSON object and nothing else:

{
  "name": "<snake_case name>",
  "description": "<one sentence>",
  "rule_type": "validation" | "standardization" | "cleaning" | "estimation",
  "field": "<field name from the list above>",
  "condition": { "operator": "<operator>", ...operands },
  "action": { "kind": "<action>", ...parameters },
  "confidence": <0.0-1.0, how sure you are that the rule captures the instruction>
}

## Conditions
- { "operator": "lt" | "lte" | "gt" | "gte", "value": <number> }
- { "operator": "between" | "outside", "min": <number>, "max": <number> }
- { "operator": "missing" }
- { "operator": "matches" | "not_matches", "pattern": "<regular expression>" }
- { "operator": "eq", "value": <string or number> }
- { "operator": "in", "values": [<string or number>, ...] }
- { "operator": "not_canonical" }  (string fields only)
- { "operator": "duplicate", "keys": [<field>, ...], "keep": "first" | "last" }  (empty keys compare every field except lot_id)
- { "operator": "invalid_date", "max_age_years": <number>, "allow_future": <boolean> }  (date fields only)

## Actions by rule type
- validation: { "kind": "flag" } or { "kind": "remove" }. Validation never changes a value.
- standardization: { "kind": "standardize", "format": "proper_case" | "upper" | "lower" | "trim", "mapping": { "<lower case input>": "<output>" } }
- cleaning: { "kind": "flag" }, { "kind": "remove" }, or { "kind": "correct", "correction": { "kind": "set", "value": <value> } | { "kind": "scale", "factor": <number> } }
- estimation: { "kind": "estimate", "method": "median" | "mean" | "group_median", "group_by": [<field>, ...] }

If the instruction does not say which field, condition and action it means, return
{ "ambiguous": true, "reason": "<what is missing>" } instead.
If it refers to a field that is not in the list, return the field name as written.`;
}

export function buildRuleCompilationPrompt(
  text: string,
  clientContext: string | null,
  clientRules: Rule[],
): string {
  let prompt = `Convert this data cleaning rule into structured JSON:\n\nRule: ${text}`;

  if (clientContext) {
    prompt += `\n\nClient: ${clientContext}`;
    const thresholds = clientRules
      .filter((rule) => rule.client_context === clientContext)
      .map((rule) => `- ${describeCondition(rule.definition.field, rule.definition.condition)} (${rule.name})`);
    if (thresholds.length > 0) {
      prompt += `\nThresholds this client already uses:\n${thresholds.join('\n')}`;
      prompt += '\nPrefer these values when the instruction leaves a threshold implicit.';
    }
  }

  prompt += '\n\nReturn only the JSON object, no additional text.';
  return prompt;
}
