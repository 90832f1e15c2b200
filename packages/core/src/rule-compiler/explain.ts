import { describeCondition } from '../rules-engine/condition-evaluator.js';
import { standardizeValue } from '../rules-engine/standardization.js';
import type { CompiledRule, Condition, RuleAction, RuleDefinition, RuleType } from '../rules-engine/types.js';

export interface RuleExplanation {
  summary: string;
  rule_type: RuleType;
  field: string;
  what_it_does: string;
  when_it_applies: string;
  action_taken: string;
  confidence: number;
  examples: string[];
}

const OUTCOME: Record<RuleAction['kind'], string> = {
  flag: 'flagged',
  remove: 'removed',
  standardize: 'standardized',
  estimate: 'estimated',
  correct: 'corrected',
};

export function describeAction(field: string, action: RuleAction): string {
  switch (action.kind) {
    case 'flag':
      return 'Flag the lot for review';
    case 'remove':
      return 'Remove the lot from the cleaned batch';
    case 'standardize':
      return `Rewrite ${field} in ${action.format.replace('_', ' ')}${action.mapping ? ' using the supplied mapping' : ''}`;
    case 'estimate':
      return action.group_by.length > 0
        ? `Estimate ${field} from the ${action.method.replace('_', ' ')} of lots with the same ${action.group_by.join(', ')}`
        : `Estimate ${field} from the batch ${action.method}`;
    case 'correct':
      return action.correction.kind === 'set'
        ? `Set ${field} to ${JSON.stringify(action.correction.value)}`
        : `Multiply ${field} by ${action.correction.factor}`;
  }
}

/** One-line description of a definition, used when a rule carries none. */
export function summarizeRule(definition: RuleDefinition): string {
  const { field, condition, action } = definition;
  const when = describeCondition(field, condition);
  switch (action.kind) {
    case 'flag':
      return `Flag lots where ${when}`;
    case 'remove':
      return `Remove lots where ${when}`;
    default:
      return `${describeAction(field, action)} where ${when}`;
  }
}

function step(value: number): number {
  return Math.max(1, Math.round(Math.abs(value) * 0.1));
}

function numericSamples(condition: Condition): { hit: number; miss: number } | null {
  switch (condition.operator) {
    case 'lt':
    case 'lte':
      return { hit: condition.value - step(condition.value), miss: condition.value + step(condition.value) };
    case 'gt':
    case 'gte':
      return { hit: condition.value + step(condition.value), miss: condition.value - step(condition.value) };
    case 'between':
      return { hit: (condition.min + condition.max) / 2, miss: condition.max + step(condition.max) };
    case 'outside':
      return { hit: condition.max + step(condition.max), miss: (condition.min + condition.max) / 2 };
    default:
      return null;
  }
}

function examplesFor(definition: RuleDefinition): string[] {
  const { field, condition, action } = definition;
  const outcome = OUTCOME[action.kind];

  const numeric = numericSamples(condition);
  if (numeric) {
    return [`${field} ${numeric.hit}: ${outcome}`, `${field} ${numeric.miss}: unchanged`];
  }

  switch (condition.operator) {
    case 'not_canonical': {
      const samples = field === 'breed' ? ['angus', 'BLK ANGUS'] : ['example value'];
      const standardize = action.kind === 'standardize' ? action : { kind: 'standardize' as const, format: 'proper_case' as const };
      return samples.map((sample) => `'${sample}' → '${standardizeValue(field, sample, standardize)}'`);
    }
    case 'duplicate': {
      const kept = condition.keep === 'first' ? 'first' : 'last';
      return [`The ${kept} copy of a repeated lot is kept`, `Every other copy is ${outcome}`];
    }
    case 'missing':
      return action.kind === 'estimate'
        ? [`A blank ${field} is ${outcome}`, 'Each estimate carries its own confidence score']
        : [`A blank ${field} is ${outcome}`, `A lot with ${field} present is unchanged`];
    case 'invalid_date':
      return [
        `${field} 2023-02-30: ${outcome} (not a calendar date)`,
        `${field} in the future: ${condition.allow_future ? 'unchanged' : outcome}`,
      ];
    default:
      return [];
  }
}

const WHAT_IT_DOES: Record<RuleType, (field: string) => string> = {
  validation: (field) => `Validates that ${field} values meet the stated criteria`,
  standardization: (field) => `Standardizes ${field} values to a consistent format`,
  cleaning: (field) => `Cleans problematic ${field} values or records`,
  estimation: (field) => `Estimates missing ${field} values from the rest of the batch`,
};

/**
 * Human-readable explanation of what a rule does, for review before saving.
 */
export function explainRule(rule: CompiledRule): RuleExplanation {
  const { definition } = rule;
  return {
    summary: rule.description || summarizeRule(definition),
    rule_type: definition.rule_type,
    field: definition.field,
    what_it_does: WHAT_IT_DOES[definition.rule_type](definition.field),
    when_it_applies: describeCondition(definition.field, definition.condition),
    action_taken: describeAction(definition.field, definition.action),
    confidence: rule.confidence,
    examples: examplesFor(definition),
  };
}
