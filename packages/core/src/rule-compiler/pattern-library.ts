/**
 * Deterministic fallback compiler: a fixed library of phrasings for numeric
 * comparisons, missing values, standardization, duplicates and date checks.
 */

import { CompileError } from '../shared/errors.js';
import { err, ok, type Result } from '../shared/types.js';
import type { FieldMention, FieldSchema } from '../rules-engine/field-schema.js';
import type { Condition, RuleDefinition, StandardizeFormat } from '../rules-engine/types.js';
import { summarizeRule } from './explain.js';

/** Upper bound on the confidence of any pattern-derived rule. */
export const PATTERN_CONFIDENCE_CAP = 0.7;

const ESTIMATE_CONFIDENCE = 0.6;

export interface PatternMatch {
  name: string;
  description: string;
  definition: RuleDefinition;
  confidence: number;
}

type Verb = 'flag' | 'check' | 'remove' | 'standardize' | 'estimate';

type Comparator = 'lt' | 'lte' | 'gt' | 'gte';

const VERBS: Array<[Verb, RegExp]> = [
  ['estimate', /\b(?:estimate|fill(?:\s+in)?|impute|infer)\b/],
  ['standardize', /\b(?:standardi[sz]e|normali[sz]e|capitali[sz]e)\b/],
  ['remove', /\b(?:remove|delete|drop|exclude|discard)\b/],
  ['flag', /\b(?:flag|mark|review|highlight)\b/],
  // States a constraint; the rule flags the lots that break it.
  ['check', /\b(?:check|validate|verify|ensure)\b/],
];

const NUMBER = '(-?\\d[\\d,]*(?:\\.\\d+)?)';
const UNIT = '(?:\\s*(?:lbs?|pounds?|kg|days?|head)\\b)?';
const LOW = 'below|under|less than|lower than|lighter than';
const HIGH = 'above|over|greater than|more than|higher than|heavier than';
const LOW_WORDS = `(?:${LOW})`;
const HIGH_WORDS = `(?:${HIGH})`;

const OUTSIDE_PATTERNS = [
  new RegExp(`\\b${LOW_WORDS}\\s+${NUMBER}${UNIT}\\s+or\\s+${HIGH_WORDS}\\s+${NUMBER}`),
  new RegExp(`\\b${HIGH_WORDS}\\s+${NUMBER}${UNIT}\\s+or\\s+${LOW_WORDS}\\s+${NUMBER}`),
  new RegExp(`\\boutside(?:\\s+of)?(?:\\s+the)?(?:\\s+range)?(?:\\s+of)?\\s+${NUMBER}${UNIT}\\s*(?:-|to|and)\\s*${NUMBER}`),
];
const BETWEEN_PATTERN = new RegExp(`\\bbetween\\s+${NUMBER}${UNIT}\\s+and\\s+${NUMBER}`);
const COMPARATORS: Array<[Comparator, RegExp]> = [
  ['lte', new RegExp(`\\b(?:at most|no more than|not more than|maximum of|up to)\\s+${NUMBER}`)],
  ['gte', new RegExp(`\\b(?:at least|no less than|not less than|minimum of)\\s+${NUMBER}`)],
  ['lt', new RegExp(`\\b(?:${LOW}|fewer than|smaller than)\\s+${NUMBER}`)],
  ['gt', new RegExp(`\\b(?:${HIGH}|exceeds?|exceeding)\\s+${NUMBER}`)],
];

const INVERTED: Record<Comparator, Comparator> = {
  lt: 'gte',
  lte: 'gt',
  gt: 'lte',
  gte: 'lt',
};

const NOT_FIELDS = new Set([
  'lot', 'lots', 'record', 'records', 'row', 'rows', 'entry', 'entries', 'value', 'values',
  'data', 'it', 'they', 'any', 'all', 'the', 'animal', 'animals', 'cattle', 'information',
]);

const UNKNOWN_FIELD_PATTERNS = [
  /\b(?:where|when|if|whose|with)\s+(?:the\s+)?([a-z][a-z_]*(?:\s+(?!is\b|are\b|was\b|were\b)[a-z][a-z_]*)?)\s+(?:is|are|was|were|exceeds?|below|above|under|over)\b/,
  /\b(?:missing|blank|empty)\s+([a-z][a-z_]*)/,
  /\b(?:standardi[sz]e|normali[sz]e|capitali[sz]e)\s+(?:the\s+|all\s+)?([a-z][a-z_]*)/,
];

interface Comparison {
  condition: Condition;
  index: number;
}

function toNumber(raw: string): number {
  return Number(raw.replace(/,/g, ''));
}

function findVerb(text: string): Verb | null {
  let best: { verb: Verb; index: number } | null = null;
  for (const [verb, pattern] of VERBS) {
    const match = pattern.exec(text);
    if (match && (best === null || match.index < best.index)) best = { verb, index: match.index };
  }
  return best?.verb ?? null;
}

function findComparison(text: string): Comparison | null {
  for (const pattern of OUTSIDE_PATTERNS) {
    const match = pattern.exec(text);
    if (match) {
      const [a, b] = [toNumber(match[1]), toNumber(match[2])];
      return { condition: { operator: 'outside', min: Math.min(a, b), max: Math.max(a, b) }, index: match.index };
    }
  }

  const between = BETWEEN_PATTERN.exec(text);
  if (between) {
    const [a, b] = [toNumber(between[1]), toNumber(between[2])];
    return { condition: { operator: 'between', min: Math.min(a, b), max: Math.max(a, b) }, index: between.index };
  }

  for (const [operator, pattern] of COMPARATORS) {
    const match = pattern.exec(text);
    if (match) return { condition: { operator, value: toNumber(match[1]) }, index: match.index };
  }
  return null;
}

function invert(condition: Condition): Condition {
  switch (condition.operator) {
    case 'lt':
    case 'lte':
    case 'gt':
    case 'gte':
      return { operator: INVERTED[condition.operator], value: condition.value };
    case 'between':
      return { operator: 'outside', min: condition.min, max: condition.max };
    case 'outside':
      return { operator: 'between', min: condition.min, max: condition.max };
    default:
      return condition;
  }
}

function guessUnknownField(text: string, schema: FieldSchema): string | null {
  for (const pattern of UNKNOWN_FIELD_PATTERNS) {
    const match = pattern.exec(text);
    const word = match?.[1]?.trim();
    if (!word || NOT_FIELDS.has(word) || NOT_FIELDS.has(word.split(' ')[0])) continue;
    if (schema.resolve(word)) continue;
    return word;
  }
  return null;
}

function unresolved(text: string, original: string, schema: FieldSchema): CompileError {
  const unknown = guessUnknownField(text, schema);
  return unknown ? CompileError.unknownField(unknown) : CompileError.ambiguous(original);
}

function toPatternMatch(definition: RuleDefinition, confidence: number): PatternMatch {
  return {
    name: `${definition.action.kind}_${definition.field}_${definition.condition.operator}`,
    description: summarizeRule(definition),
    definition,
    confidence: Math.min(confidence, PATTERN_CONFIDENCE_CAP),
  };
}

function duplicateRule(text: string, verb: Verb | null, mentions: FieldMention[]): PatternMatch {
  const keys = [...new Set(mentions.map((m) => m.field.name).filter((name) => name !== 'lot_id'))];
  const keep = /\bkeep(?:ing)?\s+(?:the\s+)?(?:last|latest|most recent|newest)\b/.test(text) ? 'last' : 'first';
  return toPatternMatch(
    {
      rule_type: 'cleaning',
      field: 'lot_id',
      condition: { operator: 'duplicate', keys, keep },
      action: verb === 'flag' || verb === 'check' ? { kind: 'flag' } : { kind: 'remove' },
    },
    PATTERN_CONFIDENCE_CAP,
  );
}

function dateRule(text: string, verb: Verb | null, mentions: FieldMention[]): PatternMatch {
  const field = mentions.find((m) => m.field.type === 'date')?.field.name ?? 'birth_date';
  const years = /(\d+)\s*(?:years?|yrs?)\b/.exec(text);
  return toPatternMatch(
    {
      rule_type: 'validation',
      field,
      condition: {
        operator: 'invalid_date',
        max_age_years: years ? Number(years[1]) : 3,
        allow_future: false,
      },
      action: verb === 'remove' ? { kind: 'remove' } : { kind: 'flag' },
    },
    PATTERN_CONFIDENCE_CAP,
  );
}

function standardizeFormat(text: string): StandardizeFormat {
  if (/\bupper\s*case\b|\ball caps\b|\bcapital letters\b/.test(text)) return 'upper';
  if (/\blower\s*case\b/.test(text)) return 'lower';
  if (/\btrim\b|\bwhitespace\b|\bextra spaces\b/.test(text)) return 'trim';
  return 'proper_case';
}

/**
 * Compile rule text with the pattern library. The result still needs
 * definition validation against the field schema.
 */
export function matchPatterns(original: string, schema: FieldSchema): Result<PatternMatch, CompileError> {
  const text = original.toLowerCase().replace(/\s+/g, ' ').trim();
  const verb = findVerb(text);
  const mentions = schema.findMentions(text);

  if (/\bduplicat(?:e|es|ed)\b/.test(text)) {
    return ok(duplicateRule(text, verb, mentions));
  }

  const mentionsDate = /\bdates?\b|\bdob\b|\bbirth/.test(text);
  if (mentionsDate && /\b(?:valid|invalid|format|formats|future|unrealistic|age|old)\b/.test(text)) {
    return ok(dateRule(text, verb, mentions));
  }

  const first = mentions[0]?.field;

  if (verb === 'estimate' || /\b(?:missing|blank|empty|null|absent|without)\b/.test(text)) {
    if (!first) return err(unresolved(text, original, schema));
    if (verb === 'estimate') {
      const groupBy = [
        ...new Set(mentions.slice(1).map((m) => m.field.name).filter((name) => name !== first.name && name !== 'lot_id')),
      ];
      return ok(
        toPatternMatch(
          {
            rule_type: 'estimation',
            field: first.name,
            condition: { operator: 'missing' },
            action: { kind: 'estimate', method: groupBy.length > 0 ? 'group_median' : 'median', group_by: groupBy },
          },
          ESTIMATE_CONFIDENCE,
        ),
      );
    }
    if (verb === 'flag' || verb === 'check' || verb === 'remove') {
      const kind = verb === 'remove' ? 'remove' : 'flag';
      return ok(
        toPatternMatch(
          { rule_type: 'validation', field: first.name, condition: { operator: 'missing' }, action: { kind } },
          PATTERN_CONFIDENCE_CAP,
        ),
      );
    }
    return err(CompileError.ambiguous(original));
  }

  if (verb === 'standardize') {
    const target = mentions.find((m) => m.field.type === 'string')?.field ?? first;
    if (!target) return err(unresolved(text, original, schema));
    return ok(
      toPatternMatch(
        {
          rule_type: 'standardization',
          field: target.name,
          condition: { operator: 'not_canonical' },
          action: { kind: 'standardize', format: standardizeFormat(text) },
        },
        PATTERN_CONFIDENCE_CAP,
      ),
    );
  }

  const comparison = findComparison(text);
  if (comparison) {
    const before = mentions.filter((m) => m.index < comparison.index);
    const field = (before[before.length - 1] ?? mentions[0])?.field;
    if (!field) return err(unresolved(text, original, schema));

    const constraint = verb === 'check' || /\b(?:should|must|needs? to)\b/.test(text);
    if (verb === null && !constraint) return err(CompileError.ambiguous(original));
    const condition = constraint ? invert(comparison.condition) : comparison.condition;
    const action = verb === 'remove' ? 'remove' : 'flag';

    return ok(
      toPatternMatch({ rule_type: 'validation', field: field.name, condition, action: { kind: action } }, PATTERN_CONFIDENCE_CAP),
    );
  }

  return err(unresolved(text, original, schema));
}
