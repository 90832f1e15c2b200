export { filterActiveRules, orderRules, evaluateRecord } from './rules-engine.js';
export type { EngineRule, RuleMatch, RecordEvaluation } from './rules-engine.js';
export {
  evaluateRule,
  describeCondition,
  isMissing,
  parseDate,
} from './condition-evaluator.js';
export type { EvaluableRule, EvaluationContext } from './condition-evaluator.js';
export { BatchContext, parseNumeric } from './batch-context.js';
export { estimateValue, median, mean, coefficientOfVariation, GROUP_FALLBACK_PENALTY } from './estimation.js';
export type { Estimate } from './estimation.js';
export { BREED_CANONICAL, standardizeValue, formatValue, defaultMappingFor } from './standardization.js';
export { CATTLE_FIELDS, FieldSchema, DEFAULT_FIELD_SCHEMA } from './field-schema.js';
export type { FieldDefinition, FieldMention, FieldType } from './field-schema.js';
export { validateRuleDefinition, ruleDefinitionSchema } from './rule-validator.js';
export { loadRulesFromFile, loadRulesFromDirectory } from './rule-loader.js';
export type { SeedRule } from './rule-loader.js';
export type {
  Rule,
  RuleType,
  RuleDefinition,
  RuleAction,
  RuleActionKind,
  FlagAction,
  RemoveAction,
  StandardizeAction,
  EstimateAction,
  CorrectAction,
  Correction,
  Condition,
  ConditionOperator,
  StandardizeFormat,
  EstimationMethod,
  CompiledRule,
  CompiledBy,
  Diagnostic,
  DiagnosticCode,
  FieldMutation,
  EvaluationOutcome,
  RuleOrdering,
} from './types.js';
