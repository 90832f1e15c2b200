export { RuleCompiler, DEFAULT_LLM_CONFIDENCE } from './rule-compiler.js';
export type { CompileOptions, CompileStrategy, ClientRuleSource, RuleCompilerDeps } from './rule-compiler.js';
export { AnthropicLlmClient, LlmUnavailableError, extractJson } from './llm-client.js';
export type { LlmClient, LlmConfig, LlmRequest, LlmResponse } from './llm-client.js';
export { matchPatterns, PATTERN_CONFIDENCE_CAP } from './pattern-library.js';
export type { PatternMatch } from './pattern-library.js';
export { explainRule, summarizeRule, describeAction } from './explain.js';
export type { RuleExplanation } from './explain.js';
export { buildRuleCompilationSystem, buildRuleCompilationPrompt } from './prompts.js';
