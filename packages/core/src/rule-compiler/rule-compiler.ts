import { z } from 'zod';
import type { Logger } from 'pino';
import { CompileError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { err, ok, type Result } from '../shared/types.js';
import { withSpan } from '../observability/tracing.js';
import { DEFAULT_FIELD_SCHEMA, type FieldSchema } from '../rules-engine/field-schema.js';
import { validateRuleDefinition } from '../rules-engine/rule-validator.js';
import type { CompiledRule, Rule } from '../rules-engine/types.js';
import { explainRule, summarizeRule, type RuleExplanation } from './explain.js';
import { extractJson, LlmUnavailableError, type LlmClient } from './llm-client.js';
import { matchPatterns } from './pattern-library.js';
import { buildRuleCompilationPrompt, buildRuleCompilationSystem } from './prompts.js';

export type CompileStrategy = 'auto' | 'llm' | 'pattern';

export interface CompileOptions {
  client_context?: string | null;
  strategy?: CompileStrategy;
}

/** Where the compiler reads a client's existing rules for threshold hints. */
export interface ClientRuleSource {
  getForClient(client: string): Promise<Rule[]>;
}

export interface RuleCompilerDeps {
  llm?: LlmClient | null;
  rules?: ClientRuleSource | null;
  schema?: FieldSchema;
  logger?: Logger;
}

/** Confidence assigned to a model reply that carries none. */
export const DEFAULT_LLM_CONFIDENCE = 0.8;

const llmReplySchema = z.union([
  z.object({ ambiguous: z.literal(true), reason: z.string().optional() }),
  z.object({
    name: z.string().optional(),
    description: z.string().optional(),
    rule_type: z.string(),
    field: z.string(),
    condition: z.unknown(),
    action: z.unknown(),
    confidence: z.number().optional(),
  }),
]);

function clip(value: number): number {
  return Math.min(1, Math.max(0, value));
}

function toSnakeCase(value: string): string {
  return value
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

/**
 * Turns natural-language cleaning instructions into typed rules. The model is
 * tried first; the pattern library is the fallback.
 */
export class RuleCompiler {
  private readonly llm: LlmClient | null;
  private readonly rules: ClientRuleSource | null;
  private readonly schema: FieldSchema;
  private readonly logger: Logger;

  constructor(deps: RuleCompilerDeps = {}) {
    this.llm = deps.llm ?? null;
    this.rules = deps.rules ?? null;
    this.schema = deps.schema ?? DEFAULT_FIELD_SCHEMA;
    this.logger = deps.logger ?? createLogger('rule-compiler');
  }

  async compile(text: string, options: CompileOptions = {}): Promise<Result<CompiledRule, CompileError>> {
    const strategy = options.strategy ?? 'auto';
    const clientContext = options.client_context ?? null;

    return withSpan('rule_compiler.compile', { strategy }, async () => {
      if (text.trim().length === 0) return err(CompileError.ambiguous(text));

      if (strategy === 'pattern') return this.compileWithPatterns(text, clientContext);

      const fromLlm = await this.compileWithLlm(text, clientContext);
      if (fromLlm.ok || strategy === 'llm') return fromLlm;

      this.logger.info(
        { code: fromLlm.error.code, reason: fromLlm.error.message },
        'LLM compile failed, falling back to pattern library',
      );
      const fromPatterns = this.compileWithPatterns(text, clientContext);
      if (fromPatterns.ok) return fromPatterns;

      if (fromLlm.error.code === 'unknown_field' && fromPatterns.error.code !== 'unknown_field') {
        return fromLlm;
      }
      return fromPatterns;
    });
  }

  explain(rule: CompiledRule): RuleExplanation {
    return explainRule(rule);
  }

  private async compileWithLlm(
    text: string,
    clientContext: string | null,
  ): Promise<Result<CompiledRule, CompileError>> {
    if (!this.llm) {
      return err(new CompileError('service_unavailable', 'No LLM client configured'));
    }

    const clientRules = clientContext && this.rules ? await this.rules.getForClient(clientContext) : [];

    let reply: string;
    try {
      const response = await this.llm.complete({
        system: buildRuleCompilationSystem(this.schema),
        prompt: buildRuleCompilationPrompt(text, clientContext, clientRules),
      });
      reply = response.text;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      if (!(error instanceof LlmUnavailableError)) {
        this.logger.warn({ err: error }, 'Unexpected LLM client failure');
      }
      return err(new CompileError('service_unavailable', message));
    }

    const parsed = llmReplySchema.safeParse(extractJson(reply));
    if (!parsed.success) {
      return err(
        new CompileError('malformed_response', 'LLM reply is not a rule object', {
          issues: parsed.error.issues.map((issue) => issue.message),
        }),
      );
    }

    const data = parsed.data;
    if ('ambiguous' in data) {
      return err(
        new CompileError('ambiguous', data.reason ?? CompileError.ambiguous(text).message, { text }),
      );
    }

    const field = this.schema.resolve(data.field);
    if (!field) return err(CompileError.unknownField(data.field));

    const definition = validateRuleDefinition(
      { rule_type: data.rule_type, field: field.name, condition: data.condition, action: data.action },
      this.schema,
    );
    if (!definition.ok) {
      return err(new CompileError('malformed_response', 'LLM rule failed validation', { issues: definition.error }));
    }

    return ok({
      name: data.name ? toSnakeCase(data.name) : `${definition.value.action.kind}_${field.name}`,
      description: data.description ?? summarizeRule(definition.value),
      source_text: text,
      definition: definition.value,
      confidence: clip(data.confidence ?? DEFAULT_LLM_CONFIDENCE),
      compiled_by: 'llm',
      client_context: clientContext,
      priority: null,
    });
  }

  private compileWithPatterns(text: string, clientContext: string | null): Result<CompiledRule, CompileError> {
    const matched = matchPatterns(text, this.schema);
    if (!matched.ok) return matched;

    const definition = validateRuleDefinition(matched.value.definition, this.schema);
    if (!definition.ok) {
      return err(new CompileError('invalid_rule', definition.error.join('; '), { issues: definition.error }));
    }

    return ok({
      name: matched.value.name,
      description: matched.value.description,
      source_text: text,
      definition: definition.value,
      confidence: matched.value.confidence,
      compiled_by: 'pattern',
      client_context: clientContext,
      priority: null,
    });
  }
}
