import { createHash } from 'node:crypto';
import {
  createLogger,
  err,
  ok,
  PreviewError,
  type CompiledRule,
  type CompileStrategy,
  type Logger,
  type Result,
  type Rule,
  type RuleCompiler,
} from '@dataherd/core';
import type { BatchProcessor } from './batch-processor.js';
import type { ChangeSet, CompileFailure, PreviewOptions } from './types.js';

export interface CleaningPipelineDeps {
  compiler: RuleCompiler;
  processor: BatchProcessor;
  logger?: Logger;
}

export interface TextPreviewOptions extends Omit<PreviewOptions, 'client_context'> {
  strategy?: CompileStrategy;
  include_stored_rules?: boolean;
}

export interface TextPreview {
  change_set: ChangeSet;
  /** Compiled but unsaved rules the ChangeSet was built from. */
  drafts: Rule[];
}

/** Stable id for an unsaved rule, so repeated previews share change keys. */
export function draftRuleId(compiled: CompiledRule): string {
  const content = JSON.stringify({
    text: compiled.source_text,
    client: compiled.client_context,
    definition: compiled.definition,
  });
  return `draft_${createHash('sha256').update(content).digest('hex').slice(0, 16)}`;
}

export function toDraftRule(compiled: CompiledRule, now: Date = new Date()): Rule {
  return {
    ...compiled,
    id: draftRuleId(compiled),
    is_permanent: false,
    is_active: true,
    usage_count: 0,
    success_rate: 0,
    last_used: null,
    created_at: now,
    updated_at: now,
    version: 1,
  };
}

/**
 * Free text in, ChangeSet out: compiles each instruction for the batch's
 * client, then previews the drafts together with the stored rules.
 */
export class CleaningPipeline {
  private readonly compiler: RuleCompiler;
  private readonly processor: BatchProcessor;
  private readonly logger: Logger;

  constructor(deps: CleaningPipelineDeps) {
    this.compiler = deps.compiler;
    this.processor = deps.processor;
    this.logger = deps.logger ?? createLogger('cleaning-pipeline');
  }

  async previewText(
    batchId: string,
    texts: string[],
    options: TextPreviewOptions = {},
  ): Promise<Result<TextPreview, PreviewError>> {
    const batch = await this.processor.getBatch(batchId);
    if (!batch) return err(new PreviewError('batch_not_found', `Batch not found: ${batchId}`));

    const drafts: Rule[] = [];
    const failures: CompileFailure[] = [];
    const now = new Date();
    for (const text of texts) {
      const compiled = await this.compiler.compile(text, {
        client_context: batch.client_context,
        strategy: options.strategy,
      });
      if (compiled.ok) {
        drafts.push(toDraftRule(compiled.value, now));
      } else {
        failures.push({ text, code: compiled.error.code, message: compiled.error.message });
      }
    }

    if (drafts.length === 0) {
      this.logger.warn({ batch_id: batchId, texts: texts.length }, 'No rule compiled; returning an empty ChangeSet');
      return ok({
        change_set: this.processor.emptyChangeSet(batchId, 'compilation_failed', {
          client_context: batch.client_context,
          as_of: options.as_of,
          compile_errors: failures,
        }),
        drafts: [],
      });
    }

    const preview = await this.processor.previewBatch(batchId, {
      ...options,
      client_context: batch.client_context,
      rules: drafts,
      compile_errors: failures,
    });
    if (!preview.ok) return err(preview.error);
    return ok({ change_set: preview.value, drafts });
  }
}
