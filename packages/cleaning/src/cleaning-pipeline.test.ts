import { describe, it, expect, beforeEach } from 'vitest';
import { RuleCompiler } from '@dataherd/core';
import { InMemoryCleaningStorage } from '@dataherd/core/testing';
import { BatchProcessor } from './batch-processor.js';
import { CleaningPipeline, draftRuleId } from './cleaning-pipeline.js';

const BATCH = 'batch-1';
const AS_OF = new Date('2026-06-01T00:00:00Z');
const WEIGHT_TEXT = 'Flag lots where entry weight is below 500 pounds';

describe('CleaningPipeline', () => {
  let storage: InMemoryCleaningStorage;
  let processor: BatchProcessor;
  let pipeline: CleaningPipeline;

  beforeEach(async () => {
    storage = new InMemoryCleaningStorage();
    processor = new BatchProcessor({ storage });
    pipeline = new CleaningPipeline({ compiler: new RuleCompiler(), processor });
    const ingested = await processor.ingest(
      [
        { lot_id: 'L1', weight: 420 },
        { lot_id: 'L2', weight: 600 },
      ],
      { batch_id: BATCH },
    );
    if (!ingested.ok) throw ingested.error;
  });

  it('should preview freshly compiled rules and report the text that failed', async () => {
    const result = await pipeline.previewText(BATCH, [WEIGHT_TEXT, 'weight below 500'], { as_of: AS_OF });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const { change_set, drafts } = result.value;
    expect(drafts).toHaveLength(1);
    expect(drafts[0]).toMatchObject({ name: 'flag_weight_lt', compiled_by: 'pattern', confidence: 0.7, is_permanent: false });
    expect(drafts[0].id).toBe(draftRuleId(drafts[0]));
    expect(change_set.entries.map((entry) => [entry.lot_id, entry.rule_id, entry.reason])).toEqual([
      ['L1', drafts[0].id, 'flag_weight_lt: weight < 500 (was 420)'],
    ]);
    expect(change_set.compile_errors).toEqual([
      {
        text: 'weight below 500',
        code: 'ambiguous',
        message: 'Could not resolve a field, condition and action from: "weight below 500"',
      },
    ]);
  });

  it('should give the same ChangeSet for the same text', async () => {
    const first = await pipeline.previewText(BATCH, [WEIGHT_TEXT], { as_of: AS_OF });
    const second = await pipeline.previewText(BATCH, [WEIGHT_TEXT], { as_of: AS_OF });

    expect(first.ok && second.ok).toBe(true);
    if (!first.ok || !second.ok) return;
    expect(JSON.stringify(second.value.change_set)).toBe(JSON.stringify(first.value.change_set));
  });

  it('should return an empty ChangeSet when nothing compiles', async () => {
    const result = await pipeline.previewText(BATCH, ['weight below 500', '   '], { as_of: AS_OF });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.drafts).toEqual([]);
    expect(result.value.change_set.outcome).toBe('compilation_failed');
    expect(result.value.change_set.entries).toEqual([]);
    expect(result.value.change_set.compile_errors.map((failure) => failure.code)).toEqual(['ambiguous', 'ambiguous']);
  });

  it('should report an unknown batch', async () => {
    const result = await pipeline.previewText('missing', [WEIGHT_TEXT]);

    expect(result.ok ? null : result.error.code).toBe('batch_not_found');
  });

  it('should apply a draft ChangeSet without saving the draft', async () => {
    const preview = await pipeline.previewText(BATCH, [WEIGHT_TEXT], { as_of: AS_OF });
    if (!preview.ok) throw preview.error;

    const applied = await processor.apply(BATCH, { kind: 'change_set', change_set: preview.value.change_set });

    expect(applied.ok && applied.value.counts.flagged).toBe(1);
    expect(await storage.rules.listPermanent()).toEqual([]);
  });
});
