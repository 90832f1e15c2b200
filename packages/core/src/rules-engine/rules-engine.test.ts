import { describe, it, expect } from 'vitest';
import { evaluateRecord, filterActiveRules, orderRules, type EngineRule } from './rules-engine.js';
import type { RuleDefinition } from './types.js';

function engineRule(
  id: string,
  definition: RuleDefinition,
  options: { priority?: number | null; created_at?: string } = {},
): EngineRule {
  return {
    id,
    name: id,
    definition,
    confidence: 0.9,
    priority: options.priority ?? null,
    created_at: new Date(options.created_at ?? '2026-01-01T00:00:00Z'),
  };
}

const setBreed = (value: string): RuleDefinition => ({
  rule_type: 'cleaning',
  field: 'breed',
  condition: { operator: 'eq', value: 'unknown' },
  action: { kind: 'correct', correction: { kind: 'set', value } },
});

describe('RulesEngine', () => {
  describe('orderRules', () => {
    const rules = [
      engineRule('old-no-priority', setBreed('A'), { created_at: '2026-01-01T00:00:00Z' }),
      engineRule('new-no-priority', setBreed('B'), { created_at: '2026-03-01T00:00:00Z' }),
      engineRule('priority-2', setBreed('C'), { priority: 2 }),
      engineRule('priority-1', setBreed('D'), { priority: 1, created_at: '2025-06-01T00:00:00Z' }),
    ];

    it('should put defined priorities first, then newest first', () => {
      expect(orderRules(rules).map((r) => r.id)).toEqual([
        'priority-1',
        'priority-2',
        'new-no-priority',
        'old-no-priority',
      ]);
    });

    it('should ignore priority under recency ordering', () => {
      expect(orderRules(rules, 'recency').map((r) => r.id)).toEqual([
        'new-no-priority',
        'old-no-priority',
        'priority-2',
        'priority-1',
      ]);
    });

    it('should not reorder the input array', () => {
      orderRules(rules);
      expect(rules[0].id).toBe('old-no-priority');
    });
  });

  describe('filterActiveRules', () => {
    it('should keep active client and global rules only', () => {
      const rules = [
        { id: 'global', is_active: true, client_context: null },
        { id: 'mine', is_active: true, client_context: 'ranch-a' },
        { id: 'theirs', is_active: true, client_context: 'ranch-b' },
        { id: 'retired', is_active: false, client_context: null },
      ];

      expect(filterActiveRules(rules, 'ranch-a').map((r) => r.id)).toEqual(['global', 'mine']);
      expect(filterActiveRules(rules, null).map((r) => r.id)).toEqual(['global']);
    });
  });

  describe('evaluateRecord', () => {
    it('should let the first rule claim a field and report later ones as superseded', () => {
      const ordered = orderRules([
        engineRule('late', setBreed('Hereford'), { created_at: '2026-02-01T00:00:00Z' }),
        engineRule('first', setBreed('Angus'), { priority: 1 }),
      ]);

      const result = evaluateRecord(ordered, { lot_id: 'L1', breed: 'unknown' });

      expect(result.matches).toHaveLength(1);
      expect(result.matches[0].rule_id).toBe('first');
      expect(result.matches[0].mutation?.to).toBe('Angus');
      expect(result.diagnostics).toEqual([
        {
          code: 'superseded',
          lot_id: 'L1',
          rule_id: 'late',
          field: 'breed',
          message: 'breed already changed by rule first',
        },
      ]);
    });

    it('should allow flags alongside a mutation on the same field', () => {
      const result = evaluateRecord(
        [
          engineRule('fix', setBreed('Angus')),
          engineRule('flag', {
            rule_type: 'validation',
            field: 'breed',
            condition: { operator: 'eq', value: 'unknown' },
            action: { kind: 'flag' },
          }),
        ],
        { lot_id: 'L1', breed: 'unknown' },
      );

      expect(result.matches.map((m) => m.action)).toEqual(['correct', 'flag']);
    });

    it('should stop evaluating a record after a remove match', () => {
      const result = evaluateRecord(
        [
          engineRule('drop', {
            rule_type: 'validation',
            field: 'weight',
            condition: { operator: 'missing' },
            action: { kind: 'remove' },
          }),
          engineRule('fix', setBreed('Angus')),
        ],
        { lot_id: 'L1', breed: 'unknown', weight: null },
      );

      expect(result.matches.map((m) => m.rule_id)).toEqual(['drop']);
    });
  });
});
