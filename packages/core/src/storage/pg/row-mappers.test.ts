import { describe, it, expect } from 'vitest';
import { rowToChangeEntry, rowToLotRecord, rowToOperation, rowToRule, rowToSnapshot, type RuleRow } from './row-mappers.js';

const CREATED = new Date('2026-02-01T12:00:00Z');

function ruleRow(overrides: Partial<RuleRow> = {}): RuleRow {
  return {
    id: 'rule-1',
    name: 'flag_weight_lt',
    description: 'Flag lots where weight < 500',
    source_text: 'Flag lots where entry weight is below 500 pounds',
    definition: {
      rule_type: 'validation',
      field: 'weight',
      condition: { operator: 'lt', value: 500 },
      action: { kind: 'flag' },
    },
    confidence: 0.7,
    compiled_by: 'pattern',
    client_context: 'ranch-a',
    priority: null,
    is_permanent: false,
    is_active: true,
    usage_count: 4,
    success_rate: 0.75,
    last_used: null,
    created_at: CREATED,
    updated_at: CREATED,
    version: 2,
    ...overrides,
  };
}

describe('row mappers', () => {
  it('should map a rule row and validate its definition', () => {
    const rule = rowToRule(ruleRow());

    expect(rule.definition).toEqual({
      rule_type: 'validation',
      field: 'weight',
      condition: { operator: 'lt', value: 500 },
      action: { kind: 'flag' },
    });
    expect(rule.compiled_by).toBe('pattern');
    expect(rule.usage_count).toBe(4);
  });

  it('should reject a rule row with a corrupt definition', () => {
    expect(() => rowToRule(ruleRow({ definition: { rule_type: 'validation' } }))).toThrow(
      /Stored rule rule-1 has an invalid definition/,
    );
  });

  it('should reject unknown enum values', () => {
    expect(() => rowToRule(ruleRow({ compiled_by: 'oracle' }))).toThrow(
      'Unexpected compiled_by value in storage: oracle',
    );
  });

  it('should map a lot record row', () => {
    const record = rowToLotRecord({
      batch_id: 'b1',
      lot_id: 'L1',
      position: 0,
      data: { lot_id: 'L1', weight: 420, breed: null },
      status: 'flagged',
      issues: ['weight < 500'],
      version: 3,
    });

    expect(record).toEqual({
      batch_id: 'b1',
      lot_id: 'L1',
      position: 0,
      data: { lot_id: 'L1', weight: 420, breed: null },
      status: 'flagged',
      issues: ['weight < 500'],
      version: 3,
    });
  });

  it('should fill missing counters of an operation row', () => {
    const operation = rowToOperation({
      operation_id: 'op-1',
      batch_id: 'b1',
      kind: 'apply',
      status: 'partially_applied',
      rule_ids: ['rule-1'],
      counts: { changed: 9999, failed: 1 },
      client_context: null,
      actor_type: 'human',
      actor_id: 'u1',
      actor_name: 'Test User',
      snapshot_id: 'snap-1',
      target_operation_id: null,
      rolled_back_by: null,
      created_at: CREATED,
    });

    expect(operation.counts).toEqual({ flagged: 0, changed: 9999, removed: 0, failed: 1, rejected: 0, restored: 0 });
    expect(operation.actor).toEqual({ type: 'human', id: 'u1', name: 'Test User' });
  });

  it('should map a change entry row with JSON values', () => {
    const entry = rowToChangeEntry({
      change_key: 'b1:L1:rule-1:breed',
      operation_id: 'op-1',
      batch_id: 'b1',
      lot_id: 'L1',
      position: 0,
      field: 'breed',
      action: 'standardize',
      original_value: 'angus',
      new_value: 'Angus',
      rule_id: 'rule-1',
      confidence: 0.7,
      reason: 'standardize_breed: breed is not in canonical form',
      risk_level: 'low',
      status: 'applied',
      failure_reason: null,
    });

    expect(entry.original_value).toBe('angus');
    expect(entry.new_value).toBe('Angus');
    expect(entry.status).toBe('applied');
  });

  it('should validate snapshot records', () => {
    const row = {
      snapshot_id: 'snap-1',
      batch_id: 'b1',
      operation_id: 'op-1',
      created_at: CREATED,
      records: [
        {
          batch_id: 'b1',
          lot_id: 'L1',
          position: 0,
          data: { lot_id: 'L1', breed: 'angus' },
          status: 'original',
          issues: [],
          version: 1,
        },
      ],
    };

    expect(rowToSnapshot(row).records[0].data).toEqual({ lot_id: 'L1', breed: 'angus' });
    expect(() => rowToSnapshot({ ...row, records: [{ lot_id: 'L1' }] })).toThrow();
  });
});
