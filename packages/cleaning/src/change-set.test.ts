import { describe, it, expect } from 'vitest';
import type { ChangeEntry, RuleActionKind } from '@dataherd/core';
import { assessRisk, changeKey, riskLevelFor, sealChangeSet, summarize, verifyFingerprint } from './change-set.js';
import type { ChangeSet } from './types.js';

function entry(lotId: string, ruleId: string, action: RuleActionKind, confidence = 0.7): ChangeEntry {
  return {
    change_key: changeKey('b1', lotId, ruleId, 'breed'),
    batch_id: 'b1',
    lot_id: lotId,
    position: 0,
    field: 'breed',
    action,
    original_value: 'angus',
    new_value: action === 'remove' ? null : 'Angus',
    rule_id: ruleId,
    confidence,
    reason: `${ruleId}: breed is not in canonical form`,
    risk_level: riskLevelFor(action, confidence),
    status: 'proposed',
    operation_id: null,
    failure_reason: null,
  };
}

function changeSet(entries: ChangeEntry[]): ChangeSet {
  return sealChangeSet({
    batch_id: 'b1',
    client_context: null,
    as_of: '2026-06-01',
    entries,
    rule_ids: ['r1'],
    summary: summarize(entries, ['r1'], 3),
    diagnostics: [],
    risk: assessRisk(entries),
    outcome: entries.length > 0 ? 'changes_proposed' : 'no_issues_found',
    compile_errors: [],
    min_confidence: null,
  });
}

describe('riskLevelFor', () => {
  it('should rate removals and low confidence as high risk', () => {
    expect(riskLevelFor('remove', 0.9)).toBe('high');
    expect(riskLevelFor('flag', 0.4)).toBe('high');
    expect(riskLevelFor('standardize', 0.49)).toBe('high');
  });

  it('should rate standardization as low and other actions as medium', () => {
    expect(riskLevelFor('standardize', 0.5)).toBe('low');
    expect(riskLevelFor('flag', 0.5)).toBe('medium');
    expect(riskLevelFor('estimate', 0.6)).toBe('medium');
    expect(riskLevelFor('correct', 0.9)).toBe('medium');
  });
});

describe('assessRisk', () => {
  it('should score nothing for an empty list', () => {
    expect(assessRisk([])).toEqual({ score: 0, requires_approval: false, high_risk_count: 0 });
  });

  it('should require approval for any high-risk entry', () => {
    expect(assessRisk([entry('L1', 'r1', 'remove')])).toEqual({ score: 10, requires_approval: true, high_risk_count: 1 });
  });
});

describe('summarize', () => {
  it('should count per action and per rule, including rules without entries', () => {
    const entries = [entry('L1', 'r1', 'flag'), entry('L1', 'r1', 'standardize'), entry('L2', 'r2', 'remove')];

    expect(summarize(entries, ['r1', 'r2', 'r3'], 5)).toEqual({
      records_scanned: 5,
      records_affected: 2,
      flagged: 1,
      changed: 1,
      removed: 1,
      by_rule: [
        { rule_id: 'r1', flagged: 1, changed: 1, removed: 0 },
        { rule_id: 'r2', flagged: 0, changed: 0, removed: 1 },
        { rule_id: 'r3', flagged: 0, changed: 0, removed: 0 },
      ],
    });
  });
});

describe('fingerprint', () => {
  it('should survive a JSON round trip', () => {
    const sealed = changeSet([entry('L1', 'r1', 'standardize')]);
    const parsed: ChangeSet = JSON.parse(JSON.stringify(sealed));

    expect(verifyFingerprint(parsed)).toBe(true);
  });

  it('should not depend on key order', () => {
    const sealed = changeSet([entry('L1', 'r1', 'standardize')]);
    const { fingerprint, batch_id, ...rest } = sealed;
    const reordered: ChangeSet = { fingerprint, ...rest, batch_id };

    expect(verifyFingerprint(reordered)).toBe(true);
  });

  it('should detect an edited entry', () => {
    const sealed = changeSet([entry('L1', 'r1', 'standardize')]);
    const edited: ChangeSet = {
      ...sealed,
      entries: sealed.entries.map((item) => ({ ...item, new_value: 'Wagyu' })),
    };

    expect(verifyFingerprint(edited)).toBe(false);
  });

  it('should differ between different content', () => {
    expect(changeSet([]).fingerprint).not.toBe(changeSet([entry('L1', 'r1', 'flag')]).fingerprint);
  });
});
