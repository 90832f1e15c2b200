import { createHash } from 'node:crypto';
import type { ChangeEntry, RiskLevel, RuleActionKind } from '@dataherd/core';
import type { ChangeSet, ChangeSetSummary, RiskAssessment, RuleCount } from './types.js';

export const LOW_CONFIDENCE_THRESHOLD = 0.5;
export const APPROVAL_SCORE_THRESHOLD = 20;

const RISK_WEIGHT: Record<RiskLevel, number> = { high: 10, medium: 5, low: 0 };

export function riskLevelFor(action: RuleActionKind, confidence: number): RiskLevel {
  if (action === 'remove' || confidence < LOW_CONFIDENCE_THRESHOLD) return 'high';
  if (action === 'standardize') return 'low';
  return 'medium';
}

export function assessRisk(entries: ChangeEntry[]): RiskAssessment {
  let score = 0;
  let highRiskCount = 0;
  for (const entry of entries) {
    score += RISK_WEIGHT[entry.risk_level];
    if (entry.risk_level === 'high') highRiskCount++;
  }
  return {
    score,
    requires_approval: score > APPROVAL_SCORE_THRESHOLD || highRiskCount > 0,
    high_risk_count: highRiskCount,
  };
}

export function changeKey(batchId: string, lotId: string, ruleId: string, field: string): string {
  return `${batchId}:${lotId}:${ruleId}:${field}`;
}

export function isMutation(action: RuleActionKind): boolean {
  return action === 'standardize' || action === 'estimate' || action === 'correct';
}

export function summarize(entries: ChangeEntry[], ruleIds: string[], recordsScanned: number): ChangeSetSummary {
  const byRule = new Map<string, RuleCount>(
    ruleIds.map((ruleId) => [ruleId, { rule_id: ruleId, flagged: 0, changed: 0, removed: 0 }]),
  );
  const summary: ChangeSetSummary = {
    records_scanned: recordsScanned,
    records_affected: new Set(entries.map((entry) => entry.lot_id)).size,
    flagged: 0,
    changed: 0,
    removed: 0,
    by_rule: [],
  };

  for (const entry of entries) {
    const counts = byRule.get(entry.rule_id);
    if (entry.action === 'flag') {
      summary.flagged++;
      if (counts) counts.flagged++;
    } else if (entry.action === 'remove') {
      summary.removed++;
      if (counts) counts.removed++;
    } else {
      summary.changed++;
      if (counts) counts.changed++;
    }
  }
  summary.by_rule = [...byRule.values()];
  return summary;
}

/** Same value with object keys sorted at every level. */
function canonical(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(canonical);
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([key, nested]) => [key, canonical(nested)]),
    );
  }
  return value;
}

/**
 * sha256 over the ChangeSet content, excluding the fingerprint itself. Keys
 * are sorted so a ChangeSet that went through JSON keeps its fingerprint.
 */
export function fingerprintChangeSet(changeSet: Omit<ChangeSet, 'fingerprint'>): string {
  const content: Omit<ChangeSet, 'fingerprint'> = {
    batch_id: changeSet.batch_id,
    client_context: changeSet.client_context,
    as_of: changeSet.as_of,
    entries: changeSet.entries,
    rule_ids: changeSet.rule_ids,
    summary: changeSet.summary,
    diagnostics: changeSet.diagnostics,
    risk: changeSet.risk,
    outcome: changeSet.outcome,
    compile_errors: changeSet.compile_errors,
    min_confidence: changeSet.min_confidence,
  };
  return createHash('sha256').update(JSON.stringify(canonical(content))).digest('hex');
}

export function sealChangeSet(changeSet: Omit<ChangeSet, 'fingerprint'>): ChangeSet {
  return { ...changeSet, fingerprint: fingerprintChangeSet(changeSet) };
}

export function verifyFingerprint(changeSet: ChangeSet): boolean {
  return fingerprintChangeSet(changeSet) === changeSet.fingerprint;
}
