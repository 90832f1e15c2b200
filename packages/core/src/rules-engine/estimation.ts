import type { FieldValue, LotRecord } from '../shared/types.js';
import type { BatchContext } from './batch-context.js';
import type { EstimateAction } from './types.js';

export interface Estimate {
  value: number;
  confidence: number;
  sample_size: number;
  /** Human-readable origin of the estimate, e.g. "median of 4 Angus lots". */
  basis: string;
}

/** Confidence multiplier when a grouped estimate falls back to the whole batch. */
export const GROUP_FALLBACK_PENALTY = 0.8;

export function median(values: number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

export function mean(values: number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Population coefficient of variation; zero for fewer than two samples. */
export function coefficientOfVariation(values: number[]): number {
  if (values.length < 2) return 0;
  const m = mean(values);
  if (m === 0) return 0;
  const variance = values.reduce((sum, v) => sum + (v - m) ** 2, 0) / values.length;
  return Math.sqrt(variance) / Math.abs(m);
}

function round(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

function isPresent(value: FieldValue | undefined): value is string | number | boolean {
  return value !== null && value !== undefined && !(typeof value === 'string' && value.trim() === '');
}

/**
 * Estimate a missing numeric value from the rest of the batch. Returns null
 * when no other lot carries a usable value.
 */
export function estimateValue(
  field: string,
  record: LotRecord,
  action: EstimateAction,
  batch: BatchContext,
  ruleConfidence: number,
): Estimate | null {
  let samples: number[] = [];
  let penalty = 1;
  let basis = 'batch';

  if (action.method === 'group_median' && action.group_by.length > 0) {
    const where: Record<string, FieldValue> = {};
    for (const key of action.group_by) {
      const value = record[key];
      if (isPresent(value)) where[key] = value;
    }
    if (Object.keys(where).length === action.group_by.length) {
      samples = batch.numericValues(field, { excludeLotId: record.lot_id, where });
      basis = Object.entries(where)
        .map(([key, value]) => `${key}=${String(value)}`)
        .join(', ');
    }
    if (samples.length === 0) penalty = GROUP_FALLBACK_PENALTY;
  }

  if (samples.length === 0) {
    samples = batch.numericValues(field, { excludeLotId: record.lot_id });
    basis = 'batch';
  }
  if (samples.length === 0) return null;

  const n = samples.length;
  const value = action.method === 'mean' ? mean(samples) : median(samples);
  const confidence =
    ruleConfidence * (n / (n + 5)) * (1 / (1 + coefficientOfVariation(samples))) * penalty;

  return {
    value: round(value, 1),
    confidence: round(confidence, 3),
    sample_size: n,
    basis: `${action.method === 'mean' ? 'mean' : 'median'} of ${n} lots (${basis})`,
  };
}
