import type { FieldValue, LotRecord } from '../shared/types.js';

/**
 * Batch-wide lookups needed by conditions and actions that look beyond a
 * single record (duplicates, estimates). Built once per preview.
 */
export class BatchContext {
  private readonly duplicateCache = new Map<string, Set<string>>();

  constructor(readonly records: readonly LotRecord[]) {}

  /**
   * Lot ids judged duplicates under `keys` (all non-key fields when empty),
   * keeping the first or last occurrence of each group.
   */
  duplicates(keys: string[], keep: 'first' | 'last'): Set<string> {
    const cacheKey = `${keys.join(',')}|${keep}`;
    const cached = this.duplicateCache.get(cacheKey);
    if (cached) return cached;

    const groups = new Map<string, string[]>();
    for (const record of this.records) {
      const signature = recordSignature(record, keys);
      const members = groups.get(signature) ?? [];
      members.push(record.lot_id);
      groups.set(signature, members);
    }

    const result = new Set<string>();
    for (const members of groups.values()) {
      if (members.length < 2) continue;
      const kept = keep === 'first' ? members[0] : members[members.length - 1];
      for (const lotId of members) {
        if (lotId !== kept) result.add(lotId);
      }
    }

    this.duplicateCache.set(cacheKey, result);
    return result;
  }

  /**
   * Parsed numeric values of `field`, optionally restricted to records
   * matching `where` and excluding one lot.
   */
  numericValues(
    field: string,
    options: { excludeLotId?: string; where?: Record<string, FieldValue> } = {},
  ): number[] {
    const values: number[] = [];
    for (const record of this.records) {
      if (record.lot_id === options.excludeLotId) continue;
      if (options.where && !matchesAll(record, options.where)) continue;
      const parsed = parseNumeric(record[field]);
      if (parsed !== null) values.push(parsed);
    }
    return values;
  }
}

function recordSignature(record: LotRecord, keys: string[]): string {
  const fields =
    keys.length > 0 ? keys : Object.keys(record).filter((key) => key !== 'lot_id').sort();
  return JSON.stringify(fields.map((field) => normalizeForCompare(record[field])));
}

function matchesAll(record: LotRecord, where: Record<string, FieldValue>): boolean {
  return Object.entries(where).every(
    ([field, expected]) => normalizeForCompare(record[field]) === normalizeForCompare(expected),
  );
}

function normalizeForCompare(value: FieldValue | undefined): FieldValue {
  if (value === undefined) return null;
  if (typeof value === 'string') return value.trim().toLowerCase();
  return value;
}

/**
 * Number from a numeric cell: plain numbers, numeric strings with thousands
 * separators and an optional pound unit. Null when absent or not numeric.
 */
export function parseNumeric(value: FieldValue | undefined): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value !== 'string') return null;
  const match = value
    .trim()
    .replace(/,/g, '')
    .match(/^(-?\d+(?:\.\d+)?)\s*(?:lbs?|pounds?)?\.?$/i);
  return match ? Number(match[1]) : null;
}
