import type { StandardizeAction, StandardizeFormat } from './types.js';

/** Canonical spellings for breed names and their common abbreviations. */
export const BREED_CANONICAL: Record<string, string> = {
  angus: 'Angus',
  'black angus': 'Black Angus',
  'blk angus': 'Black Angus',
  'red angus': 'Red Angus',
  'angus cross': 'Angus Cross',
  'angus x': 'Angus Cross',
  brangus: 'Brangus',
  brahman: 'Brahman',
  charolais: 'Charolais',
  char: 'Charolais',
  gelbvieh: 'Gelbvieh',
  hereford: 'Hereford',
  herf: 'Hereford',
  holstein: 'Holstein',
  jersey: 'Jersey',
  limousin: 'Limousin',
  lim: 'Limousin',
  shorthorn: 'Shorthorn',
  simmental: 'Simmental',
  sim: 'Simmental',
  wagyu: 'Wagyu',
};

const DEFAULT_MAPPINGS: Record<string, Record<string, string>> = {
  breed: BREED_CANONICAL,
};

export function defaultMappingFor(field: string): Record<string, string> | undefined {
  return DEFAULT_MAPPINGS[field];
}

function normalizeKey(value: string): string {
  return value.trim().replace(/\s+/g, ' ').toLowerCase();
}

export function formatValue(value: string, format: StandardizeFormat): string {
  const collapsed = value.trim().replace(/\s+/g, ' ');
  switch (format) {
    case 'trim':
      return collapsed;
    case 'upper':
      return collapsed.toUpperCase();
    case 'lower':
      return collapsed.toLowerCase();
    case 'proper_case':
      return collapsed
        .toLowerCase()
        .replace(/(^|[\s-])([a-z])/g, (_match, sep: string, letter: string) => sep + letter.toUpperCase());
  }
}

/**
 * Canonical form of `value` for `field`: explicit mapping, then the field's
 * default table, then the requested format.
 */
export function standardizeValue(field: string, value: string, action: StandardizeAction): string {
  const key = normalizeKey(value);
  const mapped = action.mapping?.[key] ?? defaultMappingFor(field)?.[key];
  if (mapped !== undefined) return mapped;
  return formatValue(value, action.format);
}
