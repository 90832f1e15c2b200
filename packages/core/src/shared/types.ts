import { ulid } from 'ulid';

export function generateId(): string {
  return ulid();
}

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export type FieldValue = string | number | boolean | null;

/** A single cattle-lot row keyed by lot_id. */
export interface LotRecord {
  lot_id: string;
  [field: string]: FieldValue;
}

export interface Actor {
  type: 'human' | 'agent' | 'system' | 'import';
  id: string;
  name: string;
}

export const SYSTEM_ACTOR: Actor = { type: 'system', id: 'system', name: 'System' };
