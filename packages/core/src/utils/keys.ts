import type { Key, StoredValue } from '../types';

export function isKey(v: StoredValue | undefined): v is Key {
  return typeof v === 'string' || typeof v === 'number';
}

// Map keys: drivers may hand back the same key as number or string.
export function keyOf(k: Key): string {
  return String(k);
}

export function chainKey(keys: readonly Key[]): string {
  return keys.map(keyOf).join('\u0000');
}
