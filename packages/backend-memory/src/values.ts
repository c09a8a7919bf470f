import type { AggregateFunction, Operator, StoredValue, TypedValue } from '@sieve/core';

type Scalar = number | string;

function scalar(v: Exclude<StoredValue, null>): Scalar {
  if (v instanceof Date) return v.getTime();
  if (typeof v === 'boolean') return v ? 1 : 0;
  return v;
}

function target(v: TypedValue): Scalar | null {
  switch (v.kind) {
    case 'null': return null;
    case 'datetime': return v.value.getTime();
    default: return v.value;
  }
}

// Numbers compare numerically; a numeric string against a number as a number;
// anything else as strings.
export function compareScalars(a: Scalar, b: Scalar): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  const na = typeof a === 'number' ? a : Number(a);
  const nb = typeof b === 'number' ? b : Number(b);
  if ((typeof a === 'number' || typeof b === 'number') && !Number.isNaN(na) && !Number.isNaN(nb) && a !== '' && b !== '') {
    return na - nb;
  }
  const sa = String(a);
  const sb = String(b);
  return sa < sb ? -1 : sa > sb ? 1 : 0;
}

/** NULLs first, then by value. */
export function compareStored(a: StoredValue, b: StoredValue): number {
  if (a === null || b === null) return a === b ? 0 : a === null ? -1 : 1;
  return compareScalars(scalar(a), scalar(b));
}

/** Whether a stored value satisfies `operator` against a typed value. */
export function matches(stored: StoredValue, operator: Operator, value: TypedValue): boolean {
  const t = target(value);
  if (operator === 'exact' && t === null) return stored === null;
  if (stored === null || t === null) return false;

  const s = scalar(stored);
  switch (operator) {
    case 'exact': return compareScalars(s, t) === 0;
    case 'iexact': return String(s).toLowerCase() === String(t).toLowerCase();
    case 'gt': return compareScalars(s, t) > 0;
    case 'gte': return compareScalars(s, t) >= 0;
    case 'lt': return compareScalars(s, t) < 0;
    case 'lte': return compareScalars(s, t) <= 0;
    case 'startswith': return String(s).startsWith(String(t));
    case 'istartswith': return String(s).toLowerCase().startsWith(String(t).toLowerCase());
    case 'endswith': return String(s).endsWith(String(t));
    case 'iendswith': return String(s).toLowerCase().endsWith(String(t).toLowerCase());
    case 'contains': return String(s).includes(String(t));
    case 'icontains': return String(s).toLowerCase().includes(String(t).toLowerCase());
  }
}

function numeric(v: Exclude<StoredValue, null>): number {
  return typeof v === 'string' ? Number(v) : Number(scalar(v));
}

/** Aggregates ignore NULLs; an empty input gives 0 for count and null otherwise. */
export function aggregate(values: readonly StoredValue[], func: AggregateFunction): StoredValue {
  const present = values.filter((v): v is Exclude<StoredValue, null> => v !== null);
  if (func === 'count') return present.length;
  if (present.length === 0) return null;

  if (func === 'max' || func === 'min') {
    const sign = func === 'max' ? 1 : -1;
    return present.reduce((best, v) => (sign * compareStored(v, best) > 0 ? v : best));
  }

  const nums = present.map(numeric);
  const sum = nums.reduce((a, b) => a + b, 0);
  if (func === 'sum') return sum;
  const mean = sum / nums.length;
  if (func === 'avg') return mean;
  const variance = nums.reduce((acc, n) => acc + (n - mean) ** 2, 0) / nums.length;
  return func === 'var' ? variance : Math.sqrt(variance);
}
