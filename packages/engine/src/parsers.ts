import type { TypedValue } from '@sieve/core';

export const UNMATCHED: unique symbol = Symbol('unmatched');
export type ParseOutcome = TypedValue | typeof UNMATCHED;

export interface TypeParser {
  readonly name: string;
  parse(token: string): ParseOutcome;
}

const INT_RE = /^[+-]?\d+$/;
const FLOAT_RE = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const DATETIME_RE = /^(\d{4})-(\d{2})-(\d{2})([T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2})?)?$/;

export const nullParser: TypeParser = {
  name: 'null',
  parse: (token) => (token === '' ? { kind: 'null', value: null } : UNMATCHED),
};

export const intParser: TypeParser = {
  name: 'int',
  parse: (token) => {
    if (!INT_RE.test(token)) return UNMATCHED;
    const value = Number(token);
    return Number.isSafeInteger(value) ? { kind: 'int', value } : UNMATCHED;
  },
};

export const floatParser: TypeParser = {
  name: 'float',
  parse: (token) => (FLOAT_RE.test(token) ? { kind: 'float', value: Number(token) } : UNMATCHED),
};

function isCalendarDate(year: number, month: number, day: number): boolean {
  const d = new Date(0);
  d.setUTCFullYear(year, month - 1, day);
  return d.getUTCFullYear() === year && d.getUTCMonth() === month - 1 && d.getUTCDate() === day;
}

// Date-times without an offset are read as UTC.
export const datetimeParser: TypeParser = {
  name: 'datetime',
  parse: (token) => {
    const m = DATETIME_RE.exec(token);
    if (!m || !isCalendarDate(Number(m[1]), Number(m[2]), Number(m[3]))) return UNMATCHED;
    let iso = token.replace(' ', 'T');
    if (m[4] && !m[7]) iso += 'Z';
    const d = new Date(iso);
    return Number.isNaN(d.getTime()) ? UNMATCHED : { kind: 'datetime', value: d };
  },
};

export const DEFAULT_PARSERS: readonly TypeParser[] = [nullParser, intParser, floatParser, datetimeParser];

/**
 * Ordered list of parsers; the first one that matches wins and unmatched
 * tokens stay strings. Order is part of the contract: putting `floatParser`
 * before `intParser` makes `"5"` a float.
 */
export class TypeParserRegistry {
  private readonly parsers: readonly TypeParser[];

  constructor(parsers: readonly TypeParser[] = DEFAULT_PARSERS) {
    this.parsers = [...parsers];
  }

  parse(token: string): TypedValue {
    for (const p of this.parsers) {
      const out = p.parse(token);
      if (out !== UNMATCHED) return out;
    }
    return { kind: 'string', value: token };
  }
}
