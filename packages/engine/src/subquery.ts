import { InvalidCommandError } from '@sieve/core';

export interface SubqueryOptions {
  command: string;        // reported on syntax errors
  fieldSeparator: string; // between key=value pairs
  valueSeparator: string; // between values of one key
}

/**
 * Parses the `key=value|key=value'value` syntax used inside `c:join`,
 * `c:annotate` and `c:aggregate`. Keys keep their first-appearance order and
 * repeated keys accumulate their values.
 */
export function parseSubquery(text: string, opts: SubqueryOptions): Map<string, string[]> {
  const out = new Map<string, string[]>();
  for (const pair of text.split(opts.fieldSeparator)) {
    const eq = pair.indexOf('=');
    if (eq < 0) {
      throw new InvalidCommandError(
        opts.command,
        `a key/value pair must contain an equal '=' (received '${pair}')`,
      );
    }
    const key = pair.slice(0, eq);
    const values = pair.slice(eq + 1).split(opts.valueSeparator);
    out.set(key, [...(out.get(key) ?? []), ...values]);
  }
  return out;
}

// Last value of a key, if any.
export function lastOf(map: ReadonlyMap<string, string[]>, key: string): string | undefined {
  const values = map.get(key);
  return values ? values[values.length - 1] : undefined;
}
