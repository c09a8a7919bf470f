export type QueryParams =
  | Iterable<readonly [string, string]>
  | Record<string, string | string[] | undefined>;

function isPairIterable(input: QueryParams): input is Iterable<readonly [string, string]> {
  return Symbol.iterator in input && typeof Reflect.get(input, Symbol.iterator) === 'function';
}

function* pairs(input: QueryParams): Generator<readonly [string, string]> {
  if (isPairIterable(input)) {
    yield* input;
    return;
  }
  for (const [key, value] of Object.entries(input)) {
    if (value === undefined) continue;
    for (const v of Array.isArray(value) ? value : [value]) yield [key, v];
  }
}

/**
 * Groups a query string by field, in order of first appearance. Repeated
 * fields accumulate and every value is split on the list separator.
 */
export function groupParams(input: QueryParams, listSeparator = ','): Array<[string, string[]]> {
  const grouped = new Map<string, string[]>();
  for (const [key, value] of pairs(input)) {
    const values = grouped.get(key) ?? [];
    values.push(...value.split(listSeparator));
    grouped.set(key, values);
  }
  return [...grouped];
}
