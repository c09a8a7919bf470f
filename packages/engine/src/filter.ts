import type { EntityType, Modifier, Operator, Predicate, ValueKind } from '@sieve/core';
import { InvalidSearchModifierError } from '@sieve/core';
import type { TypeParserRegistry } from './parsers';
import type { FieldResolver, ResolveScope } from './resolver';

// Leading glyph of a filter value -> modifier. No glyph means equality.
export const MODIFIER_GLYPHS: ReadonlyMap<string, Modifier> = new Map<string, Modifier>([
  ['<', 'lt'],
  [']', 'lte'],
  ['>', 'gt'],
  ['[', 'gte'],
  ['!', 'ne'],
  ['^', 'startswith'],
  ['$', 'endswith'],
  ['*', 'contains'],
  ['~', 'notcontains'],
]);

export type LookupEntry = Operator | { sensitive: Operator; insensitive: Operator };

// Missing (modifier, kind) entries are unsupported combinations.
export type FilterTable = { readonly [M in Modifier]: Partial<Record<ValueKind, LookupEntry>> };

const equality = {
  null: 'exact',
  int: 'exact',
  datetime: 'exact',
  string: { sensitive: 'exact', insensitive: 'iexact' },
} as const satisfies Partial<Record<ValueKind, LookupEntry>>;

const ordering = (op: Operator) => ({ int: op, float: op, datetime: op, string: op });

export const DEFAULT_FILTER_TABLE: FilterTable = {
  none: equality,
  ne: equality,
  gt: ordering('gt'),
  gte: ordering('gte'),
  lt: ordering('lt'),
  lte: ordering('lte'),
  startswith: { string: { sensitive: 'startswith', insensitive: 'istartswith' } },
  endswith: { string: { sensitive: 'endswith', insensitive: 'iendswith' } },
  contains: { string: { sensitive: 'contains', insensitive: 'icontains' } },
  notcontains: { string: { sensitive: 'contains', insensitive: 'icontains' } },
};

// Modifiers compiled as the negation of their operator.
export const EXCLUDE_MODIFIERS: ReadonlySet<Modifier> = new Set<Modifier>(['ne', 'notcontains']);

export interface FilterScope extends ResolveScope {
  caseSensitive: boolean;
}

export function splitModifier(fragment: string): { glyph: string; modifier: Modifier; rest: string } {
  const glyph = fragment.charAt(0);
  const modifier = MODIFIER_GLYPHS.get(glyph);
  if (modifier) return { glyph, modifier, rest: fragment.slice(1) };
  return { glyph: '', modifier: 'none', rest: fragment };
}

export class FilterCompiler {
  constructor(
    private readonly resolver: FieldResolver,
    private readonly parsers: TypeParserRegistry,
    private readonly table: FilterTable = DEFAULT_FILTER_TABLE,
    private readonly excludes: ReadonlySet<Modifier> = EXCLUDE_MODIFIERS,
  ) {}

  compile(root: EntityType, field: string, fragment: string, scope: FilterScope): Predicate {
    const path = this.resolver.resolveValue(root, field, scope);
    const { glyph, modifier, rest } = splitModifier(fragment);
    const value = this.parsers.parse(rest);
    const entry = this.table[modifier][value.kind];
    if (!entry) throw new InvalidSearchModifierError(glyph, rest, value.kind);

    const operator = typeof entry === 'string'
      ? entry
      : scope.caseSensitive ? entry.sensitive : entry.insensitive;

    return {
      path,
      modifier,
      operator,
      value,
      caseSensitive: scope.caseSensitive,
      exclude: this.excludes.has(modifier),
    };
  }

  /** One predicate per fragment, all on the same path. */
  compileAll(root: EntityType, field: string, fragments: readonly string[], scope: FilterScope): Predicate[] {
    return fragments.map((f) => this.compile(root, field, f, scope));
  }
}
