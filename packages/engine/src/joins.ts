import type {
  EntityType,
  Predicate,
  RelationDescriptor,
  RelationHop,
  SortKey,
} from '@sieve/core';
import { InvalidCommandError } from '@sieve/core';
import { scopedFilters } from './annotations';
import type { QueryContext } from './context';
import { lastOf, parseSubquery } from './subquery';

export interface JoinNode {
  readonly path: string; // dotted relation names from the root
  readonly hops: RelationHop[];
  readonly relation: RelationDescriptor;
  readonly entity: EntityType; // joined entity
  show?: string[];
  hide: string[];
  sort: SortKey[];
  offset: number;
  limit: number; // 0 = every related row
  filters: Predicate[];
  readonly children: Map<string, JoinNode>;
}

export type JoinDefinition = Omit<JoinNode, 'children'>;

function ensureShown(node: JoinNode, name: string): void {
  if (node.show && !node.show.includes(name)) node.show.push(name);
  node.hide = node.hide.filter((n) => n !== name);
}

/**
 * Join specifications keyed by relation path. A deep join creates the
 * intermediate levels on demand, each showing only the next relation, unless
 * that level was joined on its own.
 */
export class JoinTree {
  readonly roots = new Map<string, JoinNode>();

  add(def: JoinDefinition): void {
    let level = this.roots;
    const names = def.hops.map((h) => h.relation.name);

    for (let i = 0; i < def.hops.length - 1; i++) {
      const hop = def.hops[i];
      const next = names[i + 1];
      if (!hop || !next) break;
      let node = level.get(hop.relation.name);
      if (!node) {
        node = {
          path: names.slice(0, i + 1).join('.'),
          hops: def.hops.slice(0, i + 1),
          relation: hop.relation,
          entity: hop.to,
          show: [next],
          hide: [],
          sort: [],
          offset: 0,
          limit: 0,
          filters: [],
          children: new Map(),
        };
        level.set(hop.relation.name, node);
      } else {
        ensureShown(node, next);
      }
      level = node.children;
    }

    const existing = level.get(def.relation.name);
    const node: JoinNode = { ...def, children: existing?.children ?? new Map() };
    for (const child of node.children.keys()) ensureShown(node, child);
    level.set(def.relation.name, node);
  }
}

const JOIN_KEYS = ['field', 'show', 'hide', 'start', 'limit', 'sort', 'filters'];

function count(command: string, key: string, raw: string | undefined): number {
  const v = raw ?? '0';
  if (!/^\d+$/.test(v)) {
    throw new InvalidCommandError(command, `'${key}' value must be a non-negative integer (received '${v}')`);
  }
  return Number(v);
}

/**
 * Builds a join definition from one `c:join` value. Show, hide and sort are
 * relative to the joined entity; filters to the query's root entity.
 */
export function parseJoin(ctx: QueryContext, command: string, value: string): JoinDefinition {
  const args = parseSubquery(value, {
    command,
    fieldSeparator: ctx.settings.fieldSeparator,
    valueSeparator: ctx.settings.valueSeparator,
  });
  for (const key of args.keys()) {
    if (!JOIN_KEYS.includes(key)) {
      throw new InvalidCommandError(command, `unknown argument '${key}', valid arguments are ${JSON.stringify(JOIN_KEYS)}`);
    }
  }
  const field = lastOf(args, 'field');
  if (!field) throw new InvalidCommandError(command, "'field' argument is missing");

  const { resolver } = ctx.services;
  const scope = ctx.plainScope();
  const path = resolver.resolveRelation(ctx.entity, field, scope);
  const target = path.terminal.target;
  const names = (key: string) => (args.get(key) ?? []).filter((n) => n !== '');

  const show = names('show');
  const hide = names('hide');
  for (const n of [...show, ...hide]) {
    if (n.includes('.')) throw new InvalidCommandError(command, `'${n}' is not a field of '${target.name}'`);
    resolver.resolve(target, n, scope);
  }

  const sort = names('sort').map((s) => {
    const descending = s.startsWith('-');
    return { path: resolver.resolveValue(target, descending ? s.slice(1) : s, scope), descending };
  });

  return {
    path: field,
    hops: [...path.hops, { from: path.entity, relation: path.terminal.relation, to: target }],
    relation: path.terminal.relation,
    entity: target,
    show: show.length ? show : undefined,
    hide,
    sort,
    offset: count(command, 'start', lastOf(args, 'start')),
    limit: count(command, 'limit', lastOf(args, 'limit')),
    filters: scopedFilters(ctx, command, args.get('filters') ?? []),
  };
}
