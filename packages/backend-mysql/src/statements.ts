// packages/backend-mysql/src/statements.ts
import { sql, type RawBuilder } from 'kysely';
import type {
  AggregateFunction,
  AggregateSpec,
  AnnotationSpec,
  Clause,
  EntityType,
  FieldDescriptor,
  Key,
  PlanData,
  Predicate,
  RelatedRequest,
  RelationDescriptor,
  RelationHop,
  SchemaReflection,
  SortKey,
  ValuePath,
} from '@sieve/core';
import { clausesOf } from '@sieve/core';

export type Row = Record<string, unknown>;
type Fragment = RawBuilder<unknown>;

// Expression of every annotation of the current statement, by name.
type Computed = ReadonlyMap<string, Fragment>;

interface Step {
  table: string;
  alias: string;
  on: Fragment;
}

interface Chain {
  steps: Step[];
  targets: string[]; // alias of each hop's target entity
  alias: string;     // alias of the last target
}

export const ROOT = 't0';
export const ANCHOR_PREFIX = '__k';
export const SORT_PREFIX = '__s';

const SPACE = sql` `;
const AND = sql` and `;

const FUNCTIONS: Record<AggregateFunction, string> = {
  max: 'max',
  min: 'min',
  avg: 'avg',
  sum: 'sum',
  stddev: 'stddev_pop',
  var: 'var_pop',
  count: 'count',
};

class Aliases {
  private n = 0;
  next(): string {
    this.n += 1;
    return `t${this.n}`;
  }
}

const columnOf = (f: FieldDescriptor) => f.column ?? f.name;

function sameHop(a: RelationHop, b: RelationHop): boolean {
  return a.from.name === b.from.name && a.relation.name === b.relation.name;
}

function sharedPrefix(a: readonly RelationHop[], b: readonly RelationHop[]): number {
  let k = 0;
  while (k < a.length && k < b.length && sameHop(a[k], b[k])) k++;
  return k;
}

export function escapeLike(s: string): string {
  return s.replace(/[\\%_]/g, (m) => `\\${m}`);
}

/**
 * Builds MySQL statements for plans. Every relation hop becomes a table
 * alias (`t1`, `t2`, ...); a junction hop takes two. Root-scoped filters
 * bind the hops they share with the path being evaluated and test the rest
 * with `exists`.
 */
export class MysqlStatements {
  constructor(private readonly schema: SchemaReflection) {}

  /** The windowed, ordered rows of a plan. */
  rows(plan: PlanData): RawBuilder<Row> {
    const aliases = new Aliases();
    const computed = this.computed(plan, aliases);
    const { joins, where } = this.body(plan, aliases, computed);
    const pk = this.schema.primaryKeyOf(plan.entity);

    const columns = [
      ...this.columns(plan.entity, ROOT),
      ...plan.annotations.map((a) => sql`${this.expr(computed, a.name)} as ${sql.id(a.name)}`),
      ...plan.sort.map((k, i) => sql`${this.sortExpr(k, ROOT, aliases, computed)} as ${sql.id(`${SORT_PREFIX}${i}`)}`),
    ];
    const order = [
      ...plan.sort.map((k, i) => sql`${sql.id(`${SORT_PREFIX}${i}`)} ${sql.raw(k.descending ? 'desc' : 'asc')}`),
      sql`${sql.id(pk.name)} asc`,
    ];

    return sql<Row>`${sql.join([
      sql`select${this.distinct(plan)} ${sql.join(columns)}`,
      sql`from ${sql.table(plan.entity.table)} as ${sql.id(ROOT)}`,
      ...joins,
      ...this.where(where),
      sql`order by ${sql.join(order)}`,
      ...this.window(plan.offset, plan.limit),
    ], SPACE)}`;
  }

  /** Number of rows the plan yields before its window. */
  count(plan: PlanData): RawBuilder<Row> {
    return sql<Row>`select count(*) as ${sql.id('n')} from (${this.base(plan, new Aliases())}) as ${sql.id('q')}`;
  }

  /** One aggregate over every value `spec.path` reaches from the plan's rows. */
  aggregate(plan: PlanData, spec: AggregateSpec): RawBuilder<Row> {
    const aliases = new Aliases();
    const from = sql`from (${this.base(plan, aliases)}) as ${sql.id('q')}`;
    const call = (term: Fragment) => sql`select ${this.call(spec.func, term)} as ${sql.id('value')}`;

    const { terminal } = spec.path;
    if (terminal.kind === 'computed') {
      return sql<Row>`${call(sql.id('q', terminal.name))} ${from}`;
    }
    if (spec.path.hops.length === 0) {
      return sql<Row>`${call(sql.id('q', columnOf(terminal.field)))} ${from}`;
    }
    const chain = this.chain(spec.path.hops, 'q', aliases);
    return sql<Row>`${sql.join([
      call(sql.id(chain.alias, columnOf(terminal.field))),
      from,
      ...chain.steps.map((s) => this.join(s)),
    ], SPACE)}`;
  }

  /**
   * Rows of the entity at the end of `req.hops`, tagged with the keys of
   * their root and every intermediate object as `__k0`, `__k1`, ...
   */
  related(req: RelatedRequest): RawBuilder<Row> {
    const aliases = new Aliases();
    const chain = this.chain(req.hops, ROOT, aliases);
    const bound = [ROOT, ...chain.targets];
    const entities = [req.root, ...req.hops.map((h) => h.to)];
    const child = entities[entities.length - 1] ?? req.root;

    const anchorColumns = req.hops.map((_, i) => this.pk(bound[i] ?? ROOT, entities[i] ?? req.root));
    const columns = [
      ...anchorColumns.map((c, i) => sql`${c} as ${sql.id(`${ANCHOR_PREFIX}${i}`)}`),
      ...this.columns(child, chain.alias),
      ...req.sort.map((k, i) => sql`${this.sortExpr(k, chain.alias, aliases, new Map())} as ${sql.id(`${SORT_PREFIX}${i}`)}`),
    ];
    const tuples = req.anchors.map((a) => sql`(${sql.join(a.slice(0, anchorColumns.length))})`);
    const where = [
      sql`(${sql.join(anchorColumns)}) in (${sql.join(tuples)})`,
      ...clausesOf(req.filters).map((c) => this.bound(c, bound, req.hops, aliases, new Map())),
    ];
    const order = [
      ...req.sort.map((k, i) => sql`${sql.id(`${SORT_PREFIX}${i}`)} ${sql.raw(k.descending ? 'desc' : 'asc')}`),
      sql`${this.pk(chain.alias, child)} asc`,
    ];

    return sql<Row>`${sql.join([
      sql`select ${sql.join(columns)}`,
      sql`from ${sql.table(req.root.table)} as ${sql.id(ROOT)}`,
      ...chain.steps.map((s) => this.join(s)),
      ...this.where(where),
      sql`order by ${sql.join(order)}`,
    ], SPACE)}`;
  }

  /** `(parent, related)` key pairs of one relation, in related-key order. */
  relatedKeys(entity: EntityType, relation: RelationDescriptor, keys: readonly Key[]): RawBuilder<Row> {
    const target = this.schema.target(relation);
    const link = relation.link;
    const pair = (parent: Fragment, related: Fragment) =>
      sql`select ${parent} as ${sql.id('parent')}, ${related} as ${sql.id('related')}`;

    switch (link.kind) {
      case 'foreignKey':
        return sql<Row>`${pair(this.pk(ROOT, entity), sql.id(ROOT, link.column))} from ${sql.table(entity.table)} as ${sql.id(ROOT)} where ${this.pk(ROOT, entity)} in (${sql.join(keys)}) and ${sql.id(ROOT, link.column)} is not null`;
      case 'reverse':
        return sql<Row>`${pair(sql.id(ROOT, link.column), this.pk(ROOT, target))} from ${sql.table(target.table)} as ${sql.id(ROOT)} where ${sql.id(ROOT, link.column)} in (${sql.join(keys)}) order by ${this.pk(ROOT, target)} asc`;
      case 'junction':
        return sql<Row>`${pair(sql.id(ROOT, link.sourceColumn), this.pk('t1', target))} from ${sql.table(link.table)} as ${sql.id(ROOT)} inner join ${sql.table(target.table)} as ${sql.id('t1')} on ${this.pk('t1', target)} = ${sql.id(ROOT, link.targetColumn)} where ${sql.id(ROOT, link.sourceColumn)} in (${sql.join(keys)}) order by ${this.pk('t1', target)} asc`;
    }
  }

  // ---- plan parts ----

  // Unordered, unwindowed rows with every stored column and annotation.
  private base(plan: PlanData, aliases: Aliases): Fragment {
    const computed = this.computed(plan, aliases);
    const { joins, where } = this.body(plan, aliases, computed);
    const columns = [
      sql`${sql.id(ROOT)}.*`,
      ...plan.annotations.map((a) => sql`${this.expr(computed, a.name)} as ${sql.id(a.name)}`),
    ];
    return sql`${sql.join([
      sql`select${this.distinct(plan)} ${sql.join(columns)}`,
      sql`from ${sql.table(plan.entity.table)} as ${sql.id(ROOT)}`,
      ...joins,
      ...this.where(where),
    ], SPACE)}`;
  }

  // Non-excluding clauses through relations join one chain each, so a row
  // repeats once per combination of satisfying related objects.
  private body(plan: PlanData, aliases: Aliases, computed: Computed) {
    const joins: Fragment[] = [];
    const where: Fragment[] = [];
    for (const c of clausesOf(plan.predicates)) {
      if (c.exclude || c.path.hops.length === 0) {
        where.push(this.bound(c, [ROOT], [], aliases, computed));
        continue;
      }
      const chain = this.chain(c.path.hops, ROOT, aliases);
      joins.push(...chain.steps.map((s) => this.join(s)));
      where.push(...this.compares(this.value(chain.alias, c.path, computed), c));
    }
    return { joins, where };
  }

  private computed(plan: PlanData, aliases: Aliases): Computed {
    const narrowing = clausesOf(plan.predicates).filter((c) => !c.exclude);
    const out = new Map<string, Fragment>();
    for (const a of plan.annotations) {
      out.set(a.name, this.annotation(plan.entity, a, a.delayed ? narrowing : [], aliases));
    }
    return out;
  }

  // Correlated subquery over the row itself and the annotation's chain.
  private annotation(root: EntityType, spec: AnnotationSpec, narrowing: readonly Clause[], aliases: Aliases): Fragment {
    const self = aliases.next();
    const chain = this.chain(spec.path.hops, self, aliases);
    const bound = [self, ...chain.targets];
    const conds = [
      sql`${this.pk(self, root)} = ${this.pk(ROOT, root)}`,
      ...clausesOf(spec.filters).map((c) => this.bound(c, bound, spec.path.hops, aliases, new Map())),
      ...narrowing
        .filter((c) => sharedPrefix(c.path.hops, spec.path.hops) > 0)
        .map((c) => this.bound(c, bound, spec.path.hops, aliases, new Map())),
    ];
    return sql`(${sql.join([
      sql`select ${this.call(spec.func, this.value(chain.alias, spec.path, new Map()))}`,
      sql`from ${sql.table(root.table)} as ${sql.id(self)}`,
      ...chain.steps.map((s) => this.join(s)),
      sql`where ${sql.join(conds, AND)}`,
    ], SPACE)})`;
  }

  /**
   * A root-scoped clause evaluated against bound aliases: the first `k`
   * hops shared with `binding` reuse them, the rest is existential.
   */
  private bound(
    c: Clause,
    bound: readonly string[],
    binding: readonly RelationHop[],
    aliases: Aliases,
    computed: Computed,
  ): Fragment {
    const k = Math.min(sharedPrefix(c.path.hops, binding), bound.length - 1);
    const start = bound[k] ?? ROOT;
    const rest = c.path.hops.slice(k);
    if (rest.length === 0) {
      const cond = sql.join(this.compares(this.value(start, c.path, computed), c), AND);
      return c.exclude ? sql`(${cond}) is not true` : cond;
    }
    const chain = this.chain(rest, start, aliases);
    const exists = sql`exists ${this.subquery(chain.steps, sql`1`, this.compares(this.value(chain.alias, c.path, computed), c))}`;
    return c.exclude ? sql`not ${exists}` : exists;
  }

  // Sort values through relations order by their min (asc) or max (desc).
  private sortExpr(key: SortKey, from: string, aliases: Aliases, computed: Computed): Fragment {
    if (key.path.hops.length === 0) return this.value(from, key.path, computed);
    const chain = this.chain(key.path.hops, from, aliases);
    const term = this.value(chain.alias, key.path, computed);
    return this.subquery(chain.steps, this.call(key.descending ? 'max' : 'min', term), []);
  }

  // ---- SQL pieces ----

  private chain(hops: readonly RelationHop[], from: string, aliases: Aliases): Chain {
    const steps: Step[] = [];
    const targets: string[] = [];
    let current = from;
    for (const hop of hops) {
      const link = hop.relation.link;
      if (link.kind === 'junction') {
        const j = aliases.next();
        const to = aliases.next();
        steps.push({ table: link.table, alias: j, on: sql`${sql.id(j, link.sourceColumn)} = ${this.pk(current, hop.from)}` });
        steps.push({ table: hop.to.table, alias: to, on: sql`${this.pk(to, hop.to)} = ${sql.id(j, link.targetColumn)}` });
        targets.push(to);
        current = to;
        continue;
      }
      const to = aliases.next();
      const on = link.kind === 'foreignKey'
        ? sql`${this.pk(to, hop.to)} = ${sql.id(current, link.column)}`
        : sql`${sql.id(to, link.column)} = ${this.pk(current, hop.from)}`;
      steps.push({ table: hop.to.table, alias: to, on });
      targets.push(to);
      current = to;
    }
    return { steps, targets, alias: current };
  }

  // `(select <expr> from <first step> <joins> where <first link> and <conds>)`
  private subquery(steps: readonly Step[], select: Fragment, conds: readonly Fragment[]): Fragment {
    const [first, ...rest] = steps;
    if (!first) return sql`(select ${select})`;
    return sql`(${sql.join([
      sql`select ${select}`,
      sql`from ${sql.table(first.table)} as ${sql.id(first.alias)}`,
      ...rest.map((s) => this.join(s)),
      sql`where ${sql.join([first.on, ...conds], AND)}`,
    ], SPACE)})`;
  }

  private join(s: Step): Fragment {
    return sql`inner join ${sql.table(s.table)} as ${sql.id(s.alias)} on ${s.on}`;
  }

  private where(conds: readonly Fragment[]): Fragment[] {
    return conds.length > 0 ? [sql`where ${sql.join(conds, AND)}`] : [];
  }

  private window(offset: number, limit: number | undefined): Fragment[] {
    if (limit === undefined) {
      // MySQL has no OFFSET without LIMIT
      return offset > 0 ? [sql`limit 18446744073709551615 offset ${sql.lit(offset)}`] : [];
    }
    return [offset > 0 ? sql`limit ${sql.lit(limit)} offset ${sql.lit(offset)}` : sql`limit ${sql.lit(limit)}`];
  }

  private distinct(plan: PlanData): Fragment {
    return plan.distinct || plan.annotations.length > 0 ? sql` distinct` : sql``;
  }

  // Stored fields and to-one foreign keys, named as the row exposes them.
  private columns(entity: EntityType, alias: string): Fragment[] {
    return [
      ...this.schema.fieldsOf(entity).map((f) => sql`${sql.id(alias, columnOf(f))} as ${sql.id(f.name)}`),
      ...this.schema.relationsOf(entity).flatMap((r) =>
        r.link.kind === 'foreignKey' ? [sql`${sql.id(alias, r.link.column)} as ${sql.id(r.name)}`] : []),
    ];
  }

  private value(alias: string, path: ValuePath, computed: Computed): Fragment {
    if (path.terminal.kind === 'computed') return this.expr(computed, path.terminal.name);
    return sql.id(alias, columnOf(path.terminal.field));
  }

  private expr(computed: Computed, name: string): Fragment {
    const e = computed.get(name);
    if (!e) throw new Error(`Annotation '${name}' is not part of this statement`);
    return e;
  }

  private pk(alias: string, entity: EntityType): Fragment {
    return sql.id(alias, columnOf(this.schema.primaryKeyOf(entity)));
  }

  private call(func: AggregateFunction, term: Fragment): Fragment {
    return sql`${sql.raw(FUNCTIONS[func])}(${term})`;
  }

  private compares(target: Fragment, c: Clause): Fragment[] {
    return c.predicates.map((p) => this.compare(target, p));
  }

  private compare(target: Fragment, p: Predicate): Fragment {
    const v = p.value;
    if (v.kind === 'null') return sql`${target} is null`;
    const text = v.kind === 'datetime' ? v.value.toISOString() : String(v.value);
    const binary = (op: string, param: unknown) => sql`${target} ${sql.raw(op)} ${param} collate utf8mb4_bin`;
    const folded = (op: string, param: unknown) => sql`lower(${target}) ${sql.raw(op)} lower(${param})`;

    switch (p.operator) {
      case 'exact': return v.kind === 'string' ? binary('=', v.value) : sql`${target} = ${v.value}`;
      case 'iexact': return folded('=', text);
      case 'gt': return sql`${target} > ${v.value}`;
      case 'gte': return sql`${target} >= ${v.value}`;
      case 'lt': return sql`${target} < ${v.value}`;
      case 'lte': return sql`${target} <= ${v.value}`;
      case 'startswith': return binary('like', `${escapeLike(text)}%`);
      case 'istartswith': return folded('like', `${escapeLike(text)}%`);
      case 'endswith': return binary('like', `%${escapeLike(text)}`);
      case 'iendswith': return folded('like', `%${escapeLike(text)}`);
      case 'contains': return binary('like', `%${escapeLike(text)}%`);
      case 'icontains': return folded('like', `%${escapeLike(text)}%`);
    }
  }
}
