// packages/backend-memory/src/index.ts
import fs from 'node:fs';
import type {
  AggregateSpec,
  AnnotationSpec,
  BackendExplain,
  Clause,
  EntityRow,
  EntityType,
  FieldDescriptor,
  Key,
  PlanData,
  QueryBackend,
  RelatedRequest,
  RelatedRow,
  RelationDescriptor,
  RelationHop,
  SchemaReflection,
  SortKey,
  StoredValue,
  ValuePath,
} from '@sieve/core';
import { clausesOf, isKey, keyOf } from '@sieve/core';
import { aggregate, compareStored, matches } from './values';

export * from './values';

type StoredRecord = Record<string, StoredValue>;

// table -> raw rows, as read from JSON
export type MemoryStore = Record<string, Array<Record<string, unknown>>>;

interface Candidate {
  rec: StoredRecord;
  computed: Map<string, StoredValue>;
  multiplicity: number;
}

const columnOf = (f: FieldDescriptor) => f.column ?? f.name;

function sameHop(a: RelationHop, b: RelationHop): boolean {
  return a.from.name === b.from.name && a.relation.name === b.relation.name;
}

// Number of leading relation hops two paths share.
function sharedPrefix(a: readonly RelationHop[], b: readonly RelationHop[]): number {
  let k = 0;
  while (k < a.length && k < b.length && sameHop(a[k], b[k])) k++;
  return k;
}

/**
 * In-process backend over plain tables. It defines the reference row
 * semantics the SQL backends reproduce: existential filters through to-many
 * relations with one row per satisfying chain, grouping when annotated, and
 * min/max ordering on to-many sort paths.
 */
export class MemoryBackend implements QueryBackend {
  readonly name = 'memory';
  private readonly tables = new Map<string, StoredRecord[]>();
  private readonly indexes = new Map<string, Map<string, StoredRecord[]>>();

  constructor(private readonly schema: SchemaReflection, store: MemoryStore) {
    const datetimes = new Map<string, Set<string>>();
    for (const e of schema.entities()) {
      datetimes.set(e.table, new Set(e.fields.filter((f) => f.type === 'datetime').map(columnOf)));
    }
    for (const [table, rows] of Object.entries(store)) {
      const dates = datetimes.get(table) ?? new Set<string>();
      this.tables.set(table, rows.map((raw) => {
        const rec: StoredRecord = {};
        for (const [col, v] of Object.entries(raw)) rec[col] = hydrate(v, dates.has(col));
        return rec;
      }));
    }
    for (const e of schema.entities()) {
      const pk = columnOf(schema.primaryKeyOf(e));
      this.table(e.table).sort((a, b) => compareStored(a[pk] ?? null, b[pk] ?? null));
    }
  }

  static async fromFile(schema: SchemaReflection, p: string): Promise<MemoryBackend> {
    const raw: unknown = JSON.parse(await fs.promises.readFile(p, 'utf-8'));
    return new MemoryBackend(schema, toStore(raw));
  }

  // ---- QueryBackend ----

  async rows(plan: PlanData): Promise<EntityRow[]> {
    const rows = this.expand(plan);
    const end = plan.limit === undefined ? undefined : plan.offset + plan.limit;
    return rows.slice(plan.offset, end).map((c) => this.toRow(plan.entity, c.rec, c.computed));
  }

  async count(plan: PlanData): Promise<number> {
    return this.expand(plan).length;
  }

  async aggregate(plan: PlanData, spec: AggregateSpec): Promise<StoredValue> {
    const values: StoredValue[] = [];
    for (const c of this.expand(plan)) values.push(...this.values(c, spec.path));
    return aggregate(values, spec.func);
  }

  async related(req: RelatedRequest): Promise<RelatedRow[]> {
    const out: RelatedRow[] = [];
    const last = req.hops[req.hops.length - 1];
    if (!last) return out;

    const filters = clausesOf(req.filters);
    for (const anchor of req.anchors) {
      const bound = this.bind(req.root, req.hops.slice(0, -1), anchor);
      if (!bound) continue;
      const parent = bound[bound.length - 1];
      if (!parent) continue;

      const children = this.follow(parent, last)
        .filter((child) => filters.every((c) => this.holds(c, [...bound, child], req.hops)));
      for (const child of this.sorted(children, req.sort, (r) => r)) {
        out.push({ anchor, row: this.toRow(last.to, child, new Map()) });
      }
    }
    return out;
  }

  async relatedKeys(entity: EntityType, relation: RelationDescriptor, keys: Key[]): Promise<Map<string, Key[]>> {
    const hop: RelationHop = { from: entity, relation, to: this.schema.target(relation) };
    const pk = columnOf(this.schema.primaryKeyOf(hop.to));
    const out = new Map<string, Key[]>();
    for (const k of keys) {
      const rec = this.byKey(entity, k);
      const related = rec ? this.follow(rec, hop) : [];
      out.set(keyOf(k), related.map((r) => r[pk]).filter(isKey));
    }
    return out;
  }

  async explain(plan: PlanData): Promise<BackendExplain> {
    return {
      backend: this.name,
      detail: {
        table: plan.entity.table,
        scanned: this.table(plan.entity.table).length,
        matched: this.expand(plan).length,
      },
    };
  }

  async health() {
    return { ok: true };
  }

  // ---- evaluation ----

  // Filtered, annotated and ordered candidates, one entry per output row.
  private expand(plan: PlanData): Candidate[] {
    const immediate = plan.annotations.filter((a) => !a.delayed);
    const delayed = plan.annotations.filter((a) => a.delayed);
    const clauses = clausesOf(plan.predicates);
    const narrowing = clauses.filter((c) => !c.exclude);

    const kept: Candidate[] = [];
    for (const rec of this.table(plan.entity.table)) {
      const computed = new Map<string, StoredValue>();
      for (const a of immediate) computed.set(a.name, this.annotate(rec, a, []));

      let multiplicity = 1;
      for (const c of clauses) {
        const n = this.countFrom(rec, c.path.hops, c, computed);
        if (c.exclude ? n > 0 : n === 0) {
          multiplicity = 0;
          break;
        }
        if (!c.exclude) multiplicity *= n;
      }
      if (multiplicity === 0) continue;

      for (const a of delayed) computed.set(a.name, this.annotate(rec, a, narrowing));
      kept.push({ rec, computed, multiplicity });
    }

    const grouped = plan.distinct || plan.annotations.length > 0;
    const rows = kept.flatMap((c) =>
      Array.from({ length: grouped ? 1 : c.multiplicity }, () => c));
    return this.sorted(rows, plan.sort, (c) => c.rec, (c) => c.computed);
  }

  private annotate(rec: StoredRecord, spec: AnnotationSpec, narrowing: readonly Clause[]): StoredValue {
    const filters = clausesOf(spec.filters);
    const values: StoredValue[] = [];
    for (const chain of this.chains(rec, spec.path.hops)) {
      const full = [rec, ...chain];
      if (!filters.every((c) => this.holds(c, full, spec.path.hops))) continue;
      if (!narrowing.every((c) => sharedPrefix(c.path.hops, spec.path.hops) === 0 || this.holds(c, full, spec.path.hops))) continue;
      const end = full[full.length - 1];
      if (end) values.push(this.terminal(end, spec.path));
    }
    return aggregate(values, spec.func);
  }

  /**
   * Evaluates a root-scoped clause against a bound chain: hops shared with
   * `bindingHops` use the chain's objects, the rest is existential.
   */
  private holds(c: Clause, chain: readonly StoredRecord[], bindingHops: readonly RelationHop[]): boolean {
    const k = Math.min(sharedPrefix(c.path.hops, bindingHops), chain.length - 1);
    const start = chain[k];
    if (!start) return false;
    const n = this.countFrom(start, c.path.hops.slice(k), c, new Map());
    return c.exclude ? n === 0 : n > 0;
  }

  // Number of chains from `start` along `hops` whose terminal satisfies every predicate of `c`.
  private countFrom(start: StoredRecord, hops: readonly RelationHop[], c: Clause, computed: Map<string, StoredValue>): number {
    const [hop, ...rest] = hops;
    if (!hop) {
      const v = c.path.terminal.kind === 'computed'
        ? computed.get(c.path.terminal.name) ?? null
        : this.terminal(start, c.path);
      return c.predicates.every((p) => matches(v, p.operator, p.value)) ? 1 : 0;
    }
    let n = 0;
    for (const next of this.follow(start, hop)) n += this.countFrom(next, rest, c, computed);
    return n;
  }

  // Every terminal value reachable from a candidate along a path.
  private values(c: Candidate, path: ValuePath): StoredValue[] {
    if (path.terminal.kind === 'computed') return [c.computed.get(path.terminal.name) ?? null];
    return this.chains(c.rec, path.hops).map((chain) => this.terminal(chain[chain.length - 1] ?? c.rec, path));
  }

  private chains(rec: StoredRecord, hops: readonly RelationHop[]): StoredRecord[][] {
    const [hop, ...rest] = hops;
    if (!hop) return [[]];
    return this.follow(rec, hop).flatMap((next) => this.chains(next, rest).map((tail) => [next, ...tail]));
  }

  private terminal(rec: StoredRecord, path: ValuePath): StoredValue {
    if (path.terminal.kind === 'computed') return null;
    return rec[columnOf(path.terminal.field)] ?? null;
  }

  // Sort keys through to-many relations order by their min (asc) or max (desc).
  private sorted<T>(
    items: T[],
    keys: readonly SortKey[],
    recOf: (t: T) => StoredRecord,
    computedOf: (t: T) => Map<string, StoredValue> = () => new Map(),
  ): T[] {
    if (keys.length === 0) return items;
    const decorated = items.map((item, i) => ({
      item,
      i,
      values: keys.map((k) => {
        if (k.path.terminal.kind === 'computed') return computedOf(item).get(k.path.terminal.name) ?? null;
        const vs = this.chains(recOf(item), k.path.hops)
          .map((chain) => this.terminal(chain[chain.length - 1] ?? recOf(item), k.path))
          .filter((v) => v !== null);
        if (vs.length === 0) return null;
        return aggregate(vs, k.descending ? 'max' : 'min');
      }),
    }));
    decorated.sort((a, b) => {
      for (const [j, k] of keys.entries()) {
        const av = a.values[j] ?? null;
        const bv = b.values[j] ?? null;
        const c = compareStored(av, bv);
        if (c !== 0) return k.descending ? -c : c;
      }
      return a.i - b.i;
    });
    return decorated.map((d) => d.item);
  }

  // ---- storage ----

  private table(name: string): StoredRecord[] {
    let rows = this.tables.get(name);
    if (!rows) {
      rows = [];
      this.tables.set(name, rows);
    }
    return rows;
  }

  private byKey(entity: EntityType, k: Key): StoredRecord | undefined {
    return this.index(entity.table, columnOf(this.schema.primaryKeyOf(entity))).get(keyOf(k))?.[0];
  }

  // Rows of `table` grouped by the value of `column`, in primary-key order.
  private index(table: string, column: string): Map<string, StoredRecord[]> {
    const id = `${table}\u0000${column}`;
    let idx = this.indexes.get(id);
    if (!idx) {
      idx = new Map();
      for (const rec of this.table(table)) {
        const v = rec[column];
        if (!isKey(v)) continue;
        idx.set(keyOf(v), [...(idx.get(keyOf(v)) ?? []), rec]);
      }
      this.indexes.set(id, idx);
    }
    return idx;
  }

  private follow(rec: StoredRecord, hop: RelationHop): StoredRecord[] {
    const link = hop.relation.link;
    const ownKey = rec[columnOf(this.schema.primaryKeyOf(hop.from))];
    switch (link.kind) {
      case 'foreignKey': {
        const fk = rec[link.column];
        return isKey(fk) ? this.index(hop.to.table, columnOf(this.schema.primaryKeyOf(hop.to))).get(keyOf(fk)) ?? [] : [];
      }
      case 'reverse':
        return isKey(ownKey) ? this.index(hop.to.table, link.column).get(keyOf(ownKey)) ?? [] : [];
      case 'junction': {
        if (!isKey(ownKey)) return [];
        const targets = (this.index(link.table, link.sourceColumn).get(keyOf(ownKey)) ?? [])
          .map((j) => j[link.targetColumn])
          .filter(isKey)
          .flatMap<StoredRecord>((k) => this.byKey(hop.to, k) ?? []);
        const pk = columnOf(this.schema.primaryKeyOf(hop.to));
        return targets.sort((a, b) => compareStored(a[pk] ?? null, b[pk] ?? null));
      }
    }
  }

  // Root record plus the objects named by an anchor, or undefined if the chain is broken.
  private bind(root: EntityType, hops: readonly RelationHop[], anchor: readonly Key[]): StoredRecord[] | undefined {
    const [rootKey] = anchor;
    const first = rootKey === undefined ? undefined : this.byKey(root, rootKey);
    if (!first) return undefined;
    const chain = [first];
    for (const [i, hop] of hops.entries()) {
      const k = anchor[i + 1];
      const prev = chain[chain.length - 1];
      if (k === undefined || !prev) return undefined;
      const pk = columnOf(this.schema.primaryKeyOf(hop.to));
      const next = this.follow(prev, hop).find((r) => r[pk] !== undefined && r[pk] !== null && keyOf(k) === String(r[pk]));
      if (!next) return undefined;
      chain.push(next);
    }
    return chain;
  }

  private toRow(entity: EntityType, rec: StoredRecord, computed: Map<string, StoredValue>): EntityRow {
    const row: EntityRow = {};
    for (const f of this.schema.fieldsOf(entity)) row[f.name] = rec[columnOf(f)] ?? null;
    for (const r of this.schema.relationsOf(entity)) {
      if (r.link.kind === 'foreignKey') row[r.name] = rec[r.link.column] ?? null;
    }
    for (const [name, v] of computed) row[name] = v;
    return row;
  }
}

function hydrate(v: unknown, datetime: boolean): StoredValue {
  if (v === null || v === undefined) return null;
  if (datetime && typeof v === 'string') return new Date(v);
  if (typeof v === 'string' || typeof v === 'number' || typeof v === 'boolean') return v;
  if (v instanceof Date) return v;
  return JSON.stringify(v);
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/** Validates the `{ table: [row, ...] }` shape of a data file. */
export function toStore(raw: unknown): MemoryStore {
  if (!isRecord(raw)) throw new Error('Data file must be an object of tables');
  const store: MemoryStore = {};
  for (const [table, rows] of Object.entries(raw)) {
    if (!Array.isArray(rows)) throw new Error(`Table '${table}' must be an array of rows`);
    store[table] = rows.map((r, i) => {
      if (!isRecord(r)) throw new Error(`Row ${i} of '${table}' must be an object`);
      return r;
    });
  }
  return store;
}

export default MemoryBackend;
