import type {
  EntityRow,
  EntityType,
  JsonRow,
  JsonValue,
  Key,
  QueryBackend,
  RelationDescriptor,
  SchemaReflection,
  StoredValue,
} from '@sieve/core';
import { chainKey, isKey, keyOf } from '@sieve/core';
import type { Censor } from './censor';
import type { JoinNode } from './joins';

export function toJson(v: StoredValue | undefined): JsonValue {
  if (v === undefined) return null;
  return v instanceof Date ? v.toISOString() : v;
}

export interface RenderRequest {
  root: EntityType;
  rows: EntityRow[];
  visible: string[];
  joins: ReadonlyMap<string, JoinNode>;
  censor: Censor;
}

interface Level {
  entity: EntityType;
  rows: EntityRow[];
  chains: Key[][]; // root key ... this row's key
  visible: string[];
  joins: ReadonlyMap<string, JoinNode>;
}

/**
 * Turns backend rows into JSON rows: visible scalar and computed fields,
 * to-one relations as a key, to-many relations as a key list, and joined
 * relations expanded level by level with one backend call per join.
 */
export class RowSerializer {
  constructor(
    private readonly schema: SchemaReflection,
    private readonly backend: QueryBackend,
  ) {}

  async render(req: RenderRequest): Promise<JsonRow[]> {
    const chains = req.rows.map((r) => [this.keyOf(req.root, r)]);
    return this.level(req.root, req.censor, {
      entity: req.root,
      rows: req.rows,
      chains,
      visible: req.visible,
      joins: req.joins,
    });
  }

  /** Names a joined entity shows, in declaration order. */
  joinVisible(node: JoinNode, censor: Censor): string[] {
    const all = censor.visibleNames(node.entity);
    const shown = node.show ? all.filter((n) => node.show?.includes(n)) : all;
    return shown.filter((n) => !node.hide.includes(n));
  }

  private async level(root: EntityType, censor: Censor, lvl: Level): Promise<JsonRow[]> {
    const out: JsonRow[] = lvl.rows.map(() => ({}));
    const fields = new Set(this.schema.fieldsOf(lvl.entity).map((f) => f.name));
    const relations = new Map(this.schema.relationsOf(lvl.entity).map((r) => [r.name, r]));

    const expanded = new Map<string, JsonValue[]>();
    for (const name of lvl.visible) {
      const relation = relations.get(name);
      if (!relation) continue;
      const node = lvl.joins.get(name);
      expanded.set(name, node
        ? await this.expand(root, censor, lvl, node)
        : await this.keys(lvl, relation));
    }

    lvl.rows.forEach((row, i) => {
      const o = out[i];
      if (!o) return;
      for (const name of lvl.visible) {
        const values = expanded.get(name);
        if (values) o[name] = values[i] ?? null;
        else if (fields.has(name) || !relations.has(name)) o[name] = toJson(row[name]);
      }
    });
    return out;
  }

  // Un-joined relation: the related key(s) of every row.
  private async keys(lvl: Level, relation: RelationDescriptor): Promise<JsonValue[]> {
    if (relation.link.kind === 'foreignKey') {
      return lvl.rows.map((r) => toJson(r[relation.name]));
    }
    const parents = [...new Map(lvl.rows.map((r) => {
      const k = this.keyOf(lvl.entity, r);
      return [keyOf(k), k] as const;
    })).values()];
    const related = await this.backend.relatedKeys(lvl.entity, relation, parents);
    return lvl.rows.map((r) => {
      const ks = related.get(keyOf(this.keyOf(lvl.entity, r))) ?? [];
      return relation.cardinality === 'many' ? ks : ks[0] ?? null;
    });
  }

  private async expand(root: EntityType, censor: Censor, lvl: Level, node: JoinNode): Promise<JsonValue[]> {
    const anchors = [...new Map(lvl.chains.map((c) => [chainKey(c), c] as const)).values()];
    const related = await this.backend.related({
      root,
      hops: node.hops,
      anchors,
      filters: node.filters,
      sort: node.sort,
    });

    const byParent = new Map<string, EntityRow[]>();
    for (const r of related) {
      const k = chainKey(r.anchor);
      byParent.set(k, [...(byParent.get(k) ?? []), r.row]);
    }

    const many = node.relation.cardinality === 'many';
    const childRows: EntityRow[] = [];
    const childChains: Key[][] = [];
    const spans = lvl.chains.map((chain) => {
      let list = byParent.get(chainKey(chain)) ?? [];
      if (many) list = list.slice(node.offset, node.limit > 0 ? node.offset + node.limit : undefined);
      else list = list.slice(0, 1);
      const from = childRows.length;
      for (const row of list) {
        childRows.push(row);
        childChains.push([...chain, this.keyOf(node.entity, row)]);
      }
      return { from, to: childRows.length };
    });

    const rendered = await this.level(root, censor, {
      entity: node.entity,
      rows: childRows,
      chains: childChains,
      visible: this.joinVisible(node, censor),
      joins: node.children,
    });

    return spans.map(({ from, to }) => {
      const items = rendered.slice(from, to);
      return many ? items : items[0] ?? null;
    });
  }

  private keyOf(entity: EntityType, row: EntityRow): Key {
    const k = row[this.schema.primaryKeyOf(entity).name];
    if (!isKey(k)) throw new Error(`Row of '${entity.name}' has no primary key value`);
    return k;
  }
}
