import { describe, it, expect, beforeAll } from 'vitest';
import type { EntityType, RelationHop } from '@sieve/core';
import type { QueryEngine } from '@sieve/engine';
import type { SchemaRegistry } from '@sieve/schema';
import { MemoryBackend, toStore } from '../src';
import { entity, geography } from '../../../tests/helpers';

describe('MemoryBackend', () => {
  let schema: SchemaRegistry;
  let backend: MemoryBackend;
  let engine: QueryEngine;
  let country: EntityType;
  let river: EntityType;

  beforeAll(async () => {
    ({ schema, backend, engine } = await geography());
    country = entity(schema, 'Country');
    river = entity(schema, 'River');
  });

  const names = async (params: Record<string, string>) =>
    (await backend.rows(engine.plan(country, { ...params, 'c:limit': '0' }))).map((r) => r.name);

  const hop = (from: EntityType, name: string): RelationHop => {
    const relation = schema.relationsOf(from).find((r) => r.name === name);
    if (!relation) throw new Error(`no relation ${name}`);
    return { from, relation, to: schema.target(relation) };
  };

  it('returns rows with foreign keys under the relation name', async () => {
    const rows = await backend.rows(engine.plan(country, { name: 'France' }));
    expect(rows).toEqual([{ id: 1, name: 'France', area: 551695, population: 67000000, region: 1 }]);
  });

  it('yields one row per satisfying chain through a to-many relation', async () => {
    expect(await names({ 'rivers.length': '>1000' })).toEqual([
      'France', 'Germany', 'Poland', 'Brazil', 'Peru', 'United States', 'United States', 'Canada',
    ]);
    expect(await backend.count(engine.plan(country, { 'rivers.length': '>1000' }))).toBe(8);
  });

  it('collapses duplicates when distinct', async () => {
    expect(await backend.count(engine.plan(country, { 'rivers.length': '>1000', 'c:distinct': '1' }))).toBe(7);
  });

  it('keeps rows with no related object on an exclude filter', async () => {
    expect(await names({ 'rivers.name': '!Rhine' })).toEqual([
      'Poland', 'Brazil', 'Peru', 'United States', 'Canada', 'Atlantis',
    ]);
  });

  it('sorts to-many paths by their minimum ascending, nulls first', async () => {
    expect(await names({ 'c:sort': 'rivers.length' })).toEqual([
      'Atlantis', 'Germany', 'Poland', 'France', 'United States', 'Canada', 'Brazil', 'Peru',
    ]);
  });

  it('sorts to-many paths by their maximum descending, nulls last', async () => {
    expect(await names({ 'c:sort': '-rivers.length' })).toEqual([
      'Brazil', 'Peru', 'United States', 'Canada', 'France', 'Germany', 'Poland', 'Atlantis',
    ]);
  });

  it('reads datetime columns as dates', async () => {
    const disaster = entity(schema, 'Disaster');
    const [flood] = await backend.rows(engine.plan(disaster, { event: 'Flood' }));
    expect(flood?.date).toEqual(new Date(Date.UTC(2021, 6, 14)));
  });

  it('aggregates over the filtered rows', async () => {
    const ctx = engine.compile(country, { 'region.continent.name': 'Europe', 'c:aggregate': 'field=population|func=sum|to=total' });
    const [spec] = ctx.aggregates;
    if (!spec) throw new Error('no aggregate');
    expect(await backend.aggregate(engine.plan(country, { 'region.continent.name': 'Europe' }), spec)).toBe(188000000);
  });

  it('fetches related rows per anchor in key order', async () => {
    const related = await backend.related({
      root: country,
      hops: [hop(country, 'rivers')],
      anchors: [[1], [6]],
      filters: [],
      sort: [],
    });
    expect(related.map((r) => [r.anchor, r.row.name])).toEqual([
      [[1], 'Rhine'],
      [[6], 'Mississippi'],
      [[6], 'Yukon'],
    ]);
  });

  it('binds related filters to the anchor chain and applies the join sort', async () => {
    const filters = engine.plan(country, { 'rivers.length': '>3500' }).predicates;
    const filtered = await backend.related({ root: country, hops: [hop(country, 'rivers')], anchors: [[6]], filters, sort: [] });
    expect(filtered.map((r) => r.row.name)).toEqual(['Mississippi']);

    const sort = engine.plan(river, { 'c:sort': 'length' }).sort;
    const sorted = await backend.related({ root: country, hops: [hop(country, 'rivers')], anchors: [[2]], filters: [], sort });
    expect(sorted.map((r) => r.row.name)).toEqual(['Oder', 'Rhine']);
  });

  it('follows deep anchors through intermediate keys', async () => {
    const region = entity(schema, 'Region');
    const related = await backend.related({
      root: country,
      hops: [hop(country, 'region'), hop(region, 'continent')],
      anchors: [[1, 1], [1, 4]],
      filters: [],
      sort: [],
    });
    // France is not in region 4
    expect(related).toEqual([{ anchor: [1, 1], row: { id: 1, name: 'Europe' } }]);
  });

  it('lists related keys for every parent', async () => {
    const region = entity(schema, 'Region');
    const countries = hop(region, 'countries').relation;
    const keys = await backend.relatedKeys(region, countries, [4, 99]);
    expect([...keys]).toEqual([['4', [6, 7]], ['99', []]]);
  });

  it('explains how many rows matched', async () => {
    expect(await backend.explain(engine.plan(country, { 'rivers.name': 'Rhine' }))).toEqual({
      backend: 'memory',
      detail: { table: 'country', scanned: 8, matched: 2 },
    });
  });
});

describe('toStore', () => {
  it('validates the table shape', () => {
    expect(() => toStore([])).toThrow('Data file must be an object of tables');
    expect(() => toStore({ country: 1 })).toThrow("Table 'country' must be an array of rows");
    expect(() => toStore({ country: [1] })).toThrow("Row 0 of 'country' must be an object");
    expect(toStore({ country: [{ id: 1 }] })).toEqual({ country: [{ id: 1 }] });
  });
});
