import { describe, it, expect, beforeAll } from 'vitest';
import type { EntityType } from '@sieve/core';
import { MemoryBackend } from '@sieve/backend-memory';
import { SchemaRegistry } from '@sieve/schema';
import { createEngine, type QueryEngine } from '../src';
import { entity, geography, rowsOf, silentLogger } from '../../../tests/helpers';

let engine: QueryEngine;
let country: EntityType;

beforeAll(async () => {
  const g = await geography();
  engine = g.engine;
  country = entity(g.schema, 'Country');
});

const rows = async (params: Record<string, string | string[]>) => rowsOf(await engine.query(country, params));

describe('c:annotate', () => {
  it('adds a computed field that can be sorted on', async () => {
    expect(await rows({
      'c:annotate': 'field=rivers|func=count|to=n_rivers',
      'c:sort': '-n_rivers,name',
      'c:show': 'name',
      'c:limit': '3',
    })).toEqual([
      { name: 'Germany', n_rivers: 2 },
      { name: 'Poland', n_rivers: 2 },
      { name: 'United States', n_rivers: 2 },
    ]);
  });

  it('lets a filter use an annotation declared later in the query', async () => {
    expect(await rows({
      n_rivers: '2',
      'c:annotate': 'field=rivers|func=count|to=n_rivers',
      'c:show': 'name',
    })).toEqual([
      { name: 'Germany', n_rivers: 2 },
      { name: 'Poland', n_rivers: 2 },
      { name: 'United States', n_rivers: 2 },
    ]);
  });

  it('applies its own filters to the aggregated chains', async () => {
    expect(await rows({
      id: '6',
      'c:annotate': 'field=mountains.height|func=max|to=peak|filters=mountains.height=<6000',
      'c:show': 'name',
    })).toEqual([{ name: 'United States', peak: 5489 }]);
  });

  it('can be hidden and aggregated', async () => {
    expect(await engine.query(country, {
      'c:annotate': 'field=rivers|func=count|to=n',
      'c:aggregate': 'field=n|func=sum|to=total',
      'c:evaluate': '0',
    })).toEqual({ status: true, total: 10 });
    expect(await rows({ id: '1', 'c:annotate': 'field=rivers|func=count|to=n', 'c:hide': 'n,rivers,mountains,disasters' }))
      .toEqual([{ id: 1, name: 'France', area: 551695, population: 67000000, region: 1 }]);
  });

  it('refuses to filter on a delayed annotation', async () => {
    expect(await engine.query(country, { n: '1', 'c:annotate': 'field=rivers|func=count|to=n|delayed=1' })).toEqual({
      status: false,
      code: 'INVALID_COMMAND_ERROR',
      message: "Invalid command 'n': delayed annotation 'n' cannot be used in a filter",
      command: 'n',
    });
  });

  it('rejects names already taken', async () => {
    expect(await engine.query(country, { 'c:annotate': 'field=rivers|func=count|to=name' })).toMatchObject({
      message: "Invalid command 'c:annotate': 'to' value ('name') is already used by a field",
    });
    expect(await engine.query(country, { 'c:annotate': ['field=rivers|func=count|to=n', 'field=area|func=max|to=n'] }))
      .toMatchObject({
        message: "Invalid command 'c:annotate': 'to' value ('n') is already used by another annotation",
      });
  });

  it('requires a known function', async () => {
    expect(await engine.query(country, { 'c:annotate': 'field=rivers|to=n' })).toMatchObject({
      message: "Invalid command 'c:annotate': 'func' argument is missing",
    });
  });
});

describe('immediate and delayed annotations', () => {
  const model = {
    version: 'schema/0.1',
    entities: [
      {
        name: 'Basin',
        table: 'basin',
        primaryKey: 'id',
        fields: [{ name: 'id', type: 'integer' }, { name: 'name', type: 'string' }],
        relations: [{ name: 'streams', target: 'Stream', cardinality: 'many', link: { kind: 'reverse', column: 'basin_id' } }],
      },
      {
        name: 'Stream',
        table: 'stream',
        primaryKey: 'id',
        fields: [{ name: 'id', type: 'integer' }, { name: 'length', type: 'integer' }],
        relations: [{ name: 'basin', target: 'Basin', cardinality: 'one', link: { kind: 'foreignKey', column: 'basin_id' } }],
      },
    ],
  };
  const store = {
    basin: [{ id: 1, name: 'A' }, { id: 2, name: 'B' }, { id: 3, name: 'C' }],
    stream: [
      { id: 1, length: 400, basin_id: 1 },
      { id: 2, length: 500, basin_id: 1 },
      { id: 3, length: 100, basin_id: 2 },
      { id: 4, length: 400, basin_id: 2 },
      { id: 5, length: 100, basin_id: 3 },
    ],
  };

  const run = async (delayed: string) => {
    const schema = SchemaRegistry.fromJSON(model);
    const basins = createEngine({ schema, backend: new MemoryBackend(schema, store), logger: silentLogger });
    return rowsOf(await basins.query(entity(schema, 'Basin'), {
      'streams.length': '>300',
      'c:annotate': `field=streams.length|func=count|to=n|delayed=${delayed}`,
      'c:show': 'name',
    }));
  };

  it('counts every related row before filtering', async () => {
    expect(await run('0')).toEqual([{ name: 'A', n: 2 }, { name: 'B', n: 2 }]);
  });

  it('counts only the rows the filters kept when delayed', async () => {
    expect(await run('1')).toEqual([{ name: 'A', n: 2 }, { name: 'B', n: 1 }]);
  });
});
