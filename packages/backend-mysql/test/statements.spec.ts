/* packages/backend-mysql/test/statements.spec.ts */
import { describe, it, beforeAll, expect } from 'vitest';
import { DummyDriver, Kysely, MysqlAdapter, MysqlIntrospector, MysqlQueryCompiler } from 'kysely';
import type { EntityType, RelationHop } from '@sieve/core';
import { createEngine, type QueryEngine } from '@sieve/engine';
import { loadSchema, type SchemaRegistry } from '@sieve/schema';
import { MySQLBackend, MysqlStatements, escapeLike, type DynamicDatabase } from '../src';
import { SCHEMA_PATH, entity, silentLogger } from '../../../tests/helpers';

// Compiles statements without a server: every query returns no rows.
function dummyDb(): Kysely<DynamicDatabase> {
  return new Kysely<DynamicDatabase>({
    dialect: {
      createAdapter: () => new MysqlAdapter(),
      createDriver: () => new DummyDriver(),
      createIntrospector: (db) => new MysqlIntrospector(db),
      createQueryCompiler: () => new MysqlQueryCompiler(),
    },
  });
}

const COUNTRY_COLUMNS =
  '`t0`.`id` as `id`, `t0`.`name` as `name`, `t0`.`area` as `area`, `t0`.`population` as `population`, `t0`.`region_id` as `region`';

describe('MySQL statements', () => {
  let schema: SchemaRegistry;
  let db: Kysely<DynamicDatabase>;
  let statements: MysqlStatements;
  let engine: QueryEngine;
  let country: EntityType;

  beforeAll(async () => {
    schema = await loadSchema(SCHEMA_PATH);
    db = dummyDb();
    statements = new MysqlStatements(schema);
    engine = createEngine({ schema, backend: new MySQLBackend(schema, db, silentLogger), logger: silentLogger });
    country = entity(schema, 'Country');
  });

  const hop = (from: EntityType, name: string): RelationHop => {
    const relation = from.relations.find((r) => r.name === name);
    if (!relation) throw new Error(`no relation ${name}`);
    return { from, relation, to: schema.target(relation) };
  };

  it('selects stored fields and foreign keys with a case-sensitive equality', () => {
    const plan = engine.plan(country, { name: 'France' });
    const { sql, parameters } = statements.rows(plan).compile(db);
    expect(sql).toBe(
      `select ${COUNTRY_COLUMNS} from \`country\` as \`t0\` where \`t0\`.\`name\` = ? collate utf8mb4_bin order by \`id\` asc limit 10`,
    );
    expect(parameters).toEqual(['France']);
  });

  it('folds case and escapes LIKE patterns when case-insensitive', () => {
    const plan = engine.plan(country, new URLSearchParams('c:case=0&name=^fr_'));
    const { sql, parameters } = statements.rows(plan).compile(db);
    expect(sql).toContain('where lower(`t0`.`name`) like lower(?)');
    expect(parameters).toEqual(['fr\\_%']);
  });

  it('joins one chain per filter through a junction table', () => {
    const plan = engine.plan(country, { 'rivers.name': 'Rhine' });
    const { sql, parameters } = statements.rows(plan).compile(db);
    expect(sql).toContain(
      'from `country` as `t0` inner join `river_countries` as `t1` on `t1`.`country_id` = `t0`.`id` '
      + 'inner join `river` as `t2` on `t2`.`id` = `t1`.`river_id` where `t2`.`name` = ? collate utf8mb4_bin',
    );
    expect(parameters).toEqual(['Rhine']);
  });

  it('compares every value of one field on the same joined row', () => {
    const plan = engine.plan(country, { 'rivers.length': '[800,]1300' });
    const { sql, parameters } = statements.rows(plan).compile(db);
    expect(sql).toContain(
      'inner join `river` as `t2` on `t2`.`id` = `t1`.`river_id` where `t2`.`length` >= ? and `t2`.`length` <= ? order by',
    );
    expect(sql).not.toContain('`t3`');
    expect(parameters).toEqual([800, 1300]);
  });

  it('gives separate fields separate chains', () => {
    const plan = engine.plan(country, { 'rivers.length': '>1000', 'rivers.name': 'Rhine' });
    const { sql } = statements.rows(plan).compile(db);
    expect(sql).toContain(
      'inner join `river_countries` as `t3` on `t3`.`country_id` = `t0`.`id` inner join `river` as `t4` on `t4`.`id` = `t3`.`river_id` '
      + 'where `t2`.`length` > ? and `t4`.`name` = ? collate utf8mb4_bin',
    );
  });

  it('tests excluding filters through relations with not exists', () => {
    const plan = engine.plan(country, { 'rivers.name': '!Rhine' });
    const { sql } = statements.rows(plan).compile(db);
    expect(sql).toContain(
      'where not exists (select 1 from `river_countries` as `t1` inner join `river` as `t2` on `t2`.`id` = `t1`.`river_id` '
      + 'where `t1`.`country_id` = `t0`.`id` and `t2`.`name` = ? collate utf8mb4_bin)',
    );
  });

  it('keeps rows with a null column out of an excluded equality', () => {
    const plan = engine.plan(country, { population: '!0' });
    const { sql, parameters } = statements.rows(plan).compile(db);
    expect(sql).toContain('where (`t0`.`population` = ?) is not true');
    expect(parameters).toEqual([0]);
  });

  it('orders to-many sort keys by their maximum when descending', () => {
    const plan = engine.plan(country, { 'c:sort': '-rivers.length' });
    const { sql } = statements.rows(plan).compile(db);
    expect(sql).toContain(
      '(select max(`t2`.`length`) from `river_countries` as `t1` inner join `river` as `t2` on `t2`.`id` = `t1`.`river_id` '
      + 'where `t1`.`country_id` = `t0`.`id`) as `__s0`',
    );
    expect(sql).toContain('order by `__s0` desc, `id` asc limit 10');
  });

  it('selects annotations as correlated subqueries over distinct rows', () => {
    const plan = engine.plan(country, { 'c:annotate': 'field=rivers.length|func=max|to=longest' });
    const { sql } = statements.rows(plan).compile(db);
    expect(sql.startsWith('select distinct `t0`.`id` as `id`')).toBe(true);
    expect(sql).toContain(
      '(select max(`t3`.`length`) from `country` as `t1` inner join `river_countries` as `t2` on `t2`.`country_id` = `t1`.`id` '
      + 'inner join `river` as `t3` on `t3`.`id` = `t2`.`river_id` where `t1`.`id` = `t0`.`id`) as `longest`',
    );
  });

  it('windows with offset and without an upper bound', () => {
    const plan = engine.plan(country, new URLSearchParams('c:limit=0&c:start=2'));
    const { sql } = statements.rows(plan).compile(db);
    expect(sql.endsWith('order by `id` asc limit 18446744073709551615 offset 2')).toBe(true);
  });

  it('counts over the unwindowed rows', () => {
    const plan = engine.plan(country, { name: 'France' });
    const { sql } = statements.count(plan).compile(db);
    expect(sql).toBe(
      'select count(*) as `n` from (select `t0`.* from `country` as `t0` where `t0`.`name` = ? collate utf8mb4_bin) as `q`',
    );
  });

  it('aggregates population statistics through relations', () => {
    const plan = engine.plan(country, {});
    const river = entity(schema, 'River');
    const length = river.fields.find((f) => f.name === 'length');
    if (!length) throw new Error('no length field');
    const spec = {
      name: 'spread',
      func: 'stddev' as const,
      path: { raw: 'rivers.length', root: country, hops: [hop(country, 'rivers')], entity: river, terminal: { kind: 'field' as const, field: length } },
    };
    const { sql } = statements.aggregate(plan, spec).compile(db);
    expect(sql).toBe(
      'select stddev_pop(`t2`.`length`) as `value` from (select `t0`.* from `country` as `t0`) as `q` '
      + 'inner join `river_countries` as `t1` on `t1`.`country_id` = `q`.`id` inner join `river` as `t2` on `t2`.`id` = `t1`.`river_id`',
    );
  });

  it('tags related rows with the keys of their anchor chain', () => {
    const { sql, parameters } = statements.related({
      root: country,
      hops: [hop(country, 'rivers')],
      anchors: [[1], [2]],
      filters: [],
      sort: [],
    }).compile(db);
    expect(sql).toBe(
      'select `t0`.`id` as `__k0`, `t2`.`id` as `id`, `t2`.`name` as `name`, `t2`.`length` as `length`, `t2`.`discharge` as `discharge` '
      + 'from `country` as `t0` inner join `river_countries` as `t1` on `t1`.`country_id` = `t0`.`id` '
      + 'inner join `river` as `t2` on `t2`.`id` = `t1`.`river_id` where (`t0`.`id`) in ((?), (?)) order by `t2`.`id` asc',
    );
    expect(parameters).toEqual([1, 2]);
  });

  it('reads reverse relation keys from the target table', () => {
    const disasters = hop(country, 'disasters');
    const { sql, parameters } = statements.relatedKeys(country, disasters.relation, [1, 2]).compile(db);
    expect(sql).toBe(
      'select `t0`.`country_id` as `parent`, `t0`.`id` as `related` from `disaster` as `t0` where `t0`.`country_id` in (?, ?) order by `t0`.`id` asc',
    );
    expect(parameters).toEqual([1, 2]);
  });

  it('escapes LIKE wildcards and the escape character', () => {
    expect(escapeLike('50%_\\')).toBe('50\\%\\_\\\\');
  });
});

describe('MySQLBackend', () => {
  let schema: SchemaRegistry;
  let backend: MySQLBackend;
  let engine: QueryEngine;

  beforeAll(async () => {
    schema = await loadSchema(SCHEMA_PATH);
    backend = new MySQLBackend(schema, dummyDb(), silentLogger);
    engine = createEngine({ schema, backend, logger: silentLogger });
  });

  it('returns the compiled statement from explain', async () => {
    const country = entity(schema, 'Country');
    const plan = engine.plan(country, { name: 'France' });
    const explained = await backend.explain(plan);
    expect(explained.backend).toBe('mysql');
    expect(explained.sql).toBe(new MysqlStatements(schema).rows(plan).compile(dummyDb()).sql);
    expect(explained.params).toEqual(['France']);
    expect(explained.detail).toBeNull();
  });

  it('maps empty results to empty rows and a zero count', async () => {
    const plan = engine.plan(entity(schema, 'Country'), {});
    expect(await backend.rows(plan)).toEqual([]);
    expect(await backend.count(plan)).toBe(0);
  });

  it('skips the round trip when there is nothing to relate', async () => {
    const country = entity(schema, 'Country');
    const rivers = country.relations.find((r) => r.name === 'rivers');
    if (!rivers) throw new Error('no rivers relation');
    expect(await backend.related({
      root: country,
      hops: [{ from: country, relation: rivers, to: schema.target(rivers) }],
      anchors: [],
      filters: [],
      sort: [],
    })).toEqual([]);
    expect(await backend.relatedKeys(country, rivers, [])).toEqual(new Map());
  });

  it('reports healthy when the check query runs', async () => {
    expect(await backend.health()).toEqual({ ok: true });
  });
});
