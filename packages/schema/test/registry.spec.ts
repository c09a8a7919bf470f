import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { SchemaModelError, SchemaRegistry, findUp, loadSchema } from '../src';

const SCHEMA_PATH = fileURLToPath(new URL('../../../schema.json', import.meta.url));

interface RawEntity {
  name: string;
  table: string;
  primaryKey: string;
  fields: Array<Record<string, string>>;
  relations?: Array<Record<string, unknown>>;
}

interface RawModel {
  version: string;
  entities: RawEntity[];
  visibility?: unknown;
  extra?: unknown;
}

const minimal = (overrides: Partial<RawModel> = {}): RawModel => ({
  version: 'schema/0.1',
  entities: [
    {
      name: 'Author',
      table: 'author',
      primaryKey: 'id',
      fields: [{ name: 'id', type: 'integer' }, { name: 'name', type: 'string' }],
      relations: [
        { name: 'books', target: 'Book', cardinality: 'many', link: { kind: 'reverse', column: 'author_id' } },
      ],
    },
    {
      name: 'Book',
      table: 'book',
      primaryKey: 'id',
      fields: [{ name: 'id', type: 'integer' }, { name: 'title', type: 'string', column: 'book_title' }],
    },
  ],
  ...overrides,
});

describe('SchemaRegistry', () => {
  it('looks entities up by name, then by table', () => {
    const schema = SchemaRegistry.fromJSON(minimal());
    expect(schema.entity('Author')?.table).toBe('author');
    expect(schema.entity('book')?.name).toBe('Book');
    expect(schema.entity('Magazine')).toBeUndefined();
  });

  it('defaults relations and resolves targets and primary keys', () => {
    const schema = SchemaRegistry.fromJSON(minimal());
    const book = schema.entity('Book');
    const author = schema.entity('Author');
    if (!book || !author) throw new Error('missing entities');
    expect(schema.relationsOf(book)).toEqual([]);
    expect(schema.primaryKeyOf(book)).toEqual({ name: 'id', type: 'integer' });
    const [books] = schema.relationsOf(author);
    if (!books) throw new Error('missing relation');
    expect(schema.target(books)).toBe(book);
  });

  it('rejects a relation to an unknown entity', () => {
    const raw = minimal();
    raw.entities[0]?.relations?.push({
      name: 'prizes', target: 'Prize', cardinality: 'many', link: { kind: 'reverse', column: 'author_id' },
    });
    expect(() => SchemaRegistry.fromJSON(raw)).toThrow(
      new SchemaModelError("Relation 'Author.prizes' targets unknown entity 'Prize'"),
    );
  });

  it('rejects a primary key that is not a field', () => {
    const raw = minimal();
    const [author] = raw.entities;
    if (!author) throw new Error('missing entity');
    author.primaryKey = 'uuid';
    expect(() => SchemaRegistry.fromJSON(raw)).toThrow("Primary key 'uuid' is not a field of 'Author'");
  });

  it('rejects a relation named like a field', () => {
    const raw = minimal();
    raw.entities[0]?.relations?.push({
      name: 'name', target: 'Book', cardinality: 'one', link: { kind: 'foreignKey', column: 'book_id' },
    });
    expect(() => SchemaRegistry.fromJSON(raw)).toThrow("Duplicate field 'name' on 'Author'");
  });

  it('rejects visibility rules for unknown entities', () => {
    expect(() => SchemaRegistry.fromJSON(minimal({ visibility: { private: { Magazine: ['title'] } } })))
      .toThrow("Visibility rules name unknown entity 'Magazine'");
  });

  it('validates the document shape with zod', () => {
    expect(() => SchemaRegistry.fromJSON({ version: 'schema/0.1', entities: [] })).toThrow(ZodError);
    expect(() => SchemaRegistry.fromJSON(minimal({ extra: true }))).toThrow(ZodError);
  });
});

describe('loadSchema', () => {
  it('reads the sample schema with its visibility rules', async () => {
    const schema = await loadSchema(SCHEMA_PATH);
    expect(schema.entities().map((e) => e.name)).toEqual(['Continent', 'Region', 'Country', 'River', 'Mountain', 'Disaster']);
    expect(schema.visibility).toEqual({ private: { Disaster: ['comment'] } });
  });

  it('fails with the path when the file is missing', async () => {
    await expect(loadSchema('/nonexistent/schema.json')).rejects.toThrow('schema.json not found at /nonexistent/schema.json');
  });

  it('finds files in parent directories', () => {
    expect(findUp('schema.json', path.join(path.dirname(SCHEMA_PATH), 'packages', 'schema'))).toBe(SCHEMA_PATH);
  });
});
