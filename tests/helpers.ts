/* tests/helpers.ts */
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import pino from 'pino';
import type { EntityType, JsonRow, JsonValue, QueryResult, SchemaReflection } from '@sieve/core';
import { MemoryBackend } from '@sieve/backend-memory';
import { createEngine, type EngineOptions, type QueryEngine } from '@sieve/engine';
import { loadSchema, type SchemaRegistry } from '@sieve/schema';

const ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..');

export const SCHEMA_PATH = path.join(ROOT, 'schema.json');
export const DATA_PATH = path.join(ROOT, 'fixtures', 'geography.json');

export const silentLogger = pino({ level: 'silent' });

export interface Geography {
  schema: SchemaRegistry;
  backend: MemoryBackend;
  engine: QueryEngine;
}

/** The sample schema and data set behind an engine with quiet logging. */
export async function geography(settings: EngineOptions['settings'] = {}): Promise<Geography> {
  const schema = await loadSchema(SCHEMA_PATH);
  const backend = await MemoryBackend.fromFile(schema, DATA_PATH);
  const engine = createEngine({ schema, backend, settings, logger: silentLogger });
  return { schema, backend, engine };
}

export function entity(schema: SchemaReflection, name: string): EntityType {
  const e = schema.entity(name);
  if (!e) throw new Error(`No entity '${name}' in the test schema`);
  return e;
}

export function rowsOf(result: QueryResult): JsonRow[] {
  if (!result.status) throw new Error(`Query failed: ${result.code} ${result.message}`);
  return result.rows ?? [];
}

/** Values of one column, in row order. */
export function column(result: QueryResult, name: string): JsonValue[] {
  return rowsOf(result).map((r) => r[name] ?? null);
}
