import fs from 'node:fs';
import path from 'node:path';
import { SchemaRegistry } from './registry';

export * from './registry';

export function findUp(filename: string, startDir = process.cwd()): string | null {
  let dir = startDir;
  while (true) {
    const candidate = path.join(dir, filename);
    if (fs.existsSync(candidate)) return candidate;
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

export function resolveSchemaPath(explicit?: string): string {
  if (explicit) return path.resolve(explicit);
  return findUp('schema.json') ?? path.resolve('schema.json');
}

export async function loadSchema(p = resolveSchemaPath()): Promise<SchemaRegistry> {
  if (!fs.existsSync(p)) {
    throw new Error(`schema.json not found at ${p}. Provide SCHEMA_PATH or a schema.json in a parent directory.`);
  }
  const raw: unknown = JSON.parse(await fs.promises.readFile(p, 'utf-8'));
  return SchemaRegistry.fromJSON(raw);
}
