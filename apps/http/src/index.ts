// apps/http/src/index.ts
import path from 'node:path';
import pino from 'pino';
import type { QueryBackend, SchemaReflection } from '@sieve/core';
import { MemoryBackend } from '@sieve/backend-memory';
import { MySQLBackend } from '@sieve/backend-mysql';
import { createEngine } from '@sieve/engine';
import { findUp, loadSchema, resolveSchemaPath } from '@sieve/schema';
import { buildApp } from './app';
import { readConfig, type AppConfig } from './config';

async function openBackend(config: AppConfig, schema: SchemaReflection): Promise<QueryBackend> {
  if (config.QUERY_BACKEND === 'mysql') {
    return MySQLBackend.connect(schema, {
      uri: config.MYSQL_URI,
      logger: pino({ name: 'sieve-mysql', level: config.LOG_LEVEL }),
    });
  }
  const dataPath = config.DATA_PATH
    ? path.resolve(config.DATA_PATH)
    : findUp(path.join('fixtures', 'geography.json'));
  if (!dataPath) throw new Error('No data file found. Provide DATA_PATH for the memory backend.');
  return MemoryBackend.fromFile(schema, dataPath);
}

async function main() {
  const config = readConfig();
  const schema = await loadSchema(resolveSchemaPath(config.SCHEMA_PATH));
  const backend = await openBackend(config, schema);

  const engine = createEngine({
    schema,
    backend,
    settings: {
      defaultLimit: config.QUERY_DEFAULT_LIMIT,
      maxLimit: config.QUERY_MAX_LIMIT,
      maxDepth: config.QUERY_MAX_DEPTH,
    },
    logger: pino({ name: 'sieve-engine', level: config.LOG_LEVEL }),
  });

  const app = await buildApp({
    engine,
    usePermissions: config.QUERY_USE_PERMISSIONS,
    corsOrigin: config.CORS_ORIGIN,
    logger: { level: config.LOG_LEVEL },
  });

  app.log.info(
    {
      backend: backend.name,
      mysql_uri: config.MYSQL_URI ? 'env:MYSQL_URI' : 'default',
      entities: schema.entities().length,
      permissions: config.QUERY_USE_PERMISSIONS,
    },
    'engine-config',
  );

  const onShutdown = async (signal: string) => {
    app.log.info({ signal }, 'shutting-down');
    try {
      await app.close();
    } finally {
      process.exit(0);
    }
  };
  process.on('SIGINT', () => void onShutdown('SIGINT'));
  process.on('SIGTERM', () => void onShutdown('SIGTERM'));

  await app.listen({ port: config.PORT, host: config.HOST });
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Fatal boot error', err);
  process.exit(1);
});
